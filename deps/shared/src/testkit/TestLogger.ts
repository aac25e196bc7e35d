import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";
import { LoggerConsole, defaultEmojiMap, logLevels } from "~shared/Logger";

const getTestLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    TEST_LOG_LEVEL: t.Union(
      logLevels.map((level) => t.Literal(level)),
      { default: "error" }
    ),
  })
);

export function buildTestLogger() {
  const { TEST_LOG_LEVEL } = getTestLoggerConfig();
  return new LoggerConsole(TEST_LOG_LEVEL, ["test"], {}, defaultEmojiMap);
}
