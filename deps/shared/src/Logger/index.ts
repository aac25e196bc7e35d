import { Type as t } from "@sinclair/typebox";
import path from "node:path";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

import { type EmojiMap, logLevels } from "./Logger";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export { LoggerConsole, serializeError } from "./LoggerConsole";

export const defaultEmojiMap: EmojiMap = {
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
  start: "🏁",
  done: "✅",
};

export const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Union(
      logLevels.map((level) => t.Literal(level)),
      { default: "info" }
    ),
    LOG_FILE: t.Optional(t.String()),
  })
);

export function createDefaultLoggerFromEnv() {
  const { LOG_LEVEL, LOG_FILE } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL, [], {}, defaultEmojiMap);
  if (LOG_FILE) {
    logger.attachTransport(
      new RfsTransport({
        filename: path.basename(LOG_FILE),
        rfs: { path: path.dirname(LOG_FILE), size: "10M", maxFiles: 10 },
      })
    );
  }
  return logger;
}
