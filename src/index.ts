import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";

import { registerFetchFlight } from "./app/FetchFlight";
import { registerMatchLidar } from "./app/MatchLidar";
import { registerProcessRun } from "./app/ProcessRun";
import { registerVerifyFlight } from "./app/VerifyFlight";

const logger = createDefaultLoggerFromEnv();
const cli = cac("icebridge");

registerFetchFlight(cli, logger);
registerVerifyFlight(cli, logger);
registerProcessRun(cli, logger);
registerMatchLidar(cli, logger);

cli.help();
cli.version("0.1.0");
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exit(1);
}
