import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { registerConfig } from "./app/Config";
import { registerIngest } from "./app/Ingest";
import { registerVolumes } from "./app/Volumes";

const logger = createDefaultLoggerFromEnv();
const cli = cac("raw-ingest");

registerIngest(cli, logger);
registerVolumes(cli, logger);
registerConfig(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exitCode = 1;
} finally {
  await dispose(logger);
}
