import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { registerCollect } from "./app/Collect";

const logger = createDefaultLoggerFromEnv();
const cli = cac("file-collector");

registerCollect(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

try {
  if (cli.matchedCommand) {
    await cli.runMatchedCommand();
  } else if (!cli.options.help) {
    cli.outputHelp();
  }
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exitCode = 1;
} finally {
  await dispose(logger);
}
