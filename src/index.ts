import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";

import { registerListTree } from "./app/ListTree";

const logger = createDefaultLoggerFromEnv();
const cli = cac("depthwalk");

registerListTree(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  if (!cli.options.help) cli.outputHelp();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exit(1);
}
