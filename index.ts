import { Command } from "commander";

import { registerPlanCommand } from "./command/plan";
import { registerRunCommand } from "./command/run";
import { registerStatusCommand } from "./command/status";
import { toErrorMessage } from "./core/errors";
import { logger } from "./core/logger";

const program = new Command();

program
  .name("autopr")
  .description("Turn a task into a reviewed, CI-checked and merged pull request.")
  .configureHelp({
    sortSubcommands: true,
    subcommandTerm: (cmd) => cmd.name(),
  });

registerRunCommand(program);
registerPlanCommand(program);
registerStatusCommand(program);

program.parseAsync().catch((error: unknown) => {
  logger.error(toErrorMessage(error));
  process.exitCode = 1;
});
