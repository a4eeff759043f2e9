/**
 * Root command. Running `specify` with no subcommand prints the banner.
 */

import { Command } from "commander";
import { BANNER, CLI_NAME, TAGLINE, VERSION } from "../config/constants.js";
import type { ToolProbe } from "../init/tools.js";
import { createStyles } from "../ui/styles.js";
import { registerCheckCommand } from "./commands/check.js";
import { registerInitCommand } from "./commands/init.js";
import { registerVersionCommand } from "./commands/version.js";
import type { InitRuntime } from "./init.js";

export interface ProgramOptions {
  init?: InitRuntime;
  checkProbe?: ToolProbe;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const styles = createStyles();
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(`${TAGLINE}: scaffold projects for AI coding assistants`)
    .version(VERSION, "-v, --version")
    .action(() => {
      console.log(styles.title(BANNER));
      console.log(styles.accent(TAGLINE));
      console.log();
      console.log(`Run '${CLI_NAME} --help' for usage information`);
    });

  registerInitCommand(program, options.init);
  registerCheckCommand(program, options.checkProbe);
  registerVersionCommand(program);

  return program;
}
