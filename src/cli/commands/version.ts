import type { Command } from "commander";
import { BUILD_COMMIT, BUILD_DATE, CLI_NAME, VERSION } from "../../config/constants.js";

export function versionLines(): string[] {
  return [`${CLI_NAME} ${VERSION}`, `Commit: ${BUILD_COMMIT}`, `Built: ${BUILD_DATE}`];
}

export function registerVersionCommand(program: Command): void {
  program
    .command("version")
    .description("Show version and build information")
    .action(() => {
      for (const line of versionLines()) console.log(line);
    });
}
