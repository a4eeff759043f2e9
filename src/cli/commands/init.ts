/**
 * `specify init [name]`: scaffold a project.
 */

import type { Command } from "commander";
import { runInit, type InitRuntime } from "../init.js";

interface InitFlags {
  ai?: string;
  script?: string;
  ignoreAgentTools: boolean;
  git: boolean;
  here: boolean;
  force: boolean;
  skipTls: boolean;
  debug: boolean;
  githubToken?: string;
}

export function registerInitCommand(program: Command, runtime: InitRuntime = {}): void {
  program
    .command("init [name]")
    .description("Initialize a new Specify project from the bundled templates")
    .option("--ai <assistant>", "AI assistant to use (e.g. claude, gemini, copilot)")
    .option("--script <type>", "Script type: posix or powershell")
    .option("--ignore-agent-tools", "Skip checks for the assistant's CLI tool", false)
    .option("--no-git", "Skip git repository initialization")
    .option("--here", "Initialize in the current directory", false)
    .option("--force", "Allow a non-empty current directory with --here", false)
    .option("--skip-tls", "Skip TLS verification (accepted for compatibility)", false)
    .option("--debug", "Print configuration and step updates", false)
    .option("--github-token <token>", "GitHub token (falls back to GH_TOKEN / GITHUB_TOKEN)")
    .action(async (name: string | undefined, opts: InitFlags) => {
      await runInit(
        {
          name,
          ai: opts.ai,
          script: opts.script,
          ignoreAgentTools: opts.ignoreAgentTools,
          noGit: !opts.git,
          here: opts.here,
          force: opts.force,
          skipTls: opts.skipTls,
          debug: opts.debug,
          githubToken: opts.githubToken,
        },
        runtime,
      );
    });
}
