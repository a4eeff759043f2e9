/**
 * `specify check`: report which external tools are on PATH.
 * Missing tools are informational; the command never fails on them.
 */

import type { Command } from "commander";
import { listAssistants } from "../../config/assistants.js";
import { PathToolProbe, type ToolProbe } from "../../init/tools.js";
import { formatCheckReport, type ToolCheckResult } from "../../ui/messages.js";

/** git first, then each assistant CLI once, in registry order. */
export function checkedTools(): Array<Omit<ToolCheckResult, "available">> {
  const tools = [{ tool: "git", description: "Version control" }];
  for (const assistant of listAssistants()) {
    const tool = assistant.optionalCLITool;
    if (tool && !tools.some((t) => t.tool === tool)) {
      tools.push({ tool, description: assistant.displayName });
    }
  }
  return tools;
}

export async function runCheck(probe: ToolProbe = new PathToolProbe()): Promise<ToolCheckResult[]> {
  const results: ToolCheckResult[] = [];
  for (const entry of checkedTools()) {
    results.push({ ...entry, available: await probe.isAvailable(entry.tool) });
  }
  return results;
}

export function registerCheckCommand(program: Command, probe?: ToolProbe): void {
  program
    .command("check")
    .description("Check that git and the assistant CLIs are installed")
    .action(async () => {
      console.log("🔍 Checking for installed tools...\n");
      const results = await runCheck(probe);
      console.log(formatCheckReport(results));
    });
}
