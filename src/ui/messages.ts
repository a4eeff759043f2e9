/**
 * Post-run messages: success summary, agent-folder notice, next steps and
 * the `check` report.
 */

import type { InitResult } from "../init/orchestrator.js";
import { createStyles, type Styles } from "./styles.js";

export interface ToolCheckResult {
  tool: string;
  description: string;
  available: boolean;
}

export function formatSuccess(result: InitResult, here: boolean, styles: Styles = createStyles()): string {
  const lines: string[] = [];
  lines.push(styles.success(`✅ Project ready at ${result.root}`));
  lines.push(`   ${result.files.length} files written for ${result.assistant.displayName} (${result.scriptType.displayName})`);
  if (result.repositoryInitialized) {
    lines.push("   Git repository initialized");
  }

  if (result.warnings.length > 0) {
    lines.push("");
    lines.push(styles.warning("⚠️  Warnings:"));
    for (const warning of result.warnings) {
      lines.push(`  - ${warning}`);
    }
  }

  lines.push("");
  lines.push(formatAgentFolderNotice(result.assistant.agentFolder, styles));
  lines.push("");
  lines.push(formatNextSteps(result, here, styles));
  return lines.join("\n");
}

export function formatAgentFolderNotice(folder: string, styles: Styles = createStyles()): string {
  return [
    styles.warning("🔒 Agent folder security"),
    "   Some agents store credentials, auth tokens, or other private artifacts in their folder inside the project.",
    `   Consider adding ${styles.accent(folder)} (or parts of it) to ${styles.accent(".gitignore")}.`,
  ].join("\n");
}

export function formatNextSteps(result: InitResult, here: boolean, styles: Styles = createStyles()): string {
  const lines = ["📚 Next steps:"];
  let n = 1;
  if (!here) {
    lines.push(`  ${n++}. Go to the project folder: ${styles.accent(`cd ${result.root}`)}`);
  }
  lines.push(`  ${n}. Start using slash commands with ${result.assistant.displayName}:`);
  for (const command of result.commands) {
    const description = command.description ? ` - ${command.description}` : "";
    lines.push(`     ${styles.accent(`/${command.name}`)}${description}`);
  }
  return lines.join("\n");
}

export function formatCheckReport(results: readonly ToolCheckResult[], styles: Styles = createStyles()): string {
  const lines = ["📋 Tool check results:", ""];
  for (const result of results) {
    const status = result.available ? "✅" : "❌";
    const state = result.available ? "available" : "not found";
    lines.push(`${status} ${result.tool.padEnd(14)} ${state.padEnd(10)} ${styles.dim(result.description)}`);
  }
  lines.push("");

  const missing = results.filter((r) => !r.available);
  if (missing.length === 0) {
    lines.push(styles.success("🎉 All tools are installed"));
  } else {
    lines.push(styles.warning(`⚠️  ${missing.length} tool(s) missing. Projects can still be created; pass --ignore-agent-tools to init.`));
    lines.push("💡 Install hints:");
    lines.push("   - git: https://git-scm.com/downloads");
    lines.push("   - assistant CLIs: see each assistant's documentation");
  }
  return lines.join("\n");
}
