import { describe, it, expect } from "vitest";
import { Chalk } from "chalk";
import { ASSISTANTS } from "../../config/assistants.js";
import { SCRIPT_TYPES } from "../../config/script-types.js";
import type { InitResult } from "../../init/orchestrator.js";
import { formatCheckReport, formatNextSteps, formatSuccess } from "../messages.js";
import { createStyles } from "../styles.js";

const plain = createStyles(new Chalk({ level: 0 }));

function result(overrides: Partial<InitResult> = {}): InitResult {
  return {
    root: "/work/demo",
    assistant: ASSISTANTS.claude,
    scriptType: SCRIPT_TYPES.posix,
    files: [".claude/commands/plan.md", ".specify/scripts/setup-plan.sh"],
    warnings: [],
    repositoryInitialized: true,
    commands: [
      { name: "plan", description: "Plan it" },
      { name: "tasks", description: "" },
    ],
    ...overrides,
  };
}

describe("formatSuccess", () => {
  it("summarizes the project and names the agent folder", () => {
    const lines = formatSuccess(result(), false, plain).split("\n");

    expect(lines.slice(0, 3)).toEqual([
      "✅ Project ready at /work/demo",
      "   2 files written for Claude Code (POSIX Shell (bash/zsh))",
      "   Git repository initialized",
    ]);
    expect(lines).toContain("   Consider adding .claude/ (or parts of it) to .gitignore.");
  });

  it("lists warnings", () => {
    const lines = formatSuccess(result({ warnings: ["git not found"], repositoryInitialized: false }), true, plain).split(
      "\n",
    );

    expect(lines).not.toContain("   Git repository initialized");
    expect(lines).toContain("⚠️  Warnings:");
    expect(lines).toContain("  - git not found");
  });
});

describe("formatNextSteps", () => {
  it("starts with cd for a new directory", () => {
    expect(formatNextSteps(result(), false, plain)).toBe(
      [
        "📚 Next steps:",
        "  1. Go to the project folder: cd /work/demo",
        "  2. Start using slash commands with Claude Code:",
        "     /plan - Plan it",
        "     /tasks",
      ].join("\n"),
    );
  });

  it("skips cd when initialized in place", () => {
    expect(formatNextSteps(result(), true, plain).split("\n")[1]).toBe(
      "  1. Start using slash commands with Claude Code:",
    );
  });
});

describe("formatCheckReport", () => {
  it("marks each tool and celebrates when nothing is missing", () => {
    const report = formatCheckReport([{ tool: "git", description: "Version control", available: true }], plain);

    expect(report).toBe(
      ["📋 Tool check results:", "", "✅ git            available  Version control", "", "🎉 All tools are installed"].join(
        "\n",
      ),
    );
  });

  it("adds install hints when something is missing", () => {
    const lines = formatCheckReport(
      [
        { tool: "git", description: "Version control", available: true },
        { tool: "qwen", description: "Qwen Code", available: false },
      ],
      plain,
    ).split("\n");

    expect(lines[3]).toBe("❌ qwen           not found  Qwen Code");
    expect(lines).toContain(
      "⚠️  1 tool(s) missing. Projects can still be created; pass --ignore-agent-tools to init.",
    );
    expect(lines).toContain("💡 Install hints:");
  });
});
