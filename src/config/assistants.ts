/**
 * AI assistant registry.
 *
 * A closed set of integrations, keyed by the value accepted on `--ai`.
 * Each profile says where command files land in the generated project, what
 * format they are written in, and which CLI tool (if any) must be installed.
 */

/** Output format for assistant command files. */
export type FileFormat = "markdown" | "toml" | "prompt-markdown";

export interface AssistantProfile {
  readonly key: string;
  readonly displayName: string;
  /** Relative, slash-separated, always ends with "/". */
  readonly outputDirectory: string;
  readonly fileFormat: FileFormat;
  /** Executable probed on PATH; empty when the assistant is IDE-based. */
  readonly optionalCLITool: string;
  /** Token the assistant's runtime expands to the user's arguments. */
  readonly argumentPlaceholderSyntax: string;
  /** Folder that may hold credentials; surfaced in the post-init notice. */
  readonly agentFolder: string;
  readonly website: string;
}

export const ASSISTANTS = {
  auggie: {
    key: "auggie",
    displayName: "Auggie CLI",
    outputDirectory: ".augment/commands/",
    fileFormat: "markdown",
    optionalCLITool: "auggie",
    argumentPlaceholderSyntax: "$ARGUMENTS",
    agentFolder: ".augment/",
    website: "https://docs.augmentcode.com/cli/setup-auggie/install-auggie-cli",
  },
  claude: {
    key: "claude",
    displayName: "Claude Code",
    outputDirectory: ".claude/commands/",
    fileFormat: "markdown",
    optionalCLITool: "claude",
    argumentPlaceholderSyntax: "$ARGUMENTS",
    agentFolder: ".claude/",
    website: "https://docs.anthropic.com/en/docs/claude-code/setup",
  },
  codex: {
    key: "codex",
    displayName: "Codex CLI",
    outputDirectory: ".codex/prompts/",
    fileFormat: "markdown",
    optionalCLITool: "codex",
    argumentPlaceholderSyntax: "$ARGUMENTS",
    agentFolder: ".codex/",
    website: "https://github.com/openai/codex",
  },
  copilot: {
    key: "copilot",
    displayName: "GitHub Copilot",
    outputDirectory: ".github/prompts/",
    fileFormat: "prompt-markdown",
    optionalCLITool: "",
    argumentPlaceholderSyntax: "$ARGUMENTS",
    agentFolder: ".github/",
    website: "https://github.com/features/copilot",
  },
  cursor: {
    key: "cursor",
    displayName: "Cursor",
    outputDirectory: ".cursor/commands/",
    fileFormat: "markdown",
    optionalCLITool: "cursor-agent",
    argumentPlaceholderSyntax: "$ARGUMENTS",
    agentFolder: ".cursor/",
    website: "https://cursor.com/",
  },
  gemini: {
    key: "gemini",
    displayName: "Gemini CLI",
    outputDirectory: ".gemini/commands/",
    fileFormat: "toml",
    optionalCLITool: "gemini",
    argumentPlaceholderSyntax: "{{args}}",
    agentFolder: ".gemini/",
    website: "https://github.com/google-gemini/gemini-cli",
  },
  kilocode: {
    key: "kilocode",
    displayName: "Kilo Code",
    outputDirectory: ".kilocode/workflows/",
    fileFormat: "markdown",
    optionalCLITool: "",
    argumentPlaceholderSyntax: "$ARGUMENTS",
    agentFolder: ".kilocode/",
    website: "https://kilocode.ai/",
  },
  opencode: {
    key: "opencode",
    displayName: "opencode",
    outputDirectory: ".opencode/command/",
    fileFormat: "markdown",
    optionalCLITool: "opencode",
    argumentPlaceholderSyntax: "$ARGUMENTS",
    agentFolder: ".opencode/",
    website: "https://opencode.ai",
  },
  qwen: {
    key: "qwen",
    displayName: "Qwen Code",
    outputDirectory: ".qwen/commands/",
    fileFormat: "toml",
    optionalCLITool: "qwen",
    argumentPlaceholderSyntax: "{{args}}",
    agentFolder: ".qwen/",
    website: "https://github.com/QwenLM/qwen-code",
  },
  roo: {
    key: "roo",
    displayName: "Roo Code",
    outputDirectory: ".roo/commands/",
    fileFormat: "markdown",
    optionalCLITool: "",
    argumentPlaceholderSyntax: "$ARGUMENTS",
    agentFolder: ".roo/",
    website: "https://roocode.com/",
  },
  windsurf: {
    key: "windsurf",
    displayName: "Windsurf",
    outputDirectory: ".windsurf/workflows/",
    fileFormat: "markdown",
    optionalCLITool: "",
    argumentPlaceholderSyntax: "$ARGUMENTS",
    agentFolder: ".windsurf/",
    website: "https://windsurf.com/",
  },
} as const satisfies Record<string, AssistantProfile>;

export type AssistantKey = keyof typeof ASSISTANTS;

export const DEFAULT_ASSISTANT: AssistantKey = "claude";

export function listAssistants(): AssistantProfile[] {
  return Object.values(ASSISTANTS);
}

export function assistantKeys(): string[] {
  return Object.keys(ASSISTANTS);
}

export function isAssistantKey(key: string): key is AssistantKey {
  return Object.hasOwn(ASSISTANTS, key);
}

export function findAssistant(key: string): AssistantProfile | undefined {
  return isAssistantKey(key) ? ASSISTANTS[key] : undefined;
}
