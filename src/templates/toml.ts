/**
 * Markdown → TOML conversion for assistants that read TOML command files.
 *
 * Output shape:
 *
 *   description = "..."
 *
 *   prompt = """
 *   <markdown body>
 *   """
 */

const PROMPT_BLOCK = /^\s*prompt\s*=\s*"""/m;

export function hasPromptBlock(content: string): boolean {
  return PROMPT_BLOCK.test(content);
}

/** Encode a TOML basic (single-line) string, quotes included. */
export function tomlString(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\r/g, "\\r")
    .replace(/\n/g, "\\n")
    .replace(/\t/g, "\\t")
    .replace(/[\u0000-\u001f\u007f]/g, unicodeEscape);
  return `"${escaped}"`;
}

/** Escape text for a TOML multi-line basic string body. Tabs and line breaks stay literal. */
export function tomlMultilineBody(value: string): string {
  return value
    .replace(/\\/g, "\\\\")
    .replace(/"""/g, '""\\"')
    .replace(/[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g, unicodeEscape);
}

function unicodeEscape(char: string): string {
  return `\\u${char.charCodeAt(0).toString(16).padStart(4, "0")}`;
}

export function markdownToTomlCommand(body: string, description?: string): string {
  const lines: string[] = [];
  if (description !== undefined && description.trim().length > 0) {
    lines.push(`description = ${tomlString(description.trim())}`);
    lines.push("");
  }

  const trimmed = body.replace(/^\s*\n/, "").replace(/\s+$/, "");
  lines.push('prompt = """');
  lines.push(tomlMultilineBody(trimmed));
  lines.push('"""');
  return lines.join("\n") + "\n";
}
