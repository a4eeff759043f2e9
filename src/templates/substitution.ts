/**
 * Placeholder substitution for template and script text.
 *
 * Tokens are replaced literally (no regex, no `$` expansion):
 *
 *   __AGENT__    → assistant key
 *   $ARGUMENTS   → assistant argument syntax
 *   {{args}}     → assistant argument syntax
 *   {SCRIPT}     → script reference path
 *
 * For TOML assistants the two argument tokens are only replaced inside
 * `prompt = """ ... """` blocks; comments and keys outside keep them verbatim.
 * Markdown and prompt-markdown documents are substituted uniformly.
 */

import type { AssistantProfile } from "../config/assistants.js";
import { STANDARD_SETUP_SCRIPT, type ScriptTypeProfile } from "../config/script-types.js";
import { SCRIPTS_DIR } from "../config/constants.js";

export const PLACEHOLDERS = {
  agent: "__AGENT__",
  arguments: "$ARGUMENTS",
  args: "{{args}}",
  script: "{SCRIPT}",
} as const;

export const ALL_PLACEHOLDERS: readonly string[] = Object.values(PLACEHOLDERS);

export interface SubstitutionContext {
  assistant: AssistantProfile;
  scriptType: ScriptTypeProfile;
  /** Replacement for {SCRIPT}; defaults to the standard setup script path. */
  scriptReference?: string;
}

const PROMPT_OPEN = /^\s*prompt\s*=\s*"""/;
const TRIPLE_QUOTE = '"""';

/** Project-relative path of a generated script. */
export function scriptPath(name: string, scriptType: ScriptTypeProfile): string {
  return `${SCRIPTS_DIR}/${name}${scriptType.fileExtension}`;
}

export function standardScriptReference(scriptType: ScriptTypeProfile): string {
  return scriptPath(STANDARD_SETUP_SCRIPT, scriptType);
}

export function replaceToken(text: string, token: string, value: string): string {
  return text.split(token).join(value);
}

/** Replace both argument tokens with the assistant's syntax. */
export function replaceArguments(text: string, syntax: string): string {
  return replaceToken(replaceToken(text, PLACEHOLDERS.arguments, syntax), PLACEHOLDERS.args, syntax);
}

/**
 * Replace argument tokens only between a line opening `prompt = """` and the
 * next closing `"""`. Text on the opening line before the quotes, and on the
 * closing line after them, is left alone.
 */
export function replaceArgumentsInPromptBlocks(content: string, syntax: string): string {
  const lines = content.split("\n");
  let inPrompt = false;

  const out = lines.map((line) => {
    if (!inPrompt) {
      const open = PROMPT_OPEN.exec(line);
      if (!open) return line;

      const head = line.slice(0, open[0].length);
      const rest = line.slice(open[0].length);
      const close = rest.indexOf(TRIPLE_QUOTE);
      if (close === -1) {
        inPrompt = true;
        return head + replaceArguments(rest, syntax);
      }
      return head + replaceArguments(rest.slice(0, close), syntax) + rest.slice(close);
    }

    const close = line.indexOf(TRIPLE_QUOTE);
    if (close === -1) return replaceArguments(line, syntax);
    inPrompt = false;
    return replaceArguments(line.slice(0, close), syntax) + line.slice(close);
  });

  return out.join("\n");
}

/**
 * Apply every placeholder for the given assistant, honouring its file format.
 */
export function substitutePlaceholders(content: string, ctx: SubstitutionContext): string {
  const { assistant } = ctx;
  const reference = ctx.scriptReference ?? standardScriptReference(ctx.scriptType);

  let result = replaceToken(content, PLACEHOLDERS.agent, assistant.key);
  result = replaceToken(result, PLACEHOLDERS.script, reference);

  if (assistant.fileFormat === "toml") {
    return replaceArgumentsInPromptBlocks(result, assistant.argumentPlaceholderSyntax);
  }
  return replaceArguments(result, assistant.argumentPlaceholderSyntax);
}

/**
 * Placeholder tokens still present in processed output. The assistant's own
 * argument syntax is expected output, not a leftover.
 */
export function findUnresolvedPlaceholders(content: string, assistant: AssistantProfile): string[] {
  return ALL_PLACEHOLDERS.filter(
    (token) => token !== assistant.argumentPlaceholderSyntax && content.includes(token),
  );
}
