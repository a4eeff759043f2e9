/**
 * Turns bundled templates into project files.
 *
 * Every template is written under `.specify/templates/<name>`. Templates in the
 * `commands/` namespace are additionally copied into the assistant's command
 * directory, renamed for its format:
 *
 *   markdown         specify.md → specify.md
 *   toml             specify.md → specify.toml
 *   prompt-markdown  specify.md → specify.prompt.md
 */

import { posix } from "node:path";
import type { AssetStore } from "../assets/store.js";
import type { AssistantProfile, FileFormat } from "../config/assistants.js";
import type { ScriptTypeProfile } from "../config/script-types.js";
import { COMMANDS_NAMESPACE, TEMPLATE_CATEGORY, TEMPLATES_DIR } from "../config/constants.js";
import { AssetNotFoundError, TemplateProcessingError } from "../errors/index.js";
import { parseTemplate } from "./frontmatter.js";
import { scriptPath, standardScriptReference, substitutePlaceholders } from "./substitution.js";
import { hasPromptBlock, markdownToTomlCommand } from "./toml.js";

const FORMAT_EXTENSIONS: Readonly<Record<FileFormat, string>> = {
  markdown: ".md",
  toml: ".toml",
  "prompt-markdown": ".prompt.md",
};

/** Slash command exposed by a command template. */
export interface CommandInfo {
  name: string;
  description: string;
}

export function isCommandTemplate(name: string): boolean {
  return name.startsWith(`${COMMANDS_NAMESPACE}/`);
}

/**
 * Output file name for a command template in the assistant's directory.
 * Sub-paths below `commands/` are kept.
 */
export function deriveCommandFileName(templateName: string, format: FileFormat): string {
  const relative = isCommandTemplate(templateName)
    ? templateName.slice(COMMANDS_NAMESPACE.length + 1)
    : templateName;
  const dir = posix.dirname(relative);
  const base = posix.basename(relative);
  const dot = base.indexOf(".");
  const stem = dot > 0 ? base.slice(0, dot) : base;
  const fileName = stem + FORMAT_EXTENSIONS[format];
  return dir === "." ? fileName : `${dir}/${fileName}`;
}

export class TemplateMaterializer {
  constructor(
    private readonly assets: AssetStore,
    private readonly assistant: AssistantProfile,
    private readonly scriptType: ScriptTypeProfile,
  ) {}

  /**
   * Substitute and format one template.
   * @param name - path relative to the templates category, e.g. "commands/plan.md"
   */
  processTemplate(name: string): string {
    const raw = this.assets.get(`${TEMPLATE_CATEGORY}/${name}`);
    if (raw === undefined) {
      throw new AssetNotFoundError(`template ${name}`);
    }

    if (!isCommandTemplate(name)) {
      return substitutePlaceholders(raw, {
        assistant: this.assistant,
        scriptType: this.scriptType,
        scriptReference: standardScriptReference(this.scriptType),
      });
    }

    const parsed = parseTemplate(raw);
    const scriptReference = parsed.frontmatter.script
      ? scriptPath(parsed.frontmatter.script, this.scriptType)
      : standardScriptReference(this.scriptType);

    let content = raw;
    if (this.assistant.fileFormat === "toml" && !hasPromptBlock(raw)) {
      content = markdownToTomlCommand(parsed.body, parsed.frontmatter.description);
    }

    return substitutePlaceholders(content, {
      assistant: this.assistant,
      scriptType: this.scriptType,
      scriptReference,
    });
  }

  /** Project-relative path of a command template's copy, or undefined. */
  commandOutputPath(name: string): string | undefined {
    if (!isCommandTemplate(name)) return undefined;
    return this.assistant.outputDirectory + deriveCommandFileName(name, this.assistant.fileFormat);
  }

  /**
   * Process every bundled template.
   * @returns project-relative output path → file content
   * @throws TemplateProcessingError on the first template that fails
   */
  processAll(): Map<string, string> {
    const files = new Map<string, string>();

    for (const name of this.assets.templateNames()) {
      let content: string;
      try {
        content = this.processTemplate(name);
      } catch (error) {
        throw new TemplateProcessingError(name, error);
      }

      files.set(`${TEMPLATES_DIR}/${name}`, content);
      const commandPath = this.commandOutputPath(name);
      if (commandPath) files.set(commandPath, content);
    }

    return files;
  }
}

export function processAllTemplates(
  assets: AssetStore,
  assistant: AssistantProfile,
  scriptType: ScriptTypeProfile,
): Map<string, string> {
  return new TemplateMaterializer(assets, assistant, scriptType).processAll();
}

/** Slash commands defined by the bundle, in name order. */
export function listCommands(assets: AssetStore): CommandInfo[] {
  return assets
    .templateNames()
    .filter(isCommandTemplate)
    .map((name) => {
      const raw = assets.get(`${TEMPLATE_CATEGORY}/${name}`) ?? "";
      const base = posix.basename(name);
      const dot = base.indexOf(".");
      return {
        name: dot > 0 ? base.slice(0, dot) : base,
        description: parseTemplate(raw).frontmatter.description ?? "",
      };
    });
}
