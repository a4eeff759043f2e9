/**
 * Assistant and script-type selection.
 *
 * A KeyResolver yields a validated registry entry. Two strategies exist: the
 * value came from a flag (validate it), or it must be asked for (prompt). The
 * orchestrator does not care which.
 */

import {
  DEFAULT_ASSISTANT,
  findAssistant,
  listAssistants,
  assistantKeys,
  type AssistantProfile,
} from "../config/assistants.js";
import {
  SCRIPT_TYPE_ALIASES,
  defaultScriptTypeFor,
  findScriptType,
  listScriptTypes,
  type ScriptTypeProfile,
} from "../config/script-types.js";
import {
  ConfigurationError,
  UnknownAssistantError,
  UnknownScriptTypeError,
} from "../errors/index.js";

export interface Choice {
  value: string;
  name: string;
  description?: string;
}

/** Interactive list selection; returns the chosen `value`. */
export interface Prompter {
  select(message: string, choices: readonly Choice[], defaultValue?: string): Promise<string>;
}

export interface KeyResolver<T> {
  resolve(): Promise<T>;
}

/** Validates a key that was supplied up front. */
export class FlagKeyResolver<T> implements KeyResolver<T> {
  constructor(
    private readonly value: string,
    private readonly lookup: (key: string) => T | undefined,
    private readonly unknown: (key: string) => Error,
  ) {}

  async resolve(): Promise<T> {
    const found = this.lookup(this.value);
    if (found === undefined) throw this.unknown(this.value);
    return found;
  }
}

/** Asks the user to pick from a fixed list of choices. */
export class PromptKeyResolver<T> implements KeyResolver<T> {
  constructor(
    private readonly prompter: Prompter,
    private readonly message: string,
    private readonly choices: readonly Choice[],
    private readonly defaultValue: string,
    private readonly lookup: (key: string) => T | undefined,
  ) {}

  async resolve(): Promise<T> {
    let selected: string;
    try {
      selected = await this.prompter.select(this.message, this.choices, this.defaultValue);
    } catch (error) {
      throw new ConfigurationError(`Selection cancelled: ${this.message}`, { cause: error });
    }
    const found = this.lookup(selected);
    if (found === undefined) {
      throw new ConfigurationError(`Selection returned an unknown value: ${selected}`);
    }
    return found;
  }
}

/** Fails with a pointer to the flag that would have avoided the prompt. */
class MissingValueResolver<T> implements KeyResolver<T> {
  constructor(private readonly flag: string) {}

  async resolve(): Promise<T> {
    throw new ConfigurationError(`${this.flag} is required when not running interactively`);
  }
}

export function assistantChoices(): Choice[] {
  return listAssistants()
    .map((a) => ({ value: a.key, name: a.displayName, description: a.outputDirectory }))
    .sort((a, b) => a.value.localeCompare(b.value));
}

export function scriptTypeChoices(): Choice[] {
  return listScriptTypes()
    .map((s) => ({ value: s.key, name: s.displayName, description: `${s.fileExtension} scripts` }))
    .sort((a, b) => a.value.localeCompare(b.value));
}

export function createAssistantResolver(
  value: string,
  prompter?: Prompter,
): KeyResolver<AssistantProfile> {
  if (value) {
    return new FlagKeyResolver(value, findAssistant, (key) => new UnknownAssistantError(key, assistantKeys()));
  }
  if (!prompter) return new MissingValueResolver<AssistantProfile>("--ai");
  return new PromptKeyResolver(
    prompter,
    "Choose your AI assistant",
    assistantChoices(),
    DEFAULT_ASSISTANT,
    findAssistant,
  );
}

export function createScriptTypeResolver(
  value: string,
  prompter?: Prompter,
  platform: NodeJS.Platform = process.platform,
): KeyResolver<ScriptTypeProfile> {
  if (value) {
    const accepted = [...listScriptTypes().map((s) => s.key), ...Object.keys(SCRIPT_TYPE_ALIASES)];
    return new FlagKeyResolver(value, findScriptType, (key) => new UnknownScriptTypeError(key, accepted));
  }
  if (!prompter) return new MissingValueResolver<ScriptTypeProfile>("--script");
  return new PromptKeyResolver(
    prompter,
    "Choose script type",
    scriptTypeChoices(),
    defaultScriptTypeFor(platform),
    findScriptType,
  );
}
