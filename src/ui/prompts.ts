/**
 * Interactive list selection backed by @inquirer/prompts.
 */

import { select } from "@inquirer/prompts";
import type { Choice, Prompter } from "../init/selection.js";

export class InquirerPrompter implements Prompter {
  async select(message: string, choices: readonly Choice[], defaultValue?: string): Promise<string> {
    return select({
      message,
      choices: choices.map((c) => ({ value: c.value, name: `${c.value} (${c.name})`, description: c.description })),
      default: defaultValue,
    });
  }
}
