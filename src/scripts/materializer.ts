/**
 * Selects the bundled variant of each helper script for
 * the chosen script type and applies placeholder substitution.
 *
 * Lookups go through the script type's bundle directory ("bash",
 * "powershell"), never its short key ("posix").
 */

import type { AssetStore } from "../assets/store.js";
import type { AssistantProfile } from "../config/assistants.js";
import { SCRIPT_NAMES, type ScriptTypeProfile } from "../config/script-types.js";
import { SCRIPT_CATEGORY } from "../config/constants.js";
import { AssetNotFoundError } from "../errors/index.js";
import { scriptPath, substitutePlaceholders } from "../templates/substitution.js";

/** Bundle key of a script variant, e.g. "scripts/bash/setup-plan.sh". */
export function scriptAssetKey(baseName: string, scriptType: ScriptTypeProfile): string {
  return `${SCRIPT_CATEGORY}/${scriptType.directory}/${baseName}${scriptType.fileExtension}`;
}

/** How a script refers to itself: "./setup-plan.sh" or ".\setup-plan.ps1". */
export function selfReference(baseName: string, scriptType: ScriptTypeProfile): string {
  return `${scriptType.selfReferencePrefix}${baseName}${scriptType.fileExtension}`;
}

export class ScriptMaterializer {
  constructor(
    private readonly assets: AssetStore,
    private readonly assistant: AssistantProfile,
  ) {}

  /**
   * Render one script for the given script type.
   * @throws AssetNotFoundError when the bundle lacks this variant
   */
  generate(baseName: string, scriptType: ScriptTypeProfile): string {
    const raw = this.assets.get(scriptAssetKey(baseName, scriptType));
    if (raw === undefined) {
      throw new AssetNotFoundError(`script template ${baseName}`);
    }

    return substitutePlaceholders(raw, {
      assistant: this.assistant,
      scriptType,
      scriptReference: selfReference(baseName, scriptType),
    });
  }

  /**
   * Render the fixed script set.
   * @returns project-relative output path → script content
   */
  generateAll(scriptType: ScriptTypeProfile): Map<string, string> {
    const files = new Map<string, string>();
    for (const name of SCRIPT_NAMES) {
      files.set(scriptPath(name, scriptType), this.generate(name, scriptType));
    }
    return files;
  }
}
