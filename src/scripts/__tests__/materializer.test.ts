import { describe, it, expect } from "vitest";
import { AssetStore, defaultAssetRoot } from "../../assets/store.js";
import { ASSISTANTS } from "../../config/assistants.js";
import { SCRIPT_TYPES } from "../../config/script-types.js";
import { AssetNotFoundError } from "../../errors/index.js";
import { ScriptMaterializer, scriptAssetKey, selfReference } from "../materializer.js";

describe("script keys", () => {
  it("looks variants up by bundle directory, not by script type key", () => {
    expect(scriptAssetKey("setup-plan", SCRIPT_TYPES.posix)).toBe("scripts/bash/setup-plan.sh");
    expect(scriptAssetKey("setup-plan", SCRIPT_TYPES.powershell)).toBe("scripts/powershell/setup-plan.ps1");
  });

  it("builds a self reference per platform", () => {
    expect(selfReference("setup-plan", SCRIPT_TYPES.posix)).toBe("./setup-plan.sh");
    expect(selfReference("setup-plan", SCRIPT_TYPES.powershell)).toBe(".\\setup-plan.ps1");
  });
});

describe("ScriptMaterializer", () => {
  const assets = AssetStore.fromEntries({
    "scripts/bash/setup-plan.sh": "#!/usr/bin/env bash\n# Usage: {SCRIPT} for __AGENT__\n",
    "scripts/powershell/setup-plan.ps1": "# Usage: {SCRIPT} for __AGENT__\n",
    "templates/spec-template.md": "",
  });

  it("substitutes the script's own name and the assistant", () => {
    const materializer = new ScriptMaterializer(assets, ASSISTANTS.qwen);

    expect(materializer.generate("setup-plan", SCRIPT_TYPES.posix)).toBe(
      "#!/usr/bin/env bash\n# Usage: ./setup-plan.sh for qwen\n",
    );
    expect(materializer.generate("setup-plan", SCRIPT_TYPES.powershell)).toBe(
      "# Usage: .\\setup-plan.ps1 for qwen\n",
    );
  });

  it("fails for a variant missing from the bundle", () => {
    const materializer = new ScriptMaterializer(assets, ASSISTANTS.claude);

    expect(() => materializer.generate("create-new-feature", SCRIPT_TYPES.posix)).toThrow(AssetNotFoundError);
    expect(() => materializer.generate("create-new-feature", SCRIPT_TYPES.posix)).toThrow(
      "Asset not found: script template create-new-feature",
    );
  });

  it("renders the full script set from the shipped bundle", async () => {
    const bundle = await AssetStore.load(defaultAssetRoot());
    const materializer = new ScriptMaterializer(bundle, ASSISTANTS.cursor);

    const posix = materializer.generateAll(SCRIPT_TYPES.posix);
    expect([...posix.keys()]).toEqual([
      ".specify/scripts/check-prerequisites.sh",
      ".specify/scripts/create-new-feature.sh",
      ".specify/scripts/setup-plan.sh",
      ".specify/scripts/update-agent-context.sh",
    ]);
    expect(posix.get(".specify/scripts/update-agent-context.sh")).toContain('AGENT_TYPE="${1:-cursor}"');

    const powershell = materializer.generateAll(SCRIPT_TYPES.powershell);
    expect([...powershell.keys()]).toEqual([
      ".specify/scripts/check-prerequisites.ps1",
      ".specify/scripts/create-new-feature.ps1",
      ".specify/scripts/setup-plan.ps1",
      ".specify/scripts/update-agent-context.ps1",
    ]);
    expect(powershell.get(".specify/scripts/setup-plan.ps1")).toContain("# Usage: .\\setup-plan.ps1 [-Json]");
  });
});
