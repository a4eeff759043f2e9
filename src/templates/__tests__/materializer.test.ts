import { describe, it, expect } from "vitest";
import { AssetStore, defaultAssetRoot } from "../../assets/store.js";
import { ASSISTANTS, listAssistants } from "../../config/assistants.js";
import { SCRIPT_TYPES, listScriptTypes } from "../../config/script-types.js";
import { AssetNotFoundError, TemplateProcessingError } from "../../errors/index.js";
import { findUnresolvedPlaceholders } from "../substitution.js";
import { TemplateMaterializer, deriveCommandFileName, listCommands } from "../materializer.js";

const fixture = () =>
  AssetStore.fromEntries({
    "templates/commands/specify.md":
      "---\ndescription: Create a spec\nscript: create-new-feature\n---\n\nRun {SCRIPT} for __AGENT__ with $ARGUMENTS\n",
    "templates/commands/plan.md": "---\ndescription: Plan it\n---\n\nRun {SCRIPT} with {{args}}\n",
    "templates/spec-template.md": "# Spec for __AGENT__\n",
  });

describe("deriveCommandFileName", () => {
  it("renames by file format", () => {
    expect(deriveCommandFileName("commands/specify.md", "markdown")).toBe("specify.md");
    expect(deriveCommandFileName("commands/specify.md", "toml")).toBe("specify.toml");
    expect(deriveCommandFileName("commands/specify.md", "prompt-markdown")).toBe("specify.prompt.md");
  });

  it("keeps sub-directories and cuts the stem at the first dot", () => {
    expect(deriveCommandFileName("commands/team/review.md", "toml")).toBe("team/review.toml");
    expect(deriveCommandFileName("commands/plan.tmpl.md", "markdown")).toBe("plan.md");
  });
});

describe("TemplateMaterializer", () => {
  it("writes templates and command copies for a markdown assistant", () => {
    const files = new TemplateMaterializer(fixture(), ASSISTANTS.claude, SCRIPT_TYPES.posix).processAll();

    expect([...files.keys()]).toEqual([
      ".specify/templates/commands/plan.md",
      ".claude/commands/plan.md",
      ".specify/templates/commands/specify.md",
      ".claude/commands/specify.md",
      ".specify/templates/spec-template.md",
    ]);
    expect(files.get(".claude/commands/plan.md")).toBe(
      "---\ndescription: Plan it\n---\n\nRun .specify/scripts/setup-plan.sh with $ARGUMENTS\n",
    );
    expect(files.get(".claude/commands/specify.md")).toBe(
      "---\ndescription: Create a spec\nscript: create-new-feature\n---\n\nRun .specify/scripts/create-new-feature.sh for claude with $ARGUMENTS\n",
    );
    expect(files.get(".specify/templates/spec-template.md")).toBe("# Spec for claude\n");
  });

  it("converts command templates to TOML for TOML assistants", () => {
    const files = new TemplateMaterializer(fixture(), ASSISTANTS.gemini, SCRIPT_TYPES.powershell).processAll();

    const expected =
      'description = "Plan it"\n\nprompt = """\nRun .specify/scripts/setup-plan.ps1 with {{args}}\n"""\n';
    expect(files.get(".gemini/commands/plan.toml")).toBe(expected);
    expect(files.get(".specify/templates/commands/plan.md")).toBe(expected);
    expect(files.get(".gemini/commands/specify.toml")).toBe(
      'description = "Create a spec"\n\nprompt = """\nRun .specify/scripts/create-new-feature.ps1 for gemini with {{args}}\n"""\n',
    );
  });

  it("names prompt-markdown commands with the .prompt.md suffix", () => {
    const files = new TemplateMaterializer(fixture(), ASSISTANTS.copilot, SCRIPT_TYPES.posix).processAll();

    expect(files.has(".github/prompts/specify.prompt.md")).toBe(true);
    expect(files.has(".github/prompts/specify.md")).toBe(false);
  });

  it("reports a missing template", () => {
    const materializer = new TemplateMaterializer(fixture(), ASSISTANTS.claude, SCRIPT_TYPES.posix);

    expect(() => materializer.processTemplate("commands/none.md")).toThrow(AssetNotFoundError);
    expect(() => materializer.processTemplate("commands/none.md")).toThrow(
      "Asset not found: template commands/none.md",
    );
  });

  it("wraps frontmatter failures with the template name", () => {
    const assets = AssetStore.fromEntries({
      "templates/commands/bad.md": "---\nscript: nope\n---\nbody\n",
    });
    const materializer = new TemplateMaterializer(assets, ASSISTANTS.claude, SCRIPT_TYPES.posix);

    let caught: unknown;
    try {
      materializer.processAll();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(TemplateProcessingError);
    expect(caught instanceof TemplateProcessingError && caught.template).toBe("commands/bad.md");
  });

  it("leaves no foreign placeholders for any assistant and script type", async () => {
    const assets = await AssetStore.load(defaultAssetRoot());

    for (const assistant of listAssistants()) {
      for (const scriptType of listScriptTypes()) {
        const files = new TemplateMaterializer(assets, assistant, scriptType).processAll();

        expect(files.size).toBe(16);
        for (const [path, content] of files) {
          expect({ path, leftovers: findUnresolvedPlaceholders(content, assistant) }).toEqual({
            path,
            leftovers: [],
          });
        }
      }
    }
  });
});

describe("listCommands", () => {
  it("lists command names with their descriptions", () => {
    expect(listCommands(fixture())).toEqual([
      { name: "plan", description: "Plan it" },
      { name: "specify", description: "Create a spec" },
    ]);
  });

  it("reads the same templates again after processing them", () => {
    const assets = fixture();
    new TemplateMaterializer(assets, ASSISTANTS.claude, SCRIPT_TYPES.posix).processAll();
    new TemplateMaterializer(assets, ASSISTANTS.gemini, SCRIPT_TYPES.posix).processAll();

    expect(listCommands(assets)).toEqual([
      { name: "plan", description: "Plan it" },
      { name: "specify", description: "Create a spec" },
    ]);
  });

  it("lists the shipped slash commands", async () => {
    const assets = await AssetStore.load(defaultAssetRoot());
    expect(listCommands(assets).map((c) => c.name)).toEqual([
      "analyze",
      "clarify",
      "implement",
      "plan",
      "specify",
      "tasks",
    ]);
  });
});
