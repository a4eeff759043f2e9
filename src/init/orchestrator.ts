/**
 * Runs the init steps strictly in order and
 * records each one on a StepTracker.
 *
 * The first failing step marks itself failed and aborts the run; later steps
 * stay pending. Nothing is retried and files already written are left in
 * place.
 */

import type { AssetStore } from "../assets/store.js";
import type { AssistantProfile } from "../config/assistants.js";
import type { ScriptTypeProfile } from "../config/script-types.js";
import { INITIAL_COMMIT_MESSAGE } from "../config/constants.js";
import { ToolNotFoundError, getErrorMessage } from "../errors/index.js";
import { ProjectLayoutPlanner } from "../project/layout.js";
import { EXECUTABLE_MODE, FILE_MODE, writeProjectFiles } from "../project/writer.js";
import type { ProjectConfig } from "../schemas/project-config.js";
import { ScriptMaterializer } from "../scripts/materializer.js";
import { TemplateMaterializer, listCommands, type CommandInfo } from "../templates/materializer.js";
import { createAssistantResolver, createScriptTypeResolver, type Prompter } from "./selection.js";
import type { ToolProbe } from "./tools.js";
import { StepTracker, type StepTrackerOptions } from "./tracker.js";
import type { VersionControl } from "./vcs.js";

export const INIT_STEPS = [
  { key: "validate-config", label: "Validate configuration" },
  { key: "select-assistant", label: "Select AI assistant" },
  { key: "select-script-type", label: "Select script type" },
  { key: "check-tools", label: "Check required tools" },
  { key: "prepare-directory", label: "Prepare project directory" },
  { key: "materialize-templates", label: "Write templates and commands" },
  { key: "materialize-scripts", label: "Generate scripts" },
  { key: "initialize-version-control", label: "Initialize git repository" },
] as const;

export type InitStepKey = (typeof INIT_STEPS)[number]["key"];

export const TRACKER_TITLE = "Initialize Specify Project";

export function createInitTracker(options?: StepTrackerOptions): StepTracker {
  const tracker = new StepTracker(TRACKER_TITLE, options);
  for (const step of INIT_STEPS) tracker.add(step.key, step.label);
  return tracker;
}

export interface OrchestratorDeps {
  assets: AssetStore;
  toolProbe: ToolProbe;
  vcs: VersionControl;
  planner?: ProjectLayoutPlanner;
  /** Absent in non-interactive sessions: missing keys are then an error. */
  prompter?: Prompter;
  platform?: NodeJS.Platform;
}

export interface InitResult {
  root: string;
  assistant: AssistantProfile;
  scriptType: ScriptTypeProfile;
  /** Project-relative paths written, templates first. */
  files: string[];
  warnings: string[];
  repositoryInitialized: boolean;
  commands: CommandInfo[];
}

interface StepOutcome<T> {
  value: T;
  detail: string;
  skipped?: boolean;
}

export class InitializationOrchestrator {
  readonly tracker: StepTracker;
  private readonly planner: ProjectLayoutPlanner;

  constructor(
    private readonly deps: OrchestratorDeps,
    tracker: StepTracker = createInitTracker(),
  ) {
    this.tracker = tracker;
    this.planner = deps.planner ?? new ProjectLayoutPlanner();
  }

  async run(config: ProjectConfig): Promise<InitResult> {
    const { assets, toolProbe, vcs, prompter } = this.deps;
    const warnings: string[] = [];

    await this.step("validate-config", async () => {
      const root = await this.planner.resolve(config);
      config.path = root;
      return { value: root, detail: config.here ? "current directory" : root };
    });

    const assistant = await this.step("select-assistant", async () => {
      const profile = await createAssistantResolver(config.ai, prompter).resolve();
      config.ai = profile.key;
      return { value: profile, detail: profile.displayName };
    });

    const scriptType = await this.step("select-script-type", async () => {
      const profile = await createScriptTypeResolver(config.script, prompter, this.deps.platform).resolve();
      config.script = profile.key;
      return { value: profile, detail: profile.displayName };
    });

    await this.step("check-tools", async () => {
      const found: string[] = [];

      if (!config.noGit) {
        if (await toolProbe.isAvailable("git")) {
          found.push("git");
        } else {
          warnings.push("git not found; initializing the repository will fail unless --no-git is given");
        }
      }

      const tool = assistant.optionalCLITool;
      if (tool && !config.ignoreAgentTools) {
        if (!(await toolProbe.isAvailable(tool))) {
          throw new ToolNotFoundError(
            tool,
            `${assistant.displayName} needs it (${assistant.website}); pass --ignore-agent-tools to skip this check`,
          );
        }
        found.push(tool);
      }

      return { value: undefined, detail: found.length > 0 ? found.join(", ") : "nothing to check" };
    });

    const root = await this.step("prepare-directory", async () => {
      const prepared = await this.planner.prepare(config);
      config.path = prepared;
      return { value: prepared, detail: prepared };
    });

    const templateFiles = await this.step("materialize-templates", async () => {
      const files = new TemplateMaterializer(assets, assistant, scriptType).processAll();
      const written = await writeProjectFiles(root, files, FILE_MODE);
      return { value: written, detail: `${written.length} files` };
    });

    const scriptFiles = await this.step("materialize-scripts", async () => {
      const files = new ScriptMaterializer(assets, assistant).generateAll(scriptType);
      const written = await writeProjectFiles(root, files, EXECUTABLE_MODE);
      return { value: written, detail: `${written.length} ${scriptType.fileExtension} scripts` };
    });

    const repositoryInitialized = await this.step("initialize-version-control", async () => {
      if (config.noGit) {
        return { value: false, detail: "--no-git", skipped: true };
      }
      if (await vcs.isRepository(root)) {
        return { value: false, detail: "existing repository detected" };
      }
      await vcs.initialize(root, INITIAL_COMMIT_MESSAGE);
      return { value: true, detail: "initial commit created" };
    });

    return {
      root,
      assistant,
      scriptType,
      files: [...templateFiles, ...scriptFiles],
      warnings,
      repositoryInitialized,
      commands: listCommands(assets),
    };
  }

  private async step<T>(key: InitStepKey, body: () => Promise<StepOutcome<T>>): Promise<T> {
    this.tracker.start(key);
    try {
      const outcome = await body();
      if (outcome.skipped) {
        this.tracker.skip(key, outcome.detail);
      } else {
        this.tracker.complete(key, outcome.detail);
      }
      return outcome.value;
    } catch (error) {
      this.tracker.fail(key, getErrorMessage(error));
      throw error;
    }
  }
}
