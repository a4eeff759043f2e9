/**
 * `specify init` runner.
 * Loads user defaults and the asset bundle, runs the orchestrator and prints
 * the progress tree followed by the success panel.
 */

import { AssetStore, defaultAssetRoot } from "../assets/store.js";
import { applyUserDefaults, loadUserDefaults, resolveDefaultsPath } from "../config/defaults.js";
import { createInitTracker, InitializationOrchestrator, type InitResult } from "../init/orchestrator.js";
import type { Prompter } from "../init/selection.js";
import { PathToolProbe, type ToolProbe } from "../init/tools.js";
import { GitVersionControl, type VersionControl } from "../init/vcs.js";
import { ProjectLayoutPlanner } from "../project/layout.js";
import { createProjectConfig, describeConfig, type InitOptions } from "../schemas/project-config.js";
import { formatSuccess } from "../ui/messages.js";
import { renderStep, renderTracker } from "../ui/progress.js";
import { InquirerPrompter } from "../ui/prompts.js";
import { createStyles, type Styles } from "../ui/styles.js";
import { getErrorMessage } from "../errors/index.js";

/** Collaborators `runInit` builds by default; tests replace them. */
export interface InitRuntime {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
  assetRoot?: string;
  toolProbe?: ToolProbe;
  vcs?: VersionControl;
  /** `null` forces a non-interactive session. */
  prompter?: Prompter | null;
  styles?: Styles;
}

export async function runInit(options: InitOptions, runtime: InitRuntime = {}): Promise<InitResult> {
  const env = runtime.env ?? process.env;
  const styles = runtime.styles ?? createStyles();

  const defaults = await loadUserDefaults(resolveDefaultsPath(env));
  const config = createProjectConfig(applyUserDefaults(options, defaults), env);

  if (config.debug) {
    console.log(styles.dim("🔧 Init configuration:"));
    for (const [key, value] of Object.entries(describeConfig(config))) {
      console.log(styles.dim(`   ${key}: ${String(value)}`));
    }
  }

  const assets = await AssetStore.load(runtime.assetRoot ?? defaultAssetRoot());

  const tracker = createInitTracker({
    onRefreshError: (error) => console.warn(`⚠️  Progress display failed: ${getErrorMessage(error)}`),
  });
  if (config.debug) {
    let last = new Map<string, string>();
    tracker.attachRefresh((steps) => {
      const next = new Map<string, string>();
      for (const step of steps) {
        const line = renderStep(step, styles);
        next.set(step.key, line);
        if (last.get(step.key) !== line && step.status !== "pending") {
          console.log(styles.dim(`   [debug] ${line}`));
        }
      }
      last = next;
    });
  }

  const orchestrator = new InitializationOrchestrator(
    {
      assets,
      toolProbe: runtime.toolProbe ?? new PathToolProbe({ env, platform: runtime.platform }),
      vcs: runtime.vcs ?? new GitVersionControl(),
      planner: new ProjectLayoutPlanner({ cwd: runtime.cwd }),
      prompter: resolvePrompter(runtime.prompter),
      platform: runtime.platform,
    },
    tracker,
  );

  let result: InitResult;
  try {
    result = await orchestrator.run(config);
  } finally {
    console.log(renderTracker(tracker, styles));
    console.log();
  }

  console.log(formatSuccess(result, config.here, styles));
  return result;
}

function resolvePrompter(prompter: Prompter | null | undefined): Prompter | undefined {
  if (prompter === null) return undefined;
  if (prompter) return prompter;
  return process.stdin.isTTY ? new InquirerPrompter() : undefined;
}
