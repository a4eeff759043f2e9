/**
 * Init request schema. The options `specify init` accepts, validated with zod
 * into a mutable ProjectConfig that the orchestrator fills in as it runs.
 */

import { z } from "zod";
import { ConfigurationError } from "../errors/index.js";

export const InitOptionsSchema = z.object({
  /** Positional project name; absent in in-place mode. */
  name: z.string().trim().min(1).optional(),
  ai: z.string().trim().min(1).optional(),
  script: z.string().trim().min(1).optional(),
  ignoreAgentTools: z.boolean().default(false),
  noGit: z.boolean().default(false),
  here: z.boolean().default(false),
  force: z.boolean().default(false),
  skipTls: z.boolean().default(false),
  debug: z.boolean().default(false),
  githubToken: z.string().trim().min(1).optional(),
});
export type InitOptions = z.input<typeof InitOptionsSchema>;

export interface ProjectConfig {
  name?: string;
  here: boolean;
  /** Assistant key; empty until the select-assistant step resolves it. */
  ai: string;
  /** Script type key; empty until the select-script-type step resolves it. */
  script: string;
  force: boolean;
  noGit: boolean;
  ignoreAgentTools: boolean;
  skipTls: boolean;
  debug: boolean;
  githubToken?: string;
  /** Absolute target root, set during validation. */
  path?: string;
  createdAt: Date;
}

/**
 * Build a ProjectConfig from raw options.
 * `env` supplies GH_TOKEN / GITHUB_TOKEN when no token flag was given.
 */
export function createProjectConfig(
  input: InitOptions,
  env: NodeJS.ProcessEnv = process.env,
  now: Date = new Date(),
): ProjectConfig {
  const parsed = InitOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`Invalid init options: ${issues.join("; ")}`);
  }
  const opts = parsed.data;
  const githubToken = opts.githubToken ?? nonEmpty(env["GH_TOKEN"]) ?? nonEmpty(env["GITHUB_TOKEN"]);

  return {
    name: opts.name,
    here: opts.here,
    ai: opts.ai ?? "",
    script: opts.script ?? "",
    force: opts.force,
    noGit: opts.noGit,
    ignoreAgentTools: opts.ignoreAgentTools,
    skipTls: opts.skipTls,
    debug: opts.debug,
    githubToken,
    createdAt: now,
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/** Config summary safe to print: the token is redacted. */
export function describeConfig(config: ProjectConfig): Record<string, string | boolean> {
  return {
    name: config.name ?? "(current directory)",
    here: config.here,
    ai: config.ai || "(prompt)",
    script: config.script || "(prompt)",
    force: config.force,
    noGit: config.noGit,
    ignoreAgentTools: config.ignoreAgentTools,
    skipTls: config.skipTls,
    githubToken: config.githubToken ? "<redacted>" : "(none)",
  };
}
