/**
 * Optional YAML user defaults that pre-fill init options.
 *
 * Looked up at $SPECIFY_CONFIG, else ~/.specify.yaml. Flags always win.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { CONFIG_ENV_VAR, DEFAULT_CONFIG_FILE } from "./constants.js";
import { ConfigurationError, errnoCode } from "../errors/index.js";
import type { InitOptions } from "../schemas/project-config.js";

export const UserDefaultsSchema = z
  .object({
    ai: z.string().min(1).optional(),
    script: z.string().min(1).optional(),
    noGit: z.boolean().optional(),
    ignoreAgentTools: z.boolean().optional(),
  })
  .strict();
export type UserDefaults = z.infer<typeof UserDefaultsSchema>;

export function resolveDefaultsPath(env: NodeJS.ProcessEnv = process.env): string {
  return env[CONFIG_ENV_VAR] || join(homedir(), DEFAULT_CONFIG_FILE);
}

/**
 * Read and validate the defaults file. A missing file yields `{}`.
 */
export async function loadUserDefaults(path: string): Promise<UserDefaults> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return {};
    throw new ConfigurationError(`Cannot read defaults file ${path}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError(`Defaults file ${path} is not valid YAML`, { cause: error });
  }
  if (raw === null || raw === undefined) return {};

  const result = UserDefaultsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigurationError(`Invalid defaults file ${path}: ${issues.join("; ")}`);
  }
  return result.data;
}

/** Fill options the user did not pass on the command line. */
export function applyUserDefaults(options: InitOptions, defaults: UserDefaults): InitOptions {
  return {
    ...options,
    ai: options.ai ?? defaults.ai,
    script: options.script ?? defaults.script,
    noGit: options.noGit || (defaults.noGit ?? false),
    ignoreAgentTools: options.ignoreAgentTools || (defaults.ignoreAgentTools ?? false),
  };
}
