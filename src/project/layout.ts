/**
 * Decides where a project is created and checks the
 * target directory before anything is written.
 *
 * Two modes:
 * - in-place (`here`): root is the working directory. Never "already exists";
 *   non-empty is rejected unless `force` is set.
 * - new directory: root is `<cwd>/<name>`, which must not exist. `force` does
 *   not apply here.
 */

import { mkdir, readdir, stat } from "node:fs/promises";
import { resolve } from "node:path";
import type { ProjectConfig } from "../schemas/project-config.js";
import {
  ConflictingModeError,
  DirectoryExistsError,
  FileSystemError,
  MissingNameError,
  NonEmptyDirectoryError,
  errnoCode,
} from "../errors/index.js";

export type LayoutConfig = Pick<ProjectConfig, "name" | "here" | "force">;

export interface LayoutPlannerOptions {
  /** Working directory; defaults to process.cwd(). */
  cwd?: string;
}

export class ProjectLayoutPlanner {
  private readonly cwd: string;

  constructor(options: LayoutPlannerOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
  }

  /**
   * Check mode flags and compute the absolute root. No side effects.
   * @throws ConflictingModeError, MissingNameError, DirectoryExistsError
   */
  async resolve(config: LayoutConfig): Promise<string> {
    const name = config.name?.trim();

    if (config.here) {
      if (name) throw new ConflictingModeError(name);
      return resolve(this.cwd);
    }

    if (!name) throw new MissingNameError();

    const root = resolve(this.cwd, name);
    if (await pathExists(root)) {
      throw new DirectoryExistsError(root);
    }
    return root;
  }

  /**
   * Resolve the root and make it ready for writing: create it in new-directory
   * mode, check emptiness in in-place mode.
   * @throws NonEmptyDirectoryError, DirectoryExistsError, FileSystemError
   */
  async prepare(config: LayoutConfig): Promise<string> {
    const root = await this.resolve(config);

    if (config.here) {
      let entries: string[];
      try {
        entries = await readdir(root);
      } catch (error) {
        throw new FileSystemError("Failed to read current directory", root, error);
      }
      if (entries.length > 0 && !config.force) {
        throw new NonEmptyDirectoryError(root, entries.length);
      }
      return root;
    }

    try {
      await mkdir(root, { recursive: true });
    } catch (error) {
      throw new FileSystemError("Failed to create project directory", root, error);
    }
    return root;
  }
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error) {
    if (errnoCode(error) === "ENOENT") return false;
    throw new FileSystemError("Failed to inspect path", path, error);
  }
}
