/**
 * Repository detection and the initial commit, via simple-git.
 */

import { stat } from "node:fs/promises";
import { join } from "node:path";
import { simpleGit } from "simple-git";
import { VersionControlError, errnoCode } from "../errors/index.js";

export interface VersionControl {
  /** True when a repository marker already exists at `root`. */
  isRepository(root: string): Promise<boolean>;
  /** init + add everything + commit. */
  initialize(root: string, message: string): Promise<void>;
}

export class GitVersionControl implements VersionControl {
  async isRepository(root: string): Promise<boolean> {
    try {
      await stat(join(root, ".git"));
      return true;
    } catch (error) {
      if (errnoCode(error) === "ENOENT") return false;
      throw new VersionControlError(`Cannot inspect ${root} for a git repository`, error);
    }
  }

  async initialize(root: string, message: string): Promise<void> {
    const git = simpleGit({ baseDir: root });

    try {
      await git.init();
    } catch (error) {
      throw new VersionControlError("Failed to initialize git repository", error);
    }
    try {
      await git.add(".");
    } catch (error) {
      throw new VersionControlError("Failed to add files to git", error);
    }
    try {
      await git.commit(message);
    } catch (error) {
      throw new VersionControlError("Failed to create initial commit", error);
    }
  }
}
