/**
 * Tool probing: "is executable X on PATH?".
 */

import { access, stat } from "node:fs/promises";
import { constants } from "node:fs";
import { join } from "node:path";

export interface ToolProbe {
  isAvailable(tool: string): Promise<boolean>;
}

export interface PathToolProbeOptions {
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

const DEFAULT_PATHEXT = ".COM;.EXE;.BAT;.CMD";

/** Scans PATH (and PATHEXT on Windows) for an executable file. */
export class PathToolProbe implements ToolProbe {
  private readonly env: NodeJS.ProcessEnv;
  private readonly platform: NodeJS.Platform;

  constructor(options: PathToolProbeOptions = {}) {
    this.env = options.env ?? process.env;
    this.platform = options.platform ?? process.platform;
  }

  async isAvailable(tool: string): Promise<boolean> {
    if (!tool) return false;
    const windows = this.platform === "win32";
    const dirs = (this.env["PATH"] ?? this.env["Path"] ?? "")
      .split(windows ? ";" : ":")
      .filter((dir) => dir.length > 0);
    const extensions = windows
      ? ["", ...(this.env["PATHEXT"] ?? DEFAULT_PATHEXT).split(";").filter((ext) => ext.length > 0)]
      : [""];

    for (const dir of dirs) {
      for (const ext of extensions) {
        if (await isExecutableFile(join(dir, tool + ext), windows)) return true;
      }
    }
    return false;
  }
}

async function isExecutableFile(path: string, windows: boolean): Promise<boolean> {
  try {
    const info = await stat(path);
    if (!info.isFile()) return false;
    await access(path, windows ? constants.F_OK : constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Probe answering from a fixed set of tool names. */
export class StaticToolProbe implements ToolProbe {
  private readonly available: ReadonlySet<string>;

  constructor(available: Iterable<string>) {
    this.available = new Set(available);
  }

  async isAvailable(tool: string): Promise<boolean> {
    return this.available.has(tool);
  }
}
