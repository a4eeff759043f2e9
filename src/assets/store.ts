/**
 * Bundle of template and script text shipped with the CLI.
 *
 * Assets live under `assets/` at the package root and are read once into an
 * in-memory map keyed by their slash-separated path relative to that root,
 * e.g. "templates/commands/specify.md" or "scripts/bash/setup-plan.sh".
 * The store is read-only after load.
 */

import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { AssetLoadError } from "../errors/index.js";
import { SCRIPT_CATEGORY, TEMPLATE_CATEGORY } from "../config/constants.js";

/** Two-level asset identifier: category / namespace / name. */
export interface AssetKey {
  category: string;
  /** Slash-separated sub-path between category and name; may be empty. */
  namespace: string;
  name: string;
}

/** Bundle root, resolved relative to this module (works from src/ and dist/). */
export function defaultAssetRoot(): string {
  return fileURLToPath(new URL("../../assets", import.meta.url));
}

export function formatAssetKey(key: AssetKey): string {
  return [key.category, key.namespace, key.name].filter((part) => part.length > 0).join("/");
}

export function parseAssetKey(key: string): AssetKey {
  const parts = key.split("/").filter((part) => part.length > 0);
  if (parts.length < 2) {
    throw new Error(`Asset key "${key}" must have at least a category and a name`);
  }
  const category = parts[0] ?? "";
  const name = parts[parts.length - 1] ?? "";
  return { category, namespace: parts.slice(1, -1).join("/"), name };
}

export class AssetStore {
  private readonly assets: ReadonlyMap<string, string>;

  private constructor(assets: Map<string, string>) {
    this.assets = assets;
  }

  /**
   * Walk the bundle directory and read every file.
   * @throws AssetLoadError if the root is missing, unreadable or has no templates.
   */
  static async load(root: string = defaultAssetRoot()): Promise<AssetStore> {
    const assets = new Map<string, string>();
    try {
      await readTree(root, "", assets);
    } catch (error) {
      throw new AssetLoadError(root, error);
    }

    const store = new AssetStore(assets);
    if (store.listByPrefix(`${TEMPLATE_CATEGORY}/`).length === 0) {
      throw new AssetLoadError(root, new Error("bundle contains no templates"));
    }
    return store;
  }

  /** Build a store from literal entries (keys as they would appear on disk). */
  static fromEntries(entries: Record<string, string>): AssetStore {
    return new AssetStore(new Map(Object.entries(entries)));
  }

  get(key: string): string | undefined {
    return this.assets.get(key);
  }

  has(key: string): boolean {
    return this.assets.has(key);
  }

  /** Keys starting with `prefix`, sorted. */
  listByPrefix(prefix: string): string[] {
    return [...this.assets.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  /** Template names relative to the templates category ("commands/plan.md"). */
  templateNames(): string[] {
    const prefix = `${TEMPLATE_CATEGORY}/`;
    return this.listByPrefix(prefix).map((key) => key.slice(prefix.length));
  }

  /** Script keys relative to the scripts category ("bash/setup-plan.sh"). */
  scriptNames(): string[] {
    const prefix = `${SCRIPT_CATEGORY}/`;
    return this.listByPrefix(prefix).map((key) => key.slice(prefix.length));
  }

  get size(): number {
    return this.assets.size;
  }
}

async function readTree(dir: string, relative: string, into: Map<string, string>): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const key = relative ? `${relative}/${entry.name}` : entry.name;
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      await readTree(fullPath, key, into);
    } else if (entry.isFile()) {
      into.set(key, await readFile(fullPath, "utf-8"));
    }
  }
}
