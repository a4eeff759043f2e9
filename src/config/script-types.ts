/**
 * Script types that generated scripts can target.
 *
 * `key` is what users type on `--script`; `directory` is the bucket name in the
 * asset bundle. They differ for POSIX shell ("posix" vs "bash").
 */

export interface ScriptTypeProfile {
  readonly key: string;
  readonly displayName: string;
  readonly fileExtension: ".sh" | ".ps1";
  /** Asset bundle directory holding this variant's scripts. */
  readonly directory: string;
  readonly targetPlatformHint: "unix" | "windows";
  /** Prefix used when a script refers to itself from its own directory. */
  readonly selfReferencePrefix: string;
}

export const SCRIPT_TYPES = {
  posix: {
    key: "posix",
    displayName: "POSIX Shell (bash/zsh)",
    fileExtension: ".sh",
    directory: "bash",
    targetPlatformHint: "unix",
    selfReferencePrefix: "./",
  },
  powershell: {
    key: "powershell",
    displayName: "PowerShell",
    fileExtension: ".ps1",
    directory: "powershell",
    targetPlatformHint: "windows",
    selfReferencePrefix: ".\\",
  },
} as const satisfies Record<string, ScriptTypeProfile>;

export type ScriptTypeKey = keyof typeof SCRIPT_TYPES;

/** Short spellings accepted on `--script` and in the defaults file. */
export const SCRIPT_TYPE_ALIASES: Readonly<Record<string, ScriptTypeKey>> = {
  sh: "posix",
  bash: "posix",
  ps: "powershell",
  ps1: "powershell",
  pwsh: "powershell",
};

/** Base names of every generated script; each exists once per script type. */
export const SCRIPT_NAMES = [
  "check-prerequisites",
  "create-new-feature",
  "setup-plan",
  "update-agent-context",
] as const;

export type ScriptName = (typeof SCRIPT_NAMES)[number];

/** Script that `{SCRIPT}` refers to when a template does not pick one. */
export const STANDARD_SETUP_SCRIPT: ScriptName = "setup-plan";

export function listScriptTypes(): ScriptTypeProfile[] {
  return Object.values(SCRIPT_TYPES);
}

export function isScriptTypeKey(key: string): key is ScriptTypeKey {
  return Object.hasOwn(SCRIPT_TYPES, key);
}

export function isScriptName(name: string): name is ScriptName {
  return SCRIPT_NAMES.some((candidate) => candidate === name);
}

/** Resolve a key or alias to its profile. */
export function findScriptType(keyOrAlias: string): ScriptTypeProfile | undefined {
  const normalized = keyOrAlias.trim().toLowerCase();
  if (isScriptTypeKey(normalized)) return SCRIPT_TYPES[normalized];
  const aliased = SCRIPT_TYPE_ALIASES[normalized];
  return aliased ? SCRIPT_TYPES[aliased] : undefined;
}

export function defaultScriptTypeFor(platform: NodeJS.Platform): ScriptTypeKey {
  return platform === "win32" ? "powershell" : "posix";
}
