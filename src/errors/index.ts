/**
 * Error taxonomy for project initialization.
 *
 * Every failure the core can produce is a SpecifyError subclass carrying a
 * stable `code`. The CLI boundary prints the message and sets a non-zero
 * exit code; nothing below it retries or recovers.
 */

export const ErrorCodes = {
  CONFIGURATION: "CONFIGURATION_ERROR",
  DIRECTORY_STATE: "DIRECTORY_STATE_ERROR",
  TOOL_NOT_FOUND: "TOOL_NOT_FOUND",
  ASSET_NOT_FOUND: "ASSET_NOT_FOUND",
  ASSET_LOAD: "ASSET_LOAD_ERROR",
  TEMPLATE_PROCESSING: "TEMPLATE_PROCESSING_ERROR",
  FILE_SYSTEM: "FILESYSTEM_ERROR",
  VERSION_CONTROL: "VERSION_CONTROL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface SpecifyErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

/** Base class for every typed failure. */
export class SpecifyError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, options: SpecifyErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.details = options.details ?? {};
  }
}

// --- Configuration ---

export class ConfigurationError extends SpecifyError {
  constructor(message: string, options: SpecifyErrorOptions = {}) {
    super(ErrorCodes.CONFIGURATION, message, options);
  }
}

export class ConflictingModeError extends ConfigurationError {
  constructor(name: string) {
    super(`Cannot specify both a project name ("${name}") and --here`, { details: { name } });
  }
}

export class MissingNameError extends ConfigurationError {
  constructor() {
    super("Must specify either a project name or use --here");
  }
}

export class UnknownAssistantError extends ConfigurationError {
  constructor(key: string, known: readonly string[]) {
    super(`Unknown AI assistant: ${key} (choose from: ${known.join(", ")})`, {
      details: { key },
    });
  }
}

export class UnknownScriptTypeError extends ConfigurationError {
  constructor(key: string, known: readonly string[]) {
    super(`Unknown script type: ${key} (choose from: ${known.join(", ")})`, {
      details: { key },
    });
  }
}

// --- Directory state ---

export class DirectoryStateError extends SpecifyError {
  readonly path: string;

  constructor(path: string, message: string) {
    super(ErrorCodes.DIRECTORY_STATE, message, { details: { path } });
    this.path = path;
  }
}

export class DirectoryExistsError extends DirectoryStateError {
  constructor(path: string) {
    super(path, `Directory ${path} already exists`);
  }
}

export class NonEmptyDirectoryError extends DirectoryStateError {
  readonly entries: number;

  constructor(path: string, entries: number) {
    super(path, `Directory ${path} is not empty (${entries} entries). Use --force to initialize anyway`);
    this.entries = entries;
  }
}

// --- Tools and assets ---

export class ToolNotFoundError extends SpecifyError {
  readonly tool: string;

  constructor(tool: string, hint?: string) {
    const suffix = hint ? `. ${hint}` : "";
    super(ErrorCodes.TOOL_NOT_FOUND, `Required tool not found: ${tool}${suffix}`, { details: { tool } });
    this.tool = tool;
  }
}

export class AssetNotFoundError extends SpecifyError {
  readonly asset: string;

  constructor(asset: string) {
    super(ErrorCodes.ASSET_NOT_FOUND, `Asset not found: ${asset}`, { details: { asset } });
    this.asset = asset;
  }
}

export class AssetLoadError extends SpecifyError {
  constructor(root: string, cause?: unknown) {
    super(ErrorCodes.ASSET_LOAD, `Failed to load asset bundle from ${root}`, {
      cause,
      details: { root },
    });
  }
}

export class TemplateProcessingError extends SpecifyError {
  readonly template: string;

  constructor(template: string, cause: unknown) {
    super(
      ErrorCodes.TEMPLATE_PROCESSING,
      `Failed to process template ${template}: ${getErrorMessage(cause)}`,
      { cause, details: { template } },
    );
    this.template = template;
  }
}

// --- Side effects ---

export class FileSystemError extends SpecifyError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(ErrorCodes.FILE_SYSTEM, `${message}: ${path}`, { cause, details: { path } });
    this.path = path;
  }
}

export class VersionControlError extends SpecifyError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCodes.VERSION_CONTROL, cause === undefined ? message : `${message}: ${getErrorMessage(cause)}`, {
      cause,
    });
  }
}

// --- Helpers ---

/**
 * Normalize an unknown thrown value into an Error.
 */
export function toError(error: unknown, fallbackMessage = "Unknown error"): Error {
  if (error instanceof Error) return error;
  if (typeof error === "string" && error.length > 0) return new Error(error);
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return new Error(error.message);
  }
  return new Error(fallbackMessage);
}

export function getErrorMessage(error: unknown, fallbackMessage = "Unknown error"): string {
  return toError(error, fallbackMessage).message;
}

/** Node errno code of a thrown value, if it has one. */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/** Walk the `cause` chain, outermost first. */
export function causeChain(error: unknown): Error[] {
  const chain: Error[] = [];
  let current: unknown = error;
  while (current !== undefined && chain.length < 10) {
    const err = toError(current);
    chain.push(err);
    current = err.cause;
  }
  return chain;
}
