/**
 * Ordered progress steps for one initialization run.
 *
 * Status only moves forward:
 *
 *   pending → running → done | failed | skipped
 *   pending → skipped
 *
 * `startedAt` is stamped on first entry into running, `endedAt` on first
 * entry into a terminal status. Rejected transitions leave the step untouched.
 *
 * Mutations are synchronous, so a renderer reading `getSteps()` from a timer
 * never sees a half-applied update. The refresh callback runs after every
 * mutation; if it throws, the error is recorded and the mutation stands.
 */

export type StepStatus = "pending" | "running" | "done" | "failed" | "skipped";

export interface ProgressStep {
  key: string;
  label: string;
  status: StepStatus;
  detail: string;
  startedAt?: Date;
  endedAt?: Date;
}

export type RefreshCallback = (steps: readonly ProgressStep[]) => void;

export interface StepTrackerOptions {
  /** Clock, for tests. */
  now?: () => Date;
  /** Called when the refresh callback throws. */
  onRefreshError?: (error: unknown) => void;
}

const TERMINAL: ReadonlySet<StepStatus> = new Set(["done", "failed", "skipped"]);

const ALLOWED: Readonly<Record<StepStatus, readonly StepStatus[]>> = {
  pending: ["running", "skipped"],
  running: ["running", "done", "failed", "skipped"],
  done: [],
  failed: [],
  skipped: [],
};

export function isTerminal(status: StepStatus): boolean {
  return TERMINAL.has(status);
}

export class StepTracker {
  readonly title: string;
  private readonly steps: ProgressStep[] = [];
  private readonly now: () => Date;
  private readonly onRefreshError?: (error: unknown) => void;
  private refreshCallback?: RefreshCallback;
  private readonly refreshErrors: unknown[] = [];

  constructor(title: string, options: StepTrackerOptions = {}) {
    this.title = title;
    this.now = options.now ?? (() => new Date());
    this.onRefreshError = options.onRefreshError;
  }

  attachRefresh(callback: RefreshCallback | undefined): void {
    this.refreshCallback = callback;
  }

  /** Append a pending step. Adding an existing key is a no-op. */
  add(key: string, label: string): void {
    if (this.steps.some((s) => s.key === key)) return;
    this.steps.push({ key, label, status: "pending", detail: "" });
    this.refresh();
  }

  start(key: string, detail?: string): boolean {
    return this.transition(key, "running", detail);
  }

  complete(key: string, detail?: string): boolean {
    return this.transition(key, "done", detail);
  }

  fail(key: string, detail?: string): boolean {
    return this.transition(key, "failed", detail);
  }

  skip(key: string, detail?: string): boolean {
    return this.transition(key, "skipped", detail);
  }

  /**
   * Move a step to `status`.
   * @returns false when the transition is not allowed
   * @throws Error for an unknown step key
   */
  transition(key: string, status: StepStatus, detail?: string): boolean {
    const step = this.steps.find((s) => s.key === key);
    if (!step) {
      throw new Error(`Unknown progress step: ${key}`);
    }
    if (!ALLOWED[step.status].includes(status)) {
      return false;
    }

    step.status = status;
    if (detail) step.detail = detail;
    if (status === "running" && step.startedAt === undefined) {
      step.startedAt = this.now();
    }
    if (isTerminal(status) && step.endedAt === undefined) {
      step.endedAt = this.now();
    }

    this.refresh();
    return true;
  }

  get(key: string): ProgressStep | undefined {
    const step = this.steps.find((s) => s.key === key);
    return step ? { ...step } : undefined;
  }

  /** Snapshot copy of every step, in order. */
  getSteps(): ProgressStep[] {
    return this.steps.map((s) => ({ ...s }));
  }

  /** Errors thrown by the refresh callback so far. */
  getRefreshErrors(): readonly unknown[] {
    return this.refreshErrors;
  }

  private refresh(): void {
    if (!this.refreshCallback) return;
    try {
      this.refreshCallback(this.getSteps());
    } catch (error) {
      this.refreshErrors.push(error);
      this.onRefreshError?.(error);
    }
  }
}
