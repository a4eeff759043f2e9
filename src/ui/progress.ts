/**
 * Progress tree rendering for a StepTracker.
 */

import type { ProgressStep, StepTracker } from "../init/tracker.js";
import { createStyles, type Styles } from "./styles.js";

const SYMBOLS: Readonly<Record<ProgressStep["status"], string>> = {
  pending: "○",
  running: "○",
  done: "●",
  failed: "●",
  skipped: "○",
};

export function renderStep(step: ProgressStep, styles: Styles = createStyles()): string {
  const paint = {
    pending: styles.dim,
    running: styles.accent,
    done: styles.success,
    failed: styles.error,
    skipped: styles.warning,
  }[step.status];

  const symbol = paint(SYMBOLS[step.status]);
  const detail = step.detail ? ` ${styles.dim(`(${step.detail})`)}` : "";

  if (step.status === "pending") {
    return styles.dim(`${SYMBOLS.pending} ${step.label}${step.detail ? ` (${step.detail})` : ""}`);
  }
  return `${symbol} ${step.label}${detail}`;
}

export function renderTracker(tracker: StepTracker, styles: Styles = createStyles()): string {
  const lines = [styles.title(tracker.title), ""];
  for (const step of tracker.getSteps()) {
    lines.push(renderStep(step, styles));
  }
  return lines.join("\n");
}
