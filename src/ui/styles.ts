/**
 * Terminal styles. Built from a chalk instance so tests can pass a
 * colourless one and assert plain text.
 */

import chalk, { type ChalkInstance } from "chalk";

export interface Styles {
  title: (text: string) => string;
  accent: (text: string) => string;
  success: (text: string) => string;
  warning: (text: string) => string;
  error: (text: string) => string;
  dim: (text: string) => string;
}

export function createStyles(instance: ChalkInstance = chalk): Styles {
  return {
    title: (text) => instance.cyan.bold(text),
    accent: (text) => instance.cyan(text),
    success: (text) => instance.green(text),
    warning: (text) => instance.yellow(text),
    error: (text) => instance.red(text),
    dim: (text) => instance.gray(text),
  };
}
