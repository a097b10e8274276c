import { confirm, isCancel, outro } from "@clack/prompts";
import chalk from "chalk";
import ora from "ora";
import { ExecutionMode } from "./types";

export function setColorEnabled(enabled: boolean): void {
  chalk.level = enabled ? 3 : 0;
}

export function statusInfo(message: string): string {
  return chalk.blue(`🔵 ${message}`);
}

export function statusWarn(message: string): string {
  return chalk.yellow(`🟡 ${message}`);
}

export function statusDelete(message: string): string {
  return chalk.red(`🔴 ${message}`);
}

export function statusSafe(message: string): string {
  return chalk.green(`🟢 ${message}`);
}

/** Anything but an explicit yes, including a cancelled prompt, declines. */
export async function confirmAction(message: string): Promise<boolean> {
  const response = await confirm({
    message,
    initialValue: false
  });

  if (isCancel(response)) {
    outro("Cancelled.");
    return false;
  }

  return response === true;
}

export interface Spinner {
  succeed(text?: string): void;
  fail(text?: string): void;
}

export interface Logger {
  info(message: string): void;
  /** Per-resource lines, shown with --verbose only. */
  detail(message: string): void;
  warn(message: string): void;
  spinner(text: string): Spinner | null;
}

export type LineWriter = (line: string) => void;

export type SpinnerFactory = (text: string) => Spinner;

const startOra: SpinnerFactory = (text) => ora(text).start();

export function createLogger(
  mode: Pick<ExecutionMode, "quiet" | "verbose">,
  write: LineWriter = (line) => console.log(line),
  startSpinner: SpinnerFactory = startOra,
  writeError: LineWriter = (line) => console.error(line)
): Logger {
  const enabled = !mode.quiet;
  const detailed = enabled && mode.verbose;

  return {
    info(message) {
      if (enabled) write(message);
    },
    detail(message) {
      if (detailed) write(message);
    },
    warn(message) {
      if (enabled) writeError(statusWarn(message));
    },
    spinner(text) {
      // Spinner frames would interleave with per-resource lines.
      if (!enabled || detailed) return null;
      return startSpinner(text);
    }
  };
}
