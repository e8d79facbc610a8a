import { colorize, type TerminalColor } from "./colors.js";

export const LOG_PREFIX = "[jj-run]" as const;

export function formatCliOutput(value: string): string {
  const trimmedEnd = value.trimEnd();
  return `\n${trimmedEnd}\n\n`;
}

export function formatAlertMessage(
  label: string,
  color: TerminalColor,
  message: string,
): string {
  const prefix = colorize(`${label}:`, color);
  return `${prefix} ${message}`;
}

export function formatErrorMessage(message: string): string {
  return formatAlertMessage("Error", "red", message);
}

/**
 * Writes a prefixed diagnostic line to stderr. Used for failures that are
 * reported but never change the outcome of a run.
 */
export function logWarning(message: string): void {
  console.warn(`${LOG_PREFIX} ${message}`);
}
