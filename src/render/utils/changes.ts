import type { TerminationReason } from "../../commands/run/types.js";
import { colorize, type TerminalColor } from "../../utils/colors.js";

export const SHORT_CHANGE_ID_LENGTH = 12;
export const NO_DESCRIPTION_LABEL = "(no description set)" as const;

export function formatShortChangeId(changeId: string): string {
  return changeId.slice(0, SHORT_CHANGE_ID_LENGTH);
}

export function formatChangeLabel(change: {
  changeId: string;
  description: string;
}): string {
  const description = change.description.trim();
  return `${formatShortChangeId(change.changeId)} ${description || NO_DESCRIPTION_LABEL}`;
}

export function formatDurationLabel(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs < 0) {
    return "0s";
  }

  if (durationMs < 1000) {
    return `${Math.round(durationMs)}ms`;
  }

  const totalSeconds = Math.round(durationMs / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  const parts: string[] = [];
  if (hours > 0) {
    parts.push(`${hours}h`);
  }
  if (minutes > 0) {
    parts.push(`${minutes}m`);
  }
  if (seconds > 0 || parts.length === 0) {
    parts.push(`${seconds}s`);
  }

  return parts.join(" ");
}

const TERMINATION_STYLES: Record<
  TerminationReason,
  { label: string; color: TerminalColor }
> = {
  completed: { label: "COMPLETED", color: "green" },
  "stopped-after-error": { label: "STOPPED AFTER ERROR", color: "yellow" },
  "aborted-fatal": { label: "ABORTED", color: "red" },
};

export function formatTerminationLabel(termination: TerminationReason): string {
  const style = TERMINATION_STYLES[termination];
  return colorize(style.label, style.color);
}
