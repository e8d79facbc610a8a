import type { CommanderError } from "commander";

export const COMMANDER_SELF_RENDERED_CODES: ReadonlySet<string> = new Set([
  "commander.error",
  "commander.excessArguments",
  "commander.help",
  "commander.helpDisplayed",
  "commander.invalidArgument",
  "commander.missingArgument",
  "commander.optionMissingArgument",
  "commander.unknownOption",
  "commander.version",
]);

/** True when commander already printed its own message for `error`. */
export function commanderAlreadyRendered(error: CommanderError): boolean {
  if (!error.code) {
    return false;
  }

  if (COMMANDER_SELF_RENDERED_CODES.has(error.code)) {
    return true;
  }

  return (
    error.code.startsWith("commander.") && error.message.startsWith("error:")
  );
}
