import {
  HintedError,
  type HintedErrorOptions,
  toErrorMessage,
} from "../utils/errors.js";

/** Errors the CLI reports to the user before or instead of a run summary. */
export class CliError extends HintedError {
  constructor(headline: string, options: HintedErrorOptions = {}) {
    super(headline, options);
    this.name = "CliError";
  }
}

export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) {
    return error;
  }

  if (error instanceof HintedError) {
    return new CliError(error.headline, {
      detailLines: error.detailLines,
      hintLines: error.hintLines,
      cause: error,
    });
  }

  return new CliError(toErrorMessage(error), { cause: error });
}
