export interface HintedErrorOptions {
  readonly detailLines?: readonly string[];
  readonly hintLines?: readonly string[];
  readonly cause?: unknown;
}

/** An error whose headline, detail lines and hint lines render separately. */
export class HintedError extends Error {
  public readonly headline: string;
  public readonly detailLines: readonly string[];
  public readonly hintLines: readonly string[];

  constructor(headline: string, options: HintedErrorOptions = {}) {
    const { cause, detailLines = [], hintLines = [] } = options;
    super(headline, cause === undefined ? undefined : { cause });
    this.headline = headline;
    this.detailLines = [...detailLines];
    this.hintLines = [...hintLines];
  }
}

/** Errors recorded on a run report; summaries print their headline. */
export abstract class DisplayableError extends HintedError {
  public messageForDisplay(): string {
    return this.headline;
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : String(error);
}
