import type { HintedError } from "../../utils/errors.js";
import { formatErrorMessage } from "../../utils/output.js";
import { renderTranscript } from "./transcript.js";

/** Headline and details as one block, hints after a blank line. */
export function renderCliError(error: HintedError): string {
  const details = error.detailLines.length > 0 ? ["", ...error.detailLines] : [];
  return renderTranscript({
    sections: [[formatErrorMessage(error.headline), ...details]],
    footer: error.hintLines,
  });
}
