import { HintedError } from "../../utils/errors.js";
import type { YamlParseErrorDetail } from "../../utils/yaml-reader.js";

const SETTINGS_HINT =
  "Fix or remove the file and rerun. Supported keys: revset, errStrategy, reconciliation.onFailure.";

export class SettingsError extends HintedError {
  constructor(filePath: string, detail: string) {
    super(`Invalid settings file at ${filePath}: ${detail}`, {
      hintLines: [SETTINGS_HINT],
    });
    this.name = "SettingsError";
  }

  /** `(line L, column C): reason` when js-yaml reported where parsing stopped. */
  public static fromYaml(
    filePath: string,
    detail: YamlParseErrorDetail,
  ): SettingsError {
    const reason = detail.reason ?? detail.message ?? "unknown YAML error";
    const located =
      detail.line !== undefined && detail.column !== undefined
        ? `(line ${detail.line}, column ${detail.column}): ${reason}`
        : reason;
    return new SettingsError(filePath, located);
  }
}
