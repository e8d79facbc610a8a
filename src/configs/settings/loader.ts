import { join } from "node:path";
import process from "node:process";

import { parseYamlDocument } from "../../utils/yaml-reader.js";
import { createConfigLoader, type ReadFileFn } from "../shared/loader-factory.js";
import { SettingsError } from "./errors.js";
import {
  type RunSettings,
  type RunSettingsDocument,
  runSettingsSchema,
} from "./types.js";

export const SETTINGS_FILENAME = ".jj-run.yaml" as const;

/** Every mutable ancestor of the invoking workspace's working-copy change. */
export const DEFAULT_REVSET = "mutable() & ::@" as const;

export const DEFAULT_SETTINGS: RunSettings = {
  revset: DEFAULT_REVSET,
  errStrategy: "continue",
  reconciliation: {
    onFailure: "warn",
  },
};

export interface LoadRunSettingsOptions {
  root?: string;
  filePath?: string;
  readFile?: ReadFileFn;
}

function cloneSettings(settings: RunSettings): RunSettings {
  return {
    revset: settings.revset,
    errStrategy: settings.errStrategy,
    reconciliation: { onFailure: settings.reconciliation.onFailure },
  };
}

const runSettingsLoader = createConfigLoader<RunSettings, LoadRunSettingsOptions>({
  resolveFilePath: (root, options) =>
    options.filePath ?? join(root, SETTINGS_FILENAME),
  selectReadFile: (options) => options.readFile,
  handleMissing: () => cloneSettings(DEFAULT_SETTINGS),
  parse: (content, context) => {
    const document = parseSettingsYaml(content, context.filePath);
    return {
      revset: document.revset ?? DEFAULT_SETTINGS.revset,
      errStrategy: document.errStrategy ?? DEFAULT_SETTINGS.errStrategy,
      reconciliation: {
        onFailure:
          document.reconciliation?.onFailure ??
          DEFAULT_SETTINGS.reconciliation.onFailure,
      },
    };
  },
});

/**
 * Reads `.jj-run.yaml` from the repository root, or `filePath` when given.
 * A missing file yields the defaults.
 */
export function loadRunSettings(
  options: LoadRunSettingsOptions = {},
): RunSettings {
  const root = options.root ?? process.cwd();
  return runSettingsLoader({ ...options, root });
}

function parseSettingsYaml(
  content: string,
  filePath: string,
): RunSettingsDocument {
  const document = parseYamlDocument(content, {
    formatError: (detail) => SettingsError.fromYaml(filePath, detail),
    emptyValue: {},
  });

  const result = runSettingsSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    const detail = issue?.message ?? "Invalid settings value";
    throw new SettingsError(filePath, `${path}${detail}`);
  }
  return result.data;
}
