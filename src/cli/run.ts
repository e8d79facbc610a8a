import { resolve } from "node:path";

import { Command, Option } from "commander";

import { executeRunCommand } from "../commands/run/command.js";
import { type ProcessExecutor, shellExecutor } from "../commands/run/executor.js";
import { resolveExitCode } from "../commands/run/reports.js";
import {
  ERROR_STRATEGIES,
  type ErrorStrategy,
  type RunReport,
} from "../commands/run/types.js";
import { loadRunSettings } from "../configs/settings/loader.js";
import { ensureCommand, resolveCliContext } from "../preflight/index.js";
import {
  createRunRenderer,
  type RunProgressRenderer,
} from "../render/transcripts/run.js";
import { JjClient } from "../vcs/jj.js";
import type { VcsClient } from "../vcs/types.js";
import { writeCommandOutput } from "./output.js";

export interface RunCommandOptions {
  command: string;
  revset?: string;
  errStrategy?: ErrorStrategy;
  configPath?: string;
  cwd?: string;
  vcs?: VcsClient;
  executor?: ProcessExecutor;
  renderer?: RunProgressRenderer;
  tempDirectory?: string;
}

export interface RunCommandResult {
  report: RunReport;
  body: string;
  exitCode: number;
}

export async function runRunCommand(
  options: RunCommandOptions,
): Promise<RunCommandResult> {
  const cwd = options.cwd ?? process.cwd();
  const vcs = options.vcs ?? new JjClient();
  const command = ensureCommand(options.command);

  const { root } = await resolveCliContext({ vcs, cwd });
  const settings = loadRunSettings({
    root,
    filePath:
      options.configPath !== undefined
        ? resolve(cwd, options.configPath)
        : undefined,
  });

  const renderer = options.renderer ?? createRunRenderer();
  const report = await executeRunCommand({
    root,
    command,
    revset: options.revset ?? settings.revset,
    strategy: options.errStrategy ?? settings.errStrategy,
    reconcileFailurePolicy: settings.reconciliation.onFailure,
    vcs,
    executor: options.executor ?? shellExecutor,
    renderer,
    tempDirectory: options.tempDirectory,
  });

  return {
    report,
    body: renderer.complete(report),
    exitCode: resolveExitCode(report),
  };
}

interface RunCommandActionOptions {
  revset?: string;
  errStrategy?: ErrorStrategy;
  config?: string;
}

export function createRunCommand(): Command {
  return new Command("jj-run")
    .description(
      "Run a shell command on every change of a revset, each in a throwaway copy inside a temporary workspace",
    )
    .argument("<command>", "Shell command to run for each change")
    .option("-r, --revset <revset>", "Changes to process (default: mutable() & ::@)")
    .addOption(
      new Option(
        "-e, --err-strategy <strategy>",
        "What to do when a change fails (default: continue)",
      ).choices(ERROR_STRATEGIES),
    )
    .option("--config <path>", "Settings file to use instead of .jj-run.yaml")
    .allowExcessArguments(false)
    .action(async (command: string, options: RunCommandActionOptions) => {
      const result = await runRunCommand({
        command,
        revset: options.revset,
        errStrategy: options.errStrategy,
        configPath: options.config,
      });
      writeCommandOutput({
        body: result.body,
        exitCode: result.exitCode,
      });
    });
}
