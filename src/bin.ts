#!/usr/bin/env node

import process from "node:process";

import { CommanderError } from "commander";

import { commanderAlreadyRendered } from "./cli/commander-utils.js";
import { CliError, toCliError } from "./cli/errors.js";
import { writeCommandOutput } from "./cli/output.js";
import { createRunCommand } from "./cli/run.js";
import { terminateActiveRun } from "./commands/run/lifecycle.js";
import { renderCliError } from "./render/utils/errors.js";
import { toErrorMessage } from "./utils/errors.js";
import { LOG_PREFIX } from "./utils/output.js";
import { getCliVersion } from "./utils/version.js";

const SIGNAL_EXIT_CODES: Partial<Record<NodeJS.Signals, number>> = {
  SIGINT: 130,
  SIGTERM: 143,
};

function installProcessGuards(): void {
  process.once("SIGINT", () => {
    void exitAfterTeardown("SIGINT", SIGNAL_EXIT_CODES.SIGINT ?? 1);
  });
  process.once("SIGTERM", () => {
    void exitAfterTeardown("SIGTERM", SIGNAL_EXIT_CODES.SIGTERM ?? 1);
  });

  process.on("uncaughtException", (error) => {
    console.error(error);
    void exitAfterTeardown("uncaught exception", 1);
  });
  process.on("unhandledRejection", (reason) => {
    console.error(reason);
    void exitAfterTeardown("unhandled rejection", 1);
  });
}

async function exitAfterTeardown(trigger: string, exitCode: number): Promise<void> {
  try {
    await terminateActiveRun();
  } catch (error) {
    console.error(
      `${LOG_PREFIX} Failed to tear down workspace after ${trigger}: ${toErrorMessage(error)}`,
    );
  }
  process.exit(exitCode);
}

export async function runCli(
  argv: readonly string[] = process.argv,
): Promise<void> {
  const program = createRunCommand()
    .version(getCliVersion(), "-v, --version", "print the jj-run version")
    .exitOverride()
    .showHelpAfterError();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (commanderAlreadyRendered(error)) {
        process.exitCode = error.exitCode ?? 0;
        return;
      }

      writeCommandOutput({
        body: renderCliError(new CliError(toErrorMessage(error))),
        exitCode: error.exitCode ?? 1,
      });
      return;
    }

    writeCommandOutput({
      body: renderCliError(toCliError(error)),
      exitCode: 1,
    });
  }
}

if (require.main === module && process.env.JJ_RUN_SKIP_AUTORUN !== "1") {
  installProcessGuards();
  void runCli();
}
