import { CliError } from "../cli/errors.js";

export class RepositoryNotFoundError extends CliError {
  constructor(cwd: string, detailLines: readonly string[] = []) {
    super(`No jj repository found at ${cwd}.`, {
      detailLines,
      hintLines: [
        "Run jj-run from inside a jj workspace, or create one with `jj git init --colocate`.",
      ],
    });
    this.name = "RepositoryNotFoundError";
  }
}

export class EmptyCommandError extends CliError {
  constructor() {
    super("Command must not be empty.", {
      hintLines: ['Pass the shell command as one argument, e.g. jj-run "npm test".'],
    });
    this.name = "EmptyCommandError";
  }
}
