import { JjCommandError } from "../vcs/jj.js";
import type { VcsClient } from "../vcs/types.js";
import { EmptyCommandError, RepositoryNotFoundError } from "./errors.js";

export interface CliContext {
  root: string;
}

export interface ResolveCliContextOptions {
  vcs: VcsClient;
  cwd?: string;
}

export async function resolveCliContext(
  options: ResolveCliContextOptions,
): Promise<CliContext> {
  const cwd = options.cwd ?? process.cwd();

  try {
    const root = await options.vcs.repositoryRoot(cwd);
    return { root };
  } catch (error) {
    if (error instanceof JjCommandError) {
      throw new RepositoryNotFoundError(cwd, error.detailLines);
    }
    throw error;
  }
}

export function ensureCommand(command: string): string {
  if (command.trim().length === 0) {
    throw new EmptyCommandError();
  }
  return command;
}
