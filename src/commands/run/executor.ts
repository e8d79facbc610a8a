import type { Writable } from "node:stream";

import { spawnStreamingProcess } from "../../utils/process.js";

export interface ExecuteCommandOptions {
  command: string;
  cwd: string;
  stdout: Writable;
  stderr: Writable;
}

export interface ExecuteCommandResult {
  exitCode: number;
  signal: NodeJS.Signals | null;
}

export interface ProcessExecutor {
  execute(options: ExecuteCommandOptions): Promise<ExecuteCommandResult>;
}

/** Runs the command string through the user's shell with the inherited environment. */
export const shellExecutor: ProcessExecutor = {
  execute: async (options) => await spawnStreamingProcess(options),
};
