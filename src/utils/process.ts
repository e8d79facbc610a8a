import { spawn } from "node:child_process";
import type { Writable } from "node:stream";

import { ProcessStreamError } from "../commands/run/errors.js";

export interface SpawnStreamingProcessOptions {
  /** Command line handed to the user's shell. */
  command: string;
  cwd: string;
  stdout: Writable;
  stderr: Writable;
}

export interface SpawnStreamingProcessResult {
  exitCode: number;
  signal: NodeJS.Signals | null;
}

/**
 * Runs `command` through the shell with the inherited environment and pipes
 * its output into the given streams. Resolves once the child has exited and
 * both streams have been ended. There is no timeout.
 */
export async function spawnStreamingProcess(
  options: SpawnStreamingProcessOptions,
): Promise<SpawnStreamingProcessResult> {
  const { command, cwd, stdout, stderr } = options;

  return await new Promise<SpawnStreamingProcessResult>((resolve, reject) => {
    let settled = false;

    const child = spawn(command, [], {
      cwd,
      env: process.env,
      shell: true,
      stdio: ["ignore", "pipe", "pipe"],
    });

    const childStdout = child.stdout;
    const childStderr = child.stderr;

    if (!childStdout || !childStderr) {
      void endStreams([stdout, stderr]).finally(() => {
        reject(new ProcessStreamError("Failed to capture process output streams"));
      });
      return;
    }

    childStdout.pipe(stdout, { end: false });
    childStderr.pipe(stderr, { end: false });

    const finalize = async (): Promise<void> => {
      childStdout.unpipe(stdout);
      childStderr.unpipe(stderr);
      await endStreams([stdout, stderr]);
    };

    child.on("error", (error: Error) => {
      if (settled) {
        return;
      }
      settled = true;
      void finalize().finally(() => {
        reject(error);
      });
    });

    child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
      if (settled) {
        return;
      }
      settled = true;
      void finalize().finally(() => {
        resolve({ exitCode: code ?? (signal ? 1 : 0), signal });
      });
    });
  });
}

async function endStreams(streams: readonly Writable[]): Promise<void> {
  await Promise.all(
    streams.map((stream) => {
      const closed = waitForWritableClosure(stream);
      stream.end();
      return closed;
    }),
  );
}

function waitForWritableClosure(stream: Writable): Promise<void> {
  if (
    stream.destroyed ||
    stream.writableFinished ||
    stream.writableEnded ||
    stream.closed
  ) {
    return Promise.resolve();
  }

  return new Promise<void>((resolve) => {
    const handleComplete = (): void => {
      stream.removeListener("close", handleComplete);
      stream.removeListener("finish", handleComplete);
      stream.removeListener("error", handleComplete);
      resolve();
    };

    stream.once("close", handleComplete);
    stream.once("finish", handleComplete);
    stream.once("error", handleComplete);
  });
}
