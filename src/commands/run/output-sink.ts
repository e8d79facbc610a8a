import { Writable } from "node:stream";
import { finished } from "node:stream/promises";
import { StringDecoder } from "node:string_decoder";

export type OutputStreamName = "stdout" | "stderr";

export type OutputLineListener = (
  stream: OutputStreamName,
  line: string,
) => void;

export interface CapturedOutput {
  stdout: string;
  stderr: string;
}

/**
 * Writable pair handed to the process executor for one change. Every
 * complete line is forwarded to the listener as soon as it arrives and the
 * full text is kept for the outcome.
 */
export interface ChangeOutputSink {
  readonly stdout: Writable;
  readonly stderr: Writable;
  captured(): CapturedOutput;
  /** Ends both streams, if the executor has not, and flushes partial lines. */
  close(): Promise<void>;
}

class LineForwardingWritable extends Writable {
  private readonly decoder = new StringDecoder("utf8");
  private pending = "";
  private text = "";

  constructor(
    private readonly stream: OutputStreamName,
    private readonly onLine: OutputLineListener,
  ) {
    super();
  }

  public get content(): string {
    return this.text;
  }

  public override _write(
    chunk: Buffer | string,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void,
  ): void {
    this.accept(typeof chunk === "string" ? chunk : this.decoder.write(chunk));
    callback();
  }

  public override _final(callback: (error?: Error | null) => void): void {
    this.accept(this.decoder.end());
    if (this.pending.length > 0) {
      this.emitLine(this.pending);
      this.pending = "";
    }
    callback();
  }

  private accept(value: string): void {
    if (value.length === 0) {
      return;
    }
    this.text += value;
    const lines = (this.pending + value).split("\n");
    this.pending = lines.pop() ?? "";
    for (const line of lines) {
      this.emitLine(line);
    }
  }

  private emitLine(line: string): void {
    this.onLine(this.stream, line.endsWith("\r") ? line.slice(0, -1) : line);
  }
}

export function createChangeOutputSink(
  onLine: OutputLineListener,
): ChangeOutputSink {
  const stdout = new LineForwardingWritable("stdout", onLine);
  const stderr = new LineForwardingWritable("stderr", onLine);

  return {
    stdout,
    stderr,
    captured: () => ({ stdout: stdout.content, stderr: stderr.content }),
    close: async () => {
      for (const stream of [stdout, stderr]) {
        if (!stream.writableEnded) {
          stream.end();
        }
      }
      await Promise.all([finished(stdout), finished(stderr)]);
    },
  };
}
