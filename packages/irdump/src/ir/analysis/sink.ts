import { Error, ErrorCode } from "./errors.js";

/**
 * Destination for dump text
 */
export interface Sink {
  write(text: string): void;
}

/**
 * Collects everything written into memory
 */
export class BufferSink implements Sink {
  private chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  toString(): string {
    return this.chunks.join("");
  }
}

/**
 * Forwards text to a Node stream, e.g. `process.stdout` or a file
 *
 * The sink listens for the stream's `error` event, so a reader that goes
 * away early (`irdump x.yaml | head`) does not crash the process. The first
 * failure is kept; later writes throw it as `STREAM_FAILED`.
 */
export class StreamSink implements Sink {
  private failure: string | undefined;

  constructor(private readonly stream: NodeJS.WritableStream) {
    stream.on("error", (error: unknown) => {
      this.failure ??=
        error instanceof globalThis.Error ? error.message : String(error);
    });
  }

  /**
   * Message of the first error the stream reported, if any
   */
  get error(): string | undefined {
    return this.failure;
  }

  write(text: string): void {
    if (this.failure !== undefined) {
      throw new Error(ErrorCode.STREAM_FAILED, this.failure);
    }
    this.stream.write(text);
  }
}
