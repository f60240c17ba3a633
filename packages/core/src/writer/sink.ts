import type { Writable } from "node:stream";
import { SinkError } from "../errors.js";

/** Character target of a message writer. */
export interface TextSink {
  write(text: string): void;
  writeLine(text?: string): void;
}

export const NEWLINE = "\n";

export class StringSink implements TextSink {
  private buffer = "";

  write(text: string): void {
    this.buffer += text;
  }

  writeLine(text = ""): void {
    this.buffer += text + NEWLINE;
  }

  /** Completed lines, plus any line still being written. */
  lines(): string[] {
    if (this.buffer.length === 0) return [];
    const parts = this.buffer.split(NEWLINE);
    if (parts[parts.length - 1] === "") parts.pop();
    return parts;
  }

  clear(): void {
    this.buffer = "";
  }

  toString(): string {
    return this.buffer;
  }
}

/**
 * Forwards text to a Node stream as it is written. Writing to a stream that
 * has failed, been destroyed or been ended throws: the stream's own error
 * when it has one, a {@link SinkError} otherwise.
 */
export class StreamSink implements TextSink {
  private readonly stream: Writable;

  constructor(stream: Writable) {
    this.stream = stream;
  }

  write(text: string): void {
    this.ensureWritable();
    this.stream.write(text);
  }

  writeLine(text = ""): void {
    this.write(text + NEWLINE);
  }

  private ensureWritable(): void {
    const { errored, destroyed, writableEnded } = this.stream;
    if (errored) throw errored;
    if (destroyed) throw new SinkError("Cannot write to a destroyed stream");
    if (writableEnded) throw new SinkError("Cannot write after the stream has ended");
  }
}
