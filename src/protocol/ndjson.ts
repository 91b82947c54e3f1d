import { StringDecoder } from 'node:string_decoder';
import { createLogger, errorMessage, type Logger } from '../logger.js';

export const DEFAULT_MAX_BUFFER = 1_000_000;

export type DecodedLine =
  | { ok: true; value: unknown; line: string; lineNumber: number }
  | { ok: false; error: string; line: string; lineNumber: number };

/**
 * Incremental newline-delimited JSON framer.
 * `feed` only yields a frame once its terminating newline has been seen;
 * the trailing partial line is kept for the next call.
 */
export class NdjsonDecoder {
  private readonly log: Logger;
  private readonly utf8 = new StringDecoder('utf8');
  private buffer = '';
  private lines = 0;

  constructor(
    private readonly maxBuffer = DEFAULT_MAX_BUFFER,
    log?: Logger,
  ) {
    this.log = log ?? createLogger('ndjson');
  }

  /** Number of newline-terminated lines consumed so far, blank ones included. */
  get lineCount(): number {
    return this.lines;
  }

  /** Characters held back waiting for a newline. */
  get pending(): number {
    return this.buffer.length;
  }

  feed(chunk: string | Uint8Array): string[] {
    return this.take(chunk).map((entry) => entry.line);
  }

  /**
   * Feeds a chunk and parses every completed line. A malformed line yields an
   * error entry for that line alone; the following lines still decode.
   */
  decode(chunk: string | Uint8Array): DecodedLine[] {
    return this.take(chunk).map(({ line, lineNumber }): DecodedLine => {
      try {
        const value: unknown = JSON.parse(line);
        return { ok: true, value, line, lineNumber };
      } catch (error) {
        this.log.warn('ndjson.decode.error', { lineNumber, linePreview: line.slice(0, 120), error: errorMessage(error) });
        return { ok: false, error: errorMessage(error), line, lineNumber };
      }
    });
  }

  private take(chunk: string | Uint8Array): Array<{ line: string; lineNumber: number }> {
    this.buffer += typeof chunk === 'string' ? chunk : this.utf8.write(Buffer.from(chunk));

    const out: Array<{ line: string; lineNumber: number }> = [];
    let processed = 0;
    let idx = this.buffer.indexOf('\n');
    while (idx !== -1) {
      const line = this.buffer.slice(processed, idx).trim();
      this.lines++;
      if (line.length > 0) out.push({ line, lineNumber: this.lines });
      processed = idx + 1;
      idx = this.buffer.indexOf('\n', processed);
    }
    // Keep the tail (partial line)
    this.buffer = this.buffer.slice(processed);

    if (this.buffer.length > this.maxBuffer) {
      this.log.warn('ndjson.buffer.trim', { size: this.buffer.length, max: this.maxBuffer });
      this.buffer = '';
    }
    return out;
  }

  reset() {
    this.buffer = '';
    this.lines = 0;
    this.utf8.end();
  }
}

/** Serializes one value as compact JSON followed by a single newline. */
export function encodeFrame(value: unknown): string {
  return JSON.stringify(value) + '\n';
}

/** Concatenation of consecutive single-frame encodings. */
export function encodeBatch(values: readonly unknown[]): string {
  return values.map(encodeFrame).join('');
}

/** Byte form of {@link encodeFrame} for binary sinks. */
export function encodeFrameBytes(value: unknown): Uint8Array {
  return Buffer.from(encodeFrame(value), 'utf8');
}
