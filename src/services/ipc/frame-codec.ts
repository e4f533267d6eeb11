/**
 * Newline-delimited JSON framing
 *
 * A frame is one UTF-8 line terminated by `\n`. Reads are reassembled across
 * chunk boundaries; a trailing `\r` is dropped and blank lines are ignored.
 */

import { ProtocolError } from '../../lib/errors/DaemonErrors.js';
import { Result, ok, err } from '../../lib/result-types.js';
import { MAX_FRAME_BYTES } from '../../constants/daemon-constants.js';

const NEWLINE = 0x0a;

export function encodeFrame(message: unknown): Buffer {
  return Buffer.from(`${JSON.stringify(message)}\n`, 'utf-8');
}

export class FrameDecoder {
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(private readonly maxFrameBytes: number = MAX_FRAME_BYTES) {}

  /**
   * Feed a chunk and collect every frame it completes
   *
   * Fails once an unterminated frame grows past the size limit; the decoder
   * should then be discarded along with its connection.
   */
  push(chunk: Buffer): Result<string[], ProtocolError> {
    const frames: string[] = [];
    let start = 0;

    for (let newline = chunk.indexOf(NEWLINE, start); newline !== -1; newline = chunk.indexOf(NEWLINE, start)) {
      const piece = chunk.subarray(start, newline);
      if (this.size + piece.length > this.maxFrameBytes) {
        return err(this.oversized());
      }
      this.chunks.push(piece);
      const frame = Buffer.concat(this.chunks).toString('utf-8').replace(/\r$/, '');
      this.chunks = [];
      this.size = 0;
      if (frame.trim().length > 0) {
        frames.push(frame);
      }
      start = newline + 1;
    }

    const rest = chunk.subarray(start);
    if (rest.length > 0) {
      if (this.size + rest.length > this.maxFrameBytes) {
        return err(this.oversized());
      }
      this.chunks.push(rest);
      this.size += rest.length;
    }

    return ok(frames);
  }

  /**
   * Bytes held for an unterminated frame
   */
  pendingBytes(): number {
    return this.size;
  }

  reset(): void {
    this.chunks = [];
    this.size = 0;
  }

  private oversized(): ProtocolError {
    this.reset();
    return new ProtocolError(`Frame exceeds ${this.maxFrameBytes} bytes`);
  }
}
