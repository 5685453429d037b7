/**
 * Per-lane scratch buffer. Reset is a logical truncate: the backing storage is kept
 * and only grows when a record does not fit in what is left.
 */

import { OUTPUT_BUFFER_SIZE } from './constants.js';
import type { OutputSink } from './sink.js';

export class ScratchBuffer {
  private data: Buffer;
  private offset = 0;

  /** Throws RangeError when the capacity cannot be allocated. */
  constructor(initialCapacity: number = OUTPUT_BUFFER_SIZE) {
    this.data = Buffer.allocUnsafe(initialCapacity);
  }

  get capacity(): number {
    return this.data.length;
  }

  get length(): number {
    return this.offset;
  }

  reset(): void {
    this.offset = 0;
  }

  /** Grows the backing storage by `by` bytes, keeping the bytes written so far. */
  expand(by: number): void {
    const next = Buffer.allocUnsafe(this.data.length + by);
    this.data.copy(next, 0, 0, this.offset);
    this.data = next;
  }

  append(text: string): void {
    const needed = Buffer.byteLength(text, 'utf8');
    const free = this.data.length - this.offset;
    if (needed > free) {
      this.expand(needed - free);
    }
    this.offset += this.data.write(text, this.offset, 'utf8');
  }

  /** View of the bytes written since the last reset; valid until the next append or reset. */
  bytes(): Buffer {
    return this.data.subarray(0, this.offset);
  }

  /** Drops the backing storage. */
  free(): void {
    this.data = Buffer.alloc(0);
    this.offset = 0;
  }
}

/**
 * Serializes one record as a JSON line into the buffer (appending after whatever it
 * already holds) and writes the buffer's content to the sink. Sink errors propagate.
 */
export function writeJsonLine(record: object, sink: OutputSink, buffer: ScratchBuffer): void {
  buffer.append(JSON.stringify(record) + '\n');
  sink.write(buffer.bytes());
}
