/**
 * Parent JSON output ("eve-log"): owns one sink that every nested sub-module writes to.
 */

import { DEFAULT_EVE_FILENAME, EVE_PARENT_NAME } from './constants.js';
import { logInfo } from './logger.js';
import { openSink } from './sink.js';
import type { OutputSink } from './sink.js';
import type { SinkConfig } from './types.js';

export interface JsonOutputContext {
  readonly name: string;
  readonly sink: OutputSink;
  /** Releases the parent's reference; called after every sub-module context is destroyed. */
  destroy(): void;
}

export interface JsonOutputOptions {
  defaultLogDir?: string;
  now?: () => number;
}

export function openJsonOutput(conf: SinkConfig | undefined, options: JsonOutputOptions = {}): JsonOutputContext {
  return createJsonOutputContext(
    openSink(conf, {
      defaultFilename: DEFAULT_EVE_FILENAME,
      defaultLogDir: options.defaultLogDir,
      now: options.now,
    })
  );
}

/** Wraps an already opened sink; the context takes over the caller's reference. */
export function createJsonOutputContext(sink: OutputSink, name: string = EVE_PARENT_NAME): JsonOutputContext {
  let destroyed = false;
  return {
    name,
    sink,
    destroy(): void {
      if (destroyed) return;
      destroyed = true;
      sink.release();
      logInfo('Closed parent output', { module: name, sinkOpen: !sink.closed });
    },
  };
}
