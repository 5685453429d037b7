/**
 * Per-lane logger state. Each worker lane gets its own scratch buffer and counters;
 * nothing here is shared between lanes, so nothing here is locked.
 */

import { ScratchBuffer } from './buffer.js';
import { OUTPUT_BUFFER_SIZE } from './constants.js';
import type { ModuleContext } from './context.js';
import { OutputModuleError, errorMessage } from './errors.js';
import { logInfo } from './logger.js';
import { OUTPUT_ERROR_CODES } from './types.js';

export interface LaneStats {
  emitted: number;
  /** Events dropped because the header could not be built. */
  dropped: number;
  writeErrors: number;
}

export interface ThreadLocalState {
  readonly context: ModuleContext;
  readonly scratch: ScratchBuffer;
  readonly stats: LaneStats;
}

export function emptyStats(): LaneStats {
  return { emitted: 0, dropped: 0, writeErrors: 0 };
}

export function addStats(into: LaneStats, from: LaneStats): LaneStats {
  into.emitted += from.emitted;
  into.dropped += from.dropped;
  into.writeErrors += from.writeErrors;
  return into;
}

/**
 * Lane startup. A missing context or a buffer that cannot be allocated is fatal to the
 * lane and throws OutputModuleError; the host does not retry.
 */
export function threadInit(
  context: ModuleContext | null | undefined,
  bufferSize: number = OUTPUT_BUFFER_SIZE
): ThreadLocalState {
  if (context == null) {
    throw new OutputModuleError(
      OUTPUT_ERROR_CODES.MISSING_CONTEXT,
      'lane init called without a module context'
    );
  }
  let scratch: ScratchBuffer;
  try {
    scratch = new ScratchBuffer(bufferSize);
  } catch (err) {
    throw new OutputModuleError(
      OUTPUT_ERROR_CODES.ALLOCATION_FAILED,
      `cannot allocate ${bufferSize} byte output buffer: ${errorMessage(err)}`,
      { cause: err }
    );
  }
  return { context, scratch, stats: emptyStats() };
}

/** Lane shutdown: frees the buffer and reports the lane's counters. Null is a no-op. */
export function threadDeinit(state: ThreadLocalState | null | undefined): void {
  if (state == null) return;
  const { emitted, dropped, writeErrors } = state.stats;
  logInfo('Flow-start lane stopped', {
    module: state.context.name,
    emitted,
    dropped,
    writeErrors,
  });
  state.scratch.free();
}
