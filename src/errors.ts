import type { OutputErrorCode } from './types.js';

/**
 * Raised when an output module cannot be constructed or a lane cannot start.
 * These are fatal to the module (or to the lane); per-event failures never throw.
 */
export class OutputModuleError extends Error {
  constructor(
    public readonly code: OutputErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'OutputModuleError';
    Object.setPrototypeOf(this, OutputModuleError.prototype);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
