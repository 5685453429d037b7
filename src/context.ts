/**
 * Module context: the flow-start logger's handle on its output sink.
 * One type for both deployments; the ownership tag decides what destroy() does.
 *  - owning: standalone module, opened its own sink and releases it on destroy.
 *  - borrowing: sub-module, writes to the parent's sink and never releases it.
 */

import { DEFAULT_LOG_FILENAME, FLOWSTART_CONF_NAME, FLOWSTART_SUB_CONF_NAME } from './constants.js';
import type { JsonOutputContext } from './eve.js';
import { OutputModuleError } from './errors.js';
import { logDebug, logWarn } from './logger.js';
import { openSink } from './sink.js';
import type { OutputSink } from './sink.js';
import { OUTPUT_ERROR_CODES } from './types.js';
import type { SinkConfig } from './types.js';

export type SinkOwnership = 'owning' | 'borrowing';

export interface ModuleContext {
  readonly name: string;
  readonly ownership: SinkOwnership;
  readonly sink: OutputSink;
  readonly destroyed: boolean;
  /** Called once by the host at shutdown, after all lanes using this context are gone. */
  destroy(): void;
}

export interface StandaloneContextOptions {
  defaultFilename?: string;
  defaultLogDir?: string;
  now?: () => number;
}

function createModuleContext(name: string, ownership: SinkOwnership, sink: OutputSink): ModuleContext {
  let destroyed = false;
  return {
    name,
    ownership,
    sink,
    get destroyed(): boolean {
      return destroyed;
    },
    destroy(): void {
      if (destroyed) {
        logWarn('Module context destroyed twice; ignoring', { module: name });
        return;
      }
      destroyed = true;
      if (ownership === 'owning') {
        sink.release();
      }
      logDebug('Cleaned up module context', { module: name, ownership });
    },
  };
}

/**
 * Standalone construction: opens a dedicated sink from the configuration node.
 * Throws ValidationError for a bad node and OutputModuleError(SINK_OPEN_FAILED) when
 * the file cannot be opened; nothing is left open in either case.
 */
export function createStandaloneContext(
  conf: SinkConfig | undefined,
  options: StandaloneContextOptions = {}
): ModuleContext {
  const sink = openSink(conf, {
    defaultFilename: options.defaultFilename ?? DEFAULT_LOG_FILENAME,
    defaultLogDir: options.defaultLogDir,
    now: options.now,
  });
  return createModuleContext(FLOWSTART_CONF_NAME, 'owning', sink);
}

/**
 * Sub-module construction: shares the parent's sink without taking a reference.
 * The node's own sink settings are ignored.
 */
export function createSubModuleContext(
  conf: SinkConfig | undefined,
  parent: JsonOutputContext
): ModuleContext {
  if (parent.sink.closed) {
    throw new OutputModuleError(
      OUTPUT_ERROR_CODES.MISSING_PARENT_SINK,
      `parent output ${parent.name} has no open sink`
    );
  }
  if (conf?.filename !== undefined) {
    logWarn('filename is ignored for a sub-module; the parent output file is used', {
      module: FLOWSTART_SUB_CONF_NAME,
      parent: parent.name,
    });
  }
  return createModuleContext(FLOWSTART_SUB_CONF_NAME, 'borrowing', parent.sink);
}
