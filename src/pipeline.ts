/**
 * Minimal host pipeline: builds output contexts from configuration, gives every lane its
 * own logger state, dispatches packets through each module's condition and logger, and
 * tears everything down in order (lanes, module contexts, parent outputs).
 * Public API: createPipeline(registry, config), start(), lane(id), reopen(), stop(), isRunning().
 */

import { EVE_PARENT_NAME } from './constants.js';
import type { ModuleContext } from './context.js';
import { openJsonOutput } from './eve.js';
import type { JsonOutputContext } from './eve.js';
import { OutputModuleError, errorMessage } from './errors.js';
import { logError, logInfo } from './logger.js';
import type { OutputRegistry, PacketLoggerCallbacks } from './registry.js';
import { addStats, emptyStats } from './thread.js';
import type { LaneStats, ThreadLocalState } from './thread.js';
import { OUTPUT_ERROR_CODES, OUTPUT_STATUS } from './types.js';
import type { OutputConfig, OutputStatus, PacketView } from './types.js';

export interface PipelineConfig {
  outputs: OutputConfig[];
  /** Number of worker lanes. Default 1. */
  lanes?: number;
  defaultLogDir?: string;
  now?: () => number;
}

export interface Lane {
  readonly id: number;
  /** Runs every active logger over the packet; FAILED when any logger's write failed. */
  process(packet: PacketView): OutputStatus;
}

export interface Pipeline {
  start(): void;
  lane(id: number): Lane;
  /** Asks every open output file to reopen before its next write. */
  reopen(): void;
  /**
   * Stops all lanes and closes outputs; returns the summed lane counters. Every output is
   * released even when one release throws; the first such error is rethrown afterwards.
   */
  stop(): LaneStats;
  isRunning(): boolean;
}

interface ActiveOutput {
  module: PacketLoggerCallbacks;
  context: ModuleContext;
}

interface LaneState {
  lane: Lane;
  threads: ThreadLocalState[];
}

interface TeardownResult {
  totals: LaneStats;
  failed: boolean;
  /** Error of the first release step that threw; later steps still ran. */
  failure: unknown;
}

export function createPipeline(registry: OutputRegistry, config: PipelineConfig): Pipeline {
  const laneCount = config.lanes ?? 1;
  if (!Number.isInteger(laneCount) || laneCount < 1) {
    throw new RangeError('lanes must be a positive integer');
  }

  let running = false;
  let parents: JsonOutputContext[] = [];
  let outputs: ActiveOutput[] = [];
  let lanes: LaneState[] = [];

  function buildOutputs(): void {
    const contextOptions = { defaultLogDir: config.defaultLogDir, now: config.now };
    for (const output of config.outputs) {
      if (output.module === EVE_PARENT_NAME) {
        const parent = openJsonOutput(output.conf, contextOptions);
        parents.push(parent);
        for (const type of output.types) {
          const sub = registry.getPacketSubModule(EVE_PARENT_NAME, type);
          if (sub === undefined) {
            throw new OutputModuleError(
              OUTPUT_ERROR_CODES.UNKNOWN_MODULE,
              `no output module registered as ${EVE_PARENT_NAME}.${type}`
            );
          }
          outputs.push({ module: sub, context: sub.initContext(undefined, parent) });
        }
        continue;
      }
      const module = registry.getPacketModule(output.module);
      if (module === undefined) {
        throw new OutputModuleError(
          OUTPUT_ERROR_CODES.UNKNOWN_MODULE,
          `no output module registered as ${output.module}`
        );
      }
      outputs.push({ module, context: module.initContext(output.conf, contextOptions) });
    }
  }

  function buildLane(id: number): void {
    const threads: ThreadLocalState[] = [];
    const lane: Lane = {
      id,
      process(packet: PacketView): OutputStatus {
        let status: OutputStatus = OUTPUT_STATUS.OK;
        for (let i = 0; i < outputs.length; i++) {
          const { module } = outputs[i];
          if (!module.condition(packet)) continue;
          if (module.logger(threads[i], packet) === OUTPUT_STATUS.FAILED) {
            status = OUTPUT_STATUS.FAILED;
          }
        }
        return status;
      },
    };
    // registered before init so a failing threadInit still gets the earlier ones torn down
    lanes.push({ lane, threads });
    for (const output of outputs) {
      threads.push(output.module.threadInit(output.context));
    }
  }

  function teardown(): TeardownResult {
    const result: TeardownResult = { totals: emptyStats(), failed: false, failure: undefined };
    function attempt(step: string, name: string, release: () => void): void {
      try {
        release();
      } catch (e) {
        logError('Pipeline teardown step failed', { step, output: name, error: errorMessage(e) });
        if (!result.failed) {
          result.failed = true;
          result.failure = e;
        }
      }
    }
    for (const { threads } of lanes) {
      threads.forEach((thread, i) => {
        addStats(result.totals, thread.stats);
        const { module } = outputs[i];
        attempt('threadDeinit', module.confName, () => module.threadDeinit(thread));
      });
    }
    for (const { module, context } of outputs) {
      attempt('destroy', module.confName, () => context.destroy());
    }
    for (const parent of parents) {
      attempt('destroy', parent.name, () => parent.destroy());
    }
    lanes = [];
    outputs = [];
    parents = [];
    return result;
  }

  const pipeline: Pipeline = {
    start(): void {
      if (running) {
        throw new Error('Pipeline already running');
      }
      try {
        buildOutputs();
        for (let id = 0; id < laneCount; id++) {
          buildLane(id);
        }
      } catch (e) {
        // teardown failures are logged there; the start error is the one reported
        teardown();
        logError('Pipeline start failed', { error: errorMessage(e) });
        throw e;
      }
      running = true;
      logInfo('Pipeline started', {
        lanes: laneCount,
        outputs: outputs.map((o) => o.module.confName),
      });
    },

    lane(id: number): Lane {
      const state = lanes[id];
      if (!running || state === undefined) {
        throw new RangeError(`lane ${id} is not running`);
      }
      return state.lane;
    },

    reopen(): void {
      const sinks = new Set([...outputs.map((o) => o.context.sink), ...parents.map((p) => p.sink)]);
      for (const sink of sinks) {
        if (!sink.closed) sink.requestReopen();
      }
    },

    stop(): LaneStats {
      if (!running) {
        return emptyStats();
      }
      running = false;
      const { totals, failed, failure } = teardown();
      logInfo('Pipeline stopped', { ...totals });
      if (failed) {
        throw failure;
      }
      return totals;
    },

    isRunning(): boolean {
      return running;
    },
  };

  return pipeline;
}
