#!/usr/bin/env node
/**
 * CLI entrypoint: read FLOWSTART_* env, register the flow-start logger, start the pipeline
 * and replay newline-delimited packet records from stdin through it.
 * SIGHUP reopens output files; SIGTERM/SIGINT stop and exit.
 * Exit codes: 0 = success, EXIT_CONFIG (1) = configuration error, EXIT_RUNTIME (2) = start/stop failure.
 */

import { createInterface } from 'node:readline';
import { EXIT_CONFIG, EXIT_RUNTIME } from './constants.js';
import { errorMessage } from './errors.js';
import { detectInterfaceResolver } from './interfaces.js';
import { logError, logInfo } from './logger.js';
import { createPipeline } from './pipeline.js';
import { registerFlowStartLog } from './register.js';
import { createOutputRegistry } from './registry.js';
import { replayPackets } from './replay.js';
import type { EnvConfig } from './types.js';
import { configFromEnv, ValidationError } from './validation.js';

async function main(): Promise<void> {
  let config: EnvConfig;
  try {
    config = configFromEnv(process.env);
  } catch (err) {
    const msg = errorMessage(err);
    logError('Invalid config: ' + msg, err instanceof ValidationError && err.field ? { field: err.field } : undefined);
    process.exitCode = EXIT_CONFIG;
    return;
  }

  const engineMode = config.engineMode;
  const registry = createOutputRegistry();
  registerFlowStartLog(registry, {
    isInline: () => engineMode === 'ips',
    interfaceNames: detectInterfaceResolver(),
  });
  const pipeline = createPipeline(registry, {
    outputs: config.outputs,
    lanes: config.lanes,
    defaultLogDir: config.defaultLogDir,
  });

  try {
    pipeline.start();
  } catch (err) {
    logError('Pipeline start failed', { err: errorMessage(err) });
    process.exitCode = err instanceof ValidationError ? EXIT_CONFIG : EXIT_RUNTIME;
    return;
  }

  function shutdown(signal: string): void {
    logInfo(`Received ${signal}, stopping pipeline`);
    try {
      pipeline.stop();
      process.exit(0);
    } catch (err) {
      logError('Error during stop', { err: errorMessage(err) });
      process.exit(EXIT_RUNTIME);
    }
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGHUP', () => {
    logInfo('Received SIGHUP, reopening output files');
    pipeline.reopen();
  });

  const input = createInterface({ input: process.stdin, crlfDelay: Infinity });
  const result = await replayPackets(input, pipeline, config.lanes);
  const totals = pipeline.stop();
  logInfo('Replay finished', { ...result, ...totals });
  if (result.failedWrites > 0) {
    process.exitCode = EXIT_RUNTIME;
  }
}

main().catch((err) => {
  logError('Entrypoint failed', { err: errorMessage(err) });
  process.exit(EXIT_RUNTIME);
});
