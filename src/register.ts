/**
 * Registration of the flow-start logger: a standalone module with its own file and a
 * sub-module under eve-log sharing the parent's file. Both run the same condition,
 * logger and lane callbacks; only context construction differs.
 */

import { createFlowStartCondition } from './condition.js';
import {
  EVE_PARENT_NAME,
  FLOWSTART_CONF_NAME,
  FLOWSTART_SUB_CONF_NAME,
  LOGGER_JSON_FLOWSTART,
  MODULE_NAME,
} from './constants.js';
import { createStandaloneContext, createSubModuleContext } from './context.js';
import { createFlowStartLogger } from './formatter.js';
import type { FlowStartFormatOptions } from './formatter.js';
import { logDebug } from './logger.js';
import type { OutputRegistry, PacketLoggerCallbacks } from './registry.js';
import { threadDeinit, threadInit } from './thread.js';

export interface FlowStartRegisterOptions extends FlowStartFormatOptions {
  /** Engine-mode query, read on every packet. */
  isInline: () => boolean;
  /** JSON output support of this build; false registers nothing. Default true. */
  jsonEnabled?: boolean;
}

export function registerFlowStartLog(registry: OutputRegistry, options: FlowStartRegisterOptions): void {
  if (options.jsonEnabled === false) {
    logDebug('JSON output unavailable; flow-start logger not registered', { module: MODULE_NAME });
    return;
  }

  const shared: Omit<PacketLoggerCallbacks, 'confName'> = {
    loggerId: LOGGER_JSON_FLOWSTART,
    moduleName: MODULE_NAME,
    condition: createFlowStartCondition(options.isInline),
    logger: createFlowStartLogger({
      buildHeader: options.buildHeader,
      interfaceNames: options.interfaceNames,
    }),
    threadInit: (context) => threadInit(context),
    threadDeinit,
  };

  registry.registerPacketModule({
    ...shared,
    confName: FLOWSTART_CONF_NAME,
    initContext: createStandaloneContext,
  });
  registry.registerPacketSubModule({
    ...shared,
    confName: FLOWSTART_SUB_CONF_NAME,
    parentName: EVE_PARENT_NAME,
    initContext: createSubModuleContext,
  });
}
