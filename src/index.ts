/**
 * Flow-start JSON logger: emits one flow_start event per new flow seen by an inline
 * packet pipeline, standalone or nested under an eve-log output.
 */

export { registerFlowStartLog } from './register.js';
export type { FlowStartRegisterOptions } from './register.js';
export { createOutputRegistry } from './registry.js';
export type { OutputRegistry, PacketModule, PacketSubModule, PacketLoggerCallbacks } from './registry.js';

export { createFlowStartCondition } from './condition.js';
export type { PacketCondition } from './condition.js';
export { buildFlowStartRecord, createFlowStartLogger, logFlowStart } from './formatter.js';
export type { FlowStartFormatOptions, PacketLogger } from './formatter.js';
export { createEventHeader, formatTimestamp, protoName } from './header.js';
export type { HeaderBuilder } from './header.js';

export { createStandaloneContext, createSubModuleContext } from './context.js';
export type { ModuleContext, SinkOwnership, StandaloneContextOptions } from './context.js';
export { threadDeinit, threadInit } from './thread.js';
export type { LaneStats, ThreadLocalState } from './thread.js';
export { ScratchBuffer, writeJsonLine } from './buffer.js';
export { CallbackSink, FileSink, RefCountedSink, openSink } from './sink.js';
export type { OpenSinkOptions, OutputSink } from './sink.js';
export { createJsonOutputContext, openJsonOutput } from './eve.js';
export type { JsonOutputContext, JsonOutputOptions } from './eve.js';
export { createSysfsInterfaceResolver, detectInterfaceResolver } from './interfaces.js';
export type { InterfaceNameResolver, SysfsResolverOptions } from './interfaces.js';

export { createPipeline } from './pipeline.js';
export type { Lane, Pipeline, PipelineConfig } from './pipeline.js';
export { replayPackets } from './replay.js';
export type { ReplayResult } from './replay.js';

export {
  DEFAULT_LOG_FILENAME,
  EVE_PARENT_NAME,
  FLOWSTART_CONF_NAME,
  FLOWSTART_EVENT_TYPE,
  FLOWSTART_SUB_CONF_NAME,
  MODULE_NAME,
  OUTPUT_BUFFER_SIZE,
} from './constants.js';

export type {
  EngineMode,
  EventHeader,
  FlowStartRecord,
  FlowView,
  OutputConfig,
  OutputErrorCode,
  OutputStatus,
  PacketTimestamp,
  PacketView,
  SinkConfig,
} from './types.js';
export { OUTPUT_ERROR_CODES, OUTPUT_STATUS } from './types.js';

export { OutputModuleError } from './errors.js';
export { parsePacketRecord, validateOutputsConfig, validateSinkConfig, ValidationError } from './validation.js';
