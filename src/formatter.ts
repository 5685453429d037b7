/**
 * Builds and writes the flow_start event for a triggering packet.
 * A header that cannot be built drops the event and still reports OK; only a failed
 * sink write reports FAILED.
 */

import { writeJsonLine } from './buffer.js';
import { FLOWSTART_EVENT_TYPE } from './constants.js';
import { errorMessage } from './errors.js';
import { createEventHeader } from './header.js';
import type { HeaderBuilder } from './header.js';
import type { InterfaceNameResolver } from './interfaces.js';
import { logDebug, logError } from './logger.js';
import type { ThreadLocalState } from './thread.js';
import { OUTPUT_STATUS } from './types.js';
import type { FlowStartRecord, OutputStatus, PacketView } from './types.js';

export interface FlowStartFormatOptions {
  buildHeader?: HeaderBuilder;
  /** Absent or null: events carry no in_dev. */
  interfaceNames?: InterfaceNameResolver | null;
}

export type PacketLogger = (state: ThreadLocalState, packet: PacketView) => OutputStatus;

export function buildFlowStartRecord(
  packet: PacketView,
  options: FlowStartFormatOptions = {}
): FlowStartRecord | null {
  const buildHeader = options.buildHeader ?? createEventHeader;
  const header = buildHeader(packet, FLOWSTART_EVENT_TYPE);
  if (header === null) return null;

  const record: FlowStartRecord = { ...header, event_type: FLOWSTART_EVENT_TYPE };
  const ifIndex = packet.ingressIfIndex ?? 0;
  if (ifIndex !== 0 && options.interfaceNames) {
    const name = options.interfaceNames.nameOf(ifIndex);
    if (name !== undefined) record.in_dev = name;
  }
  return record;
}

export function logFlowStart(
  state: ThreadLocalState,
  packet: PacketView,
  options: FlowStartFormatOptions = {}
): OutputStatus {
  const record = buildFlowStartRecord(packet, options);
  if (record === null) {
    state.stats.dropped += 1;
    logDebug('Dropped flow_start event: header could not be built', {
      module: state.context.name,
      flowId: packet.flow?.flowId,
    });
    return OUTPUT_STATUS.OK;
  }

  state.scratch.reset();
  try {
    writeJsonLine(record, state.context.sink, state.scratch);
  } catch (err) {
    state.stats.writeErrors += 1;
    logError('Writing flow_start event failed', {
      module: state.context.name,
      sink: state.context.sink.name,
      error: errorMessage(err),
    });
    return OUTPUT_STATUS.FAILED;
  }
  state.stats.emitted += 1;
  return OUTPUT_STATUS.OK;
}

/** Binds formatting options into the logger callback the host calls per packet. */
export function createFlowStartLogger(options: FlowStartFormatOptions = {}): PacketLogger {
  return (state, packet) => logFlowStart(state, packet, options);
}
