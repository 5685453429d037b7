/**
 * Feeds newline-delimited JSON packet records through a running pipeline.
 * Records are spread over lanes by flow id so each flow stays on one lane.
 */

import { errorMessage } from './errors.js';
import { logWarn } from './logger.js';
import type { Pipeline } from './pipeline.js';
import { OUTPUT_STATUS } from './types.js';
import type { PacketView } from './types.js';
import { parsePacketRecord } from './validation.js';

export interface ReplayResult {
  processed: number;
  rejected: number;
  failedWrites: number;
}

export function laneFor(packet: PacketView, laneCount: number): number {
  return packet.flow === null ? 0 : packet.flow.flowId % laneCount;
}

export async function replayPackets(
  lines: AsyncIterable<string>,
  pipeline: Pipeline,
  laneCount: number
): Promise<ReplayResult> {
  const result: ReplayResult = { processed: 0, rejected: 0, failedWrites: 0 };
  let lineNo = 0;
  for await (const line of lines) {
    lineNo += 1;
    if (line.trim() === '') continue;
    let packet: PacketView;
    try {
      packet = parsePacketRecord(JSON.parse(line));
    } catch (err) {
      result.rejected += 1;
      logWarn('Skipping invalid packet record', { line: lineNo, error: errorMessage(err) });
      continue;
    }
    const status = pipeline.lane(laneFor(packet, laneCount)).process(packet);
    result.processed += 1;
    if (status === OUTPUT_STATUS.FAILED) result.failedWrites += 1;
  }
  return result;
}
