import type { PacketView } from './types.js';

export type PacketCondition = (packet: PacketView) => boolean;

/**
 * True for the first packet counted on a flow, in either direction, while the engine
 * runs inline. Runs for every packet: no allocation, no logging.
 *
 * A flow whose first packet were counted in both directions would never reach a total
 * of one; correct flow accounting upstream rules that out.
 */
export function createFlowStartCondition(isInline: () => boolean): PacketCondition {
  return (packet: PacketView): boolean => {
    if (!isInline()) return false;
    if (packet.isPseudo) return false;
    const flow = packet.flow;
    if (flow === null) return false;
    return flow.toDstPacketCount + flow.toSrcPacketCount === 1;
  };
}
