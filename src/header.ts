/**
 * Standard event header shared by every JSON event type: capture time, flow identity,
 * capture device, VLANs, addressing and protocol.
 */

import type { EventHeader, PacketTimestamp, PacketView } from './types.js';

const PROTO_ICMP = 1;
const PROTO_ICMPV6 = 58;

const PROTO_NAMES: Readonly<Record<number, string>> = {
  1: 'ICMP',
  2: 'IGMP',
  6: 'TCP',
  17: 'UDP',
  47: 'GRE',
  50: 'ESP',
  51: 'AH',
  58: 'IPv6-ICMP',
  132: 'SCTP',
};

/** Protocols whose header carries ports. */
const PORT_PROTOS = new Set([6, 17, 132]);

/** Builds the header for one packet; null when the packet cannot be described. */
export type HeaderBuilder = (packet: PacketView, eventType: string) => EventHeader | null;

/** Name for known protocols, otherwise the number zero-padded to three digits ("047"). */
export function protoName(proto: number): string {
  return PROTO_NAMES[proto] ?? String(proto).padStart(3, '0');
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/** `YYYY-MM-DDTHH:MM:SS.uuuuuu+0000`, always UTC; null outside the range a Date can hold. */
export function formatTimestamp(ts: PacketTimestamp): string | null {
  const d = new Date(ts.sec * 1000);
  if (Number.isNaN(d.getTime())) return null;
  return (
    `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1, 2)}-${pad(d.getUTCDate(), 2)}` +
    `T${pad(d.getUTCHours(), 2)}:${pad(d.getUTCMinutes(), 2)}:${pad(d.getUTCSeconds(), 2)}` +
    `.${pad(ts.usec, 6)}+0000`
  );
}

export const createEventHeader: HeaderBuilder = (packet, eventType) => {
  if (packet.srcIp === '' || packet.dstIp === '') return null;
  const timestamp = formatTimestamp(packet.timestamp);
  if (timestamp === null) return null;

  const hasPorts = PORT_PROTOS.has(packet.proto);
  const isIcmp = packet.proto === PROTO_ICMP || packet.proto === PROTO_ICMPV6;
  const vlan = packet.vlanIds ?? [];

  return {
    timestamp,
    ...(packet.flow !== null && { flow_id: packet.flow.flowId }),
    ...(packet.ingressDevice !== undefined && packet.ingressDevice !== '' && { in_iface: packet.ingressDevice }),
    ...(vlan.length > 0 && { vlan: [...vlan] }),
    event_type: eventType,
    src_ip: packet.srcIp,
    ...(hasPorts && packet.srcPort !== undefined && { src_port: packet.srcPort }),
    dest_ip: packet.dstIp,
    ...(hasPorts && packet.dstPort !== undefined && { dest_port: packet.dstPort }),
    proto: protoName(packet.proto),
    ...(isIcmp && packet.icmpType !== undefined && { icmp_type: packet.icmpType }),
    ...(isIcmp && packet.icmpCode !== undefined && { icmp_code: packet.icmpCode }),
  };
};
