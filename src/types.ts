/**
 * Shapes shared between the host pipeline and the flow-start logger.
 * Packet and flow views are owned by the host; this module only reads them.
 */

// --- Host → logger (read-only views) ---

/** Per-direction packet counters maintained by the host's flow tracker. */
export interface FlowView {
  readonly flowId: number;
  readonly toDstPacketCount: number;
  readonly toSrcPacketCount: number;
}

/** Capture time with microsecond resolution (seconds since epoch + microseconds). */
export interface PacketTimestamp {
  readonly sec: number;
  readonly usec: number;
}

export interface PacketView {
  readonly flow: FlowView | null;
  /** Set for packets the pipeline synthesizes internally (flow timeout, shutdown flush). */
  readonly isPseudo: boolean;
  readonly timestamp: PacketTimestamp;
  readonly srcIp: string;
  readonly dstIp: string;
  /** IANA protocol number. */
  readonly proto: number;
  readonly srcPort?: number;
  readonly dstPort?: number;
  readonly icmpType?: number;
  readonly icmpCode?: number;
  readonly vlanIds?: readonly number[];
  /** Capture device name, reported as in_iface. */
  readonly ingressDevice?: string;
  /** Kernel ingress interface index (netfilter queue); 0 or absent when unknown. */
  readonly ingressIfIndex?: number;
}

// --- Logger → sink (one JSON line per event) ---

export interface EventHeader {
  timestamp: string;
  flow_id?: number;
  in_iface?: string;
  vlan?: number[];
  event_type: string;
  src_ip: string;
  src_port?: number;
  dest_ip: string;
  dest_port?: number;
  proto: string;
  icmp_type?: number;
  icmp_code?: number;
}

export interface FlowStartRecord extends EventHeader {
  event_type: 'flow_start';
  in_dev?: string;
}

// --- Configuration (already parsed by the host) ---

export type SinkFileType = 'regular';

/** Sink section of an output's configuration node. Keys follow the host's YAML naming. */
export interface SinkConfig {
  filename?: string;
  filetype?: SinkFileType;
  append?: boolean;
  /** Octal permission string such as "0640", or a numeric mode. */
  filemode?: string | number;
  /** "minute" | "hour" | "day" | "<n>s" | "<n>m" | "<n>h" | "<n>d" */
  'rotate-interval'?: string;
}

/** Sink config after defaults and validation; rotateIntervalSec is 0 when rotation is off. */
export interface ResolvedSinkConfig {
  path: string;
  append: boolean;
  mode: number;
  rotateIntervalSec: number;
}

export interface StandaloneOutputConfig {
  module: 'flow_start-json-log';
  conf?: SinkConfig;
}

export interface EveOutputConfig {
  module: 'eve-log';
  conf?: SinkConfig;
  /** Nested sub-module types, e.g. ['flow_start']. */
  types: string[];
}

export type OutputConfig = StandaloneOutputConfig | EveOutputConfig;

// --- Status and error reporting ---

/** Return status of a logger call, as the host's packet-logger loop reads it. */
export const OUTPUT_STATUS = {
  OK: 0,
  FAILED: -1,
} as const;

export type OutputStatus = (typeof OUTPUT_STATUS)[keyof typeof OUTPUT_STATUS];

export const OUTPUT_ERROR_CODES = {
  SINK_OPEN_FAILED: 'SINK_OPEN_FAILED',
  MISSING_PARENT_SINK: 'MISSING_PARENT_SINK',
  MISSING_CONTEXT: 'MISSING_CONTEXT',
  ALLOCATION_FAILED: 'ALLOCATION_FAILED',
  UNKNOWN_MODULE: 'UNKNOWN_MODULE',
} as const;

export type OutputErrorCode = (typeof OUTPUT_ERROR_CODES)[keyof typeof OUTPUT_ERROR_CODES];

/** Engine operating mode; only 'ips' (inline) lets the flow-start condition fire. */
export type EngineMode = 'ids' | 'ips';

/** CLI settings read from the environment. */
export interface EnvConfig {
  outputs: OutputConfig[];
  lanes: number;
  defaultLogDir: string;
  engineMode: EngineMode;
}
