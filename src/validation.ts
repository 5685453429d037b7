/**
 * Validation and normalization of configuration nodes and replayed packet records.
 * Invalid input produces a ValidationError naming the offending field.
 */

import path from 'node:path';
import {
  DEFAULT_LOG_FILENAME,
  EVE_PARENT_NAME,
  FLOWSTART_EVENT_TYPE,
  FLOWSTART_CONF_NAME,
  ROTATE_INTERVAL_NAMES,
  SINK_DEFAULTS,
} from './constants.js';
import type {
  EnvConfig,
  FlowView,
  OutputConfig,
  PacketView,
  ResolvedSinkConfig,
  SinkConfig,
} from './types.js';

export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

function assert(condition: boolean, message: string, field?: string): asserts condition {
  if (!condition) {
    throw new ValidationError(message, field);
  }
}

const UNIT_SECONDS: Readonly<Record<string, number>> = { s: 1, m: 60, h: 3_600, d: 86_400 };

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

/**
 * Parses a rotate-interval value into seconds: "minute", "hour", "day",
 * or a positive count with an s/m/h/d suffix ("30s", "5m").
 */
export function parseRotateInterval(value: string): number {
  const named = ROTATE_INTERVAL_NAMES[value];
  if (named !== undefined) return named;
  const match = /^(\d+)([smhd])$/.exec(value);
  assert(match !== null, `rotate-interval "${value}" is not valid`, 'rotate-interval');
  const count = Number(match[1]);
  assert(count > 0, 'rotate-interval must be greater than zero', 'rotate-interval');
  return count * (UNIT_SECONDS[match[2]] ?? 1);
}

function parseFileMode(value: string | number): number {
  if (typeof value === 'number') {
    assert(
      Number.isInteger(value) && value >= 0 && value <= 0o7777,
      'filemode must be a permission mode between 0 and 07777',
      'filemode'
    );
    return value;
  }
  assert(/^0?[0-7]{3,4}$/.test(value), `filemode "${value}" is not an octal mode`, 'filemode');
  return parseInt(value, 8);
}

export interface SinkDefaults {
  defaultFilename?: string;
  logDir?: string;
}

/**
 * Applies defaults to a sink configuration node and resolves the output path.
 * A missing node means "all defaults".
 */
export function validateSinkConfig(
  conf: SinkConfig | undefined,
  defaults: SinkDefaults = {}
): ResolvedSinkConfig {
  const node: SinkConfig = conf ?? {};
  assert(isRecord(node), 'sink configuration must be an object');

  const filename = node.filename ?? defaults.defaultFilename ?? DEFAULT_LOG_FILENAME;
  assert(typeof filename === 'string' && filename !== '', 'filename must be a non-empty string', 'filename');

  const filetype = node.filetype ?? SINK_DEFAULTS.filetype;
  assert(filetype === 'regular', `filetype "${String(filetype)}" is not supported`, 'filetype');

  const append = node.append ?? SINK_DEFAULTS.append;
  assert(typeof append === 'boolean', 'append must be a boolean', 'append');

  const mode = node.filemode !== undefined ? parseFileMode(node.filemode) : SINK_DEFAULTS.filemode;

  const rotate = node['rotate-interval'];
  const rotateIntervalSec = rotate !== undefined && rotate !== '' ? parseRotateInterval(rotate) : 0;

  const logDir = defaults.logDir ?? SINK_DEFAULTS.logDir;
  const resolvedPath = path.isAbsolute(filename) ? filename : path.join(logDir, filename);

  return { path: resolvedPath, append, mode, rotateIntervalSec };
}

function readSinkConfig(value: unknown, field: string): SinkConfig | undefined {
  if (value === undefined) return undefined;
  assert(isRecord(value), `${field} must be an object`, field);
  const conf: SinkConfig = {};
  const { filename, filetype, append, filemode } = value;
  const rotate = value['rotate-interval'];
  if (filename !== undefined) {
    assert(typeof filename === 'string', `${field}.filename must be a string`, field);
    conf.filename = filename;
  }
  if (filetype !== undefined) {
    assert(filetype === 'regular', `${field}.filetype "${String(filetype)}" is not supported`, field);
    conf.filetype = filetype;
  }
  if (append !== undefined) {
    assert(typeof append === 'boolean', `${field}.append must be a boolean`, field);
    conf.append = append;
  }
  if (filemode !== undefined) {
    assert(
      typeof filemode === 'string' || typeof filemode === 'number',
      `${field}.filemode must be a string or number`,
      field
    );
    conf.filemode = filemode;
  }
  if (rotate !== undefined) {
    assert(typeof rotate === 'string', `${field}.rotate-interval must be a string`, field);
    conf['rotate-interval'] = rotate;
  }
  return conf;
}

/**
 * Validates the list of enabled outputs. Each entry names either the standalone
 * flow-start module or the eve-log parent with its nested types.
 */
export function validateOutputsConfig(value: unknown): OutputConfig[] {
  assert(Array.isArray(value), 'outputs must be an array', 'outputs');
  return value.map((entry: unknown, i): OutputConfig => {
    const field = `outputs[${i}]`;
    assert(isRecord(entry), `${field} must be an object`, field);
    const conf = readSinkConfig(entry.conf, `${field}.conf`);
    if (entry.module === FLOWSTART_CONF_NAME) {
      return { module: FLOWSTART_CONF_NAME, ...(conf && { conf }) };
    }
    if (entry.module === EVE_PARENT_NAME) {
      const types = entry.types;
      assert(
        Array.isArray(types) && types.every((t: unknown) => typeof t === 'string' && t !== ''),
        `${field}.types must be an array of non-empty strings`,
        field
      );
      return { module: EVE_PARENT_NAME, types: types.map(String), ...(conf && { conf }) };
    }
    throw new ValidationError(`${field}.module "${String(entry.module)}" is not a known output`, field);
  });
}

function readFlow(value: unknown): FlowView | null {
  if (value === null || value === undefined) return null;
  assert(isRecord(value), 'flow must be an object or null', 'flow');
  const { flowId, toDstPacketCount, toSrcPacketCount } = value;
  assert(isNonNegativeInteger(flowId), 'flow.flowId must be a non-negative integer', 'flow');
  assert(isNonNegativeInteger(toDstPacketCount), 'flow.toDstPacketCount must be a non-negative integer', 'flow');
  assert(isNonNegativeInteger(toSrcPacketCount), 'flow.toSrcPacketCount must be a non-negative integer', 'flow');
  return { flowId, toDstPacketCount, toSrcPacketCount };
}

function optionalInteger(record: Record<string, unknown>, key: string): number | undefined {
  const value = record[key];
  if (value === undefined) return undefined;
  assert(isNonNegativeInteger(value), `${key} must be a non-negative integer`, key);
  return value;
}

/** Latest second a Date can represent. */
export const MAX_TIMESTAMP_SEC = 8_640_000_000_000;

/**
 * Turns one decoded JSON packet record (as replayed by the CLI) into a PacketView.
 */
export function parsePacketRecord(value: unknown): PacketView {
  assert(isRecord(value), 'packet record must be an object');

  const ts = value.timestamp;
  assert(isRecord(ts), 'timestamp must be an object with sec and usec', 'timestamp');
  const { sec, usec } = ts;
  assert(
    isNonNegativeInteger(sec) && sec <= MAX_TIMESTAMP_SEC,
    `timestamp.sec must be an integer between 0 and ${MAX_TIMESTAMP_SEC}`,
    'timestamp'
  );
  assert(
    isNonNegativeInteger(usec) && usec < 1_000_000,
    'timestamp.usec must be an integer below 1000000',
    'timestamp'
  );

  const { srcIp, dstIp, proto } = value;
  assert(typeof srcIp === 'string' && srcIp !== '', 'srcIp must be a non-empty string', 'srcIp');
  assert(typeof dstIp === 'string' && dstIp !== '', 'dstIp must be a non-empty string', 'dstIp');
  assert(isNonNegativeInteger(proto) && proto <= 255, 'proto must be an integer between 0 and 255', 'proto');

  const isPseudo = value.isPseudo ?? false;
  assert(typeof isPseudo === 'boolean', 'isPseudo must be a boolean', 'isPseudo');

  const vlanIds = value.vlanIds;
  if (vlanIds !== undefined) {
    assert(
      Array.isArray(vlanIds) && vlanIds.every(isNonNegativeInteger),
      'vlanIds must be an array of non-negative integers',
      'vlanIds'
    );
  }
  const ingressDevice = value.ingressDevice;
  if (ingressDevice !== undefined) {
    assert(typeof ingressDevice === 'string', 'ingressDevice must be a string', 'ingressDevice');
  }

  const srcPort = optionalInteger(value, 'srcPort');
  const dstPort = optionalInteger(value, 'dstPort');
  const icmpType = optionalInteger(value, 'icmpType');
  const icmpCode = optionalInteger(value, 'icmpCode');
  const ingressIfIndex = optionalInteger(value, 'ingressIfIndex');

  return {
    flow: readFlow(value.flow),
    isPseudo,
    timestamp: { sec, usec },
    srcIp,
    dstIp,
    proto,
    ...(srcPort !== undefined && { srcPort }),
    ...(dstPort !== undefined && { dstPort }),
    ...(icmpType !== undefined && { icmpType }),
    ...(icmpCode !== undefined && { icmpCode }),
    ...(Array.isArray(vlanIds) && { vlanIds: vlanIds.filter(isNonNegativeInteger) }),
    ...(typeof ingressDevice === 'string' && { ingressDevice }),
    ...(ingressIfIndex !== undefined && { ingressIfIndex }),
  };
}

function envFlag(value: string | undefined): boolean {
  return value === '1' || value === 'true';
}

/**
 * Builds the CLI configuration from FLOWSTART_* environment variables.
 * FLOWSTART_MODE=eve nests the logger under an eve-log output instead of its own file.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): EnvConfig {
  const mode = env.FLOWSTART_MODE ?? 'standalone';
  assert(mode === 'standalone' || mode === 'eve', 'FLOWSTART_MODE must be "standalone" or "eve"', 'FLOWSTART_MODE');

  const lanesRaw = env.FLOWSTART_LANES ?? '1';
  const lanes = Number(lanesRaw);
  assert(
    /^\d+$/.test(lanesRaw) && Number.isInteger(lanes) && lanes >= 1,
    'FLOWSTART_LANES must be a positive integer',
    'FLOWSTART_LANES'
  );

  const conf: SinkConfig = {};
  if (env.FLOWSTART_FILENAME !== undefined && env.FLOWSTART_FILENAME !== '') {
    conf.filename = env.FLOWSTART_FILENAME;
  }
  if (env.FLOWSTART_APPEND !== undefined && env.FLOWSTART_APPEND !== '') {
    conf.append = envFlag(env.FLOWSTART_APPEND);
  }
  const rotate = env.FLOWSTART_ROTATE_INTERVAL;
  if (rotate !== undefined && rotate !== '') {
    parseRotateInterval(rotate);
    conf['rotate-interval'] = rotate;
  }
  const sinkConf = Object.keys(conf).length > 0 ? conf : undefined;

  const outputs: OutputConfig[] =
    mode === 'eve'
      ? [{ module: EVE_PARENT_NAME, types: [FLOWSTART_EVENT_TYPE], ...(sinkConf && { conf: sinkConf }) }]
      : [{ module: FLOWSTART_CONF_NAME, ...(sinkConf && { conf: sinkConf }) }];

  return {
    outputs,
    lanes,
    defaultLogDir:
      env.FLOWSTART_LOG_DIR !== undefined && env.FLOWSTART_LOG_DIR !== ''
        ? env.FLOWSTART_LOG_DIR
        : SINK_DEFAULTS.logDir,
    engineMode: envFlag(env.FLOWSTART_INLINE) ? 'ips' : 'ids',
  };
}
