/**
 * Configuration nodes, output lists, replayed packet records and CLI environment.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import path from 'node:path';
import { SINK_DEFAULTS } from './constants.js';
import {
  configFromEnv,
  parsePacketRecord,
  parseRotateInterval,
  validateOutputsConfig,
  validateSinkConfig,
  ValidationError,
} from './validation.js';

function isValidationError(field: string) {
  return (err: Error) => err instanceof ValidationError && err.field === field;
}

describe('validateSinkConfig', () => {
  it('applies defaults when the node is missing', () => {
    const resolved = validateSinkConfig(undefined, { defaultFilename: 'flowstart.json' });
    assert.deepEqual(resolved, {
      path: 'flowstart.json',
      append: true,
      mode: SINK_DEFAULTS.filemode,
      rotateIntervalSec: 0,
    });
  });

  it('resolves relative filenames against the log dir and keeps absolute ones', () => {
    assert.equal(
      validateSinkConfig({ filename: 'a.json' }, { logDir: '/var/log/ids' }).path,
      path.join('/var/log/ids', 'a.json')
    );
    assert.equal(validateSinkConfig({ filename: '/tmp/b.json' }, { logDir: '/var/log/ids' }).path, '/tmp/b.json');
  });

  it('parses filemode given as octal string or number', () => {
    assert.equal(validateSinkConfig({ filemode: '0600' }).mode, 0o600);
    assert.equal(validateSinkConfig({ filemode: '644' }).mode, 0o644);
    assert.equal(validateSinkConfig({ filemode: 0o640 }).mode, 0o640);
    assert.throws(() => validateSinkConfig({ filemode: 'rw-r--r--' }), isValidationError('filemode'));
    assert.throws(() => validateSinkConfig({ filemode: 0o10000 }), isValidationError('filemode'));
  });

  it('rejects an empty filename', () => {
    assert.throws(() => validateSinkConfig({ filename: '' }), isValidationError('filename'));
  });

  it('turns rotate-interval into seconds', () => {
    assert.equal(validateSinkConfig({ 'rotate-interval': 'hour' }).rotateIntervalSec, 3_600);
    assert.equal(validateSinkConfig({ 'rotate-interval': '' }).rotateIntervalSec, 0);
  });
});

describe('parseRotateInterval', () => {
  it('accepts names and suffixed counts', () => {
    assert.equal(parseRotateInterval('minute'), 60);
    assert.equal(parseRotateInterval('day'), 86_400);
    assert.equal(parseRotateInterval('30s'), 30);
    assert.equal(parseRotateInterval('5m'), 300);
    assert.equal(parseRotateInterval('2h'), 7_200);
    assert.equal(parseRotateInterval('1d'), 86_400);
  });

  it('rejects zero, bare numbers and unknown units', () => {
    assert.throws(() => parseRotateInterval('0m'), isValidationError('rotate-interval'));
    assert.throws(() => parseRotateInterval('15'), isValidationError('rotate-interval'));
    assert.throws(() => parseRotateInterval('3w'), isValidationError('rotate-interval'));
  });
});

describe('validateOutputsConfig', () => {
  it('accepts the standalone module and eve-log with nested types', () => {
    const outputs = validateOutputsConfig([
      { module: 'flow_start-json-log', conf: { filename: 'fs.json', append: false } },
      { module: 'eve-log', types: ['flow_start'] },
    ]);
    assert.deepEqual(outputs, [
      { module: 'flow_start-json-log', conf: { filename: 'fs.json', append: false } },
      { module: 'eve-log', types: ['flow_start'] },
    ]);
  });

  it('rejects unknown modules, bad types and unsupported file types', () => {
    assert.throws(() => validateOutputsConfig({}), isValidationError('outputs'));
    assert.throws(() => validateOutputsConfig([{ module: 'pcap-log' }]), isValidationError('outputs[0]'));
    assert.throws(() => validateOutputsConfig([{ module: 'eve-log', types: [''] }]), isValidationError('outputs[0]'));
    assert.throws(
      () => validateOutputsConfig([{ module: 'eve-log', types: [], conf: { filetype: 'unix_stream' } }]),
      isValidationError('outputs[0].conf')
    );
  });
});

describe('parsePacketRecord', () => {
  const base = {
    timestamp: { sec: 10, usec: 5 },
    srcIp: '192.0.2.1',
    dstIp: '192.0.2.2',
    proto: 17,
  };

  it('reads a record with a flow and optional fields', () => {
    const packet = parsePacketRecord({
      ...base,
      flow: { flowId: 3, toDstPacketCount: 1, toSrcPacketCount: 0 },
      srcPort: 53,
      dstPort: 5353,
      vlanIds: [10],
      ingressDevice: 'eth0',
      ingressIfIndex: 2,
    });
    assert.deepEqual(packet, {
      flow: { flowId: 3, toDstPacketCount: 1, toSrcPacketCount: 0 },
      isPseudo: false,
      timestamp: { sec: 10, usec: 5 },
      srcIp: '192.0.2.1',
      dstIp: '192.0.2.2',
      proto: 17,
      srcPort: 53,
      dstPort: 5353,
      vlanIds: [10],
      ingressDevice: 'eth0',
      ingressIfIndex: 2,
    });
  });

  it('treats a missing flow as null and keeps the pseudo flag', () => {
    const packet = parsePacketRecord({ ...base, isPseudo: true });
    assert.equal(packet.flow, null);
    assert.equal(packet.isPseudo, true);
  });

  it('rejects malformed fields', () => {
    assert.throws(() => parsePacketRecord(null), ValidationError);
    assert.throws(() => parsePacketRecord({ ...base, timestamp: { sec: 1, usec: 1_000_000 } }), isValidationError('timestamp'));
    assert.throws(
      () => parsePacketRecord({ ...base, timestamp: { sec: 8_640_000_000_001, usec: 0 } }),
      isValidationError('timestamp')
    );
    assert.throws(() => parsePacketRecord({ ...base, proto: 300 }), isValidationError('proto'));
    assert.throws(() => parsePacketRecord({ ...base, srcPort: -1 }), isValidationError('srcPort'));
    assert.throws(
      () => parsePacketRecord({ ...base, flow: { flowId: 1, toDstPacketCount: '1', toSrcPacketCount: 0 } }),
      isValidationError('flow')
    );
  });
});

describe('configFromEnv', () => {
  it('defaults to one standalone output, one lane, passive mode', () => {
    assert.deepEqual(configFromEnv({}), {
      outputs: [{ module: 'flow_start-json-log' }],
      lanes: 1,
      defaultLogDir: SINK_DEFAULTS.logDir,
      engineMode: 'ids',
    });
  });

  it('builds an eve-log output with sink settings from the environment', () => {
    assert.deepEqual(
      configFromEnv({
        FLOWSTART_MODE: 'eve',
        FLOWSTART_LOG_DIR: '/var/log/ids',
        FLOWSTART_FILENAME: 'events.json',
        FLOWSTART_ROTATE_INTERVAL: '1h',
        FLOWSTART_APPEND: 'false',
        FLOWSTART_INLINE: '1',
        FLOWSTART_LANES: '4',
      }),
      {
        outputs: [
          {
            module: 'eve-log',
            types: ['flow_start'],
            conf: { filename: 'events.json', append: false, 'rotate-interval': '1h' },
          },
        ],
        lanes: 4,
        defaultLogDir: '/var/log/ids',
        engineMode: 'ips',
      }
    );
  });

  it('rejects bad mode, lane count and rotate interval', () => {
    assert.throws(() => configFromEnv({ FLOWSTART_MODE: 'syslog' }), isValidationError('FLOWSTART_MODE'));
    assert.throws(() => configFromEnv({ FLOWSTART_LANES: '0' }), isValidationError('FLOWSTART_LANES'));
    assert.throws(() => configFromEnv({ FLOWSTART_LANES: '2.5' }), isValidationError('FLOWSTART_LANES'));
    assert.throws(() => configFromEnv({ FLOWSTART_ROTATE_INTERVAL: 'often' }), isValidationError('rotate-interval'));
  });
});
