import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { EVE_PARENT_NAME } from './constants.js';
import { openJsonOutput } from './eve.js';

describe('openJsonOutput', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), 'flowstart-eve-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('opens eve.json by default and closes it on destroy', () => {
    const parent = openJsonOutput(undefined, { defaultLogDir: dir });
    assert.equal(parent.name, EVE_PARENT_NAME);
    parent.sink.write(Buffer.from('{"event_type":"flow_start"}\n'));
    parent.destroy();
    assert.equal(parent.sink.closed, true);
    assert.equal(readFileSync(path.join(dir, 'eve.json'), 'utf8'), '{"event_type":"flow_start"}\n');
  });

  it('honours a configured filename', () => {
    const parent = openJsonOutput({ filename: 'events.json' }, { defaultLogDir: dir });
    parent.sink.write(Buffer.from('x\n'));
    parent.destroy();
    assert.equal(readFileSync(path.join(dir, 'events.json'), 'utf8'), 'x\n');
  });
});
