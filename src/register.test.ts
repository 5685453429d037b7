import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { EVE_PARENT_NAME, FLOWSTART_CONF_NAME, FLOWSTART_SUB_CONF_NAME, MODULE_NAME } from './constants.js';
import { createStandaloneContext, createSubModuleContext } from './context.js';
import { createJsonOutputContext } from './eve.js';
import { registerFlowStartLog } from './register.js';
import { createOutputRegistry } from './registry.js';
import { MemorySink, makePacket } from './test-support.js';
import { OUTPUT_STATUS } from './types.js';

describe('registerFlowStartLog', () => {
  it('registers the standalone module and the eve-log sub-module', () => {
    const registry = createOutputRegistry();
    registerFlowStartLog(registry, { isInline: () => true });
    assert.deepEqual(registry.listConfNames(), [FLOWSTART_CONF_NAME, FLOWSTART_SUB_CONF_NAME]);

    const standalone = registry.getPacketModule(FLOWSTART_CONF_NAME);
    const sub = registry.getPacketSubModule(EVE_PARENT_NAME, 'flow_start');
    assert.ok(standalone);
    assert.ok(sub);
    assert.equal(standalone.moduleName, MODULE_NAME);
    assert.equal(sub.parentName, EVE_PARENT_NAME);
    assert.equal(standalone.initContext, createStandaloneContext);
    assert.equal(sub.initContext, createSubModuleContext);
  });

  it('shares condition, logger and lane callbacks between both variants', () => {
    const registry = createOutputRegistry();
    registerFlowStartLog(registry, { isInline: () => true });
    const standalone = registry.getPacketModule(FLOWSTART_CONF_NAME);
    const sub = registry.getPacketSubModule(EVE_PARENT_NAME, 'flow_start');
    assert.ok(standalone && sub);
    assert.equal(standalone.condition, sub.condition);
    assert.equal(standalone.logger, sub.logger);
    assert.equal(standalone.threadInit, sub.threadInit);
    assert.equal(standalone.threadDeinit, sub.threadDeinit);
  });

  it('wires the injected engine mode and formatting options into the callbacks', () => {
    const registry = createOutputRegistry();
    registerFlowStartLog(registry, {
      isInline: () => true,
      interfaceNames: { nameOf: () => 'wan0' },
    });
    const sub = registry.getPacketSubModule(EVE_PARENT_NAME, 'flow_start');
    assert.ok(sub);
    const sink = new MemorySink('eve');
    const state = sub.threadInit(sub.initContext(undefined, createJsonOutputContext(sink)));
    const packet = makePacket({ ingressIfIndex: 4 });
    assert.equal(sub.condition(packet), true);
    assert.equal(sub.logger(state, packet), OUTPUT_STATUS.OK);
    assert.equal(JSON.parse(sink.lines[0]).in_dev, 'wan0');
  });

  it('registers nothing when JSON output is unavailable', () => {
    const registry = createOutputRegistry();
    registerFlowStartLog(registry, { isInline: () => true, jsonEnabled: false });
    assert.deepEqual(registry.listConfNames(), []);
  });

  it('refuses to register twice', () => {
    const registry = createOutputRegistry();
    registerFlowStartLog(registry, { isInline: () => true });
    assert.throws(() => registerFlowStartLog(registry, { isInline: () => true }), /already registered/);
  });
});

describe('createOutputRegistry', () => {
  it('rejects a sub-module whose key is not under its parent', () => {
    const registry = createOutputRegistry();
    registerFlowStartLog(registry, { isInline: () => true });
    const sub = registry.getPacketSubModule(EVE_PARENT_NAME, 'flow_start');
    assert.ok(sub);
    assert.throws(
      () => registry.registerPacketSubModule({ ...sub, confName: 'flow_start', parentName: 'syslog' }),
      /must be keyed under syslog/
    );
  });

  it('returns undefined for names nobody registered', () => {
    const registry = createOutputRegistry();
    assert.equal(registry.getPacketModule('flow_start-json-log'), undefined);
    assert.equal(registry.getPacketSubModule(EVE_PARENT_NAME, 'dns'), undefined);
  });
});
