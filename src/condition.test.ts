import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createFlowStartCondition } from './condition.js';
import { makePacket } from './test-support.js';

const inline = createFlowStartCondition(() => true);
const passive = createFlowStartCondition(() => false);

function flow(toDst: number, toSrc: number) {
  return { flowId: 7, toDstPacketCount: toDst, toSrcPacketCount: toSrc };
}

describe('createFlowStartCondition', () => {
  it('is false whenever the engine is not inline, whatever the flow state', () => {
    for (const [d, s] of [[1, 0], [0, 1], [2, 3], [0, 0]]) {
      assert.equal(passive(makePacket({ flow: flow(d, s) })), false);
    }
  });

  it('is false for pseudo packets even on a fresh flow', () => {
    assert.equal(inline(makePacket({ isPseudo: true, flow: flow(1, 0) })), false);
  });

  it('is false for packets without a flow', () => {
    assert.equal(inline(makePacket({ flow: null })), false);
  });

  it('is true only when the two direction counters sum to one', () => {
    assert.equal(inline(makePacket({ flow: flow(1, 0) })), true);
    assert.equal(inline(makePacket({ flow: flow(0, 1) })), true);
    assert.equal(inline(makePacket({ flow: flow(0, 0) })), false);
    assert.equal(inline(makePacket({ flow: flow(1, 1) })), false);
    assert.equal(inline(makePacket({ flow: flow(5, 0) })), false);
  });

  it('fires for exactly one packet over the life of a flow', () => {
    // counters as the flow tracker has them after counting each packet
    const seen = [flow(1, 0), flow(1, 1), flow(2, 1), flow(2, 2), flow(3, 2)];
    const fired = seen.filter((f) => inline(makePacket({ flow: f })));
    assert.equal(fired.length, 1);
    assert.deepEqual(fired[0], flow(1, 0));
  });

  it('reads the engine mode on every call', () => {
    let mode: 'ids' | 'ips' = 'ids';
    const condition = createFlowStartCondition(() => mode === 'ips');
    const packet = makePacket();
    assert.equal(condition(packet), false);
    mode = 'ips';
    assert.equal(condition(packet), true);
  });
});
