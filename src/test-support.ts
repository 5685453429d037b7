/**
 * Shared fixtures for the test files: an in-memory sink and a packet factory.
 */

import { RefCountedSink } from './sink.js';
import type { PacketView } from './types.js';

export class MemorySink extends RefCountedSink {
  readonly chunks: string[] = [];
  closeCalls = 0;
  reopenRequests = 0;
  failWrites = false;

  /** Complete lines written so far. */
  get lines(): string[] {
    return this.chunks.join('').split('\n').filter((l) => l !== '');
  }

  override requestReopen(): void {
    this.reopenRequests += 1;
  }

  protected writeBytes(data: Uint8Array): void {
    if (this.failWrites) {
      throw new Error('no space left on device');
    }
    this.chunks.push(Buffer.from(data).toString('utf8'));
  }

  protected close(): void {
    this.closeCalls += 1;
  }
}

/** 2023-11-14T22:13:20.000042+0000 */
export const FIXTURE_TIMESTAMP = { sec: 1_700_000_000, usec: 42 } as const;

export function makePacket(overrides: Partial<PacketView> = {}): PacketView {
  return {
    flow: { flowId: 1234, toDstPacketCount: 1, toSrcPacketCount: 0 },
    isPseudo: false,
    timestamp: FIXTURE_TIMESTAMP,
    srcIp: '10.0.0.1',
    dstIp: '10.0.0.2',
    proto: 6,
    srcPort: 40000,
    dstPort: 443,
    ...overrides,
  };
}

export const FIXTURE_LINE =
  '{"timestamp":"2023-11-14T22:13:20.000042+0000","flow_id":1234,"event_type":"flow_start",' +
  '"src_ip":"10.0.0.1","src_port":40000,"dest_ip":"10.0.0.2","dest_port":443,"proto":"TCP"}';
