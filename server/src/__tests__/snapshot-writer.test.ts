import { describe, it, expect } from 'vitest';
import logger from '../lib/logger.js';
import { SnapshotWriter } from '../manager/snapshot-writer.js';
import { MemoryObjectStore } from '../storage/memory-object-store.js';
import { STATE_KEY } from '../storage/object-store.js';

/** Holds every put until released, then fails the ones listed in `failing`. */
class GatedStore extends MemoryObjectStore {
  readonly bodies: string[] = [];
  failing = new Set<string>();
  private gates: Array<() => void> = [];

  release() {
    const gates = this.gates;
    this.gates = [];
    for (const open of gates) open();
  }

  async put(key: string, body: Buffer, contentType: string): Promise<void> {
    await new Promise<void>((resolve) => this.gates.push(resolve));
    const text = body.toString('utf8');
    this.bodies.push(text);
    if (this.failing.has(text)) throw new Error(`storage unavailable for ${text}`);
    await super.put(key, body, contentType);
  }
}

async function tick() {
  await new Promise((resolve) => setImmediate(resolve));
}

describe('SnapshotWriter', () => {
  it('writes the latest snapshot and skips superseded ones', async () => {
    const store = new GatedStore();
    const writer = new SnapshotWriter(store, logger);

    writer.schedule('v1');
    writer.schedule('v2');
    writer.schedule('v3');
    await tick();
    store.release();
    await tick();
    store.release();
    await writer.flush();

    expect(store.bodies).toEqual(['v1', 'v3']);
    expect((await store.get(STATE_KEY)).toString()).toBe('v3');
    expect(writer.getStats()).toMatchObject({ writes: 2, failures: 0, coalesced: 1, last_error: null });
  });

  it('records a failed write and keeps going', async () => {
    const store = new GatedStore();
    store.failing.add('v1');
    const writer = new SnapshotWriter(store, logger);

    writer.schedule('v1');
    await tick();
    writer.schedule('v2');
    store.release();
    await tick();
    store.release();
    await writer.flush();

    expect((await store.get(STATE_KEY)).toString()).toBe('v2');
    expect(writer.getStats()).toMatchObject({
      writes: 1,
      failures: 1,
      last_error: 'storage unavailable for v1',
    });
  });

  it('flushes immediately when idle', async () => {
    const writer = new SnapshotWriter(new MemoryObjectStore(), logger);
    await writer.flush();
    expect(writer.getStats().writes).toBe(0);
  });
});
