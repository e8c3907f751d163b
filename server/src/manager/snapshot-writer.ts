import type { Logger } from '../lib/logger.js';
import { errorMessage } from '../lib/pipeline-result.js';
import { CONTENT_TYPES, STATE_KEY } from '../storage/object-store.js';
import type { ObjectStore } from '../storage/object-store.js';

export interface SnapshotWriterStats {
  writes: number;
  failures: number;
  coalesced: number;
  last_error: string | null;
  last_written_at: string | null;
}

/**
 * Persists serialized state snapshots one write at a time. A snapshot
 * scheduled while a write is in flight replaces any snapshot still waiting,
 * so the store always ends on the latest state. Failures are logged and
 * never surface to the caller.
 */
export class SnapshotWriter {
  private pending: string | null = null;
  private writing: Promise<void> | null = null;
  private readonly stats: SnapshotWriterStats = {
    writes: 0,
    failures: 0,
    coalesced: 0,
    last_error: null,
    last_written_at: null,
  };

  constructor(
    private readonly store: ObjectStore,
    private readonly log: Logger,
  ) {}

  schedule(serialized: string): void {
    if (this.pending !== null) this.stats.coalesced += 1;
    this.pending = serialized;
    if (!this.writing) {
      this.writing = this.writeLoop();
    }
  }

  /** Resolves once every scheduled snapshot has been attempted. */
  async flush(): Promise<void> {
    while (this.writing) {
      await this.writing;
    }
  }

  getStats(): SnapshotWriterStats {
    return { ...this.stats };
  }

  private async writeLoop(): Promise<void> {
    try {
      while (this.pending !== null) {
        const body = this.pending;
        this.pending = null;
        try {
          await this.store.put(STATE_KEY, Buffer.from(body, 'utf8'), CONTENT_TYPES.json);
          this.stats.writes += 1;
          this.stats.last_written_at = new Date().toISOString();
        } catch (err) {
          this.stats.failures += 1;
          this.stats.last_error = errorMessage(err);
          this.log.error({ error: this.stats.last_error }, 'Failed to persist state snapshot');
        }
      }
    } finally {
      this.writing = null;
    }
  }
}
