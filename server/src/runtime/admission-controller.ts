/**
 * Admission Controller: bounded-concurrency job runner with a FIFO backlog.
 *
 * One instance per pipeline. Jobs are admitted immediately, started in
 * submission order while fewer than `capacity` are running, and report their
 * outcome to the requester callback they were submitted with. A job that
 * throws is converted to an `internal` failure; its slot is always released.
 */

import logger from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { errorMessage, fail } from '../lib/pipeline-result.js';
import type { PipelineResult } from '../lib/pipeline-result.js';
import { recordJobFinished, recordJobSubmitted } from '../lib/job-metrics.js';
import type { JobOutcomeLabel } from '../lib/job-metrics.js';

export interface JobOutcome<TResult> {
  id: string | null;
  result: PipelineResult<TResult>;
}

export interface Job<TPayload, TResult> {
  /** Profile id the job works on, or null when it is not known yet. */
  id: string | null;
  payload: TPayload;
  requester: (outcome: JobOutcome<TResult>) => void;
}

export type JobRunner<TPayload, TResult> = (
  payload: TPayload,
  id: string | null,
) => Promise<PipelineResult<TResult>>;

export interface AdmissionControllerOptions<TPayload, TResult> {
  name: string;
  capacity: number;
  run: JobRunner<TPayload, TResult>;
  /** Submissions beyond this many queued jobs are rejected. Unbounded when omitted. */
  maxBacklog?: number;
  /** Never run two jobs with the same non-null id at once. */
  exclusiveIds?: boolean;
  logger?: Logger;
}

export type SubmitReceipt =
  | { accepted: true; queued: number }
  | { accepted: false; reason: 'backlog_full' };

export interface ControllerStatus {
  name: string;
  capacity: number;
  active: number;
  queued: number;
  active_ids: string[];
}

interface Entry<TPayload, TResult> extends Job<TPayload, TResult> {
  token: number;
}

export class AdmissionController<TPayload, TResult> {
  readonly name: string;
  readonly capacity: number;

  private readonly runJob: JobRunner<TPayload, TResult>;
  private readonly maxBacklog: number;
  private readonly exclusiveIds: boolean;
  private readonly log: Logger;

  private backlog: Array<Entry<TPayload, TResult>> = [];
  private readonly active = new Map<number, Entry<TPayload, TResult>>();
  private drainWaiters: Array<() => void> = [];
  private nextToken = 1;

  constructor(options: AdmissionControllerOptions<TPayload, TResult>) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new RangeError(`capacity must be a positive integer, got ${options.capacity}`);
    }
    this.name = options.name;
    this.capacity = options.capacity;
    this.runJob = options.run;
    this.maxBacklog = options.maxBacklog ?? Number.POSITIVE_INFINITY;
    this.exclusiveIds = options.exclusiveIds ?? false;
    this.log = (options.logger ?? logger).child({ controller: options.name });
  }

  /** Queues a job and starts whatever capacity allows. Never waits on job work. */
  submit(job: Job<TPayload, TResult>): SubmitReceipt {
    if (this.backlog.length >= this.maxBacklog) {
      recordJobSubmitted(this.name, false);
      this.log.warn({ id: job.id, queued: this.backlog.length }, 'Backlog full — job rejected');
      this.deliver(job, fail('rejected', `${this.name} backlog is full (${this.maxBacklog} queued)`));
      return { accepted: false, reason: 'backlog_full' };
    }

    recordJobSubmitted(this.name, true);
    this.backlog.push({ ...job, token: this.nextToken++ });
    this.dispatch();
    return { accepted: true, queued: this.backlog.length };
  }

  status(): ControllerStatus {
    return {
      name: this.name,
      capacity: this.capacity,
      active: this.active.size,
      queued: this.backlog.length,
      active_ids: [...this.active.values()]
        .map((entry) => entry.id)
        .filter((id): id is string => id !== null),
    };
  }

  /** Resolves once nothing is queued or running. */
  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  // ─── Private Helpers ────────────────────────────────────────────────

  private dispatch(): void {
    let index = 0;
    while (this.active.size < this.capacity && index < this.backlog.length) {
      const entry = this.backlog[index];
      if (this.exclusiveIds && entry.id !== null && this.isIdActive(entry.id)) {
        index += 1;
        continue;
      }
      this.backlog.splice(index, 1);
      this.start(entry);
    }
  }

  private start(entry: Entry<TPayload, TResult>): void {
    this.active.set(entry.token, entry);
    this.log.info(
      { id: entry.id, active: this.active.size, capacity: this.capacity, queued: this.backlog.length },
      'Job started',
    );
    this.execute(entry).catch((err: unknown) => {
      this.log.error({ err, id: entry.id }, 'Job bookkeeping failed');
    });
  }

  private async execute(entry: Entry<TPayload, TResult>): Promise<void> {
    const startedAt = Date.now();
    let result: PipelineResult<TResult>;
    let label: JobOutcomeLabel;
    try {
      result = await this.runJob(entry.payload, entry.id);
      label = result.ok ? 'succeeded' : 'failed';
    } catch (err) {
      this.log.error({ err, id: entry.id }, 'Job threw');
      result = fail('internal', errorMessage(err));
      label = 'crashed';
    }

    try {
      recordJobFinished(this.name, label, Date.now() - startedAt);
      this.deliver(entry, result);
    } finally {
      this.complete(entry.token);
    }
  }

  private complete(token: number): void {
    this.active.delete(token);
    this.dispatch();
    if (this.isIdle()) {
      const waiters = this.drainWaiters;
      this.drainWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  private deliver(job: Job<TPayload, TResult>, result: PipelineResult<TResult>): void {
    try {
      job.requester({ id: job.id, result });
    } catch (err) {
      this.log.error({ err, id: job.id }, 'Requester callback threw');
    }
  }

  private isIdActive(id: string): boolean {
    for (const entry of this.active.values()) {
      if (entry.id === id) return true;
    }
    return false;
  }

  private isIdle(): boolean {
    return this.active.size === 0 && this.backlog.length === 0;
  }
}
