/**
 * ProfileManager: sole owner of the canonical profile collection.
 *
 * Every mutation, whether it comes from an HTTP request or a finished
 * pipeline job, is queued on one mailbox and applied strictly one at a time.
 * After each applied mutation the registered subscriber (at most one) is
 * told what changed and a full snapshot is handed to the SnapshotWriter.
 * Reads return the current in-memory state directly and never wait on
 * pipeline work.
 */

import { randomBytes } from 'node:crypto';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import logger from '../lib/logger.js';
import type { Logger } from '../lib/logger.js';
import { errorMessage } from '../lib/pipeline-result.js';
import type {
  AdmissionController,
  ControllerStatus,
  JobOutcome,
  SubmitReceipt,
} from '../runtime/admission-controller.js';
import { ObjectNotFoundError, STATE_KEY, deleteProfileArtifacts } from '../storage/object-store.js';
import type { ObjectStore } from '../storage/object-store.js';
import { resolveProfileId } from '../profiles/content-id.js';
import type { SuffixGenerator } from '../profiles/content-id.js';
import { applyExtraction, mergeProfile } from '../profiles/profile.js';
import type { ExtractedFields, Profile, ProfileEdit } from '../profiles/profile.js';
import { acceptsEvent, nextStatus } from '../profiles/status.js';
import type { StatusEvent } from '../profiles/status.js';
import { emptyState, parseSnapshot, serializeState } from '../profiles/snapshot.js';
import type { CertificateConfig, ManagerState } from '../profiles/snapshot.js';
import type { UploadPayload, IdRegistry } from '../pipelines/upload.js';
import type { ExtractionPayload } from '../pipelines/extraction.js';
import type { CertificatePayload } from '../pipelines/certificate.js';
import { SnapshotWriter } from './snapshot-writer.js';
import type { ManagerEvent, Subscriber } from './events.js';

export interface ManagerControllers {
  uploads: AdmissionController<UploadPayload, Profile>;
  extraction: AdmissionController<ExtractionPayload, ExtractedFields>;
  certificates: AdmissionController<CertificatePayload, void>;
}

export interface ProfileManagerOptions {
  store: ObjectStore;
  /** Where intake copies uploaded bytes before the upload job runs. */
  stagingDir: string;
  /** Builds the three controllers; receives the registry upload jobs claim ids from. */
  controllers: (ids: IdRegistry) => ManagerControllers;
  suffix?: SuffixGenerator;
  logger?: Logger;
}

export type IntakeResult =
  | { accepted: true }
  | { accepted: false; reason: 'staging_failed' | 'backlog_full'; message: string };

export interface BatchReceipt {
  /** Ids handed to a controller. */
  submitted: string[];
  /** Ids a controller refused because its backlog was full. */
  rejected: string[];
  /** Requested ids that do not exist or are not in an eligible status. */
  skipped: string[];
}

export type DeleteResult = { ok: true } | { ok: false; reason: 'not_found' };

export class ProfileManager {
  private state: ManagerState = emptyState();
  private subscriber: Subscriber | null = null;

  private readonly store: ObjectStore;
  private readonly stagingDir: string;
  private readonly controllers: ManagerControllers;
  private readonly suffix: SuffixGenerator | undefined;
  private readonly log: Logger;
  private readonly snapshots: SnapshotWriter;

  private readonly reservedIds = new Set<string>();
  private readonly deletingIds = new Set<string>();
  private readonly removals = new Set<Promise<DeleteResult>>();
  private mailbox: Array<() => Promise<void>> = [];
  private processing = false;

  constructor(options: ProfileManagerOptions) {
    this.store = options.store;
    this.stagingDir = options.stagingDir;
    this.suffix = options.suffix;
    this.log = (options.logger ?? logger).child({ component: 'profile-manager' });
    this.snapshots = new SnapshotWriter(this.store, this.log);
    this.controllers = options.controllers({
      claim: (candidate) => this.claimId(candidate),
      release: (id) => {
        this.reservedIds.delete(id);
      },
    });
  }

  /** Loads the persisted snapshot; a missing snapshot starts an empty collection. */
  async load(): Promise<void> {
    await this.enqueue('load', async () => {
      let raw: Buffer;
      try {
        raw = await this.store.get(STATE_KEY);
      } catch (err) {
        if (err instanceof ObjectNotFoundError) {
          this.log.info('No stored state snapshot — starting empty');
          this.state = emptyState();
          return;
        }
        throw err;
      }
      const { state, dropped } = parseSnapshot(raw.toString('utf8'));
      if (dropped.length > 0) {
        this.log.warn({ dropped }, 'Dropped invalid profiles from stored snapshot');
      }
      this.state = state;
      this.log.info({ profiles: state.profiles.length }, 'Loaded state snapshot');
    });
  }

  // ─── Subscriber ─────────────────────────────────────────────────────

  /**
   * Registers the one subscriber, replacing any previous one. The returned
   * function unregisters it, unless another subscriber has taken its place.
   */
  subscribe(subscriber: Subscriber): () => void {
    if (this.subscriber) {
      this.log.info('Replacing existing subscriber');
    }
    this.subscriber = subscriber;
    return () => {
      if (this.subscriber === subscriber) this.subscriber = null;
    };
  }

  // ─── Reads ──────────────────────────────────────────────────────────

  listProfiles(): Profile[] {
    return this.state.profiles.map((p) => ({ ...p }));
  }

  getProfile(id: string): Profile | null {
    const found = this.state.profiles.find((p) => p.id === id);
    return found ? { ...found } : null;
  }

  getInferenceUrl(): string | null {
    return this.state.inference_url;
  }

  getCertificateConfig(): CertificateConfig {
    return { ...this.state.certificate_config };
  }

  controllerStatus(): ControllerStatus[] {
    const { uploads, extraction, certificates } = this.controllers;
    return [uploads.status(), extraction.status(), certificates.status()];
  }

  persistenceStats() {
    return this.snapshots.getStats();
  }

  // ─── Intake ─────────────────────────────────────────────────────────

  /** Stages the bytes in a private file, then queues its upload. */
  async createProfileFromBytes(bytes: Buffer): Promise<IntakeResult> {
    const stagedPath = path.join(this.stagingDir, `profile_upload_${randomBytes(8).toString('hex')}.jpg`);
    try {
      await mkdir(this.stagingDir, { recursive: true });
      await writeFile(stagedPath, bytes);
    } catch (err) {
      this.log.error({ error: errorMessage(err) }, 'Failed to stage uploaded file');
      await rm(stagedPath, { force: true });
      return { accepted: false, reason: 'staging_failed', message: errorMessage(err) };
    }

    const receipt = this.controllers.uploads.submit({
      id: null,
      payload: { stagedPath },
      requester: (outcome) => this.post('upload_complete', () => this.onUploadComplete(outcome)),
    });
    if (!receipt.accepted) {
      await rm(stagedPath, { force: true });
      return { accepted: false, reason: 'backlog_full', message: 'Upload queue is full' };
    }
    return { accepted: true };
  }

  // ─── Mutations ──────────────────────────────────────────────────────

  updateProfile(id: string, edit: ProfileEdit): Promise<Profile | null> {
    return this.enqueue('update_profile', () => {
      const current = this.findProfile(id);
      if (!current) return null;
      const updated = mergeProfile(current, edit);
      this.replaceProfile(updated);
      this.log.info({ profileId: id, fields: Object.keys(edit) }, 'Profile edited');
      this.commit({ type: 'profile_updated', profile: { ...updated } });
      return { ...updated };
    });
  }

  /**
   * Claims the profile for deletion, removes its stored artifacts outside the
   * mailbox, then drops it from the collection. A profile being deleted stays
   * readable but takes no new jobs.
   */
  async deleteProfile(id: string): Promise<DeleteResult> {
    const claimed = await this.enqueue('delete_profile', () => {
      if (!this.findProfile(id) || this.deletingIds.has(id)) return false;
      this.deletingIds.add(id);
      return true;
    });
    if (!claimed) return { ok: false, reason: 'not_found' };

    const removal = this.removeProfile(id);
    this.removals.add(removal);
    try {
      return await removal;
    } finally {
      this.removals.delete(removal);
    }
  }

  private async removeProfile(id: string): Promise<DeleteResult> {
    try {
      await deleteProfileArtifacts(this.store, id);
    } catch (err) {
      this.log.warn({ profileId: id, error: errorMessage(err) }, 'Failed to delete stored artifacts');
    }
    return this.enqueue('profile_removed', (): DeleteResult => {
      this.deletingIds.delete(id);
      this.state = { ...this.state, profiles: this.state.profiles.filter((p) => p.id !== id) };
      this.log.info({ profileId: id }, 'Profile deleted');
      this.commit({ type: 'profiles_updated', profiles: this.listProfiles() });
      return { ok: true };
    });
  }

  extractProfiles(ids: string[]): Promise<BatchReceipt> {
    return this.enqueue('extract_profiles', () =>
      this.submitBatch(ids, 'extraction_succeeded', (profile) =>
        this.controllers.extraction.submit({
          id: profile.id,
          payload: { profileId: profile.id, baseUrl: this.state.inference_url },
          requester: (outcome) => this.post('extraction_result', () => this.onExtractionResult(outcome)),
        })));
  }

  generateCertificates(ids: string[]): Promise<BatchReceipt> {
    return this.enqueue('generate_certificates', () =>
      this.submitBatch(ids, 'certificate_succeeded', (profile) =>
        this.controllers.certificates.submit({
          id: profile.id,
          payload: { profile: { ...profile }, config: { ...this.state.certificate_config } },
          requester: (outcome) => this.post('certificate_result', () => this.onCertificateResult(outcome)),
        })));
  }

  /** `generated → reviewed` for every eligible id; returns the ids that moved. */
  markReviewed(ids: string[]): Promise<string[]> {
    return this.enqueue('mark_reviewed', () => this.transitionMany(ids, 'mark_reviewed'));
  }

  /** `reviewed → generated` for every eligible id; returns the ids that moved. */
  unmarkReviewed(ids: string[]): Promise<string[]> {
    return this.enqueue('unmark_reviewed', () => this.transitionMany(ids, 'unmark_reviewed'));
  }

  setInferenceUrl(url: string | null): Promise<void> {
    return this.enqueue('set_inference_url', () => {
      this.state = { ...this.state, inference_url: url };
      this.commit({ type: 'inference_url_updated', url });
    });
  }

  setCertificateConfig(config: CertificateConfig): Promise<void> {
    return this.enqueue('set_certificate_config', () => {
      this.state = { ...this.state, certificate_config: { ...config } };
      this.commit({ type: 'certificate_config_updated', config: { ...config } });
    });
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────

  /**
   * Waits until no job is queued or running, every completion and deletion has been
   * applied, and the last snapshot write has been attempted.
   */
  async settle(): Promise<void> {
    const all = Object.values(this.controllers);
    for (;;) {
      await Promise.all([...all.map((controller) => controller.drain()), ...this.removals]);
      await this.enqueue('settle', () => undefined);
      const busy = all.some((controller) => {
        const status = controller.status();
        return status.active > 0 || status.queued > 0;
      });
      if (!busy && this.removals.size === 0 && this.mailbox.length === 0) break;
    }
    await this.snapshots.flush();
  }

  /** Waits for queued mutations and the pending snapshot write; running jobs are not awaited. */
  async flush(): Promise<void> {
    await this.enqueue('flush', () => undefined);
    await this.snapshots.flush();
  }

  // ─── Job completions ────────────────────────────────────────────────

  private onUploadComplete(outcome: JobOutcome<Profile>): void {
    if (!outcome.result.ok) {
      this.log.error({ error: outcome.result.error }, 'Upload failed');
      this.notify({ type: 'upload_error', id: outcome.id, error: outcome.result.error });
      return;
    }

    const profile = outcome.result.value;
    this.reservedIds.delete(profile.id);
    if (this.findProfile(profile.id)) {
      this.log.error({ profileId: profile.id }, 'Uploaded profile id already present — ignoring');
      return;
    }
    this.state = { ...this.state, profiles: [profile, ...this.state.profiles] };
    this.log.info({ profileId: profile.id }, 'Profile created');
    this.commit({ type: 'profiles_updated', profiles: this.listProfiles() });
  }

  private onExtractionResult(outcome: JobOutcome<ExtractedFields>): void {
    const id = outcome.id;
    if (id === null) return;
    if (!outcome.result.ok) {
      this.log.error({ profileId: id, error: outcome.result.error }, 'Extraction failed');
      this.notify({ type: 'extract_error', id, error: outcome.result.error });
      return;
    }

    const current = this.findProfile(id);
    if (!current) {
      this.log.info({ profileId: id }, 'Extraction finished for a deleted profile — ignoring');
      return;
    }
    const status = nextStatus(current.status, 'extraction_succeeded');
    if (!status) {
      this.log.warn({ profileId: id, status: current.status }, 'Extraction result no longer applicable — ignoring');
      return;
    }
    this.replaceProfile({ ...applyExtraction(current, outcome.result.value), status });
    this.log.info({ profileId: id }, 'Extraction applied');
    this.commit({ type: 'profiles_updated', profiles: this.listProfiles() });
  }

  private onCertificateResult(outcome: JobOutcome<void>): void {
    const id = outcome.id;
    if (id === null) return;
    if (!outcome.result.ok) {
      this.log.error({ profileId: id, error: outcome.result.error }, 'Certificate generation failed');
      this.notify({ type: 'certificate_error', id, error: outcome.result.error });
      return;
    }

    const current = this.findProfile(id);
    if (!current) {
      this.log.info({ profileId: id }, 'Certificate finished for a deleted profile — ignoring');
      return;
    }
    const status = nextStatus(current.status, 'certificate_succeeded');
    if (!status) {
      this.log.warn({ profileId: id, status: current.status }, 'Certificate result no longer applicable — ignoring');
      return;
    }
    this.replaceProfile({ ...current, status });
    this.commit({ type: 'profiles_updated', profiles: this.listProfiles() });
  }

  // ─── Private Helpers ────────────────────────────────────────────────

  private claimId(candidate: string): string {
    const id = resolveProfileId(
      candidate,
      (taken) => this.reservedIds.has(taken) || this.findProfile(taken) !== undefined,
      this.suffix,
    );
    this.reservedIds.add(id);
    return id;
  }

  private submitBatch(
    ids: string[],
    event: StatusEvent,
    submit: (profile: Profile) => SubmitReceipt,
  ): BatchReceipt {
    const requested = new Set(ids);
    const receipt: BatchReceipt = { submitted: [], rejected: [], skipped: [] };
    for (const profile of this.state.profiles) {
      if (!requested.has(profile.id)) continue;
      requested.delete(profile.id);
      if (this.deletingIds.has(profile.id) || !acceptsEvent(profile.status, event)) {
        receipt.skipped.push(profile.id);
        continue;
      }
      if (submit(profile).accepted) receipt.submitted.push(profile.id);
      else receipt.rejected.push(profile.id);
    }
    receipt.skipped.push(...requested);
    return receipt;
  }

  private transitionMany(ids: string[], event: StatusEvent): string[] {
    const requested = new Set(ids);
    const moved: string[] = [];
    const profiles = this.state.profiles.map((profile) => {
      if (!requested.has(profile.id)) return profile;
      const status = nextStatus(profile.status, event);
      if (!status) return profile;
      moved.push(profile.id);
      return { ...profile, status };
    });
    if (moved.length > 0) {
      this.state = { ...this.state, profiles };
      this.log.info({ event, moved }, 'Review status changed');
      this.commit({ type: 'profiles_updated', profiles: this.listProfiles() });
    }
    return moved;
  }

  private findProfile(id: string): Profile | undefined {
    return this.state.profiles.find((p) => p.id === id);
  }

  private replaceProfile(updated: Profile): void {
    this.state = {
      ...this.state,
      profiles: this.state.profiles.map((p) => (p.id === updated.id ? updated : p)),
    };
  }

  private commit(event: ManagerEvent): void {
    this.notify(event);
    this.snapshots.schedule(serializeState(this.state));
  }

  private notify(event: ManagerEvent): void {
    const subscriber = this.subscriber;
    if (!subscriber) return;
    try {
      subscriber(event);
    } catch (err) {
      this.log.error({ err, event: event.type }, 'Subscriber threw');
    }
  }

  /** Fire-and-forget mailbox message; failures are logged. */
  private post(label: string, handler: () => void | Promise<void>): void {
    this.enqueue(label, handler).catch((err: unknown) => {
      this.log.error({ err, message: label }, 'Mailbox message failed');
    });
  }

  private enqueue<T>(label: string, handler: () => T | Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.mailbox.push(async () => {
        try {
          resolve(await handler());
        } catch (err) {
          this.log.error({ err, message: label }, 'Mailbox handler failed');
          reject(err);
        }
      });
      this.pump();
    });
  }

  private pump(): void {
    if (this.processing) return;
    this.processing = true;
    this.processMailbox().catch((err: unknown) => {
      this.log.error({ err }, 'Mailbox loop failed');
    });
  }

  private async processMailbox(): Promise<void> {
    try {
      while (this.mailbox.length > 0) {
        const next = this.mailbox.shift();
        if (next) await next();
      }
    } finally {
      this.processing = false;
    }
  }
}
