import { readFile, rm } from 'node:fs/promises';
import { createProfileLogger } from '../lib/logger.js';
import { errorMessage, fail, ok } from '../lib/pipeline-result.js';
import type { PipelineResult } from '../lib/pipeline-result.js';
import type { JobRunner } from '../runtime/admission-controller.js';
import { CONTENT_TYPES, FOLDERS, objectKey } from '../storage/object-store.js';
import type { ObjectStore } from '../storage/object-store.js';
import { contentIdOfFile } from '../profiles/content-id.js';
import { newProfile } from '../profiles/profile.js';
import type { Profile } from '../profiles/profile.js';
import type { ImageCompressor } from './image-compressor.js';

export interface UploadPayload {
  /** Private copy of the uploaded bytes; removed when the job ends. */
  stagedPath: string;
}

export interface IdRegistry {
  /** Reserves a free id derived from `candidate`. */
  claim(candidate: string): string;
  /** Gives back an id reserved by a job that did not produce a profile. */
  release(id: string): void;
}

export interface UploadDeps {
  store: ObjectStore;
  compress: ImageCompressor;
  ids: IdRegistry;
}

export function createUploadRunner(deps: UploadDeps): JobRunner<UploadPayload, Profile> {
  return (payload) => uploadProfileImage(deps, payload);
}

export async function uploadProfileImage(deps: UploadDeps, payload: UploadPayload): Promise<PipelineResult<Profile>> {
  let claimed: string | null = null;
  try {
    let candidate: string;
    try {
      candidate = await contentIdOfFile(payload.stagedPath);
    } catch (err) {
      return fail('io', `Failed to hash upload: ${errorMessage(err)}`, { step: 'hash' });
    }

    const id = deps.ids.claim(candidate);
    claimed = id;
    const log = createProfileLogger(id, { pipeline: 'upload' });
    if (id !== candidate) {
      log.info({ candidate }, 'Content id already taken — using suffixed id');
    }

    let original: Buffer;
    try {
      original = await readFile(payload.stagedPath);
      await deps.store.put(objectKey(FOLDERS.raw, id), original, CONTENT_TYPES.jpeg);
    } catch (err) {
      return fail('io', `Failed to store original image: ${errorMessage(err)}`, { step: 'store_original' });
    }

    try {
      const compressed = await deps.compress(original);
      await deps.store.put(objectKey(FOLDERS.compressed, id), compressed, CONTENT_TYPES.jpeg);
    } catch (err) {
      return fail('io', `Failed to store compressed image: ${errorMessage(err)}`, { step: 'store_compressed' });
    }

    log.info('Uploaded images for profile');
    claimed = null;
    return ok(newProfile(id));
  } finally {
    if (claimed !== null) deps.ids.release(claimed);
    await rm(payload.stagedPath, { force: true });
  }
}
