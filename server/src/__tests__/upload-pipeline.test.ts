import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { access, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { uploadProfileImage } from '../pipelines/upload.js';
import type { IdRegistry, UploadDeps } from '../pipelines/upload.js';
import type { ImageCompressor } from '../pipelines/image-compressor.js';
import { MemoryObjectStore } from '../storage/memory-object-store.js';
import type { ObjectStore } from '../storage/object-store.js';
import { contentIdOfBuffer } from '../profiles/content-id.js';

const IMAGE = Buffer.from('fake jpeg bytes for a scanned form');
const ID = contentIdOfBuffer(IMAGE);

class RecordingRegistry implements IdRegistry {
  readonly claimed: string[] = [];
  readonly released: string[] = [];
  constructor(private readonly answer: (candidate: string) => string = (c) => c) {}
  claim(candidate: string): string {
    const id = this.answer(candidate);
    this.claimed.push(id);
    return id;
  }
  release(id: string): void {
    this.released.push(id);
  }
}

const labelCompressor: ImageCompressor = async (input) =>
  Buffer.from(`compressed:${Buffer.isBuffer(input) ? input.length : input}`);

async function exists(file: string): Promise<boolean> {
  try {
    await access(file);
    return true;
  } catch {
    return false;
  }
}

describe('uploadProfileImage', () => {
  let dir: string;
  let staged: string;
  let store: MemoryObjectStore;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'upload-test-'));
    staged = path.join(dir, 'staged.jpg');
    await writeFile(staged, IMAGE);
    store = new MemoryObjectStore();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function deps(overrides: Partial<UploadDeps> = {}): UploadDeps {
    return { store, compress: labelCompressor, ids: new RecordingRegistry(), ...overrides };
  }

  it('stores the original and the compressed copy and returns a new profile', async () => {
    const ids = new RecordingRegistry();
    const result = await uploadProfileImage(deps({ ids }), { stagedPath: staged });

    expect(result).toEqual({
      ok: true,
      value: { id: ID, name_cn: null, name_pinyin: null, birthday: null, baptism_date: null, status: 'uploaded' },
    });
    expect(store.keys()).toEqual([`compressed_images/${ID}.jpg`, `raw_images/${ID}.jpg`]);
    expect((await store.get(`raw_images/${ID}.jpg`)).equals(IMAGE)).toBe(true);
    expect((await store.get(`compressed_images/${ID}.jpg`)).toString()).toBe(`compressed:${IMAGE.length}`);
    expect(store.contentTypeOf(`raw_images/${ID}.jpg`)).toBe('image/jpeg');
    expect(ids.claimed).toEqual([ID]);
    expect(ids.released).toEqual([]);
  });

  it('uses the id the registry hands out', async () => {
    const ids = new RecordingRegistry((candidate) => `dup_beef_${candidate}`);
    const result = await uploadProfileImage(deps({ ids }), { stagedPath: staged });

    expect(result.ok && result.value.id).toBe(`dup_beef_${ID}`);
    expect(await store.exists(`raw_images/dup_beef_${ID}.jpg`)).toBe(true);
  });

  it('removes the staged file on success', async () => {
    await uploadProfileImage(deps(), { stagedPath: staged });
    expect(await exists(staged)).toBe(false);
  });

  it('fails at the hash step when the staged file is missing', async () => {
    const ids = new RecordingRegistry();
    const result = await uploadProfileImage(deps({ ids }), { stagedPath: path.join(dir, 'missing.jpg') });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('io');
      expect(result.error.step).toBe('hash');
    }
    expect(ids.claimed).toEqual([]);
  });

  it('releases the claimed id and removes the staged file when storage fails', async () => {
    const failing: ObjectStore = {
      put: async () => { throw new Error('bucket unavailable'); },
      get: (key) => store.get(key),
      delete: (keys) => store.delete(keys),
      exists: (key) => store.exists(key),
      presignedUrl: (key, options) => store.presignedUrl(key, options),
    };
    const ids = new RecordingRegistry();
    const result = await uploadProfileImage(deps({ store: failing, ids }), { stagedPath: staged });

    expect(result).toEqual({
      ok: false,
      error: { kind: 'io', message: 'Failed to store original image: bucket unavailable', step: 'store_original' },
    });
    expect(ids.released).toEqual([ID]);
    expect(await exists(staged)).toBe(false);
  });

  it('reports a compression failure as store_compressed', async () => {
    const broken: ImageCompressor = async () => { throw new Error('unsupported image format'); };
    const result = await uploadProfileImage(deps({ compress: broken }), { stagedPath: staged });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.step).toBe('store_compressed');
      expect(result.error.message).toBe('Failed to store compressed image: unsupported image format');
    }
    expect(store.keys()).toEqual([`raw_images/${ID}.jpg`]);
  });
});
