import path from 'node:path';
import type { SupabaseClient } from '@supabase/supabase-js';
import { ObjectNotFoundError } from './object-store.js';
import type { ObjectStore, PresignOptions } from './object-store.js';

/** ObjectStore backed by a single Supabase Storage bucket. */
export class SupabaseObjectStore implements ObjectStore {
  constructor(
    private readonly client: SupabaseClient,
    private readonly bucket: string,
  ) {}

  private get api() {
    return this.client.storage.from(this.bucket);
  }

  async put(key: string, body: Buffer, contentType: string): Promise<void> {
    const { error } = await this.api.upload(key, body, { contentType, upsert: true });
    if (error) {
      throw new Error(`Storage upload failed for ${key}: ${error.message}`);
    }
  }

  async get(key: string): Promise<Buffer> {
    const { data, error } = await this.api.download(key);
    if (error || !data) {
      // download() does not expose a usable status, so tell "missing" apart by listing
      if (!(await this.exists(key))) throw new ObjectNotFoundError(key);
      throw new Error(`Storage download failed for ${key}: ${error?.message ?? 'empty body'}`);
    }
    return Buffer.from(await data.arrayBuffer());
  }

  async delete(keys: string[]): Promise<void> {
    if (keys.length === 0) return;
    const { error } = await this.api.remove(keys);
    if (error) {
      throw new Error(`Storage delete failed: ${error.message}`);
    }
  }

  async exists(key: string): Promise<boolean> {
    const folder = path.posix.dirname(key);
    const name = path.posix.basename(key);
    const { data, error } = await this.api.list(folder === '.' ? '' : folder, { limit: 100, search: name });
    if (error) {
      throw new Error(`Storage list failed for ${key}: ${error.message}`);
    }
    return (data ?? []).some((entry) => entry.name === name);
  }

  async presignedUrl(key: string, options: PresignOptions): Promise<string> {
    const download = options.disposition === 'attachment'
      ? (options.filename ?? true)
      : undefined;
    const { data, error } = await this.api.createSignedUrl(
      key,
      options.expiresIn,
      download === undefined ? undefined : { download },
    );
    if (error || !data) {
      throw new Error(`Failed to sign URL for ${key}: ${error?.message ?? 'no data'}`);
    }
    return data.signedUrl;
  }
}
