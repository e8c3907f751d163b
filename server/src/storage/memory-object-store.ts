import { ObjectNotFoundError } from './object-store.js';
import type { ObjectStore, PresignOptions } from './object-store.js';

interface StoredObject {
  body: Buffer;
  contentType: string;
}

/**
 * Process-local ObjectStore for development without Supabase credentials and
 * for tests. Contents are lost on restart.
 */
export class MemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<string, StoredObject>();

  async put(key: string, body: Buffer, contentType: string): Promise<void> {
    this.objects.set(key, { body: Buffer.from(body), contentType });
  }

  async get(key: string): Promise<Buffer> {
    const found = this.objects.get(key);
    if (!found) throw new ObjectNotFoundError(key);
    return Buffer.from(found.body);
  }

  async delete(keys: string[]): Promise<void> {
    for (const key of keys) this.objects.delete(key);
  }

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  async presignedUrl(key: string, options: PresignOptions): Promise<string> {
    const params = new URLSearchParams({ expires_in: String(options.expiresIn) });
    if (options.disposition === 'attachment') {
      params.set('download', options.filename ?? '');
    }
    return `memory://objects/${key}?${params.toString()}`;
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }

  contentTypeOf(key: string): string | undefined {
    return this.objects.get(key)?.contentType;
  }
}
