export const FOLDERS = {
  raw: 'raw_images',
  compressed: 'compressed_images',
  headshot: 'headshots_rembg',
  certificate: 'certificates',
  preview: 'certificate_previews',
} as const;

export type Folder = (typeof FOLDERS)[keyof typeof FOLDERS];

export const STATE_KEY = 'manager_state.json';
export const TEMPLATE_KEY = 'template.pptx';

const EXTENSIONS: Record<Folder, string> = {
  raw_images: 'jpg',
  compressed_images: 'jpg',
  headshots_rembg: 'jpg',
  certificates: 'pptx',
  certificate_previews: 'png',
};

export const CONTENT_TYPES = {
  jpeg: 'image/jpeg',
  png: 'image/png',
  pptx: 'application/vnd.openxmlformats-officedocument.presentationml.presentation',
  json: 'application/json',
} as const;

export function objectKey(folder: Folder, id: string): string {
  return `${folder}/${id}.${EXTENSIONS[folder]}`;
}

export interface PresignOptions {
  expiresIn: number;
  /** `attachment` forces a download, named `filename` when given. */
  disposition?: 'inline' | 'attachment';
  filename?: string;
}

export class ObjectNotFoundError extends Error {
  constructor(readonly key: string) {
    super(`Object not found: ${key}`);
    this.name = 'ObjectNotFoundError';
  }
}

/**
 * Durable keyed object storage. Implementations throw on transport failure and
 * throw ObjectNotFoundError from `get` when the key does not exist.
 */
export interface ObjectStore {
  put(key: string, body: Buffer, contentType: string): Promise<void>;
  get(key: string): Promise<Buffer>;
  delete(keys: string[]): Promise<void>;
  exists(key: string): Promise<boolean>;
  presignedUrl(key: string, options: PresignOptions): Promise<string>;
}

/** Every object stored for a profile, across all folders. */
export function profileArtifactKeys(id: string): string[] {
  return Object.values(FOLDERS).map((folder) => objectKey(folder, id));
}

export async function deleteProfileArtifacts(store: ObjectStore, id: string): Promise<void> {
  await store.delete(profileArtifactKeys(id));
}
