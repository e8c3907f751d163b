import { createHash, randomBytes } from 'node:crypto';
import { createReadStream } from 'node:fs';

export const CONTENT_ID_LENGTH = 8;

export type SuffixGenerator = () => string;

/** Four random lowercase hex characters. */
export const randomSuffix: SuffixGenerator = () => randomBytes(2).toString('hex');

export function contentIdFromDigest(hexDigest: string): string {
  return hexDigest.slice(0, CONTENT_ID_LENGTH).toLowerCase();
}

export function contentIdOfBuffer(bytes: Buffer): string {
  return contentIdFromDigest(createHash('sha256').update(bytes).digest('hex'));
}

/** SHA-256 of a file, streamed, truncated to a content id. */
export async function contentIdOfFile(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return contentIdFromDigest(hash.digest('hex'));
}

/**
 * Picks a free id for `candidate`. A taken candidate becomes
 * `dup_<suffix>_<candidate>`, retried until `isTaken` is false.
 */
export function resolveProfileId(
  candidate: string,
  isTaken: (id: string) => boolean,
  suffix: SuffixGenerator = randomSuffix,
  maxAttempts = 32,
): string {
  if (!isTaken(candidate)) return candidate;
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const id = `dup_${suffix()}_${candidate}`;
    if (!isTaken(id)) return id;
  }
  throw new Error(`Could not find a free id for ${candidate} after ${maxAttempts} attempts`);
}
