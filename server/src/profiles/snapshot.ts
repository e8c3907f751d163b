import { z } from 'zod';
import { profileSchema } from './profile.js';
import type { Profile } from './profile.js';

export type CertificateConfig = Record<string, string>;

export interface ManagerState {
  profiles: Profile[];
  inference_url: string | null;
  certificate_config: CertificateConfig;
}

export function emptyState(): ManagerState {
  return { profiles: [], inference_url: null, certificate_config: {} };
}

const snapshotSchema = z.object({
  profiles: z.array(z.unknown()).default([]),
  inference_url: z.string().nullable().optional(),
  certificate_config: z.record(z.string(), z.string()).nullable().optional(),
});

export interface ParsedSnapshot {
  state: ManagerState;
  /** Ids (or indexes) of stored profiles that failed validation and were dropped. */
  dropped: string[];
}

export function serializeState(state: ManagerState): string {
  return JSON.stringify({
    profiles: state.profiles,
    inference_url: state.inference_url,
    certificate_config: state.certificate_config,
  });
}

/**
 * Parses a stored snapshot. The envelope must be valid; individual profiles
 * that fail validation are dropped and reported rather than failing the load.
 */
export function parseSnapshot(raw: string): ParsedSnapshot {
  const envelope = snapshotSchema.parse(JSON.parse(raw));
  const profiles: Profile[] = [];
  const dropped: string[] = [];
  const seen = new Set<string>();

  envelope.profiles.forEach((candidate, index) => {
    const parsed = profileSchema.safeParse(candidate);
    if (!parsed.success || seen.has(parsed.data.id)) {
      dropped.push(parsed.success ? parsed.data.id : `#${index}`);
      return;
    }
    seen.add(parsed.data.id);
    profiles.push(parsed.data);
  });

  return {
    state: {
      profiles,
      inference_url: envelope.inference_url ?? null,
      certificate_config: envelope.certificate_config ?? {},
    },
    dropped,
  };
}
