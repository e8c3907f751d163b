import type { ProfileStatus } from './profile.js';

export type StatusEvent =
  | 'extraction_succeeded'
  | 'certificate_succeeded'
  | 'mark_reviewed'
  | 'unmark_reviewed';

/**
 * Legal moves per event. Re-running extraction on an extracted profile or
 * regenerating a generated one refreshes its data without moving it.
 */
const TRANSITIONS: Record<StatusEvent, Partial<Record<ProfileStatus, ProfileStatus>>> = {
  extraction_succeeded: { uploaded: 'extracted', extracted: 'extracted' },
  certificate_succeeded: { extracted: 'generated', generated: 'generated' },
  mark_reviewed: { generated: 'reviewed' },
  unmark_reviewed: { reviewed: 'generated' },
};

/** Returns the next status, or null when `event` is not allowed from `from`. */
export function nextStatus(from: ProfileStatus, event: StatusEvent): ProfileStatus | null {
  return TRANSITIONS[event][from] ?? null;
}

export function acceptsEvent(status: ProfileStatus, event: StatusEvent): boolean {
  return nextStatus(status, event) !== null;
}
