/**
 * Priority tiers and their integer tags at the storage boundary.
 */

import type { PriorityName, PriorityTag } from './types.js';
import { CltodoError } from './errors.js';

// Ordered lowest to highest; the index is the stored tag
export const PRIORITIES: readonly PriorityName[] = ['normal', 'important', 'critical'];

const TAGS: Record<PriorityName, PriorityTag> = {
  normal: 0,
  important: 1,
  critical: 2,
};

const LABELS: Record<PriorityName, string> = {
  normal: 'Normal',
  important: 'Important',
  critical: 'Critical',
};

export const LABEL_WIDTH = Math.max(...PRIORITIES.map(p => LABELS[p].length));

export function isPriorityName(value: string): value is PriorityName {
  return (PRIORITIES as readonly string[]).includes(value);
}

export function priorityTag(priority: PriorityName): PriorityTag {
  return TAGS[priority];
}

export function priorityLabel(priority: PriorityName): string {
  return LABELS[priority];
}

/**
 * Parse a user-supplied priority name (case-insensitive).
 */
export function parsePriority(value: string): PriorityName {
  const normalized = value.trim().toLowerCase();
  if (!isPriorityName(normalized)) {
    throw new CltodoError(
      'INVALID_PRIORITY',
      `Invalid priority '${value}'. Must be one of: ${PRIORITIES.join(', ')}`,
      { value }
    );
  }
  return normalized;
}

/**
 * Map a stored tag back to a tier. Anything outside 0..2 means the row is corrupted.
 */
export function priorityFromTag(tag: number, id?: number): PriorityName {
  const priority = Number.isInteger(tag) ? PRIORITIES[tag] : undefined;
  if (priority === undefined) {
    throw new CltodoError('CORRUPTED_PRIORITY', `Stored priority ${tag} is not a known tier`, { id, tag });
  }
  return priority;
}
