/**
 * Type definitions for the todo CLI
 */

import type { DateTime } from 'luxon';

export type PriorityName = 'normal' | 'important' | 'critical';
export type PriorityTag = 0 | 1 | 2;
export type StoreScope = 'project' | 'global';

export interface Todo {
  id: number;
  date: DateTime<true>;
  text: string;
  priority: PriorityName;
}

export interface ListFilter {
  priority?: PriorityName;
  from?: DateTime<true>;
  to?: DateTime<true>;
  reversed?: boolean;
}

export interface ListOptions extends ListFilter {
  chronological?: boolean;
}

// Raw command-line values before validation
export interface ListArgs {
  priority?: string;
  from?: string;
  to?: string;
  reversed?: boolean;
  chronological?: boolean;
}
