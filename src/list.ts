/**
 * Listing core: date bounds, query construction and priority re-bucketing.
 */

import { DateTime } from 'luxon';
import type { ListArgs, ListOptions, ListFilter, PriorityName, Todo } from './types.js';
import { CltodoError } from './errors.js';
import { PRIORITIES, parsePriority, priorityTag } from './priority.js';

const BARE_DATE = /^\d{4}-\d{2}-\d{2}$/;
// Timestamps carry a time part after 'T' (ISO) or a space (SQL)
const HAS_TIME = /[T\s]/;

export type BoundEdge = 'start' | 'end';

export interface ListQuery {
  sql: string;
  params: (string | number)[];
}

/**
 * Parse a `--from` / `--to` argument.
 *
 * A bare calendar date expands to the first or last instant of that local day,
 * so both bounds cover the whole day. Anything else must be an ISO timestamp
 * or an SQL-style `YYYY-MM-DD HH:mm:ss`; without an offset it is read as local time.
 * Other date-only forms (`20240101`, `2024-01`, `2024-W01-1`) are rejected.
 */
export function parseDateBound(value: string, edge: BoundEdge): DateTime<true> {
  const input = value.trim();

  if (BARE_DATE.test(input)) {
    const day = DateTime.fromISO(input);
    if (day.isValid) {
      return edge === 'start' ? day.startOf('day') : day.endOf('day');
    }
  } else if (HAS_TIME.test(input)) {
    const iso = DateTime.fromISO(input, { setZone: true });
    if (iso.isValid) return iso;

    const sql = DateTime.fromSQL(input, { setZone: true });
    if (sql.isValid) return sql;
  }

  throw new CltodoError('INVALID_DATE', `Invalid date or timestamp: '${value}'`, { value });
}

/**
 * Validate raw command-line options. Runs before the database is opened.
 */
export function parseListArgs(args: ListArgs): ListOptions {
  const options: ListOptions = {
    reversed: args.reversed === true,
    chronological: args.chronological === true,
  };

  if (args.priority !== undefined) options.priority = parsePriority(args.priority);
  if (args.from !== undefined) options.from = parseDateBound(args.from, 'start');
  if (args.to !== undefined) options.to = parseDateBound(args.to, 'end');

  return options;
}

/**
 * Build the single filtered and ordered SELECT for a listing.
 * Dates are compared through julianday() so rows written under different
 * offsets compare as instants.
 */
export function buildListQuery(filter: ListFilter = {}): ListQuery {
  let sql = 'SELECT id, date, text, priority FROM todos WHERE 1=1';
  const params: (string | number)[] = [];

  if (filter.priority) {
    sql += ' AND priority = ?';
    params.push(priorityTag(filter.priority));
  }

  if (filter.from) {
    // Keep rows whose stored date SQLite cannot read; loading them raises CORRUPTED_DATE
    sql += ' AND (julianday(date) >= julianday(?) OR julianday(date) IS NULL)';
    params.push(filter.from.toISO());
  }

  if (filter.to) {
    sql += ' AND (julianday(date) <= julianday(?) OR julianday(date) IS NULL)';
    params.push(filter.to.toISO());
  }

  const direction = filter.reversed ? 'ASC' : 'DESC';
  sql += ` ORDER BY julianday(date) ${direction}, id ${direction}`;

  return { sql, params };
}

/**
 * Stable partition by priority tier, highest first.
 * Relative order inside each tier is the order the todos arrived in.
 */
export function bucketByPriority(todos: Todo[]): Todo[] {
  const buckets = new Map<PriorityName, Todo[]>(PRIORITIES.map(p => [p, []]));

  for (const todo of todos) {
    buckets.get(todo.priority)?.push(todo);
  }

  return [...PRIORITIES].reverse().flatMap(p => buckets.get(p) ?? []);
}

export function arrangeTodos(todos: Todo[], options: ListOptions): Todo[] {
  return options.chronological ? todos : bucketByPriority(todos);
}
