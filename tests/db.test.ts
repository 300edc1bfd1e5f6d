// All test data is fictional
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { DateTime } from 'luxon';
import { TodoDatabase } from '../src/db.js';
import { CltodoError } from '../src/errors.js';
import { parseDateBound } from '../src/list.js';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

function at(iso: string): DateTime<true> {
  const date = DateTime.fromISO(iso, { setZone: true });
  if (!date.isValid) throw new Error(`Bad fixture date: ${iso}`);
  return date;
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('TodoDatabase', () => {
  let db: TodoDatabase;
  let tempDir: string;
  let dbPath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'cltodo-test-'));
    dbPath = join(tempDir, 'data.db');
    db = new TodoDatabase(dbPath);
  });

  afterEach(() => {
    db.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('schema', () => {
    it('keeps existing rows when the store is opened again', () => {
      db.addTodo('Water plants', 'normal');
      db.close();

      db = new TodoDatabase(dbPath);
      expect(db.listTodos().map(t => t.text)).toEqual(['Water plants']);
    });

    it('rejects values that do not match the declared column types', () => {
      const raw = new Database(dbPath);
      try {
        expect(() =>
          raw.prepare('INSERT INTO todos (date, text, priority) VALUES (?, ?, ?)').run('2024-01-01T00:00:00.000Z', 'x', 'high')
        ).toThrow();
      } finally {
        raw.close();
      }
    });

    it('wraps open failures as storage errors', () => {
      const err = captureError(() => new TodoDatabase(join(tempDir, 'missing', 'data.db')));
      expect(err).toBeInstanceOf(CltodoError);
      expect(err).toMatchObject({ code: 'STORAGE_ERROR' });
    });
  });

  describe('addTodo', () => {
    it('assigns increasing ids', () => {
      expect(db.addTodo('First', 'normal')).toBe(1);
      expect(db.addTodo('Second', 'important')).toBe(2);
      expect(db.addTodo('Third', 'critical')).toBe(3);
    });

    it('round-trips text, priority and timestamp', () => {
      const when = at('2024-03-10T09:15:30.250+02:00');
      const id = db.addTodo('Call the plumber', 'important', when);

      const todo = db.getTodo(id);
      expect(todo).not.toBeNull();
      expect(todo!.id).toBe(id);
      expect(todo!.text).toBe('Call the plumber');
      expect(todo!.priority).toBe('important');
      expect(todo!.date.toISO()).toBe('2024-03-10T09:15:30.250+02:00');
    });

    it('stamps the current time by default', () => {
      const before = DateTime.local().toMillis();
      const id = db.addTodo('Now-ish', 'normal');
      const after = DateTime.local().toMillis();

      const stored = db.getTodo(id)!.date.toMillis();
      expect(stored).toBeGreaterThanOrEqual(before);
      expect(stored).toBeLessThanOrEqual(after);
    });
  });

  describe('getTodo', () => {
    it('returns null for an unknown id', () => {
      expect(db.getTodo(42)).toBeNull();
    });
  });

  describe('deleteTodo', () => {
    it('removes only the matching row', () => {
      db.addTodo('Keep', 'normal');
      const id = db.addTodo('Drop', 'normal');

      db.deleteTodo(id);
      expect(db.listTodos().map(t => t.text)).toEqual(['Keep']);
    });

    it('ignores ids that do not exist', () => {
      db.addTodo('Only one', 'critical');

      expect(() => db.deleteTodo(99)).not.toThrow();
      expect(db.listTodos()).toHaveLength(1);
    });
  });

  describe('pruneTodos', () => {
    it('empties the table and restarts ids at 1', () => {
      db.addTodo('a', 'normal');
      db.addTodo('b', 'important');
      db.addTodo('c', 'critical');

      db.pruneTodos();
      expect(db.listTodos()).toEqual([]);

      const id = db.addTodo('fresh start', 'normal');
      expect(id).toBe(1);
      const todos = db.listTodos();
      expect(todos).toHaveLength(1);
      expect(todos[0].id).toBe(1);
    });
  });

  describe('listTodos', () => {
    it('buckets by priority with no filters', () => {
      db.addTodo('buy milk', 'normal');
      db.addTodo('fix server', 'critical');
      db.addTodo('write report', 'important');

      const todos = db.listTodos();
      expect(todos.map(t => [t.text, t.priority])).toEqual([
        ['fix server', 'critical'],
        ['write report', 'important'],
        ['buy milk', 'normal'],
      ]);
    });

    describe('ordering', () => {
      beforeEach(() => {
        db.addTodo('a', 'normal', at('2024-01-01T08:00:00'));
        db.addTodo('b', 'critical', at('2024-01-02T08:00:00'));
        db.addTodo('c', 'normal', at('2024-01-03T08:00:00'));
        db.addTodo('d', 'critical', at('2024-01-04T08:00:00'));
      });

      it('puts higher tiers first, newest first inside each tier', () => {
        expect(db.listTodos().map(t => t.text)).toEqual(['d', 'b', 'c', 'a']);
      });

      it('keeps tiers but goes oldest first when reversed', () => {
        expect(db.listTodos({ reversed: true }).map(t => t.text)).toEqual(['b', 'd', 'a', 'c']);
      });

      it('ignores priority in chronological mode', () => {
        expect(db.listTodos({ chronological: true }).map(t => t.text)).toEqual(['d', 'c', 'b', 'a']);
        expect(db.listTodos({ chronological: true, reversed: true }).map(t => t.text)).toEqual(['a', 'b', 'c', 'd']);
      });

      it('filters by priority', () => {
        expect(db.listTodos({ priority: 'critical' }).map(t => t.text)).toEqual(['d', 'b']);
        expect(db.listTodos({ priority: 'important' })).toEqual([]);
      });
    });

    it('breaks timestamp ties by id in the same direction', () => {
      const when = at('2024-05-05T12:00:00');
      db.addTodo('first', 'normal', when);
      db.addTodo('second', 'normal', when);

      expect(db.listTodos().map(t => t.text)).toEqual(['second', 'first']);
      expect(db.listTodos({ reversed: true }).map(t => t.text)).toEqual(['first', 'second']);
    });

    it('includes the whole day for bare-date bounds', () => {
      db.addTodo('day before', 'normal', at('2023-12-31T23:59:59.999'));
      db.addTodo('midnight', 'normal', at('2024-01-01T00:00:00.000'));
      db.addTodo('last moment', 'normal', at('2024-01-01T23:59:59.999'));
      db.addTodo('day after', 'normal', at('2024-01-02T00:00:00.000'));

      const todos = db.listTodos({
        from: parseDateBound('2024-01-01', 'start'),
        to: parseDateBound('2024-01-01', 'end'),
        chronological: true,
        reversed: true,
      });
      expect(todos.map(t => t.text)).toEqual(['midnight', 'last moment']);
    });

    it('compares timestamps stored under different offsets as instants', () => {
      // 12:00 at +05:00 is 07:00 UTC
      db.addTodo('eastern', 'normal', at('2024-01-01T12:00:00.000+05:00'));

      expect(db.listTodos({ from: at('2024-01-01T06:30:00.000Z') })).toHaveLength(1);
      expect(db.listTodos({ from: at('2024-01-01T07:30:00.000Z') })).toHaveLength(0);
      expect(db.listTodos({ to: at('2024-01-01T07:00:00.000Z') })).toHaveLength(1);
    });

    it('combines priority and date filters', () => {
      db.addTodo('old critical', 'critical', at('2024-01-01T10:00:00'));
      db.addTodo('new critical', 'critical', at('2024-02-01T10:00:00'));
      db.addTodo('new normal', 'normal', at('2024-02-01T11:00:00'));

      const todos = db.listTodos({ priority: 'critical', from: parseDateBound('2024-01-15', 'start') });
      expect(todos.map(t => t.text)).toEqual(['new critical']);
    });
  });

  describe('corrupted rows', () => {
    function insertRaw(date: string, priority: number): void {
      const raw = new Database(dbPath);
      try {
        raw.prepare('INSERT INTO todos (date, text, priority) VALUES (?, ?, ?)').run(date, 'tampered', priority);
      } finally {
        raw.close();
      }
    }

    it('fails the whole listing on an unknown priority tag', () => {
      db.addTodo('fine', 'normal');
      insertRaw('2024-01-01T10:00:00.000+00:00', 7);

      const err = captureError(() => db.listTodos());
      expect(err).toBeInstanceOf(CltodoError);
      expect(err).toMatchObject({ code: 'CORRUPTED_PRIORITY', context: { id: 2, tag: 7 } });
    });

    it('fails on a date that does not parse', () => {
      insertRaw('next tuesday', 0);

      const err = captureError(() => db.getTodo(1));
      expect(err).toBeInstanceOf(CltodoError);
      expect(err).toMatchObject({ code: 'CORRUPTED_DATE', context: { id: 1, date: 'next tuesday' } });
      expect(err instanceof CltodoError && err.isCorruption).toBe(true);
    });

    it('fails on an unreadable date even when a date range is given', () => {
      db.addTodo('fine', 'normal', at('2024-01-01T12:00:00'));
      insertRaw('next tuesday', 0);

      for (const filter of [
        { from: parseDateBound('2000-01-01', 'start') },
        { to: parseDateBound('2100-01-01', 'end') },
        { from: parseDateBound('2000-01-01', 'start'), to: parseDateBound('2100-01-01', 'end') },
      ]) {
        const err = captureError(() => db.listTodos(filter));
        expect(err).toMatchObject({ code: 'CORRUPTED_DATE', context: { id: 2, date: 'next tuesday' } });
      }
    });
  });
});
