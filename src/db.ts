import Database from 'better-sqlite3';
import { DateTime } from 'luxon';
import type { ListOptions, PriorityName, Todo } from './types.js';
import { CltodoError, errorMessage } from './errors.js';
import { priorityFromTag, priorityTag } from './priority.js';
import { arrangeTodos, buildListQuery } from './list.js';

// DB row type for type safety
interface TodoRow {
  id: number;
  date: string;
  text: string;
  priority: number;
}

// Helper to wrap driver errors with CltodoError
function wrapSQLiteError(error: unknown, operation: string): CltodoError {
  if (error instanceof CltodoError) return error;
  return new CltodoError('STORAGE_ERROR', `Storage failure during ${operation}: ${errorMessage(error)}`, { operation });
}

// Create-if-absent; never drops or alters an existing table
function migrate(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS todos (
      id INTEGER PRIMARY KEY,
      date TEXT NOT NULL,
      text TEXT NOT NULL,
      priority INTEGER NOT NULL
    ) STRICT;
  `);
}

function openDatabase(dbPath: string): Database.Database {
  let db: Database.Database | null = null;
  try {
    db = new Database(dbPath);

    // Enable WAL mode
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');

    migrate(db);
    return db;
  } catch (error) {
    db?.close();
    throw wrapSQLiteError(error, 'open');
  }
}

export class TodoDatabase {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = openDatabase(dbPath);
  }

  // Add todo, stamped with the given (default: current local) time
  addTodo(text: string, priority: PriorityName, at: DateTime<true> = DateTime.local()): number {
    try {
      const result = this.db
        .prepare('INSERT INTO todos (date, text, priority) VALUES (?, ?, ?)')
        .run(at.toISO(), text, priorityTag(priority));
      return Number(result.lastInsertRowid);
    } catch (error) {
      throw wrapSQLiteError(error, 'add');
    }
  }

  // Delete by id; a missing id is not an error
  deleteTodo(id: number): void {
    try {
      this.db.prepare('DELETE FROM todos WHERE id = ?').run(id);
    } catch (error) {
      throw wrapSQLiteError(error, 'delete');
    }
  }

  // Delete everything. With a plain INTEGER PRIMARY KEY the next id starts at 1 again.
  pruneTodos(): void {
    try {
      this.db.prepare('DELETE FROM todos').run();
    } catch (error) {
      throw wrapSQLiteError(error, 'prune');
    }
  }

  // Get todo by ID
  getTodo(id: number): Todo | null {
    let row: TodoRow | undefined;
    try {
      row = this.db.prepare('SELECT id, date, text, priority FROM todos WHERE id = ?').get(id) as TodoRow | undefined;
    } catch (error) {
      throw wrapSQLiteError(error, 'get');
    }
    return row ? this.rowToTodo(row) : null;
  }

  // List todos: one query, then priority re-bucketing unless chronological
  listTodos(options: ListOptions = {}): Todo[] {
    const { sql, params } = buildListQuery(options);
    let rows: TodoRow[];
    try {
      rows = this.db.prepare(sql).all(...params) as TodoRow[];
    } catch (error) {
      throw wrapSQLiteError(error, 'list');
    }
    return arrangeTodos(rows.map(row => this.rowToTodo(row)), options);
  }

  private rowToTodo(row: TodoRow): Todo {
    const date = DateTime.fromISO(row.date, { setZone: true });
    if (!date.isValid) {
      throw new CltodoError('CORRUPTED_DATE', `Stored date '${row.date}' of todo #${row.id} is not a timestamp`, {
        id: row.id,
        date: row.date,
      });
    }

    return {
      id: row.id,
      date,
      text: row.text,
      priority: priorityFromTag(row.priority, row.id),
    };
  }

  close(): void {
    this.db.close();
  }
}
