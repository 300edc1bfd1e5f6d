import { Command } from 'commander';
import { TodoDatabase } from './db.js';
import { CltodoError } from './errors.js';
import { parseListArgs } from './list.js';
import { parsePriority, PRIORITIES } from './priority.js';
import { FsStorageLocator, prepareStore, resolveStore, type StorageLocator } from './location.js';
import { expandPath, loadConfig, type CliConfig } from './config.js';
import type { ListArgs } from './types.js';
import {
  renderTodoList,
  renderTodo,
  renderSuccess,
  renderError,
  renderNotice,
  type OutputFormat
} from './render.js';

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
  exit: (code: number) => void;
}

export interface CliDeps {
  io?: CliIO;
  locator?: StorageLocator;
  config?: CliConfig;
}

type GlobalOptions = {
  global?: boolean;
  db?: string;
};

interface JsonOption {
  json?: boolean;
}

interface AddOptions extends JsonOption {
  priority: string;
}

interface GetOptions extends ListArgs, JsonOption {
  extended?: boolean;
}

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
  exit: (code) => process.exit(code),
};

// Parse a positional todo id
export function parseId(value: string): number {
  const trimmed = value.trim().replace(/^#/, '');
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(Number(trimmed))) {
    throw new CltodoError('INVALID_ID', `Invalid todo id '${value}'`, { value });
  }
  return Number(trimmed);
}

export function createProgram(deps: CliDeps = {}): Command {
  const io = deps.io ?? consoleIO;
  const locator = deps.locator ?? new FsStorageLocator();
  const config = deps.config ?? loadConfig();

  const program = new Command();

  // Open the store for this invocation, announcing it when the file is new
  function openDb(format: OutputFormat): TodoDatabase {
    const opts = program.opts<GlobalOptions>();
    const explicitPath = opts.db ? expandPath(opts.db) : config.dbPath;
    const store = explicitPath
      ? prepareStore(explicitPath)
      : resolveStore(locator, opts.global ? 'global' : config.defaultScope);

    const db = new TodoDatabase(store.dbPath);
    if (store.created) {
      const notice = renderNotice(`Created new todo store at ${store.dbPath}`);
      if (format === 'json') io.err(notice);
      else io.out(notice);
    }
    return db;
  }

  /*
   * Validate, then connect, act, disconnect. Input errors are reported before
   * the store is opened; every failure ends in a diagnostic and exit status 1.
   */
  function execute<T>(format: OutputFormat, validate: () => T, action: (db: TodoDatabase, input: T) => string): void {
    let db: TodoDatabase | null = null;
    let output: string;
    try {
      const input = validate();
      db = openDb(format);
      output = action(db, input);
    } catch (error) {
      db?.close();
      io.err(renderError(error, format, { debug: config.debug }));
      io.exit(1);
      return;
    }
    db.close();
    io.out(output);
    io.exit(0);
  }

  const formatOf = (options: JsonOption): OutputFormat => (options.json ? 'json' : 'text');

  program
    .name('cltodo')
    .description('Personal todo list, scoped to the current git project or your home directory')
    .version('0.1.0')
    .option('-g, --global', 'Use the global store in ~/.cltodo instead of the project store')
    .option('--db <path>', 'Database path (default: <git root>/.cltodo/data.db, or $CLTODO_DB_PATH)')
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    })
    .exitOverride((err) => {
      io.exit(err.exitCode);
      throw err;
    })
    .addHelpText('after', `
EXAMPLES:
  cltodo add "Fix the login bug" --priority critical
  cltodo get                                  # everything, critical first
  cltodo get --from 2024-01-01 --to 2024-01-31
  cltodo get --chronological --reversed       # oldest first, ignore priority
  cltodo delete 3
  cltodo --global get                         # the store in ~/.cltodo
`);

  // Add command
  program
    .command('add')
    .description('Add a new todo')
    .argument('<text>', 'Todo text')
    .requiredOption('-p, --priority <priority>', `Priority (${PRIORITIES.join('|')})`)
    .option('--json', 'Output as JSON')
    .action((text: string, options: AddOptions) => {
      const format = formatOf(options);
      execute(format, () => parsePriority(options.priority), (db, priority) => {
        const id = db.addTodo(text, priority);
        return renderSuccess(`Added: #${id}`, format, { id });
      });
    });

  // Delete command
  program
    .command('delete')
    .alias('rm')
    .description('Delete a todo by id (missing ids are ignored)')
    .argument('<id>', 'Todo id')
    .option('--json', 'Output as JSON')
    .action((idArg: string, options: JsonOption) => {
      const format = formatOf(options);
      execute(format, () => parseId(idArg), (db, id) => {
        db.deleteTodo(id);
        return renderSuccess(`Deleted: #${id}`, format, { id });
      });
    });

  // Get command
  program
    .command('get')
    .alias('ls')
    .description('List todos, critical first, newest first within each priority')
    .option('-p, --priority <priority>', `Only this priority (${PRIORITIES.join('|')})`)
    .option('--from <date>', 'Earliest date, inclusive (YYYY-MM-DD or timestamp)')
    .option('--to <date>', 'Latest date, inclusive (YYYY-MM-DD or timestamp)')
    .option('-r, --reversed', 'Oldest first')
    .option('-e, --extended', 'Show full timestamps')
    .option('-c, --chronological', 'Sort by date only, ignoring priority')
    .option('--json', 'Output as JSON')
    .action((options: GetOptions) => {
      const format = formatOf(options);
      execute(format, () => parseListArgs(options), (db, listOptions) => {
        const todos = db.listTodos(listOptions);
        return renderTodoList(todos, format, { extended: options.extended });
      });
    });

  // Show command
  program
    .command('show')
    .description('Show a single todo')
    .argument('<id>', 'Todo id')
    .option('-e, --extended', 'Show the full timestamp')
    .option('--json', 'Output as JSON')
    .action((idArg: string, options: JsonOption & { extended?: boolean }) => {
      const format = formatOf(options);
      execute(format, () => parseId(idArg), (db, id) => {
        const todo = db.getTodo(id);
        if (!todo) {
          throw new CltodoError('TODO_NOT_FOUND', `Todo not found: #${id}`, { id });
        }
        return renderTodo(todo, format, { extended: options.extended });
      });
    });

  // Prune command
  program
    .command('prune')
    .description('Delete every todo in the store')
    .option('--json', 'Output as JSON')
    .action((options: JsonOption) => {
      const format = formatOf(options);
      execute(format, () => undefined, (db) => {
        db.pruneTodos();
        return renderSuccess('Pruned all todos.', format);
      });
    });

  return program;
}
