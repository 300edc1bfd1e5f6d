/**
 * render.ts - Output formatting layer
 * Separates display logic from storage logic for JSON/text dual output.
 */

import chalk from 'chalk';
import type { PriorityName, Todo } from './types.js';
import { CltodoError } from './errors.js';
import { LABEL_WIDTH, priorityLabel } from './priority.js';

export type OutputFormat = 'text' | 'json';

export interface RenderOptions {
  extended?: boolean;
}

// Semantic color helpers (auto-disabled in non-TTY, respects NO_COLOR)
const c = {
  success: chalk.green,
  error: chalk.red,
  dim: chalk.dim,
};

const PRIORITY_COLORS: Record<PriorityName, ((text: string) => string) | null> = {
  critical: chalk.red,
  important: chalk.yellow,
  normal: null,
};

export function formatDate(todo: Todo, extended: boolean = false): string {
  return extended ? todo.date.toISO() : todo.date.toISODate();
}

/**
 * Render a single todo (text format)
 */
export function renderTodoLine(todo: Todo, options: RenderOptions = {}): string {
  const label = priorityLabel(todo.priority).padStart(LABEL_WIDTH);
  const line = `#${todo.id} ${label} ${formatDate(todo, options.extended)} ${todo.text}`;
  const color = PRIORITY_COLORS[todo.priority];
  return color ? color(line) : line;
}

export function todoToJSON(todo: Todo) {
  return {
    id: todo.id,
    date: todo.date.toISO(),
    text: todo.text,
    priority: todo.priority,
  };
}

/**
 * Render a list of todos
 */
export function renderTodoList(todos: Todo[], format: OutputFormat = 'text', options: RenderOptions = {}): string {
  if (format === 'json') {
    return JSON.stringify({ todos: todos.map(todoToJSON) }, null, 2);
  }

  if (todos.length === 0) {
    return 'No results.';
  }

  return todos.map(todo => renderTodoLine(todo, options)).join('\n');
}

/**
 * Render a single todo (show command)
 */
export function renderTodo(todo: Todo, format: OutputFormat = 'text', options: RenderOptions = {}): string {
  if (format === 'json') {
    return JSON.stringify({ todo: todoToJSON(todo) }, null, 2);
  }
  return renderTodoLine(todo, options);
}

/**
 * Render success message
 */
export function renderSuccess(message: string, format: OutputFormat = 'text', data: Record<string, unknown> = {}): string {
  if (format === 'json') {
    return JSON.stringify({ success: true, message, ...data }, null, 2);
  }

  return c.success('✓') + ' ' + message;
}

/**
 * Render a store-creation or other advisory notice
 */
export function renderNotice(message: string): string {
  return c.dim(message);
}

/**
 * Render error message
 */
export function renderError(error: unknown, format: OutputFormat = 'text', options: { debug?: boolean } = {}): string {
  if (format === 'json') {
    if (error instanceof CltodoError) {
      return JSON.stringify(error.toJSON(), null, 2);
    }
    return JSON.stringify({
      error: true,
      code: 'UNKNOWN_ERROR',
      message: error instanceof Error ? error.message : String(error)
    }, null, 2);
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = error instanceof CltodoError ? c.dim(` [${error.code}]`) : '';
  let output = c.error('✗') + ' Error' + code + ': ' + message;

  if (error instanceof CltodoError && error.context) {
    for (const [key, value] of Object.entries(error.context)) {
      if (value === undefined) continue;
      output += '\n' + c.dim(`  ${key}: `) + String(value);
    }
  }

  if (error instanceof CltodoError && error.isCorruption) {
    output += '\n' + c.dim('  hint: remove the row with `cltodo delete <id>` or clear the store with `cltodo prune`');
  }

  if (options.debug && error instanceof Error && error.stack) {
    output += '\n' + c.dim(error.stack);
  }

  return output;
}
