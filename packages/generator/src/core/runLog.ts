/**
 * Run activity log: in-memory ring buffer for progress and diagnostics
 *
 * Appends to the buffer AND mirrors to the console: progress on stdout,
 * warnings and errors on stderr. The buffer is queryable after a run.
 */

export type LogLevel = 'info' | 'warn' | 'error';

export type LogComponent = 'generator' | 'tree' | 'checkpoint' | 'config';

export interface LogEntry {
  ts: number;
  component: LogComponent;
  message: string;
  level: LogLevel;
}

const MAX_ENTRIES = 500;
const buffer: LogEntry[] = [];

/**
 * Log a message to the ring buffer and the console.
 */
export function runLog(component: LogComponent, message: string, level: LogLevel = 'info'): void {
  const entry: LogEntry = {
    ts: Date.now(),
    component,
    message,
    level,
  };

  buffer.push(entry);
  if (buffer.length > MAX_ENTRIES) {
    buffer.shift();
  }

  if (level === 'info') {
    console.log(`[TreeForge] [${component}] ${message}`);
  } else {
    const prefix = level === 'error' ? '[TreeForge] ERROR' : '[TreeForge] WARN';
    console.error(`${prefix} [${component}] ${message}`);
  }
}

/**
 * Query the log buffer with optional filters.
 */
export function getRunLog(options: {
  since?: number;
  component?: LogComponent;
  level?: LogLevel;
  limit?: number;
} = {}): LogEntry[] {
  const { since, component, level, limit = 100 } = options;

  let entries = buffer;

  if (since) {
    entries = entries.filter(e => e.ts > since);
  }

  if (component) {
    entries = entries.filter(e => e.component === component);
  }

  if (level) {
    entries = entries.filter(e => e.level === level);
  }

  // Most recent entries (tail of buffer)
  if (entries.length > limit) {
    entries = entries.slice(-limit);
  }

  return [...entries];
}

export function clearRunLog(): void {
  buffer.length = 0;
}
