/**
 * In-memory command log.
 *
 * A bounded ring of human-readable lines recording every control action and
 * sync attempt, e.g. `[2024-03-01 14:02:11] Sync: DDR 1 => 2m 05.00s`.
 * Nothing is persisted; the log starts empty on every run.
 */

import { EventEmitter } from 'node:events';

// ============================================================================
// Types
// ============================================================================

export type CommandKind =
  | 'IN'
  | 'OUT'
  | 'SET'
  | 'TIMECONTROL'
  | 'Control PATCH'
  | 'Registry'
  | 'Sync'
  | 'Timer'
  | 'TriCaster';

export interface CommandLogEvents {
  entry: (line: string) => void;
}

export const DEFAULT_COMMAND_LOG_SIZE = 200;

// ============================================================================
// Command Log
// ============================================================================

export class CommandLog extends EventEmitter {
  private readonly capacity: number;
  private readonly now: () => Date;
  private lines: string[] = [];

  constructor(capacity: number = DEFAULT_COMMAND_LOG_SIZE, now: () => Date = () => new Date()) {
    super();
    this.capacity = Math.max(1, capacity);
    this.now = now;
  }

  override on<K extends keyof CommandLogEvents>(event: K, listener: CommandLogEvents[K]): this {
    return super.on(event, listener);
  }

  override emit<K extends keyof CommandLogEvents>(
    event: K,
    ...args: Parameters<CommandLogEvents[K]>
  ): boolean {
    return super.emit(event, ...args);
  }

  /**
   * Append a line, dropping the oldest once full.
   */
  record(kind: CommandKind, detail: string): string {
    const line = `[${formatTimestamp(this.now())}] ${kind}: ${detail}`;
    this.lines.push(line);
    if (this.lines.length > this.capacity) {
      this.lines = this.lines.slice(this.lines.length - this.capacity);
    }
    this.emit('entry', line);
    return line;
  }

  /**
   * The newest `count` lines, oldest first.
   */
  recent(count = 100): string[] {
    return count <= 0 ? [] : this.lines.slice(-count);
  }

  clear(): void {
    this.lines = [];
  }

  get size(): number {
    return this.lines.length;
  }
}

/**
 * Local time as `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
