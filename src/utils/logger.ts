/** 
 * Log level: `'silent'` (no output), `'info'` (info only), or `'debug'` (info and debug). 
 * */
export type LogLevel = 'silent' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'info', 'debug'];

/**
 * Simple logging utility with configurable verbosity.
 *
 * @example
 * ```typescript
 * const logger = new Logger('info');
 * logger.info('Catalog report started', { books: 5 });
 * ```
 */
export class Logger {
  /**
   * @param level - Logging level (default: `'info'`)
   */
  constructor(private readonly level: LogLevel = 'info') {}

  /**
   * Log an info message. Suppressed only when the level is `'silent'`.
   * @param msg - Message to log
   * @param meta - Optional metadata object
   */
  info(msg: string, meta?: Record<string, unknown>): void {
    if (this.level === 'silent') return;
    console.log(`[INFO] ${msg}`, meta ?? '');
  }

  /**
   * Log a debug message. Outputs only if level is `'debug'`.
   */
  debug(msg: string, meta?: Record<string, unknown>): void {
    if (this.level !== 'debug') return;
    console.log(`[DEBUG] ${msg}`, meta ?? '');
  }

  /**
   * Logs tabular data with `console.table`. Nothing is printed when the level is `'silent'`.
   *
   * @param title - Optional heading printed above the table, prefixed like other log lines.
   */
  table(data: unknown, title?: string): void {
    if (this.level === 'silent') {
      return;
    }

    if (title) {
      const prefix = this.level === 'debug' ? '[DEBUG]' : '[INFO]';
      console.log(`${prefix} ${title}`);
    }

    console.table(data);
  }
}
