// shared/logger.ts — Logger shape used by the engine, plus sinks for the CLI

export type Logger = Pick<Console, 'log' | 'warn'>;

export interface MemoryLogger extends Logger {
  /** most recent lines, oldest first */
  lines(): string[];
}

/** Keeps the last `limit` lines in memory, e.g. for an on-screen log panel. */
export function createMemoryLogger(limit = 100): MemoryLogger {
  const buffer: string[] = [];
  const push = (...args: unknown[]): void => {
    buffer.push(args.map(String).join(' '));
    if (buffer.length > limit) buffer.splice(0, buffer.length - limit);
  };
  return {
    log: push,
    warn: push,
    lines: () => [...buffer],
  };
}

/** Everything to stderr, so stdout stays machine-readable. */
export function createStderrLogger(): Logger {
  const write = (...args: unknown[]): void => {
    process.stderr.write(args.map(String).join(' ') + '\n');
  };
  return { log: write, warn: write };
}
