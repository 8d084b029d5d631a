import { type Logger, type NameService, type Timespec, createConsoleLogger } from '@execmon/logevt';
import type { RecordWriter } from '@execmon/logfmt';

/** Process-level collaborators of the commands, replaceable in tests. */
export interface CliIo {
  /** Receives encoded records. */
  stdout: RecordWriter;
  /** Diagnostics; `debug` selects the level when not supplied. */
  logger?: Logger;
  nameService?: NameService;
  now?: () => Timespec;
}

export function defaultIo(): CliIo {
  return { stdout: process.stdout };
}

export function loggerFor(io: CliIo, debug: boolean): Logger {
  return io.logger ?? createConsoleLogger(debug ? 'debug' : 'info');
}

export function currentTime(): Timespec {
  const ms = Date.now();
  return { sec: Math.floor(ms / 1000), nsec: (ms % 1000) * 1_000_000 };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
