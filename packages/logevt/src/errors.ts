import { type EventCode, eventCodeName } from './types.js';

/**
 * A descriptor broke a contract the producer guarantees (for example a script
 * image carrying its own signature). Callers should treat this as fatal.
 */
export class InvariantViolationError extends Error {
  readonly invariant: string;

  constructor(invariant: string, message: string) {
    super(`invariant '${invariant}' violated: ${message}`);
    this.name = 'InvariantViolationError';
    this.invariant = invariant;
  }
}

export function invariant(condition: boolean, name: string, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(name, message);
  }
}

/** Sink calls arrived in an order the sink protocol does not allow. */
export class SinkProtocolError extends Error {
  readonly op: string;

  constructor(op: string, message: string) {
    super(`${op}: ${message}`);
    this.name = 'SinkProtocolError';
    this.op = op;
  }
}

/** Writing one record failed; the sink may hold a truncated record. */
export class RecordWriteError extends Error {
  readonly code: EventCode;

  constructor(code: EventCode, options: { cause: unknown }) {
    const detail = options.cause instanceof Error ? options.cause.message : String(options.cause);
    super(`failed to write ${eventCodeName(code)} record: ${detail}`, { cause: options.cause });
    this.name = 'RecordWriteError';
    this.code = code;
  }
}
