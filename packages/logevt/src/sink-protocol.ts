import { SinkProtocolError } from './errors.js';
import type { SinkOp } from './sink.js';

type Block = 'dict' | 'list';

/**
 * Tracks the nesting state of one sink and rejects call sequences that would
 * produce a malformed record. Shared by every sink shipped in this repo.
 */
export class SinkProtocol {
  private inRecord = false;
  private readonly stack: Block[] = [];
  private expectingValue = false;

  get depth(): number {
    return this.stack.length;
  }

  /** Starts a record, dropping whatever was left of a record that never ended. */
  recordBegin(): void {
    this.stack.length = 0;
    this.inRecord = true;
    this.expectingValue = true;
  }

  recordEnd(): void {
    if (!this.inRecord) {
      throw new SinkProtocolError('recordEnd', 'no open record');
    }
    if (this.stack.length > 0) {
      throw new SinkProtocolError('recordEnd', `${this.stack.length} unclosed block(s)`);
    }
    if (this.expectingValue) {
      throw new SinkProtocolError('recordEnd', 'record has no body');
    }
    this.inRecord = false;
  }

  open(block: Block, op: SinkOp): void {
    this.value(op);
    this.stack.push(block);
  }

  close(block: Block, op: SinkOp): void {
    const top = this.stack[this.stack.length - 1];
    if (top !== block) {
      throw new SinkProtocolError(op, `no open ${block}`);
    }
    if (this.expectingValue) {
      throw new SinkProtocolError(op, 'item has no value');
    }
    this.stack.pop();
  }

  item(block: Block, op: SinkOp): void {
    const top = this.stack[this.stack.length - 1];
    if (top !== block) {
      throw new SinkProtocolError(op, `not inside a ${block}`);
    }
    if (this.expectingValue) {
      throw new SinkProtocolError(op, 'previous item has no value');
    }
    this.expectingValue = true;
  }

  value(op: SinkOp): void {
    if (!this.inRecord) {
      throw new SinkProtocolError(op, 'no open record');
    }
    if (!this.expectingValue) {
      throw new SinkProtocolError(op, 'value without a preceding item');
    }
    this.expectingValue = false;
  }
}
