import type { RecordSink, SinkCall } from './sink.js';
import { SinkProtocol } from './sink-protocol.js';
import type { Timespec } from './types.js';

/**
 * Sink that keeps the raw call sequence of every record. Useful wherever the
 * exact sink interaction matters more than an encoding.
 */
export class RecordingSink implements RecordSink {
  readonly calls: SinkCall[] = [];
  readonly records: SinkCall[][] = [];

  private readonly protocol = new SinkProtocol();
  private current: SinkCall[] = [];

  recordBegin(): void {
    this.protocol.recordBegin();
    this.current = [];
    this.push({ op: 'recordBegin' });
  }

  recordEnd(): void {
    this.protocol.recordEnd();
    this.push({ op: 'recordEnd' });
    this.records.push(this.current);
    this.current = [];
  }

  dictBegin(): void {
    this.protocol.open('dict', 'dictBegin');
    this.push({ op: 'dictBegin' });
  }

  dictEnd(): void {
    this.protocol.close('dict', 'dictEnd');
    this.push({ op: 'dictEnd' });
  }

  dictItem(key: string): void {
    this.protocol.item('dict', 'dictItem');
    this.push({ op: 'dictItem', arg: key });
  }

  listBegin(): void {
    this.protocol.open('list', 'listBegin');
    this.push({ op: 'listBegin' });
  }

  listEnd(): void {
    this.protocol.close('list', 'listEnd');
    this.push({ op: 'listEnd' });
  }

  listItem(label: string): void {
    this.protocol.item('list', 'listItem');
    this.push({ op: 'listItem', arg: label });
  }

  valueString(value: string): void {
    this.protocol.value('valueString');
    this.push({ op: 'valueString', arg: value });
  }

  valueInt(value: number): void {
    this.protocol.value('valueInt');
    this.push({ op: 'valueInt', arg: value });
  }

  valueUint(value: number): void {
    this.protocol.value('valueUint');
    this.push({ op: 'valueUint', arg: value });
  }

  valueUintOct(value: number): void {
    this.protocol.value('valueUintOct');
    this.push({ op: 'valueUintOct', arg: value });
  }

  valueBool(value: boolean): void {
    this.protocol.value('valueBool');
    this.push({ op: 'valueBool', arg: value });
  }

  valueNull(): void {
    this.protocol.value('valueNull');
    this.push({ op: 'valueNull' });
  }

  valueTimespec(value: Timespec): void {
    this.protocol.value('valueTimespec');
    this.push({ op: 'valueTimespec', arg: { sec: value.sec, nsec: value.nsec } });
  }

  valueBufHex(value: Uint8Array): void {
    this.protocol.value('valueBufHex');
    this.push({ op: 'valueBufHex', arg: Uint8Array.from(value) });
  }

  valueTtyDev(dev: number): void {
    this.protocol.value('valueTtyDev');
    this.push({ op: 'valueTtyDev', arg: dev });
  }

  /** Keys emitted directly inside the top-level dict of record `index`, in order. */
  topLevelKeys(index = 0): string[] {
    const record = this.records[index] ?? [];
    const keys: string[] = [];
    let depth = 0;
    for (const call of record) {
      switch (call.op) {
        case 'dictBegin':
        case 'listBegin':
          depth++;
          break;
        case 'dictEnd':
        case 'listEnd':
          depth--;
          break;
        case 'dictItem':
          if (depth === 1) {
            keys.push(call.arg);
          }
          break;
        default:
          break;
      }
    }
    return keys;
  }

  private push(call: SinkCall): void {
    this.current.push(call);
    this.calls.push(call);
  }
}
