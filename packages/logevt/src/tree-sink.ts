import { SinkProtocolError } from './errors.js';
import type { RecordSink } from './sink.js';
import { SinkProtocol } from './sink-protocol.js';
import type { Timespec } from './types.js';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/** Maps the typed sink values that JSON has no native form for. */
export interface ValueRenderer {
  timespec(value: Timespec): JsonValue;
  octal(value: number): JsonValue;
  hex(value: Uint8Array): JsonValue;
  ttyDev(dev: number): JsonValue;
}

export function formatTimespec(value: Timespec): string {
  const whole = new Date(value.sec * 1000).toISOString().slice(0, 19);
  return `${whole}.${String(value.nsec).padStart(9, '0')}Z`;
}

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

export function formatTtyDev(dev: number): string {
  const major = (dev >>> 24) & 0xff;
  const minor = dev & 0xffffff;
  return `${major},${minor}`;
}

export const defaultValueRenderer: ValueRenderer = {
  timespec: formatTimespec,
  octal: (value) => value.toString(8),
  hex: toHex,
  ttyDev: formatTtyDev,
};

type Frame = { kind: 'dict'; value: JsonObject; key: string | null } | { kind: 'list'; value: JsonValue[] };

/**
 * Builds one plain value tree per record and hands it to {@link emit} at
 * `recordEnd`. Nothing reaches the subclass for a record that never ends.
 */
export abstract class TreeSink implements RecordSink {
  protected readonly renderer: ValueRenderer;

  private readonly protocol = new SinkProtocol();
  private frames: Frame[] = [];
  private root: JsonValue | undefined;

  constructor(renderer: ValueRenderer = defaultValueRenderer) {
    this.renderer = renderer;
  }

  protected abstract emit(record: JsonValue): void;

  recordBegin(): void {
    this.protocol.recordBegin();
    this.frames = [];
    this.root = undefined;
  }

  recordEnd(): void {
    this.protocol.recordEnd();
    const record = this.root;
    this.root = undefined;
    if (record === undefined) {
      throw new SinkProtocolError('recordEnd', 'record has no body');
    }
    this.emit(record);
  }

  dictBegin(): void {
    this.protocol.open('dict', 'dictBegin');
    const value: JsonObject = {};
    this.place(value);
    this.frames.push({ kind: 'dict', value, key: null });
  }

  dictEnd(): void {
    this.protocol.close('dict', 'dictEnd');
    this.frames.pop();
  }

  dictItem(key: string): void {
    this.protocol.item('dict', 'dictItem');
    const top = this.frames[this.frames.length - 1];
    if (top?.kind === 'dict') {
      top.key = key;
    }
  }

  listBegin(): void {
    this.protocol.open('list', 'listBegin');
    const value: JsonValue[] = [];
    this.place(value);
    this.frames.push({ kind: 'list', value });
  }

  listEnd(): void {
    this.protocol.close('list', 'listEnd');
    this.frames.pop();
  }

  listItem(_label: string): void {
    this.protocol.item('list', 'listItem');
  }

  valueString(value: string): void {
    this.protocol.value('valueString');
    this.place(value);
  }

  valueInt(value: number): void {
    this.protocol.value('valueInt');
    this.place(value);
  }

  valueUint(value: number): void {
    this.protocol.value('valueUint');
    this.place(value);
  }

  valueUintOct(value: number): void {
    this.protocol.value('valueUintOct');
    this.place(this.renderer.octal(value));
  }

  valueBool(value: boolean): void {
    this.protocol.value('valueBool');
    this.place(value);
  }

  valueNull(): void {
    this.protocol.value('valueNull');
    this.place(null);
  }

  valueTimespec(value: Timespec): void {
    this.protocol.value('valueTimespec');
    this.place(this.renderer.timespec(value));
  }

  valueBufHex(value: Uint8Array): void {
    this.protocol.value('valueBufHex');
    this.place(this.renderer.hex(value));
  }

  valueTtyDev(dev: number): void {
    this.protocol.value('valueTtyDev');
    this.place(this.renderer.ttyDev(dev));
  }

  private place(value: JsonValue): void {
    const top = this.frames[this.frames.length - 1];
    if (!top) {
      this.root = value;
      return;
    }
    if (top.kind === 'list') {
      top.value.push(value);
      return;
    }
    if (top.key !== null) {
      top.value[top.key] = value;
      top.key = null;
    }
  }
}

/** Keeps every finished record tree in memory. */
export class CollectingSink extends TreeSink {
  readonly records: JsonValue[] = [];

  protected emit(record: JsonValue): void {
    this.records.push(record);
  }
}
