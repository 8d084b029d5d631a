import type { Timespec } from './types.js';

/**
 * Capability set the engine drives to emit a record. Calls are order
 * sensitive: every `dictItem` is followed by exactly one value or nested
 * block, and every `*Begin` is matched by its `*End`. One implementation
 * exists per output encoding.
 */
export interface RecordSink {
  recordBegin(): void;
  recordEnd(): void;
  dictBegin(): void;
  dictEnd(): void;
  dictItem(key: string): void;
  listBegin(): void;
  listEnd(): void;
  /** Starts one list element; `label` names the element for encodings that use one. */
  listItem(label: string): void;
  valueString(value: string): void;
  valueInt(value: number): void;
  valueUint(value: number): void;
  valueUintOct(value: number): void;
  valueBool(value: boolean): void;
  valueNull(): void;
  valueTimespec(value: Timespec): void;
  valueBufHex(value: Uint8Array): void;
  valueTtyDev(dev: number): void;
}

export type SinkOp = keyof RecordSink;

export type SinkCall =
  | { op: 'recordBegin' | 'recordEnd' | 'dictBegin' | 'dictEnd' | 'listBegin' | 'listEnd' | 'valueNull' }
  | { op: 'dictItem' | 'listItem' | 'valueString'; arg: string }
  | { op: 'valueInt' | 'valueUint' | 'valueUintOct' | 'valueTtyDev'; arg: number }
  | { op: 'valueBool'; arg: boolean }
  | { op: 'valueTimespec'; arg: Timespec }
  | { op: 'valueBufHex'; arg: Uint8Array };
