import { describe, expect, it } from 'vitest';

import { SinkProtocolError } from './errors.js';
import { RecordingSink } from './recording-sink.js';
import { CollectingSink, formatTimespec, formatTtyDev, toHex } from './tree-sink.js';

describe('value rendering', () => {
  it('formats timestamps with nanoseconds', () => {
    expect(formatTimespec({ sec: 0, nsec: 0 })).toBe('1970-01-01T00:00:00.000000000Z');
    expect(formatTimespec({ sec: 1700000000, nsec: 123456789 })).toBe('2023-11-14T22:13:20.123456789Z');
  });

  it('formats buffers as lowercase hex', () => {
    expect(toHex(Uint8Array.from([0x00, 0xab, 0x0f]))).toBe('00ab0f');
  });

  it('splits a device number into major and minor', () => {
    expect(formatTtyDev((16 << 24) | 2)).toBe('16,2');
  });
});

describe('CollectingSink', () => {
  it('builds nested records', () => {
    const sink = new CollectingSink();
    sink.recordBegin();
    sink.dictBegin();
    sink.dictItem('mode');
    sink.valueUintOct(0o644);
    sink.dictItem('tags');
    sink.listBegin();
    sink.listItem('tag');
    sink.valueString('a');
    sink.listItem('tag');
    sink.valueNull();
    sink.listEnd();
    sink.dictItem('digest');
    sink.valueBufHex(Uint8Array.from([1, 2]));
    sink.dictEnd();
    sink.recordEnd();

    expect(sink.records).toEqual([{ mode: '644', tags: ['a', null], digest: '0102' }]);
  });

  it('accepts several records in a row', () => {
    const sink = new CollectingSink();
    for (const n of [1, 2]) {
      sink.recordBegin();
      sink.dictBegin();
      sink.dictItem('n');
      sink.valueInt(n);
      sink.dictEnd();
      sink.recordEnd();
    }
    expect(sink.records).toEqual([{ n: 1 }, { n: 2 }]);
  });
});

describe('sink protocol', () => {
  it('rejects a value without a key', () => {
    const sink = new RecordingSink();
    sink.recordBegin();
    sink.dictBegin();
    expect(() => sink.valueInt(1)).toThrow(SinkProtocolError);
  });

  it('rejects a key without a value', () => {
    const sink = new RecordingSink();
    sink.recordBegin();
    sink.dictBegin();
    sink.dictItem('a');
    expect(() => sink.dictEnd()).toThrow('dictEnd: item has no value');
  });

  it('rejects mismatched blocks', () => {
    const sink = new RecordingSink();
    sink.recordBegin();
    sink.dictBegin();
    expect(() => sink.listEnd()).toThrow('listEnd: no open list');
  });

  it('rejects unclosed blocks', () => {
    const sink = new RecordingSink();
    sink.recordBegin();
    sink.dictBegin();
    expect(() => sink.recordEnd()).toThrow('recordEnd: 1 unclosed block(s)');
  });

  it('drops an abandoned record when the next one begins', () => {
    const sink = new CollectingSink();
    sink.recordBegin();
    sink.dictBegin();
    sink.dictItem('partial');
    sink.listBegin();

    sink.recordBegin();
    sink.dictBegin();
    sink.dictItem('n');
    sink.valueInt(2);
    sink.dictEnd();
    sink.recordEnd();

    expect(sink.records).toEqual([{ n: 2 }]);
  });

  it('rejects values outside a record', () => {
    expect(() => new CollectingSink().valueString('x')).toThrow('valueString: no open record');
  });
});
