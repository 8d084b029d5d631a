import type { RecordSink } from './sink.js';
import type { EventHeader } from './types.js';

/**
 * Version of the record layout. Renaming or retyping any emitted field is a
 * breaking change and bumps this number.
 */
export const RECORD_SCHEMA_VERSION = 1;

export function beginRecord(sink: RecordSink, header: EventHeader): void {
  sink.recordBegin();
  sink.dictBegin();
  sink.dictItem('version');
  sink.valueUint(RECORD_SCHEMA_VERSION);
  sink.dictItem('time');
  sink.valueTimespec(header.time);
  sink.dictItem('eventcode');
  sink.valueUint(header.code);
}

export function endRecord(sink: RecordSink): void {
  sink.dictEnd();
  sink.recordEnd();
}
