import type { EncodedSink, EncodedSinkOptions } from './encoded-sink.js';
import { JsonSink } from './json-sink.js';
import { YamlSink } from './yaml-sink.js';

export type RecordFormat = 'json' | 'yaml';

export const RECORD_FORMATS: readonly RecordFormat[] = ['json', 'yaml'];

export function isRecordFormat(value: unknown): value is RecordFormat {
  return value === 'json' || value === 'yaml';
}

export interface CreateSinkOptions extends EncodedSinkOptions {
  /** JSON only; YAML documents are always multi-line. */
  oneline?: boolean;
}

export function createSink(format: RecordFormat, options: CreateSinkOptions): EncodedSink {
  switch (format) {
    case 'json':
      return new JsonSink(options);
    case 'yaml':
      return new YamlSink(options);
    default: {
      const exhaustive: never = format;
      return exhaustive;
    }
  }
}
