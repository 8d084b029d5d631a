export type { EncodedSinkOptions, RecordWriter } from './encoded-sink.js';
export { EncodedSink, StringWriter } from './encoded-sink.js';
export type { JsonSinkOptions } from './json-sink.js';
export { JsonSink } from './json-sink.js';
export { YamlSink } from './yaml-sink.js';
export type { CreateSinkOptions, RecordFormat } from './create-sink.js';
export { RECORD_FORMATS, createSink, isRecordFormat } from './create-sink.js';
