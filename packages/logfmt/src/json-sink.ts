import type { JsonValue } from '@execmon/logevt';

import { EncodedSink, type EncodedSinkOptions } from './encoded-sink.js';

export interface JsonSinkOptions extends EncodedSinkOptions {
  /** One record per line instead of indented documents. */
  oneline?: boolean;
}

export class JsonSink extends EncodedSink {
  private readonly oneline: boolean;

  constructor(options: JsonSinkOptions) {
    super(options);
    this.oneline = options.oneline ?? false;
  }

  protected encode(record: JsonValue): string {
    return `${this.oneline ? JSON.stringify(record) : JSON.stringify(record, null, 2)}\n`;
  }
}
