import { type JsonValue, TreeSink, type ValueRenderer } from '@execmon/logevt';

/** Anything that takes text chunks, such as `process.stdout` or a file stream. */
export interface RecordWriter {
  write(chunk: string): unknown;
}

export interface EncodedSinkOptions {
  writer: RecordWriter;
  renderer?: ValueRenderer;
}

/**
 * Encodes each finished record tree and passes it to the writer in a single
 * `write` call. A record that fails halfway leaves the writer untouched.
 */
export abstract class EncodedSink extends TreeSink {
  protected readonly writer: RecordWriter;
  private written = 0;

  constructor(options: EncodedSinkOptions) {
    super(options.renderer);
    this.writer = options.writer;
  }

  /** Number of records handed to the writer so far. */
  get recordCount(): number {
    return this.written;
  }

  protected abstract encode(record: JsonValue): string;

  protected emit(record: JsonValue): void {
    this.writer.write(this.encode(record));
    this.written++;
  }
}

/** Writer that keeps everything in memory. */
export class StringWriter implements RecordWriter {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }
}
