import type { JsonValue } from '@execmon/logevt';
import { dump } from 'js-yaml';

import { EncodedSink } from './encoded-sink.js';

/** Multi-document YAML stream, one document per record. */
export class YamlSink extends EncodedSink {
  protected encode(record: JsonValue): string {
    return `---\n${dump(record, { lineWidth: -1, noRefs: true })}`;
  }
}
