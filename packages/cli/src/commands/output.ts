import type { LogConfig } from '@execmon/logevt';
import { RECORD_FORMATS, type RecordFormat, isRecordFormat } from '@execmon/logfmt';

/** Command-line flags win over the configuration file. */
export function resolveOutput(
  config: Readonly<LogConfig>,
  options: { format?: string; oneline?: boolean },
): { format: RecordFormat; oneline: boolean } {
  const format = options.format ?? config.logfmt;
  if (!isRecordFormat(format)) {
    throw new Error(`unsupported record format: ${format} (supported: ${RECORD_FORMATS.join(', ')})`);
  }
  return { format, oneline: options.oneline ?? config.logoneline ?? false };
}
