import { readFileSync } from 'node:fs';

import { loadLogConfigFromFile } from '@execmon/config';
import { type LogConfig, createLogEngine, defaultLogConfig, eventCodeName, freezeLogConfig } from '@execmon/logevt';
import { createSink } from '@execmon/logfmt';

import { decodeDescriptors } from '../descriptor.js';
import { type CliIo, errorMessage, loggerFor } from '../io.js';
import { resolveOutput } from './output.js';

export interface RenderOptions {
  config?: string;
  format?: string;
  oneline?: boolean;
}

export function renderCommands(io: CliIo) {
  return {
    async render(eventFile: string, options: RenderOptions = {}): Promise<void> {
      let logger = loggerFor(io, false);
      try {
        let config: Readonly<LogConfig>;
        if (options.config) {
          config = loadLogConfigFromFile(options.config, { onWarning: (m) => logger.warn(m) });
          logger = loggerFor(io, config.debug);
        } else {
          config = freezeLogConfig(defaultLogConfig());
        }

        const events = decodeDescriptors(JSON.parse(readFileSync(eventFile, 'utf-8')));
        const engine = createLogEngine({ config, nameService: io.nameService, logger });
        const { format, oneline } = resolveOutput(config, options);
        const sink = createSink(format, { writer: io.stdout, oneline });

        for (const event of events) {
          if (!engine.isEnabled(event.code)) {
            logger.debug(`skipping ${eventCodeName(event.code)} event: not enabled in configuration`);
            continue;
          }
          engine.write(sink, event);
        }
        logger.debug(`wrote ${sink.recordCount} of ${events.length} records`);
      } catch (err) {
        logger.error(`Failed to render events: ${errorMessage(err)}`);
        process.exitCode = 1;
      }
    },
  };
}
