import { readFileSync } from 'node:fs';

import { loadLogConfigFromFile, validateLogConfig } from '@execmon/config';
import { EventCode, createLogEngine, eventCodeName } from '@execmon/logevt';
import { createSink } from '@execmon/logfmt';
import { load as loadYaml } from 'js-yaml';

import { type CliIo, currentTime, errorMessage, loggerFor } from '../io.js';
import { resolveOutput } from './output.js';

export interface ConfigShowOptions {
  format?: string;
  oneline?: boolean;
}

export function configCommands(io: CliIo) {
  return {
    async lint(file: string): Promise<void> {
      try {
        const content = readFileSync(file, 'utf-8');
        const result = validateLogConfig(loadYaml(content) ?? {});

        if (result.valid) {
          console.log('Configuration is valid');
          if (result.warnings.length > 0) {
            console.log('\nWarnings:');
            result.warnings.forEach((w) => console.log(`   - ${w}`));
          }
        } else {
          console.log('Configuration validation failed:');
          result.errors.forEach((err) => console.log(`   - ${err}`));
          process.exitCode = 1;
        }
      } catch (err) {
        console.log(`Failed to read configuration file: ${errorMessage(err)}`);
        process.exitCode = 1;
      }
    },

    /** Writes the startup record the monitor would log for this configuration. */
    async show(file: string, options: ConfigShowOptions = {}): Promise<void> {
      const logger = loggerFor(io, false);
      try {
        const config = loadLogConfigFromFile(file, { onWarning: (m) => logger.warn(m) });
        const engine = createLogEngine({ config, nameService: io.nameService, logger });
        const { format, oneline } = resolveOutput(config, options);
        const sink = createSink(format, { writer: io.stdout, oneline });

        engine.ops(sink, { code: EventCode.Ops, time: (io.now ?? currentTime)(), subtype: 'config' });
        logger.debug(`wrote ${eventCodeName(EventCode.Ops)} record for ${config.path}`);
      } catch (err) {
        logger.error(`Failed to show configuration: ${errorMessage(err)}`);
        process.exitCode = 1;
      }
    },
  };
}
