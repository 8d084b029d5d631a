import { ENGINE_VERSION } from '@execmon/logevt';
import { Command } from 'commander';

import { configCommands } from './commands/config.js';
import { renderCommands } from './commands/render.js';
import { type CliIo, defaultIo } from './io.js';

export { DescriptorDecodeError, decodeDescriptor, decodeDescriptors } from './descriptor.js';
export type { CliIo } from './io.js';
export { configCommands } from './commands/config.js';
export { renderCommands } from './commands/render.js';

export function createCli(io: CliIo = defaultIo()): Command {
  const program = new Command();
  program
    .name('execmon')
    .description('Render security event descriptors as versioned records')
    .version(ENGINE_VERSION);

  const config = configCommands(io);
  const render = renderCommands(io);

  const configCmd = program.command('config').description('Configuration management');

  configCmd
    .command('lint <file>')
    .description('Validate a configuration file')
    .action((file: string) => config.lint(file));

  configCmd
    .command('show <file>')
    .option('-f, --format <format>', 'Record format (json, yaml)')
    .option('--oneline', 'One JSON record per line')
    .description('Write the startup record for a configuration file')
    .action((file: string, options: { format?: string; oneline?: boolean }) => config.show(file, options));

  program
    .command('render <event-file>')
    .option('-c, --config <path>', 'Configuration file path')
    .option('-f, --format <format>', 'Record format (json, yaml)')
    .option('--oneline', 'One JSON record per line')
    .description('Render a JSON file of event descriptors as records')
    .action((eventFile: string, options: { config?: string; format?: string; oneline?: boolean }) =>
      render.render(eventFile, options),
    );

  return program;
}
