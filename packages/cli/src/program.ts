import { Command } from 'commander';
import { generateCommand } from './commands/generate.js';
import { listCommand } from './commands/list.js';
import { configCommand } from './commands/config.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('lla-docs')
    .description('Generate the LLA plugin catalogue (plugins.md)')
    .version('0.1.0');

  program.addCommand(generateCommand, { isDefault: true });
  program.addCommand(listCommand);
  program.addCommand(configCommand);

  return program;
}
