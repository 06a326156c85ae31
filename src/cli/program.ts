// toolbox CLI program definition

import { Command } from 'commander';
import { registerDecodeCommand } from './commands/decode.js';
import { registerHooksCommand } from './commands/hooks.js';

export const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('toolbox')
    .description('Developer toolbox - secrets-scanning commit hooks and small utilities')
    .version(VERSION);

  registerHooksCommand(program);
  registerDecodeCommand(program);

  return program;
}
