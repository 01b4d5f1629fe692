import { Command } from 'commander';
import type { CliContext } from './commands/context.js';
import { registerVirtualenvCommand } from './commands/virtualenv.js';
import { registerVirtualenvsCommand } from './commands/virtualenvs.js';
import { registerVirtualenvPrefixCommand } from './commands/virtualenv-prefix.js';
import { registerVirtualenvDeleteCommand } from './commands/virtualenv-delete.js';
import { registerShDeactivateCommand } from './commands/sh-deactivate.js';

export function buildProgram(cli: CliContext): Command {
  const program = new Command();

  program
    .name('pyenv-venv')
    .description('pyenv plugin to manage Python virtualenvs')
    .version(cli.version)
    // options after a subcommand name belong to the subcommand (virtualenv takes --version itself)
    .enablePositionalOptions();

  registerVirtualenvCommand(program, cli);
  registerVirtualenvsCommand(program, cli);
  registerVirtualenvPrefixCommand(program, cli);
  registerVirtualenvDeleteCommand(program, cli);
  registerShDeactivateCommand(program, cli);

  return program;
}
