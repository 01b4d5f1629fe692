import { Command } from 'commander';
import { emitDeactivate } from '../deactivate.js';
import type { CliContext } from './context.js';

export function registerShDeactivateCommand(program: Command, cli: CliContext): void {
  program
    .command('sh-deactivate')
    .description('Print shell code that deactivates the active virtualenv')
    .option('--shell <shell>', 'shell to emit code for (default: $PYENV_SHELL, then $SHELL)')
    .action((options: { shell?: string }) => {
      for (const line of emitDeactivate(options.shell ?? cli.config.shell)) {
        console.log(line);
      }
    });
}
