import { Command } from 'commander';
import { virtualenvPrefix } from '../environments.js';
import { exitCodeOf } from '../errors.js';
import { error } from '../ui.js';
import type { CliContext } from './context.js';

export function registerVirtualenvPrefixCommand(program: Command, cli: CliContext): void {
  program
    .command('virtualenv-prefix [virtualenv]')
    .description('Display the prefix of the interpreter a virtualenv was created from')
    .action((name?: string) => {
      try {
        const target = name ?? cli.vm.currentVersion();
        console.log(virtualenvPrefix(cli.config.versionsDir, target));
      } catch (err) {
        error(err instanceof Error ? err.message : String(err));
        process.exit(exitCodeOf(err));
      }
    });
}
