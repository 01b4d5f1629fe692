/**
 * pyenv virtualenv-delete [-f|--force] <virtualenv-name>
 */

import * as path from 'path';
import fs from 'fs-extra';
import { Command } from 'commander';
import { deleteVirtualenv } from '../environments.js';
import { ConfirmationDeclinedError, exitCodeOf, VirtualenvError } from '../errors.js';
import { ask as defaultAsk, isYes } from '../prompt.js';
import { error, success } from '../ui.js';
import type { CliContext } from './context.js';

export function registerVirtualenvDeleteCommand(program: Command, cli: CliContext): void {
  program
    .command('virtualenv-delete <virtualenv>')
    .description('Uninstall a specific Python virtualenv')
    .option('-f, --force', 'do not prompt; succeed silently if the virtualenv is missing')
    .action(async (name: string, options: { force?: boolean }) => {
      try {
        const envName = path.basename(name);
        const envPath = path.join(cli.config.versionsDir, envName);

        if (!fs.existsSync(envPath)) {
          if (options.force) return;
          throw new VirtualenvError(`virtualenv \`${envName}' not installed`);
        }

        if (!options.force) {
          const answer = await (cli.ask ?? defaultAsk)(`pyenv-virtualenv: remove ${envPath}? (y/N) `);
          if (!isYes(answer)) {
            throw new ConfirmationDeclinedError(envPath);
          }
        }

        deleteVirtualenv(cli.config.versionsDir, envName);
        cli.vm.rehash();
        success(`Removed ${envPath}`);
      } catch (err) {
        error(err instanceof Error ? err.message : String(err));
        process.exit(exitCodeOf(err));
      }
    });
}
