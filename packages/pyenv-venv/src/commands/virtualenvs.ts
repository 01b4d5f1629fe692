/**
 * pyenv virtualenvs [--bare]
 */

import chalk from 'chalk';
import { Command } from 'commander';
import { listVirtualenvs, type VirtualenvInfo } from '../environments.js';
import { exitCodeOf } from '../errors.js';
import { error } from '../ui.js';
import type { CliContext } from './context.js';

/** `* web 3.12.1 (created from /path/bin)`; version and origin appear when pyvenv.cfg records them */
export function formatVirtualenvLine(
  env: Pick<VirtualenvInfo, 'name' | 'home' | 'pythonVersion'>,
  active: boolean,
): string {
  const marker = active ? '* ' : '  ';
  const version = env.pythonVersion ? ` ${env.pythonVersion}` : '';
  const origin = env.home ? chalk.dim(` (created from ${env.home})`) : '';
  return `${marker}${env.name}${version}${origin}`;
}

export function registerVirtualenvsCommand(program: Command, cli: CliContext): void {
  program
    .command('virtualenvs')
    .description('List all Python virtualenvs found in $PYENV_ROOT/versions/*')
    .option('--bare', 'print only the virtualenv names')
    .action((options: { bare?: boolean }) => {
      try {
        const envs = listVirtualenvs(cli.config.versionsDir);
        if (options.bare) {
          for (const env of envs) console.log(env.name);
          return;
        }

        const current = envs.length > 0 ? cli.vm.currentVersion() : '';
        for (const env of envs) {
          console.log(formatVirtualenvLine(env, env.name === current));
        }
      } catch (err) {
        error(err instanceof Error ? err.message : String(err));
        process.exit(exitCodeOf(err));
      }
    });
}
