/**
 * pyenv virtualenv [-f|--force] [-u|--upgrade] [VIRTUALENV_OPTIONS] [version] <virtualenv-name>
 */

import { Command } from 'commander';
import { interpretOptions, parseOptions } from '../options.js';
import { runVirtualenv } from '../pipeline.js';
import { exitCodeOf, UsageError, VersionNotInstalledError } from '../errors.js';
import { error, usage } from '../ui.js';
import type { CliContext } from './context.js';

export const VIRTUALENV_USAGE = `Usage: pyenv virtualenv [-f|--force] [VIRTUALENV_OPTIONS] [version] <virtualenv-name>
       pyenv virtualenv --version
       pyenv virtualenv --help

  -u/--upgrade     Imitate the behavior of \`pyvenv --upgrade'
  -f/--force       Install even if the version appears to be installed already
  -p/--python      Interpreter the virtualenv is built with
  -q/--quiet       Pass --quiet to the backend and pip
  -v/--verbose     Pass --verbose to the backend and pip

Any other option is passed to virtualenv (or pyvenv) unchanged.
\`--' ends option parsing: later arguments are taken as the version and
name, and \`--' itself is not passed to the backend.`;

/**
 * Run `virtualenv` with raw tokens. Resolves with the exit status; errors are
 * reported on stderr, never thrown.
 */
export async function executeVirtualenv(tokens: string[], cli: CliContext): Promise<number> {
  try {
    if (tokens[0] === '--complete') {
      for (const version of cli.vm.versions()) {
        console.log(version);
      }
      return 0;
    }

    const flags = interpretOptions(parseOptions(tokens));
    if (flags.help) {
      console.log(VIRTUALENV_USAGE);
      return 0;
    }
    if (flags.version) {
      console.log(`pyenv-virtualenv ${cli.version}`);
      return 0;
    }

    return await runVirtualenv(flags, {
      vm: cli.vm,
      config: cli.config,
      env: cli.env,
      ask: cli.ask,
      loadHooks: cli.loadHooks,
    });
  } catch (err) {
    error(err instanceof Error ? err.message : String(err));
    if (err instanceof UsageError || err instanceof VersionNotInstalledError) {
      usage(VIRTUALENV_USAGE);
    }
    return exitCodeOf(err);
  }
}

export function registerVirtualenvCommand(program: Command, cli: CliContext): void {
  program
    .command('virtualenv')
    .description('Create a Python virtualenv using the pyenv-virtualenv plugin')
    .helpOption(false)
    .allowUnknownOption()
    .argument('[args...]', 'options, source version and virtualenv name')
    .action(async (tokens: string[]) => {
      const status = await executeVirtualenv(tokens, cli);
      if (status !== 0) {
        process.exit(status);
      }
    });
}
