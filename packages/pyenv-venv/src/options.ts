/**
 * Option parsing for the virtualenv command.
 *
 * Flags are not validated here: anything the plugin does not recognise is
 * forwarded verbatim to the backend tool.
 */

import { UsageError } from './errors.js';

export interface ParsedOptions {
  readonly options: readonly string[];
  readonly args: readonly string[];
}

export interface VirtualenvFlags {
  force: boolean;
  upgrade: boolean;
  quiet: boolean;
  verbose: boolean;
  help: boolean;
  version: boolean;
  /** Options forwarded to the backend, already prefixed with dashes */
  passThrough: string[];
  /** Positional arguments left after `-p` took its value */
  args: string[];
}

/**
 * Split raw tokens into flag names and positional arguments.
 * `-xyz` yields x, y, z; `--name` yields name; `--` ends option parsing.
 */
export function parseOptions(tokens: readonly string[]): ParsedOptions {
  const options: string[] = [];
  const args: string[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (token === '--') {
      args.push(...tokens.slice(i + 1));
      break;
    }
    if (token.startsWith('--')) {
      options.push(token.slice(2));
    } else if (token.length > 1 && token.startsWith('-')) {
      options.push(...token.slice(1).split(''));
    } else {
      args.push(token);
    }
  }

  return Object.freeze({ options: Object.freeze(options), args: Object.freeze(args) });
}

export function interpretOptions(parsed: ParsedOptions): VirtualenvFlags {
  const flags: VirtualenvFlags = {
    force: false,
    upgrade: false,
    quiet: false,
    verbose: false,
    help: false,
    version: false,
    passThrough: [],
    args: [...parsed.args],
  };

  for (const option of parsed.options) {
    switch (option) {
      case 'f':
      case 'force':
        flags.force = true;
        break;
      case 'u':
      case 'upgrade':
        flags.upgrade = true;
        break;
      case 'q':
      case 'quiet':
        flags.quiet = true;
        break;
      case 'v':
      case 'verbose':
        flags.verbose = true;
        break;
      case 'h':
      case 'help':
        flags.help = true;
        break;
      case 'version':
        flags.version = true;
        break;
      case 'p':
      case 'python': {
        const python = flags.args.shift();
        if (python === undefined) {
          throw new UsageError('option -p requires a python executable.');
        }
        flags.passThrough.push(`--python=${python}`);
        break;
      }
      default:
        flags.passThrough.push(option.length === 1 ? `-${option}` : `--${option}`);
    }
  }

  return flags;
}
