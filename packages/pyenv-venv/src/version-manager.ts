/**
 * Adapter over the host version manager (pyenv).
 *
 * Everything the plugin needs from pyenv goes through the VersionManager
 * interface so the pipeline can run against a fake in tests.
 */

import { spawnSync } from 'child_process';
import * as os from 'os';
import { childEnv, type Env } from './config.js';
import { debug } from './ui.js';

export interface ExecOptions {
  cwd?: string;
  /** Replaces the adapter's base environment for this child */
  env?: Env;
  /** Capture stdout instead of inheriting the terminal */
  capture?: boolean;
}

export interface ExecResult {
  status: number;
  stdout: string;
}

export interface VersionManager {
  /** Name of the version selected by `pyenv version-name` */
  currentVersion(): string;
  /** Installation prefix of a version, or null if it is not installed */
  prefix(version: string): string | null;
  /** Whether `command` can be located while running under `version` */
  which(command: string, version: string): boolean;
  /** Run a command under `version` through `pyenv exec` */
  exec(version: string, argv: string[], options?: ExecOptions): ExecResult;
  /** Hook scripts contributed by other plugins for a pyenv command */
  hookScripts(command: string): string[];
  rehash(): void;
  /** Installed versions, bare names */
  versions(): string[];
}

export class PyenvVersionManager implements VersionManager {
  constructor(
    private readonly env: Env = process.env,
    private readonly command = 'pyenv',
  ) {}

  currentVersion(): string {
    const result = this.run(['version-name'], this.env);
    if (result.status !== 0) {
      throw new Error('pyenv version-name failed');
    }
    return firstLine(result.stdout);
  }

  prefix(version: string): string | null {
    const result = this.run(['prefix', version], this.env);
    return result.status === 0 ? firstLine(result.stdout) : null;
  }

  which(command: string, version: string): boolean {
    return this.run(['which', command], childEnv(this.env, version)).status === 0;
  }

  exec(version: string, argv: string[], options: ExecOptions = {}): ExecResult {
    const env = childEnv(options.env ?? this.env, version);
    return this.run(['exec', ...argv], env, options.cwd, options.capture !== true);
  }

  hookScripts(command: string): string[] {
    const result = this.run(['hooks', command], this.env);
    if (result.status !== 0) return [];
    return lines(result.stdout);
  }

  rehash(): void {
    this.run(['rehash'], this.env, undefined, true);
  }

  versions(): string[] {
    const result = this.run(['versions', '--bare'], this.env);
    return result.status === 0 ? lines(result.stdout) : [];
  }

  private run(args: string[], env: Env, cwd?: string, inherit = false): ExecResult {
    debug(`${this.command} ${args.join(' ')}${cwd ? ` (in ${cwd})` : ''}`);
    const result = spawnSync(this.command, args, {
      cwd,
      env,
      encoding: 'utf-8',
      stdio: inherit ? 'inherit' : ['ignore', 'pipe', 'pipe'],
    });
    if (result.error) {
      debug(`${this.command} could not be started: ${result.error.message}`);
      return { status: 127, stdout: '' };
    }
    return { status: exitStatus(result.status, result.signal), stdout: result.stdout ?? '' };
  }
}

/** Shell convention: a child killed by a signal exits with 128 + its number. */
export function exitStatus(status: number | null, signal: NodeJS.Signals | null): number {
  if (status !== null) return status;
  if (signal !== null) {
    const code: number | undefined = os.constants.signals[signal];
    if (code !== undefined) return 128 + code;
  }
  return 1;
}

function lines(output: string): string[] {
  return output
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}

function firstLine(output: string): string {
  return lines(output)[0] ?? '';
}
