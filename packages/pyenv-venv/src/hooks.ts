/**
 * Before/after hooks for the virtualenv command.
 *
 * Hooks are callbacks over the RunContext. Hook scripts published by other
 * pyenv plugins (`pyenv hooks virtualenv`) are an extension point: each script
 * is sourced by bash, registers fragments through `before_virtualenv` and
 * `after_virtualenv`, and every fragment later runs in bash with the run's
 * environment. Variables a fragment exports are carried back into the context.
 * This runs trusted plugin code with full access; it is not sandboxed.
 */

import { spawnSync } from 'child_process';
import type { Env } from './config.js';
import { exitStatus, type VersionManager } from './version-manager.js';
import type { Hook, HookList, HookPhase, RunContext } from './types.js';
import { VirtualenvError } from './errors.js';
import { debug } from './ui.js';

const SHELL = 'bash';

// Fragments and environment dumps travel over fd 3 so hook output keeps the terminal.
const COLLECT_SCRIPT = [
  'before_virtualenv() { printf "before\\0%s\\0" "$*" >&3; }',
  'after_virtualenv() { printf "after\\0%s\\0" "$*" >&3; }',
  'for script in "$@"; do source "$script" 1>&2; done',
].join('\n');

const RUN_SCRIPT = 'eval "$1"\nenv -0 >&3';

/** Variables exposed to fragments and stripped from what they hand back */
const HOOK_VARIABLES = ['VIRTUALENV_NAME', 'VIRTUALENV_PATH', 'VERSION_NAME', 'STATUS'] as const;

export function emptyHooks(): HookList {
  return { before: [], after: [] };
}

export function addHook(hooks: HookList, phase: HookPhase, hook: Hook): void {
  hooks[phase].push(hook);
}

export function runHooks(hooks: readonly Hook[], ctx: RunContext): void {
  for (const hook of hooks) {
    debug(`hook ${hook.name}`);
    hook.run(ctx);
  }
}

function fd3(output: ReadonlyArray<Buffer | string | null>): string {
  const data = output[3];
  if (data === null || data === undefined) return '';
  return typeof data === 'string' ? data : data.toString('utf-8');
}

/** Split `a\0b\0c\0` into ['a', 'b', 'c'] */
export function splitNul(data: string): string[] {
  const parts = data.split('\0');
  if (parts[parts.length - 1] === '') parts.pop();
  return parts;
}

export function parseFragments(data: string, origin: string): HookList {
  const hooks = emptyHooks();
  const parts = splitNul(data);
  for (let i = 0; i + 1 < parts.length; i += 2) {
    const phase = parts[i];
    if (phase !== 'before' && phase !== 'after') continue;
    hooks[phase].push(shellFragmentHook(parts[i + 1], `${origin} (${phase})`));
  }
  return hooks;
}

export function parseEnvDump(data: string): Env {
  const env: Env = {};
  for (const entry of splitNul(data)) {
    const eq = entry.indexOf('=');
    if (eq <= 0) continue;
    env[entry.slice(0, eq)] = entry.slice(eq + 1);
  }
  return env;
}

/**
 * A shell fragment run by bash with the context's environment. The exported
 * environment it leaves behind replaces `ctx.env`.
 */
export function shellFragmentHook(fragment: string, name: string): Hook {
  return {
    name,
    run(ctx: RunContext): void {
      const result = spawnSync(SHELL, ['-c', RUN_SCRIPT, 'pyenv-virtualenv-hook', fragment], {
        env: {
          ...ctx.env,
          VIRTUALENV_NAME: ctx.target.name,
          VIRTUALENV_PATH: ctx.target.path,
          VERSION_NAME: ctx.sourceVersion,
          STATUS: String(ctx.status),
        },
        stdio: ['inherit', 'inherit', 'inherit', 'pipe'],
      });
      if (result.error) {
        throw new VirtualenvError(`could not run hook ${name}: ${result.error.message}`);
      }
      if (result.status !== 0) {
        throw new VirtualenvError(`hook ${name} failed`, exitStatus(result.status, result.signal));
      }

      const env = parseEnvDump(fd3(result.output));
      for (const key of HOOK_VARIABLES) {
        delete env[key];
      }
      ctx.env = env;
    },
  };
}

/**
 * Collect fragments from every hook script pyenv reports for `command`.
 */
export function loadShellHooks(vm: VersionManager, command = 'virtualenv'): HookList {
  const hooks = emptyHooks();
  const scripts = vm.hookScripts(command);
  if (scripts.length === 0) return hooks;

  for (const script of scripts) {
    const result = spawnSync(SHELL, ['-c', COLLECT_SCRIPT, 'pyenv-virtualenv-hooks', script], {
      stdio: ['ignore', 'inherit', 'inherit', 'pipe'],
    });
    if (result.error || result.status !== 0) {
      throw new VirtualenvError(`could not load hook script ${script}`, result.status || 1);
    }
    const loaded = parseFragments(fd3(result.output), script);
    hooks.before.push(...loaded.before);
    hooks.after.push(...loaded.after);
  }

  debug(`loaded ${hooks.before.length} before and ${hooks.after.length} after hooks`);
  return hooks;
}
