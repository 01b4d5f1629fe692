/**
 * The virtualenv create pipeline:
 *
 *   resolve target -> check source version -> ready backend -> load hooks
 *   -> confirm -> before hooks -> create -> (replay packages) -> after hooks
 *   -> rehash | clean up
 *
 * A backend or replay killed by SIGINT skips the after hooks and resolves
 * with 130 once the guard has cleaned up.
 *
 * Every stage works on one RunContext; nothing is kept in module state.
 */

import * as path from 'path';
import fs from 'fs-extra';
import { childEnv, type Env, type PluginConfig } from './config.js';
import type { VersionManager } from './version-manager.js';
import type { VirtualenvFlags } from './options.js';
import type { HookList, RunContext, TargetEnvironment } from './types.js';
import { createBackend, detectBackend, installVirtualenv, type Backend } from './backends/index.js';
import { ConfirmationDeclinedError, UsageError, VersionNotInstalledError } from './errors.js';
import { acquireCreationGuard, INTERRUPT_STATUS, type GuardOptions } from './guard.js';
import { emptyHooks, runHooks } from './hooks.js';
import { makeSeed, replay, reportStranded, snapshot } from './migrate.js';
import { ask as defaultAsk, isYes, type AskFn } from './prompt.js';
import { debug, success, warn } from './ui.js';

export interface PipelineDeps {
  vm: VersionManager;
  config: PluginConfig;
  ask?: AskFn;
  loadHooks?: (vm: VersionManager) => HookList;
  /** Base environment for child processes; defaults to process.env */
  env?: Env;
  now?: () => Date;
  pid?: number;
  guard?: GuardOptions;
}

export interface ResolvedTarget {
  sourceVersion: string;
  target: TargetEnvironment;
}

/**
 * One positional: the environment name, built from the active version.
 * Two or more: the first is the source version, the last (basename) the name.
 */
export function resolveTarget(flags: VirtualenvFlags, vm: VersionManager, config: PluginConfig): ResolvedTarget {
  const args = flags.args;
  if (args.length === 0) {
    throw new UsageError();
  }

  const sourceVersion = args.length === 1 ? vm.currentVersion() : args[0];
  const name = path.basename(args[args.length - 1]);
  if (!name || name === '.' || name === '..') {
    throw new UsageError(`invalid virtualenv name \`${args[args.length - 1]}'.`);
  }

  if (vm.prefix(sourceVersion) === null) {
    throw new VersionNotInstalledError(sourceVersion);
  }

  const envPath = path.join(config.versionsDir, name);
  return {
    sourceVersion,
    target: { name, path: envPath, preexisting: fs.existsSync(envPath) },
  };
}

export interface ReadyBackend {
  backend: Backend;
  options: string[];
}

/**
 * Pick the backend, install virtualenv if it is the choice and missing, and
 * reduce the pass-through options to what the backend accepts.
 */
export function prepareBackend(
  vm: VersionManager,
  config: PluginConfig,
  flags: VirtualenvFlags,
  sourceVersion: string,
): ReadyBackend {
  let detection = detectBackend(vm, sourceVersion);
  if (detection.kind === 'virtualenv' && !detection.virtualenvInstalled) {
    installVirtualenv(vm, sourceVersion, {
      quiet: flags.quiet,
      verbose: flags.verbose,
      pin: config.virtualenvPin,
    });
    detection = detectBackend(vm, sourceVersion);
  }

  const backend = createBackend(detection.kind, vm);
  const requested = [...flags.passThrough];
  if (flags.quiet) requested.push('--quiet');
  if (flags.verbose) requested.push('--verbose');
  // pyvenv upgrades in place itself; virtualenv goes through the migrator.
  if (flags.upgrade && backend.kind === 'pyvenv') requested.push('--upgrade');

  const options = requested.filter((option) => {
    const supported = backend.supportsOption(option);
    if (!supported) debug(`${backend.kind} does not take ${option}; dropped`);
    return supported;
  });

  return { backend, options };
}

export function isPopulated(target: TargetEnvironment): boolean {
  return fs.existsSync(path.join(target.path, 'bin'));
}

/**
 * Ask before installing over a populated environment, then take the upgrade
 * snapshot when one is due.
 */
export async function confirmAndSnapshot(ctx: RunContext, vm: VersionManager, deps: PipelineDeps): Promise<void> {
  const populated = isPopulated(ctx.target);

  if (populated && !ctx.flags.force) {
    warn(`${ctx.target.path} already exists`);
    const answer = await (deps.ask ?? defaultAsk)('continue with installation? (y/N) ');
    if (!isYes(answer)) {
      throw new ConfirmationDeclinedError(ctx.target.path);
    }
  }

  if (ctx.flags.upgrade && ctx.backend.kind === 'virtualenv' && populated) {
    const seed = makeSeed(deps.now ? deps.now() : new Date(), deps.pid ?? process.pid);
    ctx.snapshot = snapshot(vm, ctx.target, seed, ctx.config.tmpDir);
  }
}

/**
 * Create (or upgrade) a virtualenv. Resolves with the exit status.
 */
export async function runVirtualenv(flags: VirtualenvFlags, deps: PipelineDeps): Promise<number> {
  const { vm, config } = deps;

  const { sourceVersion, target } = resolveTarget(flags, vm, config);
  debug(`source version ${sourceVersion}, target ${target.path} (preexisting: ${target.preexisting})`);

  const { backend, options } = prepareBackend(vm, config, flags, sourceVersion);
  const hooks = deps.loadHooks ? deps.loadHooks(vm) : emptyHooks();

  const ctx: RunContext = {
    config,
    flags,
    sourceVersion,
    target,
    backend,
    options,
    hooks,
    env: childEnv(deps.env ?? process.env, sourceVersion),
    status: 0,
    snapshot: null,
  };

  await confirmAndSnapshot(ctx, vm, deps);

  const guard = acquireCreationGuard(target, deps.guard);
  let finalStatus = 1;
  try {
    runHooks(ctx.hooks.before, ctx);

    fs.ensureDirSync(config.cacheDir);
    ctx.status = backend.create(target.path, ctx.options, {
      version: sourceVersion,
      cwd: config.cacheDir,
      env: ctx.env,
    });

    if (ctx.snapshot && ctx.status !== 0) {
      reportStranded(ctx.snapshot);
    } else if (ctx.snapshot) {
      ctx.status = replay(vm, target, ctx.snapshot, {
        quiet: flags.quiet,
        verbose: flags.verbose,
        env: childEnv(ctx.env, target.name),
      });
    }

    // an interrupted backend or replay stops the run here
    if (ctx.status !== INTERRUPT_STATUS) {
      runHooks(ctx.hooks.after, ctx);
    }
    finalStatus = ctx.status;
  } finally {
    guard.settle(finalStatus);
  }

  if (finalStatus === INTERRUPT_STATUS) {
    warn(`interrupted while creating ${target.name}`);
  } else if (finalStatus === 0) {
    vm.rehash();
    success(`Created ${target.name} from ${sourceVersion} with ${backend.kind}`);
  }
  return finalStatus;
}
