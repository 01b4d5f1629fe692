/**
 * Shared types for the virtualenv pipeline.
 */

import type { Backend } from './backends/types.js';
import type { Env, PluginConfig } from './config.js';
import type { UpgradeSnapshot } from './migrate.js';
import type { VirtualenvFlags } from './options.js';

export interface TargetEnvironment {
  name: string;
  /** `<root>/versions/<name>` */
  path: string;
  /** Recorded before anything is touched; gates cleanup on failure */
  preexisting: boolean;
}

export type HookPhase = 'before' | 'after';

/**
 * A plugin-contributed step run before or after the backend.
 * Hooks get the live context and may change `env`, `options` or `status`.
 */
export interface Hook {
  readonly name: string;
  run(ctx: RunContext): void;
}

export interface HookList {
  before: Hook[];
  after: Hook[];
}

export interface RunContext {
  readonly config: PluginConfig;
  readonly flags: VirtualenvFlags;
  readonly sourceVersion: string;
  readonly target: TargetEnvironment;
  readonly backend: Backend;
  /** Options handed to the backend, already filtered by its capabilities */
  options: string[];
  hooks: HookList;
  /** Environment of every child process started for this run */
  env: Env;
  /** Exit status of the backend, then of the migration */
  status: number;
  snapshot: UpgradeSnapshot | null;
}
