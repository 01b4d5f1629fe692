import type { Env, PluginConfig } from '../config.js';
import type { AskFn } from '../prompt.js';
import type { VersionManager } from '../version-manager.js';
import type { HookList } from '../types.js';

/** What every command needs, built once in index.ts */
export interface CliContext {
  version: string;
  config: PluginConfig;
  vm: VersionManager;
  env: Env;
  ask?: AskFn;
  loadHooks?: (vm: VersionManager) => HookList;
}
