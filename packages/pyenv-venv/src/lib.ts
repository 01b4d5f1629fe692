/**
 * Programmatic API: run the virtualenv pipeline with your own version
 * manager, prompt or hooks.
 */

export { loadConfig, childEnv, type Env, type PluginConfig } from './config.js';
export { parseOptions, interpretOptions, type ParsedOptions, type VirtualenvFlags } from './options.js';
export { PyenvVersionManager, type VersionManager, type ExecOptions, type ExecResult } from './version-manager.js';
export {
  createBackend,
  detectBackend,
  installVirtualenv,
  PyvenvBackend,
  VirtualenvBackend,
  type Backend,
  type BackendKind,
  type CreateOptions,
} from './backends/index.js';
export { runVirtualenv, resolveTarget, prepareBackend, type PipelineDeps } from './pipeline.js';
export { snapshot, replay, makeSeed, type UpgradeSnapshot } from './migrate.js';
export { addHook, emptyHooks, loadShellHooks, shellFragmentHook } from './hooks.js';
export { CreationGuard, acquireCreationGuard } from './guard.js';
export { emitDeactivate, shellFamily, type ShellFamily } from './deactivate.js';
export { listVirtualenvs, virtualenvPrefix, deleteVirtualenv, type VirtualenvInfo } from './environments.js';
export { buildProgram } from './program.js';
export * from './errors.js';
export type { Hook, HookList, HookPhase, RunContext, TargetEnvironment } from './types.js';
