import type { VersionManager } from '../version-manager.js';
import { PyvenvBackend } from './pyvenv.js';
import type { Backend, BackendKind } from './types.js';
import { VirtualenvBackend } from './virtualenv.js';

export { detectBackend, type Detection } from './detect.js';
export { installVirtualenv, virtualenvRequirement, type InstallOptions } from './install.js';
export { PyvenvBackend } from './pyvenv.js';
export { VirtualenvBackend } from './virtualenv.js';
export type { Backend, BackendKind, CreateOptions } from './types.js';

export function createBackend(kind: BackendKind, vm: VersionManager): Backend {
  return kind === 'pyvenv' ? new PyvenvBackend(vm) : new VirtualenvBackend(vm);
}
