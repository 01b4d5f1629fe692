import type { VersionManager } from '../version-manager.js';
import { debug } from '../ui.js';
import type { BackendKind } from './types.js';

export interface Detection {
  kind: BackendKind;
  /** Whether `virtualenv` itself was found */
  virtualenvInstalled: boolean;
}

/**
 * Decide which backend to use under `version`.
 *
 * pyvenv wins only when it is present and virtualenv is not. With neither
 * present the result is still virtualenv, which the installer then provides.
 */
export function detectBackend(vm: VersionManager, version: string): Detection {
  const virtualenvInstalled = vm.which('virtualenv', version);
  const pyvenvInstalled = vm.which('pyvenv', version);
  const kind: BackendKind = pyvenvInstalled && !virtualenvInstalled ? 'pyvenv' : 'virtualenv';
  debug(`virtualenv=${virtualenvInstalled} pyvenv=${pyvenvInstalled} -> ${kind}`);
  return { kind, virtualenvInstalled };
}
