import type { VersionManager } from '../version-manager.js';
import { BackendInstallError } from '../errors.js';
import { step, success } from '../ui.js';

export interface InstallOptions {
  quiet?: boolean;
  verbose?: boolean;
  /** Exact virtualenv release to install, from VIRTUALENV_VERSION */
  pin?: string | null;
}

export function virtualenvRequirement(pin?: string | null): string {
  return pin ? `virtualenv==${pin}` : 'virtualenv';
}

/**
 * Install virtualenv into `version` with pip. A failing pip is fatal.
 */
export function installVirtualenv(vm: VersionManager, version: string, options: InstallOptions = {}): void {
  const argv = ['pip', 'install'];
  if (options.quiet) argv.push('--quiet');
  if (options.verbose) argv.push('--verbose');
  argv.push(virtualenvRequirement(options.pin));

  step(`Installing ${virtualenvRequirement(options.pin)} into ${version}...`);
  const { status } = vm.exec(version, argv);
  if (status !== 0) {
    throw new BackendInstallError(status);
  }
  success(`Installed virtualenv into ${version}`);
}
