import type { VersionManager } from '../version-manager.js';
import type { Backend, CreateOptions } from './types.js';

/**
 * The `virtualenv` package. Accepts every option; unknown ones are the
 * tool's to reject.
 */
export class VirtualenvBackend implements Backend {
  readonly kind = 'virtualenv' as const;

  constructor(private readonly vm: VersionManager) {}

  supportsOption(_option: string): boolean {
    return true;
  }

  create(target: string, options: readonly string[], createOptions: CreateOptions): number {
    const { status } = this.vm.exec(
      createOptions.version,
      ['virtualenv', ...options, target],
      { cwd: createOptions.cwd, env: createOptions.env },
    );
    return status;
  }
}
