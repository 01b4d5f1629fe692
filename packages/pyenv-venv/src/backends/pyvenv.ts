import type { VersionManager } from '../version-manager.js';
import { optionName, type Backend, type CreateOptions } from './types.js';

/** Options the stdlib `pyvenv` script understands */
const PYVENV_OPTIONS = new Set([
  'system-site-packages',
  'symlinks',
  'copies',
  'clear',
  'upgrade',
  'without-pip',
  'prompt',
]);

export class PyvenvBackend implements Backend {
  readonly kind = 'pyvenv' as const;

  constructor(private readonly vm: VersionManager) {}

  supportsOption(option: string): boolean {
    return PYVENV_OPTIONS.has(optionName(option));
  }

  create(target: string, options: readonly string[], createOptions: CreateOptions): number {
    const { status } = this.vm.exec(
      createOptions.version,
      ['pyvenv', ...options, target],
      { cwd: createOptions.cwd, env: createOptions.env },
    );
    return status;
  }
}
