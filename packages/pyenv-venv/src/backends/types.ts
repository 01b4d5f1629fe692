import type { Env } from '../config.js';

export type BackendKind = 'virtualenv' | 'pyvenv';

export interface CreateOptions {
  /** Version the backend runs under */
  version: string;
  /** Working directory for the backend; bootstrap downloads land here */
  cwd: string;
  env?: Env;
}

/**
 * An external tool that materialises a virtual environment.
 */
export interface Backend {
  readonly kind: BackendKind;
  /** Whether the backend accepts a pass-through option such as `--quiet` */
  supportsOption(option: string): boolean;
  /** Create the environment at `target`; returns the tool's exit status */
  create(target: string, options: readonly string[], createOptions: CreateOptions): number;
}

export function optionName(option: string): string {
  return option.replace(/^-+/, '').split('=')[0];
}
