/**
 * Plugin configuration, resolved from environment variables.
 *
 * Root resolution order:
 * 1. PYENV_ROOT
 * 2. ~/.pyenv
 */

import * as os from 'os';
import * as path from 'path';

export type Env = Record<string, string | undefined>;

export interface PluginConfig {
  root: string;
  versionsDir: string;
  cacheDir: string;
  debug: boolean;
  virtualenvPin: string | null;
  shell: string | null;
  tmpDir: string;
}

/** Variables removed from the child environment before delegating to a backend */
export const ISOLATION_VARIABLES = ['PIP_REQUIRE_VENV', 'PIP_REQUIRE_VIRTUALENV'] as const;

function getEnv(env: Env, key: string, defaultValue: string): string {
  const value = env[key];
  return value === undefined || value === '' ? defaultValue : value;
}

function getOptionalEnv(env: Env, key: string): string | null {
  const value = env[key];
  return value === undefined || value === '' ? null : value;
}

export function loadConfig(env: Env = process.env): PluginConfig {
  const root = path.resolve(getEnv(env, 'PYENV_ROOT', path.join(os.homedir(), '.pyenv')));
  const buildCache = getEnv(env, 'PYTHON_BUILD_CACHE_PATH', path.join(root, 'cache'));

  return {
    root,
    versionsDir: path.join(root, 'versions'),
    cacheDir: path.resolve(getEnv(env, 'PYENV_VIRTUALENV_CACHE_PATH', buildCache)),
    debug: getOptionalEnv(env, 'PYENV_DEBUG') !== null,
    virtualenvPin: getOptionalEnv(env, 'VIRTUALENV_VERSION'),
    shell: resolveShell(env),
    tmpDir: getEnv(env, 'TMPDIR', os.tmpdir()),
  };
}

export function resolveShell(env: Env): string | null {
  const pyenvShell = getOptionalEnv(env, 'PYENV_SHELL');
  if (pyenvShell) return pyenvShell;
  const loginShell = getOptionalEnv(env, 'SHELL');
  return loginShell ? path.basename(loginShell) : null;
}

/**
 * Build the environment a delegated tool runs with: isolation toggles removed,
 * PYENV_VERSION pinned to the version the tool must run under.
 */
export function childEnv(base: Env, version: string): Env {
  const env: Env = { ...base };
  for (const key of ISOLATION_VARIABLES) {
    delete env[key];
  }
  env['PYENV_VERSION'] = version;
  return env;
}
