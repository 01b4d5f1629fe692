/**
 * Tests for configuration loading (config.ts)
 */

import { describe, it, expect } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import { childEnv, loadConfig, resolveShell } from '../config.js';

describe('loadConfig', () => {
  it('defaults the root to ~/.pyenv', () => {
    const config = loadConfig({});
    expect(config.root).toBe(path.join(os.homedir(), '.pyenv'));
    expect(config.versionsDir).toBe(path.join(os.homedir(), '.pyenv', 'versions'));
    expect(config.cacheDir).toBe(path.join(os.homedir(), '.pyenv', 'cache'));
    expect(config.debug).toBe(false);
    expect(config.virtualenvPin).toBeNull();
  });

  it('reads PYENV_ROOT', () => {
    const config = loadConfig({ PYENV_ROOT: '/opt/pyenv' });
    expect(config.versionsDir).toBe('/opt/pyenv/versions');
    expect(config.cacheDir).toBe('/opt/pyenv/cache');
  });

  it('prefers PYENV_VIRTUALENV_CACHE_PATH over PYTHON_BUILD_CACHE_PATH', () => {
    expect(loadConfig({ PYENV_ROOT: '/opt/pyenv', PYTHON_BUILD_CACHE_PATH: '/var/cache/build' }).cacheDir)
      .toBe('/var/cache/build');
    expect(loadConfig({
      PYENV_ROOT: '/opt/pyenv',
      PYTHON_BUILD_CACHE_PATH: '/var/cache/build',
      PYENV_VIRTUALENV_CACHE_PATH: '/var/cache/venv',
    }).cacheDir).toBe('/var/cache/venv');
  });

  it('turns on debug for any non-empty PYENV_DEBUG', () => {
    expect(loadConfig({ PYENV_DEBUG: '1' }).debug).toBe(true);
    expect(loadConfig({ PYENV_DEBUG: '' }).debug).toBe(false);
  });

  it('reads the virtualenv pin', () => {
    expect(loadConfig({ VIRTUALENV_VERSION: '20.25.0' }).virtualenvPin).toBe('20.25.0');
  });
});

describe('resolveShell', () => {
  it('prefers PYENV_SHELL', () => {
    expect(resolveShell({ PYENV_SHELL: 'fish', SHELL: '/bin/zsh' })).toBe('fish');
  });

  it('falls back to the basename of SHELL', () => {
    expect(resolveShell({ SHELL: '/usr/local/bin/zsh' })).toBe('zsh');
  });

  it('returns null when neither is set', () => {
    expect(resolveShell({})).toBeNull();
  });
});

describe('childEnv', () => {
  it('removes isolation toggles and replaces PYENV_VERSION', () => {
    const base = { HOME: '/home/dev', PIP_REQUIRE_VENV: '1', PIP_REQUIRE_VIRTUALENV: 'true', PYENV_VERSION: '3.10.13' };
    expect(childEnv(base, '3.12.1')).toEqual({ HOME: '/home/dev', PYENV_VERSION: '3.12.1' });
  });

  it('does not mutate the base environment', () => {
    const base = { PIP_REQUIRE_VENV: '1' };
    childEnv(base, '3.12.1');
    expect(base).toEqual({ PIP_REQUIRE_VENV: '1' });
  });
});
