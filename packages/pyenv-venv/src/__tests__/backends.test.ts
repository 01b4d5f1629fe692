/**
 * Tests for backend detection, installation and capabilities (backends/)
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  createBackend,
  detectBackend,
  installVirtualenv,
  virtualenvRequirement,
  PyvenvBackend,
  VirtualenvBackend,
} from '../backends/index.js';
import { BackendInstallError } from '../errors.js';
import { FakeVersionManager } from './fake-version-manager.js';

let tmpDir: string;
let vm: FakeVersionManager;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pyenv-venv-backends-'));
  vm = new FakeVersionManager(path.join(tmpDir, 'versions'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('detectBackend', () => {
  it('picks virtualenv when only virtualenv is present', () => {
    vm.withTools('3.12.1', 'virtualenv');
    expect(detectBackend(vm, '3.12.1')).toEqual({ kind: 'virtualenv', virtualenvInstalled: true });
  });

  it('picks virtualenv when both are present', () => {
    vm.withTools('3.12.1', 'virtualenv', 'pyvenv');
    expect(detectBackend(vm, '3.12.1').kind).toBe('virtualenv');
  });

  it('picks pyvenv only when pyvenv is present and virtualenv is not', () => {
    vm.withTools('3.12.1', 'pyvenv');
    expect(detectBackend(vm, '3.12.1')).toEqual({ kind: 'pyvenv', virtualenvInstalled: false });
  });

  it('falls back to virtualenv when neither is present', () => {
    expect(detectBackend(vm, '3.12.1')).toEqual({ kind: 'virtualenv', virtualenvInstalled: false });
  });

  it('probes under the requested version', () => {
    vm.withTools('3.11.7', 'pyvenv');
    expect(detectBackend(vm, '3.12.1').kind).toBe('virtualenv');
    expect(detectBackend(vm, '3.11.7').kind).toBe('pyvenv');
  });
});

describe('installVirtualenv', () => {
  it('runs pip install virtualenv under the version', () => {
    installVirtualenv(vm, '3.12.1');
    expect(vm.calls).toHaveLength(1);
    expect(vm.calls[0].version).toBe('3.12.1');
    expect(vm.calls[0].argv).toEqual(['pip', 'install', 'virtualenv']);
    expect(vm.which('virtualenv', '3.12.1')).toBe(true);
  });

  it('passes quiet, verbose and the pinned release', () => {
    installVirtualenv(vm, '3.12.1', { quiet: true, verbose: true, pin: '20.25.0' });
    expect(vm.calls[0].argv).toEqual(['pip', 'install', '--quiet', '--verbose', 'virtualenv==20.25.0']);
  });

  it('throws BackendInstallError carrying the pip status', () => {
    vm.installStatus = 2;
    let caught: unknown;
    try {
      installVirtualenv(vm, '3.12.1');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(BackendInstallError);
    expect(caught).toMatchObject({ exitCode: 2 });
  });
});

describe('virtualenvRequirement', () => {
  it('is unpinned without a version', () => {
    expect(virtualenvRequirement(null)).toBe('virtualenv');
  });

  it('pins with ==', () => {
    expect(virtualenvRequirement('20.25.0')).toBe('virtualenv==20.25.0');
  });
});

describe('backend capabilities', () => {
  it('virtualenv accepts any option', () => {
    const backend = new VirtualenvBackend(vm);
    expect(backend.supportsOption('--quiet')).toBe(true);
    expect(backend.supportsOption('--never-download')).toBe(true);
  });

  it('pyvenv rejects quiet and verbose', () => {
    const backend = new PyvenvBackend(vm);
    expect(backend.supportsOption('--quiet')).toBe(false);
    expect(backend.supportsOption('--verbose')).toBe(false);
  });

  it('pyvenv accepts its own options, with or without a value', () => {
    const backend = new PyvenvBackend(vm);
    expect(backend.supportsOption('--upgrade')).toBe(true);
    expect(backend.supportsOption('--system-site-packages')).toBe(true);
    expect(backend.supportsOption('--prompt=dev')).toBe(true);
  });

  it('createBackend maps kinds to adapters', () => {
    expect(createBackend('pyvenv', vm)).toBeInstanceOf(PyvenvBackend);
    expect(createBackend('virtualenv', vm)).toBeInstanceOf(VirtualenvBackend);
  });

  it('create runs the tool with options then the target path', () => {
    const target = path.join(tmpDir, 'versions', 'env');
    const status = new PyvenvBackend(vm).create(target, ['--clear'], { version: '3.12.1', cwd: tmpDir });
    expect(status).toBe(0);
    expect(vm.calls[0].argv).toEqual(['pyvenv', '--clear', target]);
    expect(vm.calls[0].options.cwd).toBe(tmpDir);
  });
});
