/**
 * Inspection of virtualenvs living under `<root>/versions`.
 */

import * as path from 'path';
import fs from 'fs-extra';
import { NotAVirtualenvError, VirtualenvError } from './errors.js';

export interface VirtualenvInfo {
  name: string;
  path: string;
  /** `home` from pyvenv.cfg: bin directory of the base interpreter */
  home: string | null;
  /** `version` (or `version_info`) from pyvenv.cfg */
  pythonVersion: string | null;
}

const UPGRADE_SUFFIX = '.upgrade';

export function isVirtualenv(dir: string): boolean {
  return (
    fs.existsSync(path.join(dir, 'pyvenv.cfg')) ||
    fs.existsSync(path.join(dir, 'bin', 'activate'))
  );
}

/** Parse `key = value` lines; null when the file does not exist */
export function readPyvenvCfg(dir: string): Record<string, string> | null {
  const cfgPath = path.join(dir, 'pyvenv.cfg');
  if (!fs.existsSync(cfgPath)) return null;

  const cfg: Record<string, string> = {};
  for (const line of fs.readFileSync(cfgPath, 'utf-8').split('\n')) {
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    cfg[line.slice(0, eq).trim()] = line.slice(eq + 1).trim();
  }
  return cfg;
}

export function describeVirtualenv(versionsDir: string, name: string): VirtualenvInfo {
  const envPath = path.join(versionsDir, name);
  const cfg = readPyvenvCfg(envPath);
  return {
    name,
    path: envPath,
    home: cfg?.['home'] ?? null,
    pythonVersion: cfg?.['version'] ?? cfg?.['version_info'] ?? null,
  };
}

/**
 * Every virtualenv under `versionsDir`, sorted by name. Directories left by a
 * failed upgrade are not listed.
 */
export function listVirtualenvs(versionsDir: string): VirtualenvInfo[] {
  if (!fs.existsSync(versionsDir)) return [];

  return fs
    .readdirSync(versionsDir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && !entry.name.endsWith(UPGRADE_SUFFIX))
    .filter((entry) => isVirtualenv(path.join(versionsDir, entry.name)))
    .map((entry) => describeVirtualenv(versionsDir, entry.name))
    .sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Prefix of the interpreter a virtualenv was created from.
 * pyvenv.cfg `home` points at its bin directory; virtualenv releases before
 * 20 recorded the prefix in lib/python<X.Y>/orig-prefix.txt instead.
 */
export function virtualenvPrefix(versionsDir: string, name: string): string {
  const envPath = path.join(versionsDir, name);
  if (!fs.existsSync(envPath)) {
    throw new VirtualenvError(`version \`${name}' not installed`);
  }

  const home = readPyvenvCfg(envPath)?.['home'];
  if (home) {
    return path.basename(home) === 'bin' ? path.dirname(home) : home;
  }

  const libDir = path.join(envPath, 'lib');
  if (fs.existsSync(libDir)) {
    for (const entry of fs.readdirSync(libDir)) {
      const origPrefix = path.join(libDir, entry, 'orig-prefix.txt');
      if (entry.startsWith('python') && fs.existsSync(origPrefix)) {
        return fs.readFileSync(origPrefix, 'utf-8').trim();
      }
    }
  }

  throw new NotAVirtualenvError(name);
}

export function deleteVirtualenv(versionsDir: string, name: string): string {
  const envPath = path.join(versionsDir, name);
  if (!isVirtualenv(envPath)) {
    throw new NotAVirtualenvError(name);
  }
  fs.removeSync(envPath);
  return envPath;
}
