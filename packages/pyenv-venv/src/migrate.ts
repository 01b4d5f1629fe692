/**
 * Package-list migration for upgrade-in-place.
 *
 * snapshot() records `pip freeze` of the old environment and moves it aside;
 * replay() installs that list into the freshly created environment. A failed
 * create or replay leaves both the list and the old directory behind for
 * manual recovery, and reportStranded() says where they are.
 */

import * as path from 'path';
import fs from 'fs-extra';
import type { Env } from './config.js';
import type { VersionManager } from './version-manager.js';
import type { TargetEnvironment } from './types.js';
import { VirtualenvError } from './errors.js';
import { debug, step, success, upgradeFailure } from './ui.js';

export interface UpgradeSnapshot {
  seed: string;
  /** `pip freeze` output of the old environment */
  manifestPath: string;
  /** Where the old environment was moved */
  upgradePath: string;
}

export interface ReplayOptions {
  quiet?: boolean;
  verbose?: boolean;
  env?: Env;
}

/** `YYYYMMDDHHMMSS.<pid>`, unique across concurrent runs */
export function makeSeed(now: Date = new Date(), pid: number = process.pid): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  const stamp =
    String(now.getFullYear()) +
    pad(now.getMonth() + 1) +
    pad(now.getDate()) +
    pad(now.getHours()) +
    pad(now.getMinutes()) +
    pad(now.getSeconds());
  return `${stamp}.${pid}`;
}

export function snapshotPaths(target: TargetEnvironment, seed: string, tmpDir: string): UpgradeSnapshot {
  return {
    seed,
    manifestPath: path.join(tmpDir, `pyenv-virtualenv.${seed}.txt`),
    upgradePath: `${target.path}.${seed}.upgrade`,
  };
}

export function snapshot(
  vm: VersionManager,
  target: TargetEnvironment,
  seed: string,
  tmpDir: string,
): UpgradeSnapshot {
  const snap = snapshotPaths(target, seed, tmpDir);

  step(`Recording packages installed in ${target.name}...`);
  const freeze = vm.exec(target.name, ['pip', 'freeze'], { capture: true });
  if (freeze.status !== 0) {
    throw new VirtualenvError(`could not list packages of ${target.name}.`, freeze.status);
  }
  fs.ensureDirSync(tmpDir);
  fs.writeFileSync(snap.manifestPath, freeze.stdout);
  debug(`package list written to ${snap.manifestPath}`);

  fs.moveSync(target.path, snap.upgradePath);
  debug(`moved ${target.path} to ${snap.upgradePath}`);
  return snap;
}

export function readManifest(manifestPath: string): string[] {
  if (!fs.existsSync(manifestPath)) return [];
  return fs
    .readFileSync(manifestPath, 'utf-8')
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
}

export function reportStranded(snap: UpgradeSnapshot): void {
  upgradeFailure(snap.manifestPath, snap.upgradePath, readManifest(snap.manifestPath));
}

/**
 * Reinstall the recorded packages into the new environment.
 * Returns pip's exit status.
 */
export function replay(
  vm: VersionManager,
  target: TargetEnvironment,
  snap: UpgradeSnapshot,
  options: ReplayOptions = {},
): number {
  const argv = ['pip', 'install'];
  if (options.quiet) argv.push('--quiet');
  if (options.verbose) argv.push('--verbose');
  argv.push('--requirement', snap.manifestPath);

  step(`Restoring packages into ${target.name}...`);
  const { status } = vm.exec(target.name, argv, { env: options.env });
  if (status !== 0) {
    reportStranded(snap);
    return status;
  }

  fs.removeSync(snap.manifestPath);
  fs.removeSync(snap.upgradePath);
  success(`Upgraded ${target.name}`);
  return 0;
}
