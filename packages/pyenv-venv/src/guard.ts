import fs from 'fs-extra';
import type { TargetEnvironment } from './types.js';
import { debug, warn } from './ui.js';

export interface GuardOptions {
  signals?: NodeJS.Signals[];
  /** Called after the rollback an interrupt triggers */
  onInterrupt?: (signal: NodeJS.Signals) => void;
}

/** Exit status of a run stopped by SIGINT, from the shell or from a killed child */
export const INTERRUPT_STATUS = 130;

/**
 * A pending environment creation. Settling with a non-zero status, or an
 * interrupt while pending, removes the target directory unless it existed
 * before the run started.
 *
 * While pending, the signal listener also keeps the terminal's SIGINT from
 * terminating this process; a synchronous child killed by it reports
 * INTERRUPT_STATUS, and the pipeline settles with that.
 */
export class CreationGuard {
  private settled = false;
  private readonly signals: NodeJS.Signals[];
  private readonly onInterrupt: (signal: NodeJS.Signals) => void;
  private readonly listener = (signal: NodeJS.Signals): void => {
    this.release();
    this.rollback();
    this.onInterrupt(signal);
  };

  constructor(
    private readonly target: TargetEnvironment,
    options: GuardOptions = {},
  ) {
    this.signals = options.signals ?? ['SIGINT'];
    this.onInterrupt = options.onInterrupt ?? (() => process.exit(INTERRUPT_STATUS));
    for (const signal of this.signals) {
      process.once(signal, this.listener);
    }
  }

  get pending(): boolean {
    return !this.settled;
  }

  settle(status: number): void {
    if (this.settled) return;
    this.release();
    if (status !== 0) {
      this.rollback();
    }
  }

  /** Remove the target if this run created it. Returns whether anything was removed. */
  rollback(): boolean {
    if (this.target.preexisting || !fs.existsSync(this.target.path)) {
      return false;
    }
    warn(`removing ${this.target.path}`);
    fs.removeSync(this.target.path);
    debug(`rolled back ${this.target.path}`);
    return true;
  }

  private release(): void {
    this.settled = true;
    for (const signal of this.signals) {
      process.removeListener(signal, this.listener);
    }
  }
}

export function acquireCreationGuard(target: TargetEnvironment, options?: GuardOptions): CreationGuard {
  return new CreationGuard(target, options);
}
