/**
 * Error classes for pyenv-venv commands.
 * Each carries the process exit status the command terminates with.
 */

export class VirtualenvError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode = 1) {
    super(message);
    this.name = 'VirtualenvError';
    this.exitCode = exitCode;
  }
}

export class UsageError extends VirtualenvError {
  constructor(message = 'no virtualenv name given.') {
    super(message, 1);
    this.name = 'UsageError';
  }
}

export class VersionNotInstalledError extends VirtualenvError {
  public readonly version: string;

  constructor(version: string) {
    super(`\`${version}' is not installed in pyenv.`, 1);
    this.name = 'VersionNotInstalledError';
    this.version = version;
  }
}

export class ConfirmationDeclinedError extends VirtualenvError {
  constructor(target: string) {
    super(`aborted; ${target} left untouched.`, 1);
    this.name = 'ConfirmationDeclinedError';
  }
}

export class BackendInstallError extends VirtualenvError {
  constructor(status: number) {
    super('failed to install virtualenv with pip.', status === 0 ? 1 : status);
    this.name = 'BackendInstallError';
  }
}

export class NotAVirtualenvError extends VirtualenvError {
  constructor(name: string) {
    super(`\`${name}' is not a virtualenv.`, 1);
    this.name = 'NotAVirtualenvError';
  }
}

export function exitCodeOf(err: unknown): number {
  return err instanceof VirtualenvError ? err.exitCode : 1;
}
