/**
 * Shell source that deactivates the active virtualenv. The output is meant for
 * `eval` in the user's interactive shell; nothing here deactivates anything.
 */

export type ShellFamily = 'posix' | 'fish';

export function shellFamily(shell: string | null | undefined): ShellFamily {
  return shell === 'fish' ? 'fish' : 'posix';
}

export function emitDeactivate(shell: string | null | undefined): string[] {
  if (shellFamily(shell) === 'fish') {
    return ['if functions -q deactivate; deactivate; end;', 'set -e PYENV_VERSION;'];
  }
  return ['declare -f deactivate 1>/dev/null 2>&1 && deactivate;', 'unset PYENV_VERSION;'];
}
