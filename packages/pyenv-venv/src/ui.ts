import chalk from "chalk";

let debugEnabled = false;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

export function success(msg: string): void {
  console.log(chalk.green("  ✓") + " " + msg);
}

export function step(msg: string): void {
  console.log(chalk.cyan("  →") + " " + msg);
}

// Diagnostics go to stderr: stdout of some commands is evaluated by a shell.
export function warn(msg: string): void {
  console.error(chalk.yellow("pyenv-virtualenv:") + " " + msg);
}

export function error(msg: string): void {
  console.error(chalk.red("pyenv-virtualenv:") + " " + msg);
}

export function debug(msg: string): void {
  if (!debugEnabled) return;
  console.error(chalk.dim(`+ [pyenv-virtualenv] ${msg}`));
}

export function usage(text: string): void {
  console.error(text);
}

export function upgradeFailure(manifest: string, previous: string, packages: string[]): void {
  console.error();
  error("failed to upgrade virtualenv");
  console.error(chalk.dim(`  Previous environment kept at ${previous}`));
  console.error(chalk.dim(`  Package list kept at ${manifest}:`));
  for (const pkg of packages) {
    console.error(chalk.white(`    ${pkg}`));
  }
  console.error();
}
