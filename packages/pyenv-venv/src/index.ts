#!/usr/bin/env node

/**
 * pyenv-venv - virtualenv management commands for pyenv
 */

import { createRequire } from 'module';
import { loadConfig } from './config.js';
import { loadShellHooks } from './hooks.js';
import { buildProgram } from './program.js';
import { setDebug } from './ui.js';
import { PyenvVersionManager } from './version-manager.js';

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const config = loadConfig();
setDebug(config.debug);

await buildProgram({
  version: pkg.version,
  config,
  vm: new PyenvVersionManager(process.env),
  env: process.env,
  loadHooks: loadShellHooks,
}).parseAsync();
