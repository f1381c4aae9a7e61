/**
 * Centralized Vitest Setup for convention-lint
 *
 * A config path or log level exported in the developer's shell must not
 * change what the tests see.
 */

import { afterEach, beforeEach } from 'vitest';
import { CONFIG_PATH_ENV } from './src/config/loader.js';
import { setLogLevel } from './src/telemetry/logger.js';

const savedConfigPath = process.env[CONFIG_PATH_ENV];

beforeEach(() => {
  delete process.env[CONFIG_PATH_ENV];
  setLogLevel('info');
});

afterEach(() => {
  if (savedConfigPath === undefined) {
    delete process.env[CONFIG_PATH_ENV];
  } else {
    process.env[CONFIG_PATH_ENV] = savedConfigPath;
  }
});
