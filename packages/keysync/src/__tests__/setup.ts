/**
 * Global Test Setup for KeySync
 *
 * Keeps component logging quiet; tests that exercise the CLI reconfigure it
 * from their own config files.
 */

import { beforeEach } from 'vitest';
import { configureLogging } from '../core/utils/logger.js';

configureLogging({ level: 'error' });

beforeEach(() => {
  configureLogging({ level: 'error' });
});
