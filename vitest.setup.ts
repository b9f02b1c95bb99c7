/**
 * Centralized Vitest Setup for pagecite
 *
 * Library code logs to stderr; tests that assert on logging raise the level
 * themselves with setLogLevel.
 */

import { beforeEach } from 'vitest';
import { setLogLevel } from './src/telemetry/logger.js';

beforeEach(() => {
  setLogLevel('silent');
});
