/**
 * Jest Test Setup
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';

process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'error';
delete process.env.LOG_DIR;
delete process.env.OPSDECK_APP_NAME;
process.env.OPSDECK_CONFIG = join(tmpdir(), 'opsdeck-test-no-config.json');

// Suppress console during tests
beforeAll(() => {
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'info').mockImplementation(() => {});
});

afterAll(() => {
  jest.restoreAllMocks();
});
