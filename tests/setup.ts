// Test setup file
/// <reference types="jest" />

// Set test environment variables before any module reads the config
process.env.NODE_ENV = 'test';
process.env.JWT_SECRET = 'test-secret';
process.env.RANDOMNESS_SECRET = 'test-randomness-secret';
process.env.STORE_DRIVER = 'memory';
process.env.ENABLE_DRAW_SCHEDULER = 'false';
process.env.SENTRY_DSN = '';

// Global test timeout
jest.setTimeout(10000);

// Keep test output readable
beforeAll(() => {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterAll(() => {
  jest.restoreAllMocks();
});
