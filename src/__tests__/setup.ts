/**
 * Jest setup file for global test configuration
 * Runs before each test file
 */

// Environment seen by loadEnvironmentConfig() in tests
Object.assign(process.env, {
  NODE_ENV: 'test',
  LOG_LEVEL: 'error' // Reduce log noise in tests
});

// Mock console methods to reduce noise in tests
const originalConsole = { ...console };

beforeEach(() => {
  console.log = jest.fn();
  console.info = jest.fn();
  console.warn = jest.fn();
  console.error = jest.fn();
  console.debug = jest.fn();
});

afterEach(() => {
  jest.restoreAllMocks();
});

afterAll(() => {
  // Restore original console methods
  console.log = originalConsole.log;
  console.info = originalConsole.info;
  console.warn = originalConsole.warn;
  console.error = originalConsole.error;
  console.debug = originalConsole.debug;
});
