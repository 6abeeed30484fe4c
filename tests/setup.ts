import { beforeAll } from 'vitest';

// Global test setup
beforeAll(() => {
  process.env.NODE_ENV = 'test';
});

// Mock console methods to reduce noise in tests
const originalConsole = global.console;
global.console = {
  ...originalConsole,
  log: () => {}, // Suppress logs in tests
  warn: () => {}, // Suppress warnings in tests
  error: originalConsole.error, // Keep errors for debugging
};
