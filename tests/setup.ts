import { afterEach, jest } from '@jest/globals';

// Keep engine and simulator logs out of test output unless a test opts in.
process.env.LOG_LEVEL = 'error';

afterEach(() => {
  jest.restoreAllMocks();
});
