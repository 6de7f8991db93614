/**
 * Jest Test Setup
 * Sets up environment variables and mocks for testing
 */

// Set required environment variables for tests
process.env.NODE_ENV = 'test';
process.env.PORT = '4000';
process.env.ANTHROPIC_API_KEY = 'test-api-key';
process.env.LOG_LEVEL = 'error';

// Mock logger to suppress logs during tests
jest.mock('../utils/logger', () => {
  const child = () => ({
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  });
  return {
    __esModule: true,
    default: child(),
    auditLogger: { info: jest.fn() },
    getLogger: () => child(),
  };
});

// Clean up mocks after each test
// resetAllMocks() clears mock history AND resets implementations
afterEach(() => {
  jest.resetAllMocks();
});
