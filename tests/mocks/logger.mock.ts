/**
 * Logger Mock
 * Centralized mock for the logger module
 *
 * This mock is automatically applied in jest.setup.ts,
 * but can be imported for more specific mock behavior.
 */

export const mockLogger = {
  debug: jest.fn(),
  info: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  debugWithContext: jest.fn(),
  infoWithContext: jest.fn(),
  warnWithContext: jest.fn(),
  errorWithContext: jest.fn(),
  logger: {}
};

/**
 * Assert that a debug message was logged
 */
export function expectDebugLogged(messageMatch?: string | RegExp) {
  expect(mockLogger.debug).toHaveBeenCalled();
  if (messageMatch) {
    const calls = mockLogger.debug.mock.calls;
    const found = calls.some((call: unknown[]) => {
      const message = String(call[0]);
      return typeof messageMatch === 'string'
        ? message.includes(messageMatch)
        : messageMatch.test(message);
    });
    expect(found).toBe(true);
  }
}

/**
 * Assert that nothing above debug level was logged
 */
export function expectQuietLogs() {
  expect(mockLogger.info).not.toHaveBeenCalled();
  expect(mockLogger.warn).not.toHaveBeenCalled();
  expect(mockLogger.error).not.toHaveBeenCalled();
}

export default mockLogger;
