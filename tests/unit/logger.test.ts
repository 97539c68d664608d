import { LOG_LEVELS } from '../../utils/constants';

const { default: logger } = jest.requireActual<typeof import('../../utils/logger')>('../../utils/logger');

describe('Logger', () => {
  it('should register the library log levels', () => {
    expect(logger.logger.levels).toEqual(LOG_LEVELS);
  });

  it('should be silent when the configured level is silent', () => {
    expect(logger.logger.silent).toBe(true);
  });

  it('should log metadata without throwing', () => {
    expect(() => {
      logger.debugWithContext('Test metadata', { key: 'value', nested: { prop: 123 } });
      logger.info('Test message', { key: 'value' });
    }).not.toThrow();
  });
});
