import { ConfigService } from '@nestjs/config';
import {
  DEFAULT_DATABASE_URL,
  inboxConfigFromEnv,
  parseLogLevel,
  resolveInboxConfig,
  resolveLogLevels,
} from '../../src';

describe('Inbox configuration', () => {
  describe('inboxConfigFromEnv', () => {
    it('should read the secret, database URL and log level', () => {
      const config = inboxConfigFromEnv(
        new ConfigService({
          WEBHOOK_SECRET: 'test-secret',
          DATABASE_URL: 'sqlite::memory:',
          LOG_LEVEL: 'debug',
        }),
      );

      expect(config.webhookSecret).toBe('test-secret');
      expect(config.storage).toEqual({
        type: 'typeorm',
        databaseUrl: 'sqlite::memory:',
      });
      expect(config.logLevel).toBe('DEBUG');
      expect(config.signatureHeader).toBe('x-signature');
    });

    it('should fall back to defaults', () => {
      const config = inboxConfigFromEnv(new ConfigService({}));

      expect(config.webhookSecret).toBeUndefined();
      expect(config.storage).toEqual({
        type: 'typeorm',
        databaseUrl: DEFAULT_DATABASE_URL,
      });
      expect(config.logLevel).toBe('INFO');
    });

    it('should treat an empty secret as unset', () => {
      const config = inboxConfigFromEnv(new ConfigService({ WEBHOOK_SECRET: '' }));
      expect(config.webhookSecret).toBeUndefined();
    });
  });

  describe('resolveInboxConfig', () => {
    it('should keep explicit storage over the default', () => {
      expect(resolveInboxConfig({ storage: { type: 'memory' } }).storage).toEqual({
        type: 'memory',
      });
    });
  });

  describe('log levels', () => {
    it.each([
      ['DEBUG', 'DEBUG'],
      ['warning', 'WARNING'],
      ['WARN', 'WARNING'],
      [' error ', 'ERROR'],
      ['verbose', 'INFO'],
      [undefined, 'INFO'],
    ])('should parse %p as %s', (value, expected) => {
      expect(parseLogLevel(value)).toBe(expected);
    });

    it('should enable levels at or above the threshold', () => {
      expect(resolveLogLevels('DEBUG')).toEqual([
        'fatal',
        'error',
        'warn',
        'log',
        'debug',
        'verbose',
      ]);
      expect(resolveLogLevels('INFO')).toEqual(['fatal', 'error', 'warn', 'log']);
      expect(resolveLogLevels('WARNING')).toEqual(['fatal', 'error', 'warn']);
      expect(resolveLogLevels('ERROR')).toEqual(['fatal', 'error']);
    });
  });
});
