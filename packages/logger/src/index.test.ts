/**
 * Unit tests for @mailroot/logger
 */

import {
  createLogger,
  getLogger,
  setDefaultLogger,
  resetDefaultLogger,
  redact,
  redactObject,
  hashAddress,
  Logger,
  LogEntry,
} from './index';

function capture(options: ConstructorParameters<typeof Logger>[0] = {}): {
  logger: Logger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  const logger = new Logger({ ...options, output: (entry) => entries.push(entry) });
  return { logger, entries };
}

describe('@mailroot/logger', () => {
  beforeEach(() => {
    resetDefaultLogger();
  });

  describe('redact', () => {
    it('should redact mailbox addresses', () => {
      expect(redact('Resolving inbox for anna@example.com')).toBe('Resolving inbox for [REDACTED]');
    });

    it('should redact authorization values', () => {
      expect(redact('header Bearer abcdefgh12345678')).toBe('header [REDACTED]');
    });

    it('should redact key=value secrets', () => {
      expect(redact('login password=test-secret failed')).toBe('login [REDACTED] failed');
    });

    it('should leave plain text alone', () => {
      expect(redact('Top of Information Store')).toBe('Top of Information Store');
    });

    it('should return empty strings unchanged', () => {
      expect(redact('')).toBe('');
    });

    it('should use custom patterns', () => {
      expect(redact('folder AAMkAD42', [/AAMk\w+/g])).toBe('folder [REDACTED]');
    });
  });

  describe('redactObject', () => {
    it('should redact nested strings', () => {
      const result = redactObject({ folder: { owner: 'bo@example.com', name: 'Kalender' } });
      expect(result).toEqual({ folder: { owner: '[REDACTED]', name: 'Kalender' } });
    });

    it('should drop values of credential-like keys', () => {
      const result = redactObject({ credentials: { username: 'bo' }, accessToken: 'x' });
      expect(result).toEqual({ credentials: '[REDACTED]', accessToken: '[REDACTED]' });
    });

    it('should handle arrays and primitives', () => {
      expect(redactObject(['a@example.com', 3, true])).toEqual(['[REDACTED]', 3, true]);
      expect(redactObject(null)).toBeNull();
      expect(redactObject(undefined)).toBeUndefined();
    });
  });

  describe('hashAddress', () => {
    it('should produce a 16 character hash', () => {
      expect(hashAddress('anna@example.com')).toHaveLength(16);
    });

    it('should ignore case and surrounding whitespace', () => {
      expect(hashAddress(' Anna@Example.com ')).toBe(hashAddress('anna@example.com'));
    });

    it('should differ between addresses', () => {
      expect(hashAddress('anna@example.com')).not.toBe(hashAddress('bo@example.com'));
    });

    it('should return empty string for empty input', () => {
      expect(hashAddress('')).toBe('');
    });
  });

  describe('Logger', () => {
    it('should respect minimum log level', () => {
      const { logger, entries } = capture({ minLevel: 'warn' });

      logger.debug('debug message');
      logger.info('info message');
      logger.warn('warn message');
      logger.error('error message');

      expect(entries.map((e) => e.level)).toEqual(['warn', 'error']);
    });

    it('should redact messages', () => {
      const { logger, entries } = capture();

      logger.info('Added account anna@example.com');

      expect(entries[0]!.message).toBe('Added account [REDACTED]');
    });

    it('should hash the account context value', () => {
      const { logger, entries } = capture();

      logger.info('Resolved folder', { account: 'anna@example.com', folderType: 'Inbox' });

      expect(entries[0]!.context).toEqual({
        account: hashAddress('anna@example.com'),
        folderType: 'Inbox',
      });
    });

    it('should include error name, message and code', () => {
      const { logger, entries } = capture();
      const error = Object.assign(new Error('Lookup failed for anna@example.com'), {
        code: 'FOLDER_NOT_FOUND',
      });

      logger.error('Resolution failed', error);

      expect(entries[0]!.error?.name).toBe('Error');
      expect(entries[0]!.error?.message).toBe('Lookup failed for [REDACTED]');
      expect(entries[0]!.error?.code).toBe('FOLDER_NOT_FOUND');
      expect(entries[0]!.error?.stack).toBeDefined();
    });

    it('should omit empty context', () => {
      const { logger, entries } = capture();

      logger.info('plain');

      expect(entries[0]!.context).toBeUndefined();
    });

    it('should allow disabling timestamps', () => {
      const { logger, entries } = capture({ includeTimestamps: false });

      logger.info('plain');

      expect(entries[0]!.timestamp).toBe('');
    });

    it('should change level dynamically', () => {
      const { logger, entries } = capture();

      logger.debug('hidden');
      logger.setLevel('debug');
      logger.debug('shown');

      expect(logger.getLevel()).toBe('debug');
      expect(entries.map((e) => e.message)).toEqual(['shown']);
    });

    it('should write pretty output to the console', () => {
      const spy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
      const logger = new Logger({ includeTimestamps: false, jsonFormat: false });

      logger.info('Discovered folders', { component: 'folder-tree', count: 3 });

      expect(spy).toHaveBeenCalledWith('[INFO ] [folder-tree] Discovered folders {"count":3}');
      spy.mockRestore();
    });

    it('should write JSON output when configured', () => {
      const spy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const logger = new Logger({ includeTimestamps: false, jsonFormat: true });

      logger.warn('Probe used');

      expect(spy).toHaveBeenCalledWith('{"level":"warn","message":"Probe used","timestamp":""}');
      spy.mockRestore();
    });
  });

  describe('child logger', () => {
    it('should merge context with the parent', () => {
      const { logger, entries } = capture();

      logger.child({ component: 'account' }).child({ folderType: 'Drafts' }).info('Resolved');

      expect(entries[0]!.context).toEqual({ component: 'account', folderType: 'Drafts' });
    });

    it('should inherit the level from the parent', () => {
      const { logger, entries } = capture({ minLevel: 'error' });

      logger.child({ component: 'account' }).warn('ignored');

      expect(entries).toHaveLength(0);
    });
  });

  describe('default logger', () => {
    it('should return the same instance', () => {
      expect(getLogger()).toBe(getLogger());
    });

    it('should use the logger set at startup', () => {
      const custom = createLogger({ minLevel: 'debug' });
      setDefaultLogger(custom);
      expect(getLogger()).toBe(custom);
    });

    it('should create a new instance after reset', () => {
      const first = getLogger();
      resetDefaultLogger();
      expect(getLogger()).not.toBe(first);
    });
  });
});
