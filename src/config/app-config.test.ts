import { ZodError } from 'zod';
import { loadConfig } from './app-config';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    // Arrange & Act
    const config = loadConfig({});

    // Assert
    expect(config).toEqual({
      addressBookFile: 'addressbook.json',
      birthdayWindowDays: 7,
      logLevel: 'warn',
    });
  });

  it('should read values from the environment', () => {
    // Arrange
    const env = {
      ADDRESS_BOOK_FILE: '/tmp/contacts.json',
      BIRTHDAY_WINDOW_DAYS: '14',
      LOG_LEVEL: 'debug',
    };

    // Act
    const config = loadConfig(env);

    // Assert
    expect(config).toEqual({
      addressBookFile: '/tmp/contacts.json',
      birthdayWindowDays: 14,
      logLevel: 'debug',
    });
  });

  it('should treat empty strings as unset', () => {
    const config = loadConfig({ ADDRESS_BOOK_FILE: '', BIRTHDAY_WINDOW_DAYS: '' });

    expect(config.addressBookFile).toBe('addressbook.json');
    expect(config.birthdayWindowDays).toBe(7);
  });

  it.each(['abc', '-1', '2.5', '400'])(
    'should reject BIRTHDAY_WINDOW_DAYS=%s',
    (value) => {
      expect(() => loadConfig({ BIRTHDAY_WINDOW_DAYS: value })).toThrow(ZodError);
    }
  );

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ZodError);
  });
});
