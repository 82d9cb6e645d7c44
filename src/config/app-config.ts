import { z } from 'zod';
import { DEFAULT_BIRTHDAY_WINDOW_DAYS } from '../modules/contact/domain/entities/AddressBook';

/**
 * Application Configuration
 *
 * Read once at startup from environment variables:
 * ```bash
 * ADDRESS_BOOK_FILE=~/contacts.json   # data file, default ./addressbook.json
 * BIRTHDAY_WINDOW_DAYS=14             # look-ahead for `birthdays`, default 7
 * LOG_LEVEL=debug                     # pino level, default warn
 * ```
 *
 * Invalid values fail fast instead of falling back to defaults, since a typo in
 * ADDRESS_BOOK_FILE would otherwise start the user on an empty book.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const AppConfigSchema = z.object({
  ADDRESS_BOOK_FILE: z.string().min(1).default('addressbook.json'),
  BIRTHDAY_WINDOW_DAYS: z.coerce
    .number()
    .int('BIRTHDAY_WINDOW_DAYS must be an integer')
    .min(0)
    .max(365)
    .default(DEFAULT_BIRTHDAY_WINDOW_DAYS),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('warn'),
});

export interface AppConfig {
  addressBookFile: string;
  birthdayWindowDays: number;
  logLevel: z.infer<typeof AppConfigSchema>['LOG_LEVEL'];
}

/**
 * Loads configuration from the given environment
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws ZodError if a variable is set to an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = AppConfigSchema.parse({
    ADDRESS_BOOK_FILE: env.ADDRESS_BOOK_FILE || undefined,
    BIRTHDAY_WINDOW_DAYS: env.BIRTHDAY_WINDOW_DAYS || undefined,
    LOG_LEVEL: env.LOG_LEVEL || undefined,
  });

  return {
    addressBookFile: parsed.ADDRESS_BOOK_FILE,
    birthdayWindowDays: parsed.BIRTHDAY_WINDOW_DAYS,
    logLevel: parsed.LOG_LEVEL,
  };
}
