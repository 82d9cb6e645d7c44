#!/usr/bin/env node
/**
 * Contact Book Assistant - command-line entry point
 *
 * **Usage:**
 * - Development: `npm run dev`
 * - Production: `npm run build && npm start`
 *
 * **Environment Variables:**
 * - ADDRESS_BOOK_FILE: data file (default: ./addressbook.json)
 * - BIRTHDAY_WINDOW_DAYS: look-ahead for `birthdays` (default: 7)
 * - LOG_LEVEL: pino level, logs go to stderr (default: warn)
 *
 * The book is loaded once here and saved by the `exit` command.
 */

import * as path from 'path';
import { loadConfig } from './config/app-config';
import { logger } from './shared/logger';
import { JsonFileAddressBookRepository } from './modules/contact/adapters/persistence/JsonFileAddressBookRepository';
import { createCommandRegistry } from './adapters/primary/cli/commands/assistantCommands';
import { CommandDispatcher } from './adapters/primary/cli/CommandDispatcher';
import { ConsoleView } from './adapters/primary/cli/views/ConsoleView';
import { runRepl } from './adapters/primary/cli/repl';

async function main(): Promise<void> {
  const config = loadConfig();
  logger.level = config.logLevel;

  const repository = new JsonFileAddressBookRepository(
    path.resolve(config.addressBookFile),
    logger
  );
  const addressBook = await repository.load();
  logger.info({ msg: 'Address book ready', contacts: addressBook.size });

  const view = new ConsoleView();
  const registry = createCommandRegistry({
    addressBook,
    repository,
    birthdayWindowDays: config.birthdayWindowDays,
  });
  const dispatcher = new CommandDispatcher(registry, view, logger);

  await runRepl(dispatcher, view, logger);
}

main().catch((error: unknown) => {
  logger.error({
    msg: 'Assistant failed to start',
    error: error instanceof Error ? error.message : String(error),
  });
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
