import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { PassThrough } from 'stream';
import { DateTime } from 'luxon';
import { JsonFileAddressBookRepository } from '../../modules/contact/adapters/persistence/JsonFileAddressBookRepository';
import { createCommandRegistry } from '../../adapters/primary/cli/commands/assistantCommands';
import { CommandDispatcher } from '../../adapters/primary/cli/CommandDispatcher';
import { ConsoleView } from '../../adapters/primary/cli/views/ConsoleView';
import { runRepl } from '../../adapters/primary/cli/repl';
import type { ILogger } from '../../shared/logger';

/**
 * E2E: two assistant sessions sharing one data file
 *
 * Runs the real repository, registry, dispatcher, view and REPL against
 * in-memory streams and a file in a temporary directory.
 */
describe('Assistant session (E2E)', () => {
  let tempDir: string;
  let filePath: string;

  const logger: ILogger = {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  };

  const runSession = async (script: string): Promise<string> => {
    const repository = new JsonFileAddressBookRepository(filePath, logger);
    const addressBook = await repository.load();

    let printed = '';
    const view = new ConsoleView({
      write: (chunk: string) => {
        printed += chunk;
        return true;
      },
    });
    const registry = createCommandRegistry({
      addressBook,
      repository,
      birthdayWindowDays: 7,
      // Wednesday
      clock: () => DateTime.local(2025, 1, 1),
    });
    const dispatcher = new CommandDispatcher(registry, view, logger);

    const input = new PassThrough();
    const output = new PassThrough();
    output.resume();
    const done = runRepl(dispatcher, view, logger, { input, output });
    input.end(script);
    await done;

    return printed;
  };

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'assistant-e2e-'));
    filePath = path.join(tempDir, 'addressbook.json');
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should persist contacts on exit and restore them in the next session', async () => {
    // Arrange & Act: first session
    const first = await runSession(
      [
        'add John 1234567890',
        'add Jane 5555555555',
        'add-birthday John 04.01.1990',
        'change Jane 5555555555 6666666666',
        'close',
      ].join('\n') + '\n'
    );

    // Assert
    expect(first).toBe(
      'Welcome to the assistant bot!\n' +
        'Contact added.\n' +
        'Contact added.\n' +
        'Birthday added.\n' +
        'Phone number for Jane changed from 5555555555 to 6666666666.\n' +
        'Good bye!\n'
    );

    // Act: second session reads the saved file
    const second = await runSession('all\nbirthdays\nexit\n');

    // Assert
    expect(second).toBe(
      'Welcome to the assistant bot!\n' +
        'Contacts:\n' +
        'Contact name: John, phones: 1234567890, birthday: 04.01.1990\n' +
        'Contact name: Jane, phones: 6666666666\n' +
        'John: 06.01.2025\n' +
        'Good bye!\n'
    );
  });

  it('should start with an empty book when no file exists', async () => {
    const printed = await runSession('all\nexit\n');

    expect(printed).toBe(
      'Welcome to the assistant bot!\nContacts:\nNo contacts found.\nGood bye!\n'
    );
    const saved = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    expect(saved).toEqual({ version: 1, contacts: [] });
  });
});
