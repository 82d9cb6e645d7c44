import { DateTime } from 'luxon';
import { AddressBook } from '@modules/contact/domain/entities/AddressBook';
import type { IAddressBookRepository } from '@modules/contact/application/ports/IAddressBookRepository';
import { AddContactUseCase } from '@modules/contact/application/use-cases/AddContactUseCase';
import { ChangePhoneUseCase } from '@modules/contact/application/use-cases/ChangePhoneUseCase';
import { RemovePhoneUseCase } from '@modules/contact/application/use-cases/RemovePhoneUseCase';
import { GetContactUseCase } from '@modules/contact/application/use-cases/GetContactUseCase';
import { SetBirthdayUseCase } from '@modules/contact/application/use-cases/SetBirthdayUseCase';
import { GetUpcomingBirthdaysUseCase } from '@modules/contact/application/use-cases/GetUpcomingBirthdaysUseCase';
import { DeleteContactUseCase } from '@modules/contact/application/use-cases/DeleteContactUseCase';
import { MissingArgumentError } from '../../../../domain/errors/MissingArgumentError';
import { CommandRegistry } from './CommandRegistry';
import { ICommandHandler, message } from './ICommandHandler';

export interface AssistantCommandDependencies {
  addressBook: AddressBook;
  repository: IAddressBookRepository;
  birthdayWindowDays: number;
  clock?: () => DateTime;
}

/**
 * Returns the first `count` arguments
 * @throws MissingArgumentError if fewer were given; extra arguments are ignored
 */
function requireArgs(command: string, args: readonly string[], count: 1): [string];
function requireArgs(command: string, args: readonly string[], count: 2): [string, string];
function requireArgs(
  command: string,
  args: readonly string[],
  count: 3
): [string, string, string];
function requireArgs(command: string, args: readonly string[], count: number): string[] {
  if (args.length < count) {
    throw new MissingArgumentError(command, count, args.length);
  }
  return args.slice(0, count);
}

/**
 * Builds every assistant command, in the order they appear in help
 *
 * Use cases are instantiated once here and shared by the handlers; they all
 * operate on the same in-memory AddressBook that `exit` persists.
 */
export function createAssistantCommands(deps: AssistantCommandDependencies): ICommandHandler[] {
  const { addressBook, repository } = deps;
  const addContact = new AddContactUseCase(addressBook);
  const changePhone = new ChangePhoneUseCase(addressBook);
  const removePhone = new RemovePhoneUseCase(addressBook);
  const getContact = new GetContactUseCase(addressBook);
  const setBirthday = new SetBirthdayUseCase(addressBook);
  const upcomingBirthdays = new GetUpcomingBirthdaysUseCase(
    addressBook,
    deps.birthdayWindowDays,
    deps.clock
  );
  const deleteContact = new DeleteContactUseCase(addressBook);

  return [
    {
      command: 'add',
      usage: 'add [name] [phone]',
      description: 'Add a new contact or add a phone to an existing one.',
      execute: (args) => {
        const [name, phone] = requireArgs('add', args, 2);
        const { created } = addContact.execute({ name, phone });
        return message(created ? 'Contact added.' : 'Contact updated.');
      },
    },
    {
      command: 'change',
      usage: 'change [name] [old_phone] [new_phone]',
      description: 'Change the phone number of a contact.',
      execute: (args) => {
        const [name, oldPhone, newPhone] = requireArgs('change', args, 3);
        changePhone.execute({ name, oldPhone, newPhone });
        return message(`Phone number for ${name} changed from ${oldPhone} to ${newPhone}.`);
      },
    },
    {
      command: 'phone',
      usage: 'phone [name]',
      description: 'Show the phone numbers of a contact.',
      execute: (args) => {
        const [name] = requireArgs('phone', args, 1);
        const record = getContact.execute({ name });
        const phones = record.phones.map((phone) => phone.toString()).join('; ');
        return message(phones ? `${name}'s phones: ${phones}` : `${name} has no phone numbers.`);
      },
    },
    {
      command: 'remove-phone',
      usage: 'remove-phone [name] [phone]',
      description: 'Remove a phone number from a contact.',
      execute: (args) => {
        const [name, phone] = requireArgs('remove-phone', args, 2);
        removePhone.execute({ name, phone });
        return message(`Phone ${phone} removed from ${name}.`);
      },
    },
    {
      command: 'all',
      usage: 'all',
      description: 'Show all contacts.',
      execute: () => ({ type: 'contacts', records: addressBook.records() }),
    },
    {
      command: 'add-birthday',
      usage: 'add-birthday [name] [DD.MM.YYYY]',
      description: 'Add a birthday to a contact.',
      execute: (args) => {
        const [name, birthday] = requireArgs('add-birthday', args, 2);
        setBirthday.execute({ name, birthday });
        return message('Birthday added.');
      },
    },
    {
      command: 'show-birthday',
      usage: 'show-birthday [name]',
      description: 'Show the birthday of a contact.',
      execute: (args) => {
        const [name] = requireArgs('show-birthday', args, 1);
        const { birthday } = getContact.execute({ name });
        return message(birthday ? birthday.toString() : 'Birthday not found for this contact.');
      },
    },
    {
      command: 'birthdays',
      usage: 'birthdays',
      description: `Show birthdays to congratulate within ${deps.birthdayWindowDays} days.`,
      execute: () => {
        const upcoming = upcomingBirthdays.execute();
        if (upcoming.length === 0) {
          return message('No upcoming birthdays.');
        }
        return message(upcoming.map((b) => `${b.name}: ${b.congratulationDate}`).join('\n'));
      },
    },
    {
      command: 'delete',
      usage: 'delete [name]',
      description: 'Delete a contact.',
      execute: (args) => {
        const [name] = requireArgs('delete', args, 1);
        deleteContact.execute({ name });
        return message('Contact deleted.');
      },
    },
    {
      command: 'hello',
      usage: 'hello',
      description: 'Get a greeting from the bot.',
      execute: () => message('How can I help you?'),
    },
    {
      command: 'help',
      usage: 'help',
      description: 'Show this list of commands.',
      execute: () => ({ type: 'help' }),
    },
    {
      command: 'exit',
      aliases: ['close'],
      usage: 'close or exit',
      description: 'Save the contacts and exit the program.',
      terminal: true,
      execute: async () => {
        await repository.save(addressBook);
        return message('Good bye!');
      },
    },
  ];
}

export function createCommandRegistry(deps: AssistantCommandDependencies): CommandRegistry {
  const registry = new CommandRegistry();
  for (const handler of createAssistantCommands(deps)) {
    registry.register(handler);
  }
  return registry;
}
