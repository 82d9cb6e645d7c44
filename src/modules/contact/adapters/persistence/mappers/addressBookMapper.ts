import {
  ADDRESS_BOOK_FILE_VERSION,
  PersistedAddressBook,
  PersistedContact,
} from '@shared/validation/schemas';
import { AddressBook } from '@modules/contact/domain/entities/AddressBook';
import { ContactRecord } from '@modules/contact/domain/entities/ContactRecord';

/**
 * Converts a persisted contact to a domain ContactRecord
 *
 * Phones and birthday go through the same value objects as user input, so a
 * hand-edited file cannot smuggle in values the commands would reject.
 *
 * @throws ValidationError if a stored value no longer passes validation
 */
export function contactToDomain(contact: PersistedContact): ContactRecord {
  const record = new ContactRecord(contact.name);
  for (const phone of contact.phones) {
    record.addPhone(phone);
  }
  if (contact.birthday !== null) {
    record.addBirthday(contact.birthday);
  }
  return record;
}

export function contactToPersisted(record: ContactRecord): PersistedContact {
  return {
    name: record.name.toString(),
    phones: record.phones.map((phone) => phone.toString()),
    birthday: record.birthday ? record.birthday.toString() : null,
  };
}

export function addressBookToDomain(data: PersistedAddressBook): AddressBook {
  return new AddressBook(data.contacts.map(contactToDomain));
}

export function addressBookToPersisted(book: AddressBook): PersistedAddressBook {
  return {
    version: ADDRESS_BOOK_FILE_VERSION,
    contacts: book.records().map(contactToPersisted),
  };
}
