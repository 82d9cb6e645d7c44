import { z } from 'zod';

/**
 * Zod schemas for command input and for the persisted address book file
 *
 * Each schema is the single source of truth for:
 * - Runtime validation (via schema.parse())
 * - Compile-time types (via z.infer<>)
 *
 * The domain value objects (PhoneNumber, Birthday) enforce their own rules. Schemas
 * for commands on an existing contact only require the values to be present, so an
 * unknown contact is reported before a malformed value.
 */

const contactName = z.string().trim().min(1, 'Contact name is required');
const phone = z.string().regex(/^\d{10}$/, 'Phone number must contain exactly 10 digits');

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const ContactNameSchema = z.object({
  name: contactName,
});

export type ContactNameDTO = z.infer<typeof ContactNameSchema>;

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const AddContactSchema = z.object({
  name: contactName,
  phone,
});

export type AddContactDTO = z.infer<typeof AddContactSchema>;

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const ChangePhoneSchema = z.object({
  name: contactName,
  oldPhone: z.string().min(1, 'Old phone number is required'),
  newPhone: z.string().min(1, 'New phone number is required'),
});

export type ChangePhoneDTO = z.infer<typeof ChangePhoneSchema>;

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const RemovePhoneSchema = z.object({
  name: contactName,
  phone: z.string().min(1, 'Phone number is required'),
});

export type RemovePhoneDTO = z.infer<typeof RemovePhoneSchema>;

/**
 * Validation Rules:
 * - birthday: presence only; the Birthday value object checks the format once the contact is found
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const SetBirthdaySchema = z.object({
  name: contactName,
  birthday: z.string().min(1, 'Birthday is required'),
});

export type SetBirthdayDTO = z.infer<typeof SetBirthdaySchema>;

/**
 * Current version of the data file layout
 */
export const ADDRESS_BOOK_FILE_VERSION = 1;

/**
 * Zod schema for one persisted contact
 *
 * Phones and birthday are stored as plain strings and re-validated by the
 * domain value objects when the book is loaded.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const PersistedContactSchema = z.object({
  name: z.string().min(1),
  phones: z.array(z.string()),
  birthday: z.string().nullable(),
});

export type PersistedContact = z.infer<typeof PersistedContactSchema>;

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
export const PersistedAddressBookSchema = z.object({
  version: z.literal(ADDRESS_BOOK_FILE_VERSION),
  contacts: z.array(PersistedContactSchema),
});

export type PersistedAddressBook = z.infer<typeof PersistedAddressBookSchema>;
