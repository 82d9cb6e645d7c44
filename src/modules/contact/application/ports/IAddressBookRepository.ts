import { AddressBook } from '../../domain/entities/AddressBook';

/**
 * Repository interface for AddressBook persistence.
 *
 * The whole book is read once on startup and written once on exit; there are no
 * per-record operations because nothing else touches the data between runs.
 *
 * Note: The 'I' prefix for port interfaces follows the Hexagonal Architecture
 * naming used across the project.
 */
/* eslint-disable @typescript-eslint/naming-convention */
export interface IAddressBookRepository {
  /**
   * Loads the address book.
   *
   * @returns Promise resolving to the stored book, or an empty book when nothing is stored yet
   * @throws InfrastructureError if stored data exists but cannot be read or parsed
   */
  load(): Promise<AddressBook>;

  /**
   * Replaces the stored data with the given book.
   *
   * @throws InfrastructureError if the data cannot be written
   */
  save(book: AddressBook): Promise<void>;
}
