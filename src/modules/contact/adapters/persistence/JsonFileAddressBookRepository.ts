import * as fs from 'fs/promises';
import * as path from 'path';
import { ZodError } from 'zod';
import { IAddressBookRepository } from '@modules/contact/application/ports/IAddressBookRepository';
import { AddressBook } from '@modules/contact/domain/entities/AddressBook';
import { PersistedAddressBookSchema } from '@shared/validation/schemas';
import type { ILogger } from '@shared/logger';
import { InfrastructureError } from '../../../../domain/errors/InfrastructureError';
import { DomainError } from '../../../../domain/errors/DomainError';
import { addressBookToDomain, addressBookToPersisted } from './mappers/addressBookMapper';

// fs errors may come from another realm (e.g. under a test VM), so check the shape
const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

/**
 * JsonFileAddressBookRepository - Stores the whole book in a single JSON file
 *
 * **File layout:**
 * ```json
 * {
 *   "version": 1,
 *   "contacts": [{ "name": "John", "phones": ["1234567890"], "birthday": "15.03.1990" }]
 * }
 * ```
 *
 * A missing file loads as an empty book. Every save overwrites the file whole.
 */
export class JsonFileAddressBookRepository implements IAddressBookRepository {
  public constructor(
    private readonly filePath: string,
    private readonly logger: ILogger
  ) {}

  public async load(): Promise<AddressBook> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        this.logger.info({ msg: 'No address book file, starting empty', file: this.filePath });
        return new AddressBook();
      }
      throw new InfrastructureError(`Failed to read address book file ${this.filePath}`, error);
    }

    try {
      const data = PersistedAddressBookSchema.parse(JSON.parse(content));
      const book = addressBookToDomain(data);
      this.logger.debug({ msg: 'Address book loaded', file: this.filePath, contacts: book.size });
      return book;
    } catch (error) {
      if (error instanceof SyntaxError || error instanceof ZodError || error instanceof DomainError) {
        this.logger.error({
          msg: 'Address book file is corrupt',
          file: this.filePath,
          error: error.message,
        });
        throw new InfrastructureError(`Address book file ${this.filePath} is corrupt`, error);
      }
      throw error;
    }
  }

  public async save(book: AddressBook): Promise<void> {
    const content = `${JSON.stringify(addressBookToPersisted(book), null, 2)}\n`;

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, content, 'utf-8');
    } catch (error) {
      throw new InfrastructureError(`Failed to write address book file ${this.filePath}`, error);
    }

    this.logger.debug({ msg: 'Address book saved', file: this.filePath, contacts: book.size });
  }
}
