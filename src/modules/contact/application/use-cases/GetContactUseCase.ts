import { ContactNameDTO, ContactNameSchema } from '@shared/validation/schemas';
import { AddressBook } from '../../domain/entities/AddressBook';
import { ContactRecord } from '../../domain/entities/ContactRecord';
import { ContactNotFoundError } from '../../../../domain/errors/ContactNotFoundError';

/**
 * GetContactUseCase - Looks a contact up by name
 *
 * Backs the read-only commands (`phone`, `show-birthday`), which format the
 * record's phones or birthday themselves.
 */
export class GetContactUseCase {
  public constructor(private readonly addressBook: AddressBook) {}

  /**
   * @throws ContactNotFoundError if the contact does not exist
   */
  public execute(dto: ContactNameDTO): ContactRecord {
    const { name } = ContactNameSchema.parse(dto);

    const record = this.addressBook.find(name);
    if (!record) {
      throw new ContactNotFoundError(name);
    }
    return record;
  }
}
