import { ContactNameDTO, ContactNameSchema } from '@shared/validation/schemas';
import { AddressBook } from '../../domain/entities/AddressBook';
import { ContactNotFoundError } from '../../../../domain/errors/ContactNotFoundError';

/**
 * DeleteContactUseCase - Removes a contact from the book
 *
 * The book itself ignores unknown names; this use case reports them so the
 * user learns about a typo instead of seeing a silent success.
 */
export class DeleteContactUseCase {
  public constructor(private readonly addressBook: AddressBook) {}

  /**
   * @throws ContactNotFoundError if the contact does not exist
   */
  public execute(dto: ContactNameDTO): void {
    const { name } = ContactNameSchema.parse(dto);

    if (!this.addressBook.delete(name)) {
      throw new ContactNotFoundError(name);
    }
  }
}
