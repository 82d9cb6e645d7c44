import { RemovePhoneDTO, RemovePhoneSchema } from '@shared/validation/schemas';
import { AddressBook } from '../../domain/entities/AddressBook';
import { ContactRecord } from '../../domain/entities/ContactRecord';
import { ContactNotFoundError } from '../../../../domain/errors/ContactNotFoundError';

/**
 * RemovePhoneUseCase - Drops a phone number from a contact
 */
export class RemovePhoneUseCase {
  public constructor(private readonly addressBook: AddressBook) {}

  /**
   * @throws ContactNotFoundError if the contact does not exist
   * @throws ValidationError if the phone is not on the record
   */
  public execute(dto: RemovePhoneDTO): ContactRecord {
    const { name, phone } = RemovePhoneSchema.parse(dto);

    const record = this.addressBook.find(name);
    if (!record) {
      throw new ContactNotFoundError(name);
    }

    record.removePhone(phone);
    return record;
  }
}
