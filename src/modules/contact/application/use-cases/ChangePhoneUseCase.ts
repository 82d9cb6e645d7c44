import { ChangePhoneDTO, ChangePhoneSchema } from '@shared/validation/schemas';
import { AddressBook } from '../../domain/entities/AddressBook';
import { ContactRecord } from '../../domain/entities/ContactRecord';
import { ContactNotFoundError } from '../../../../domain/errors/ContactNotFoundError';

/**
 * ChangePhoneUseCase - Replaces one phone number of a contact
 */
export class ChangePhoneUseCase {
  public constructor(private readonly addressBook: AddressBook) {}

  /**
   * @throws ZodError if input validation fails
   * @throws ContactNotFoundError if the contact does not exist
   * @throws ValidationError if the old phone is not on the record or the new one is invalid
   */
  public execute(dto: ChangePhoneDTO): ContactRecord {
    const { name, oldPhone, newPhone } = ChangePhoneSchema.parse(dto);

    const record = this.addressBook.find(name);
    if (!record) {
      throw new ContactNotFoundError(name);
    }

    record.editPhone(oldPhone, newPhone);
    return record;
  }
}
