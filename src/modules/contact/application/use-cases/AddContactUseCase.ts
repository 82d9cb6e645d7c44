import { AddContactDTO, AddContactSchema } from '@shared/validation/schemas';
import { AddressBook } from '../../domain/entities/AddressBook';
import { ContactRecord } from '../../domain/entities/ContactRecord';
import { PhoneNumber } from '../../domain/value-objects/PhoneNumber';

export interface AddContactResult {
  record: ContactRecord;
  created: boolean;
}

/**
 * AddContactUseCase - Creates a contact or adds a phone to an existing one
 *
 * **Rules:**
 * - A new name creates a record holding the phone
 * - An existing name gets the phone appended unless it already has it
 * - The phone is validated before the book changes, so a rejected phone never
 *   leaves an empty record behind
 */
export class AddContactUseCase {
  public constructor(private readonly addressBook: AddressBook) {}

  /**
   * @throws ZodError if input validation fails
   * @throws InvalidPhoneNumberError if the phone is not exactly 10 digits
   */
  public execute(dto: AddContactDTO): AddContactResult {
    const { name, phone } = AddContactSchema.parse(dto);
    const phoneNumber = new PhoneNumber(phone);

    const existing = this.addressBook.find(name);
    if (existing) {
      if (!existing.findPhone(phoneNumber.toString())) {
        existing.addPhone(phoneNumber.toString());
      }
      return { record: existing, created: false };
    }

    const record = new ContactRecord(name);
    record.addPhone(phoneNumber.toString());
    this.addressBook.addRecord(record);
    return { record, created: true };
  }
}
