import { SetBirthdayDTO, SetBirthdaySchema } from '@shared/validation/schemas';
import { AddressBook } from '../../domain/entities/AddressBook';
import { Birthday } from '../../domain/value-objects/Birthday';
import { ContactNotFoundError } from '../../../../domain/errors/ContactNotFoundError';

/**
 * SetBirthdayUseCase - Sets or overwrites a contact's birthday
 */
export class SetBirthdayUseCase {
  public constructor(private readonly addressBook: AddressBook) {}

  /**
   * @throws ZodError if the name or date is missing
   * @throws ContactNotFoundError if the contact does not exist
   * @throws InvalidBirthdayError if the date is not a real DD.MM.YYYY date
   */
  public execute(dto: SetBirthdayDTO): Birthday {
    const { name, birthday } = SetBirthdaySchema.parse(dto);

    const record = this.addressBook.find(name);
    if (!record) {
      throw new ContactNotFoundError(name);
    }

    return record.addBirthday(birthday);
  }
}
