import { ContactName } from '../value-objects/ContactName';
import { PhoneNumber } from '../value-objects/PhoneNumber';
import { Birthday } from '../value-objects/Birthday';
import { ValidationError } from '../../../../domain/errors/ValidationError';

/**
 * ContactRecord entity
 * One contact: an immutable name, an ordered list of phones and an optional birthday.
 * Unlike the value objects it wraps, a record is mutated in place.
 */
export class ContactRecord {
  public readonly name: ContactName;
  private phoneList: PhoneNumber[] = [];
  private birthdayValue: Birthday | null = null;

  public constructor(name: string | ContactName) {
    this.name = typeof name === 'string' ? new ContactName(name) : name;
  }

  public get phones(): readonly PhoneNumber[] {
    return this.phoneList;
  }

  public get birthday(): Birthday | null {
    return this.birthdayValue;
  }

  /**
   * Appends a phone number
   * @throws InvalidPhoneNumberError if the value is not exactly 10 digits
   */
  public addPhone(phone: string): PhoneNumber {
    const phoneNumber = new PhoneNumber(phone);
    this.phoneList.push(phoneNumber);
    return phoneNumber;
  }

  public findPhone(phone: string): PhoneNumber | null {
    return this.phoneList.find((p) => p.toString() === phone) ?? null;
  }

  /**
   * @throws ValidationError if the phone is not on this record
   */
  public removePhone(phone: string): void {
    const index = this.phoneList.findIndex((p) => p.toString() === phone);
    if (index === -1) {
      throw new ValidationError(`Phone ${phone} not found for ${this.name.toString()}`);
    }
    this.phoneList.splice(index, 1);
  }

  /**
   * Replaces an existing phone. The new number is validated before anything is removed,
   * so a failed edit leaves the record untouched.
   * @throws ValidationError if oldPhone is not on this record
   * @throws InvalidPhoneNumberError if newPhone is invalid
   */
  public editPhone(oldPhone: string, newPhone: string): void {
    if (!this.findPhone(oldPhone)) {
      throw new ValidationError(`Phone ${oldPhone} not found for ${this.name.toString()}`);
    }
    this.addPhone(newPhone);
    this.removePhone(oldPhone);
  }

  /**
   * Sets or overwrites the birthday
   * @throws InvalidBirthdayError on a malformed or impossible date
   */
  public addBirthday(birthday: string): Birthday {
    this.birthdayValue = new Birthday(birthday);
    return this.birthdayValue;
  }

  public toString(): string {
    const phones = this.phoneList.map((p) => p.toString()).join('; ');
    const birthday = this.birthdayValue ? `, birthday: ${this.birthdayValue.toString()}` : '';
    return `Contact name: ${this.name.toString()}, phones: ${phones}${birthday}`;
  }
}
