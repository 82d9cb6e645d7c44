import { ValidationError } from '../../../../domain/errors/ValidationError';

/**
 * ContactName value object
 * Key of a contact in the address book; cannot change once a record exists
 */
export class ContactName {
  private readonly value: string;

  public constructor(value: string) {
    if (!value || value.trim().length === 0) {
      throw new ValidationError('Contact name cannot be empty');
    }
    this.value = value.trim();
  }

  public toString(): string {
    return this.value;
  }

  public equals(other: ContactName): boolean {
    return this.value === other.value;
  }
}
