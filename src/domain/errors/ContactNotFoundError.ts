/**
 * ContactNotFoundError - Application-level error for missing contacts
 *
 * Thrown when a use case operates on a name that is not in the address book.
 *
 * **Usage:**
 * ```typescript
 * const record = addressBook.find(name);
 * if (!record) {
 *   throw new ContactNotFoundError(name);
 * }
 * ```
 */
export class ContactNotFoundError extends Error {
  public constructor(contactName: string) {
    super(`Contact not found: ${contactName}`);
    this.name = 'ContactNotFoundError';
    Error.captureStackTrace(this, this.constructor);
  }
}
