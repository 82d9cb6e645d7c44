import { DateTime } from 'luxon';
import { AddressBook, UpcomingBirthday } from '../../domain/entities/AddressBook';

/**
 * GetUpcomingBirthdaysUseCase - Lists contacts to congratulate within the window
 *
 * @example
 * ```typescript
 * const useCase = new GetUpcomingBirthdaysUseCase(book, 7);
 * useCase.execute(DateTime.local(2025, 1, 1));
 * // [{ name: 'John', congratulationDate: '03.01.2025' }]
 * ```
 */
export class GetUpcomingBirthdaysUseCase {
  /**
   * @param addressBook - The book to scan
   * @param windowDays - Days to look ahead, today included
   * @param clock - Source of "today"; replaced in tests
   */
  public constructor(
    private readonly addressBook: AddressBook,
    private readonly windowDays: number,
    private readonly clock: () => DateTime = () => DateTime.now()
  ) {}

  public execute(today: DateTime = this.clock()): UpcomingBirthday[] {
    return this.addressBook.getUpcomingBirthdays(today, this.windowDays);
  }
}
