import { DateTime } from 'luxon';
import { InvalidBirthdayError } from '../../../../domain/errors/InvalidBirthdayError';

/**
 * Input format: day and month may have one or two digits, the year has four.
 */
export const BIRTHDAY_INPUT_FORMAT = 'd.M.yyyy';

/**
 * Format used when reporting dates back to the user.
 */
export const DISPLAY_DATE_FORMAT = 'dd.MM.yyyy';

const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;

/**
 * Birthday value object
 * Holds the date string exactly as entered, validated as a real calendar date
 */
export class Birthday {
  private readonly raw: string;
  private readonly value: DateTime;

  public constructor(dateString: string) {
    const parsed = DateTime.fromFormat(dateString, BIRTHDAY_INPUT_FORMAT);
    if (!parsed.isValid) {
      throw new InvalidBirthdayError(dateString);
    }
    this.raw = dateString;
    this.value = parsed;
  }

  /**
   * Returns the month and day of the birthday
   */
  public getMonthDay(): { month: number; day: number } {
    return { month: this.value.month, day: this.value.day };
  }

  /**
   * Projects the birthday onto the given year.
   * 29 February lands on 1 March when the year has no such day.
   */
  public occurrenceIn(year: number): DateTime {
    const { month, day } = this.getMonthDay();
    if (month === 2 && day === 29 && !isLeapYear(year)) {
      return DateTime.local(year, 3, 1);
    }
    return DateTime.local(year, month, day);
  }

  /**
   * Calculates the next occurrence of this birthday on or after the reference date
   * @param referenceDate The reference date (defaults to now); only its calendar day matters
   */
  public calculateNextOccurrence(referenceDate: DateTime = DateTime.now()): DateTime {
    const today = DateTime.local(referenceDate.year, referenceDate.month, referenceDate.day);
    const thisYear = this.occurrenceIn(today.year);

    if (thisYear < today) {
      return this.occurrenceIn(today.year + 1);
    }
    return thisYear;
  }

  /**
   * Returns the date as it was entered
   */
  public toString(): string {
    return this.raw;
  }

  public equals(other: Birthday): boolean {
    return this.value.equals(other.value);
  }
}
