import { DateTime } from 'luxon';
import { ContactRecord } from './ContactRecord';
import { DISPLAY_DATE_FORMAT } from '../value-objects/Birthday';

/**
 * Default look-ahead for birthday reminders, today included
 */
export const DEFAULT_BIRTHDAY_WINDOW_DAYS = 7;

export interface UpcomingBirthday {
  name: string;
  /** Weekend-adjusted date formatted as dd.MM.yyyy */
  congratulationDate: string;
}

/**
 * AddressBook aggregate
 * Maps contact names to records, one record per name
 */
export class AddressBook {
  private readonly data: Map<string, ContactRecord> = new Map();

  public constructor(records: Iterable<ContactRecord> = []) {
    for (const record of records) {
      this.addRecord(record);
    }
  }

  public get size(): number {
    return this.data.size;
  }

  /**
   * Inserts the record, replacing any record with the same name
   */
  public addRecord(record: ContactRecord): void {
    this.data.set(record.name.toString(), record);
  }

  public find(name: string): ContactRecord | null {
    return this.data.get(name) ?? null;
  }

  /**
   * Removes the record with the given name
   * @returns true if a record was removed, false if there was none
   */
  public delete(name: string): boolean {
    return this.data.delete(name);
  }

  public records(): ContactRecord[] {
    return Array.from(this.data.values());
  }

  /**
   * Lists contacts whose next birthday falls within [today, today + days]
   *
   * A birthday that already passed this year is projected into next year.
   * Birthdays landing on Saturday or Sunday are congratulated on the following Monday.
   *
   * @param today The reference date; only its calendar day matters
   * @param days Size of the look-ahead window in days
   */
  public getUpcomingBirthdays(
    today: DateTime = DateTime.now(),
    days: number = DEFAULT_BIRTHDAY_WINDOW_DAYS
  ): UpcomingBirthday[] {
    const start = DateTime.local(today.year, today.month, today.day);
    const upcoming: UpcomingBirthday[] = [];

    for (const record of this.data.values()) {
      if (!record.birthday) {
        continue;
      }

      const next = record.birthday.calculateNextOccurrence(start);
      // Rounded so a DST shift inside the window does not produce fractional days
      const daysUntil = Math.round(next.diff(start, 'days').days);
      if (daysUntil < 0 || daysUntil > days) {
        continue;
      }

      upcoming.push({
        name: record.name.toString(),
        congratulationDate: AddressBook.congratulationDate(next).toFormat(DISPLAY_DATE_FORMAT),
      });
    }

    return upcoming;
  }

  /**
   * Rolls a weekend date forward to Monday; weekdays are returned unchanged
   */
  public static congratulationDate(date: DateTime): DateTime {
    // Luxon weekdays: 1 = Monday ... 6 = Saturday, 7 = Sunday
    if (date.weekday >= 6) {
      return date.plus({ days: 8 - date.weekday });
    }
    return date;
  }

  public toString(): string {
    return this.records()
      .map((record) => record.toString())
      .join('\n');
  }
}
