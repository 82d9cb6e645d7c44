import { ContactRecord } from './ContactRecord';
import { ValidationError } from '../../../../domain/errors/ValidationError';
import { InvalidPhoneNumberError } from '../../../../domain/errors/InvalidPhoneNumberError';
import { InvalidBirthdayError } from '../../../../domain/errors/InvalidBirthdayError';

describe('ContactRecord', () => {
  let record: ContactRecord;

  beforeEach(() => {
    record = new ContactRecord('John');
  });

  describe('constructor', () => {
    it('should start with no phones and no birthday', () => {
      expect(record.name.toString()).toBe('John');
      expect(record.phones).toEqual([]);
      expect(record.birthday).toBeNull();
    });

    it('should throw ValidationError for an empty name', () => {
      expect(() => new ContactRecord('')).toThrow(ValidationError);
    });
  });

  describe('addPhone / findPhone / removePhone', () => {
    it('should find a phone after adding it', () => {
      // Arrange
      record.addPhone('1234567890');

      // Act
      const found = record.findPhone('1234567890');

      // Assert
      expect(found?.toString()).toBe('1234567890');
    });

    it('should return null after the phone is removed', () => {
      // Arrange
      record.addPhone('1234567890');

      // Act
      record.removePhone('1234567890');

      // Assert
      expect(record.findPhone('1234567890')).toBeNull();
      expect(record.phones).toHaveLength(0);
    });

    it('should keep phones in insertion order', () => {
      record.addPhone('1111111111');
      record.addPhone('2222222222');

      expect(record.phones.map((p) => p.toString())).toEqual(['1111111111', '2222222222']);
    });

    it('should reject an invalid phone and leave the list unchanged', () => {
      expect(() => record.addPhone('12345')).toThrow(InvalidPhoneNumberError);
      expect(record.phones).toHaveLength(0);
    });

    it('should throw ValidationError when removing an unknown phone', () => {
      expect(() => record.removePhone('1234567890')).toThrow(ValidationError);
    });
  });

  describe('editPhone', () => {
    it('should replace the old phone with the new one', () => {
      // Arrange
      record.addPhone('1111111111');
      record.addPhone('2222222222');

      // Act
      record.editPhone('1111111111', '3333333333');

      // Assert
      expect(record.phones.map((p) => p.toString())).toEqual(['2222222222', '3333333333']);
    });

    it('should throw ValidationError when the old phone is missing', () => {
      record.addPhone('1111111111');

      expect(() => record.editPhone('9999999999', '3333333333')).toThrow(ValidationError);
      expect(record.phones.map((p) => p.toString())).toEqual(['1111111111']);
    });

    it('should keep the old phone when the new one is invalid', () => {
      record.addPhone('1111111111');

      expect(() => record.editPhone('1111111111', 'abc')).toThrow(InvalidPhoneNumberError);
      expect(record.phones.map((p) => p.toString())).toEqual(['1111111111']);
    });
  });

  describe('addBirthday', () => {
    it('should set the birthday', () => {
      record.addBirthday('15.03.1990');

      expect(record.birthday?.toString()).toBe('15.03.1990');
    });

    it('should overwrite an existing birthday', () => {
      record.addBirthday('15.03.1990');
      record.addBirthday('16.03.1990');

      expect(record.birthday?.toString()).toBe('16.03.1990');
    });

    it('should keep the previous birthday when the new one is malformed', () => {
      record.addBirthday('15.03.1990');

      expect(() => record.addBirthday('31.02.2024')).toThrow(InvalidBirthdayError);
      expect(record.birthday?.toString()).toBe('15.03.1990');
    });
  });

  describe('toString', () => {
    it('should list phones without a birthday', () => {
      record.addPhone('1111111111');
      record.addPhone('2222222222');

      expect(record.toString()).toBe('Contact name: John, phones: 1111111111; 2222222222');
    });

    it('should include the birthday when set', () => {
      record.addPhone('1111111111');
      record.addBirthday('15.03.1990');

      expect(record.toString()).toBe(
        'Contact name: John, phones: 1111111111, birthday: 15.03.1990'
      );
    });
  });
});
