import { DeleteContactUseCase } from './DeleteContactUseCase';
import { AddressBook } from '../../domain/entities/AddressBook';
import { ContactRecord } from '../../domain/entities/ContactRecord';
import { ContactNotFoundError } from '../../../../domain/errors/ContactNotFoundError';

describe('DeleteContactUseCase', () => {
  it('should remove the contact', () => {
    // Arrange
    const book = new AddressBook([new ContactRecord('John'), new ContactRecord('Jane')]);
    const useCase = new DeleteContactUseCase(book);

    // Act
    useCase.execute({ name: 'John' });

    // Assert
    expect(book.find('John')).toBeNull();
    expect(book.size).toBe(1);
  });

  it('should throw ContactNotFoundError for an unknown contact', () => {
    const useCase = new DeleteContactUseCase(new AddressBook());

    expect(() => useCase.execute({ name: 'John' })).toThrow(ContactNotFoundError);
  });
});
