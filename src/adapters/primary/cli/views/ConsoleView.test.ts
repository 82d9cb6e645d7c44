import { ConsoleView, OutputStream } from './ConsoleView';
import { ContactRecord } from '@modules/contact/domain/entities/ContactRecord';

describe('ConsoleView', () => {
  let written: string[];
  let out: OutputStream;
  let view: ConsoleView;

  beforeEach(() => {
    written = [];
    out = {
      write: jest.fn((chunk: string) => {
        written.push(chunk);
        return true;
      }),
    };
    view = new ConsoleView(out);
  });

  describe('displayMessage', () => {
    it('should write the message as one line', () => {
      view.displayMessage('How can I help you?');

      expect(written).toEqual(['How can I help you?\n']);
    });
  });

  describe('displayContacts', () => {
    it('should report an empty book', () => {
      view.displayContacts([]);

      expect(written.join('')).toBe('Contacts:\nNo contacts found.\n');
    });

    it('should list each record on its own line', () => {
      // Arrange
      const john = new ContactRecord('John');
      john.addPhone('1234567890');
      const jane = new ContactRecord('Jane');
      jane.addBirthday('15.03.1990');

      // Act
      view.displayContacts([john, jane]);

      // Assert
      expect(written.join('')).toBe(
        'Contacts:\n' +
          'Contact name: John, phones: 1234567890\n' +
          'Contact name: Jane, phones: , birthday: 15.03.1990\n'
      );
    });
  });

  describe('displayHelp', () => {
    it('should indent each usage line under a header', () => {
      view.displayHelp([
        { usage: 'hello', description: 'Get a greeting from the bot.' },
        { usage: 'all', description: 'Show all contacts.' },
      ]);

      expect(written.join('')).toBe(
        'Available commands:\n' +
          '    hello - Get a greeting from the bot.\n' +
          '    all - Show all contacts.\n'
      );
    });
  });
});
