import type { ContactRecord } from '@modules/contact/domain/entities/ContactRecord';
import type { HelpEntry, IAssistantView } from './IAssistantView';

/**
 * Anything with a write method; process.stdout in production
 */
export interface OutputStream {
  write(chunk: string): unknown;
}

/**
 * ConsoleView - Writes assistant output as plain lines
 */
export class ConsoleView implements IAssistantView {
  public constructor(private readonly out: OutputStream = process.stdout) {}

  public displayMessage(message: string): void {
    this.out.write(`${message}\n`);
  }

  public displayContacts(records: readonly ContactRecord[]): void {
    this.displayMessage('Contacts:');
    if (records.length === 0) {
      this.displayMessage('No contacts found.');
      return;
    }
    this.displayMessage(records.map((record) => record.toString()).join('\n'));
  }

  public displayHelp(entries: readonly HelpEntry[]): void {
    const lines = entries.map((entry) => `    ${entry.usage} - ${entry.description}`);
    this.displayMessage(['Available commands:', ...lines].join('\n'));
  }
}
