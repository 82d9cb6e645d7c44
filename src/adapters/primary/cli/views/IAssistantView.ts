import type { ContactRecord } from '@modules/contact/domain/entities/ContactRecord';

export interface HelpEntry {
  usage: string;
  description: string;
}

/**
 * Output port of the assistant. The console is the only implementation today.
 */
/* eslint-disable @typescript-eslint/naming-convention */
export interface IAssistantView {
  displayMessage(message: string): void;
  displayContacts(records: readonly ContactRecord[]): void;
  displayHelp(entries: readonly HelpEntry[]): void;
}
