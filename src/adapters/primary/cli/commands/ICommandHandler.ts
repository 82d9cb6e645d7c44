import type { ContactRecord } from '@modules/contact/domain/entities/ContactRecord';

/**
 * What a command asks the view to show
 */
export type CommandOutput =
  | { type: 'message'; text: string }
  | { type: 'contacts'; records: readonly ContactRecord[] }
  | { type: 'help' };

/**
 * ICommandHandler - Strategy for one assistant command
 *
 * Handlers throw domain errors freely; the dispatcher turns them into user-facing
 * messages, so a handler never formats its own failures.
 */
/* eslint-disable @typescript-eslint/naming-convention */
export interface ICommandHandler {
  /** Primary command word, lower-case */
  readonly command: string;
  /** Other words that run the same handler */
  readonly aliases?: readonly string[];
  /** Shown in help, e.g. 'add [name] [phone]' */
  readonly usage: string;
  readonly description: string;
  /** Whether a successful run ends the session */
  readonly terminal?: boolean;

  execute(args: readonly string[]): CommandOutput | Promise<CommandOutput>;
}

export const message = (text: string): CommandOutput => ({ type: 'message', text });
