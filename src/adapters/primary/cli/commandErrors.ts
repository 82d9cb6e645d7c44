import { ZodError } from 'zod';
import type { ILogger } from '@shared/logger';
import { ValidationError } from '../../../domain/errors/ValidationError';
import { MissingArgumentError } from '../../../domain/errors/MissingArgumentError';
import { ContactNotFoundError } from '../../../domain/errors/ContactNotFoundError';
import { CommandOutput, message } from './commands/ICommandHandler';

export const ERROR_MESSAGES = {
  invalidValue: 'Give me correct data please.',
  missingArgument: 'Enter user name and the required arguments please.',
  notFound: 'Contact not found.',
} as const;

/**
 * Maps a failure to the fixed user-facing message for its category
 */
export function describeCommandError(error: unknown): string {
  if (error instanceof ValidationError || error instanceof ZodError) {
    return ERROR_MESSAGES.invalidValue;
  }
  if (error instanceof MissingArgumentError) {
    return ERROR_MESSAGES.missingArgument;
  }
  if (error instanceof ContactNotFoundError) {
    return ERROR_MESSAGES.notFound;
  }
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}

export interface CommandRunResult {
  ok: boolean;
  output: CommandOutput;
}

/**
 * Runs a command and converts any failure into a message, so nothing thrown by
 * a handler reaches the REPL loop. Unexpected failures are logged with their stack.
 */
export async function runCommand(
  command: string,
  action: () => CommandOutput | Promise<CommandOutput>,
  logger: ILogger
): Promise<CommandRunResult> {
  try {
    return { ok: true, output: await action() };
  } catch (error) {
    const text = describeCommandError(error);
    if (text.startsWith('Error: ')) {
      logger.error({
        msg: 'Command failed unexpectedly',
        command,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
    } else {
      logger.debug({ msg: 'Command rejected', command, reason: text });
    }
    return { ok: false, output: message(text) };
  }
}
