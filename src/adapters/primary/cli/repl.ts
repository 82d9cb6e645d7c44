import * as readline from 'readline';
import type { ILogger } from '@shared/logger';
import { CommandDispatcher } from './CommandDispatcher';
import type { IAssistantView } from './views/IAssistantView';

export const WELCOME_MESSAGE = 'Welcome to the assistant bot!';
export const PROMPT = 'Enter a command: ';

export interface ReplStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Treat the input as a TTY (keypresses, Ctrl+C); detected from the output when omitted */
  terminal?: boolean;
}

/**
 * Runs the prompt loop until a terminal command succeeds
 *
 * End of input (Ctrl+D) and Ctrl+C are handled as `exit`, so the book is
 * saved however the session ends. If that final save fails there is no
 * prompt left to retry from, and the loss is logged at error level.
 */
export async function runRepl(
  dispatcher: CommandDispatcher,
  view: IAssistantView,
  logger: ILogger,
  streams: ReplStreams = { input: process.stdin, output: process.stdout }
): Promise<void> {
  const rl = readline.createInterface({
    input: streams.input,
    output: streams.output,
    prompt: PROMPT,
    terminal: streams.terminal,
  });
  rl.on('SIGINT', () => rl.close());

  view.displayMessage(WELCOME_MESSAGE);
  rl.prompt();

  for await (const line of rl) {
    const state = await dispatcher.dispatch(line);
    if (state === 'terminated') {
      rl.close();
      return;
    }
    rl.prompt();
  }

  if (dispatcher.state === 'running') {
    const state = await dispatcher.dispatch('exit');
    if (state === 'running') {
      logger.error({
        msg: 'Input closed before the address book could be saved; changes are lost',
      });
    }
  }
}
