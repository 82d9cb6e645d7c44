import type { ILogger } from '@shared/logger';
import { InvalidStateTransitionError } from '../../../domain/errors/InvalidStateTransitionError';
import { CommandRegistry } from './commands/CommandRegistry';
import { CommandOutput } from './commands/ICommandHandler';
import { runCommand } from './commandErrors';
import { parseInput } from './parseInput';
import type { IAssistantView } from './views/IAssistantView';

export type DispatcherState = 'running' | 'terminated';

export const INVALID_COMMAND_MESSAGE = 'Invalid command.';

/**
 * CommandDispatcher - Routes one line of input to its command handler
 *
 * **States:**
 * - running: accepts input
 * - terminated: reached after a terminal command (exit/close) succeeds; no further input
 *
 * Blank lines and unknown commands print a generic message and leave the state alone.
 * A terminal command that fails (e.g. the save on exit) keeps the session running so
 * the user can retry.
 */
export class CommandDispatcher {
  private currentState: DispatcherState = 'running';

  public constructor(
    private readonly registry: CommandRegistry,
    private readonly view: IAssistantView,
    private readonly logger: ILogger
  ) {}

  public get state(): DispatcherState {
    return this.currentState;
  }

  /**
   * Handle one line of input
   *
   * @returns The state after the line was handled
   * @throws InvalidStateTransitionError if called after termination
   */
  public async dispatch(line: string): Promise<DispatcherState> {
    if (this.currentState === 'terminated') {
      throw new InvalidStateTransitionError('terminated', 'running');
    }

    const input = parseInput(line);
    const handler = input ? this.registry.find(input.command) : null;
    if (!input || !handler) {
      this.view.displayMessage(INVALID_COMMAND_MESSAGE);
      return this.currentState;
    }

    const result = await runCommand(input.command, () => handler.execute(input.args), this.logger);
    this.render(result.output);

    if (result.ok && handler.terminal) {
      this.currentState = 'terminated';
      this.logger.debug({ msg: 'Session terminated', command: input.command });
    }
    return this.currentState;
  }

  private render(output: CommandOutput): void {
    switch (output.type) {
      case 'message':
        this.view.displayMessage(output.text);
        break;
      case 'contacts':
        this.view.displayContacts(output.records);
        break;
      case 'help':
        this.view.displayHelp(this.registry.getHelpEntries());
        break;
    }
  }
}
