import type { HelpEntry } from '../views/IAssistantView';
import { ICommandHandler } from './ICommandHandler';

/**
 * CommandRegistry - Registry of assistant commands (Strategy Pattern)
 *
 * Maps every command word and alias to its handler. Help text is derived from
 * the registered handlers in registration order.
 */
export class CommandRegistry {
  private handlers: Map<string, ICommandHandler> = new Map();
  private ordered: ICommandHandler[] = [];

  /**
   * Register a handler under its command and aliases
   *
   * @throws Error if any of its words is already registered
   */
  public register(handler: ICommandHandler): void {
    const words = [handler.command, ...(handler.aliases ?? [])];
    for (const word of words) {
      if (this.handlers.has(word)) {
        throw new Error(`Command "${word}" is already registered`);
      }
    }
    for (const word of words) {
      this.handlers.set(word, handler);
    }
    this.ordered.push(handler);
  }

  /**
   * @returns The handler for the word, or null if none is registered
   */
  public find(word: string): ICommandHandler | null {
    return this.handlers.get(word) ?? null;
  }

  public getHelpEntries(): HelpEntry[] {
    return this.ordered.map((handler) => ({
      usage: handler.usage,
      description: handler.description,
    }));
  }
}
