import { Collection, type ChatInputCommandInteraction } from 'discord.js';

export type CommandExecutor = (interaction: ChatInputCommandInteraction) => Promise<void> | void;

export interface CommandRouter {
  register: (name: string, handler: CommandExecutor) => void;
  /** Runs the handler for the interaction's command; resolves false when none is registered. */
  dispatch: (interaction: ChatInputCommandInteraction) => Promise<boolean>;
  has: (name: string) => boolean;
  names: () => string[];
}

export function createCommandRouter(): CommandRouter {
  const handlers = new Collection<string, CommandExecutor>();

  return {
    register: (name, handler) => {
      if (handlers.has(name)) {
        throw new Error(`A handler is already registered for command "${name}"`);
      }
      handlers.set(name, handler);
    },
    has: (name) => handlers.has(name),
    names: () => [...handlers.keys()],
    async dispatch(interaction) {
      const handler = handlers.get(interaction.commandName);
      if (!handler) {
        return false;
      }
      await handler(interaction);
      return true;
    },
  };
}
