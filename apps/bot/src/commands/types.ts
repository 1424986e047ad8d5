import type { ChatInputCommandInteraction, SlashCommandBuilder, SlashCommandOptionsOnlyBuilder } from 'discord.js';
import type { Logger } from '@cadence/logger';
import type { MusicService } from '../services/music.js';

export type MusicCommands = Pick<MusicService, 'play' | 'pause' | 'resume' | 'skip' | 'seek' | 'setVolume' | 'leave'>;

export interface CommandContext {
  logger: Logger;
  music: MusicCommands;
}

export interface ChatInputCommand {
  data: SlashCommandBuilder | SlashCommandOptionsOnlyBuilder;
  execute: (interaction: ChatInputCommandInteraction, context: CommandContext) => Promise<void>;
}
