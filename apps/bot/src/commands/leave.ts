import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommand } from './types.js';
import { runMusicCommand } from './utils.js';

export function createLeaveCommand(): ChatInputCommand {
  return {
    data: new SlashCommandBuilder().setName('leave').setDescription('Stop playback and leave the voice channel.'),
    async execute(interaction, context) {
      await runMusicCommand(interaction, context, 'leave', async (guildId) => {
        await context.music.leave(guildId);
        return '⏹️ Stopped playback and left the voice channel.';
      });
    },
  };
}
