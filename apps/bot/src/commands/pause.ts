import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommand } from './types.js';
import { runMusicCommand } from './utils.js';

export function createPauseCommand(): ChatInputCommand {
  return {
    data: new SlashCommandBuilder().setName('pause').setDescription('Pause the current track.'),
    async execute(interaction, context) {
      await runMusicCommand(interaction, context, 'pause', async (guildId) =>
        (await context.music.pause(guildId)) ? '⏸️ Paused the current track.' : 'Playback is already paused.',
      );
    },
  };
}

export function createResumeCommand(): ChatInputCommand {
  return {
    data: new SlashCommandBuilder().setName('resume').setDescription('Resume paused playback.'),
    async execute(interaction, context) {
      await runMusicCommand(interaction, context, 'resume', async (guildId) =>
        (await context.music.resume(guildId)) ? '▶️ Resumed playback.' : 'Playback is already running.',
      );
    },
  };
}
