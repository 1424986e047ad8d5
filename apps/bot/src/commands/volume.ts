import { SlashCommandBuilder } from 'discord.js';
import { MAX_VOLUME, MIN_VOLUME } from '@cadence/music';
import type { ChatInputCommand } from './types.js';
import { runMusicCommand } from './utils.js';

export function createVolumeCommand(): ChatInputCommand {
  return {
    data: new SlashCommandBuilder()
      .setName('volume')
      .setDescription('Set the playback volume.')
      .addIntegerOption((option) =>
        option
          .setName('level')
          .setDescription(`Volume percentage (${MIN_VOLUME}-${MAX_VOLUME})`)
          .setMinValue(MIN_VOLUME)
          .setMaxValue(MAX_VOLUME)
          .setRequired(true),
      ),
    async execute(interaction, context) {
      const level = interaction.options.getInteger('level', true);
      await runMusicCommand(interaction, context, 'volume', async (guildId) => {
        const applied = await context.music.setVolume(guildId, level);
        return `🔊 Set volume to **${applied}%**.`;
      });
    },
  };
}
