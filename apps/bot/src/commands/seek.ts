import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommand } from './types.js';
import { formatDuration, runMusicCommand } from './utils.js';

const MS_IN_SECOND = 1000;

export function createSeekCommand(): ChatInputCommand {
  return {
    data: new SlashCommandBuilder()
      .setName('seek')
      .setDescription('Jump to a position in the current track.')
      .addIntegerOption((option) =>
        option.setName('seconds').setDescription('Position from the start of the track').setMinValue(0).setRequired(true),
      ),
    async execute(interaction, context) {
      const positionMs = interaction.options.getInteger('seconds', true) * MS_IN_SECOND;
      await runMusicCommand(interaction, context, 'seek', async (guildId) =>
        (await context.music.seek(guildId, positionMs))
          ? `⏩ Seeked to ${formatDuration(positionMs)}.`
          : 'There is no track to seek in.',
      );
    },
  };
}
