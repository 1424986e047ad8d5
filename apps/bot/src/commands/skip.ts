import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommand } from './types.js';
import { formatTrackTitle, runMusicCommand } from './utils.js';

export function createSkipCommand(): ChatInputCommand {
  return {
    data: new SlashCommandBuilder().setName('skip').setDescription('Stop the current track.'),
    async execute(interaction, context) {
      await runMusicCommand(interaction, context, 'skip', async (guildId) => {
        const skipped = await context.music.skip(guildId);
        return skipped ? `⏭️ Skipped ${formatTrackTitle(skipped)}.` : 'There was nothing to skip.';
      });
    },
  };
}
