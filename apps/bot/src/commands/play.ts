import { SlashCommandBuilder } from 'discord.js';
import type { ChatInputCommand } from './types.js';
import {
  GUILD_ONLY_MESSAGE,
  formatTrackTitle,
  getVoiceChannelIdFromInteraction,
  replyToInteraction,
  runMusicCommand,
} from './utils.js';

const COMMAND_NAME = 'play';

export function createPlayCommand(): ChatInputCommand {
  return {
    data: new SlashCommandBuilder()
      .setName(COMMAND_NAME)
      .setDescription('Play a track in your voice channel, replacing whatever is playing.')
      .addStringOption((option) =>
        option.setName('query').setDescription('A URL or search terms').setRequired(true),
      ),
    async execute(interaction, context) {
      if (!interaction.inCachedGuild()) {
        await replyToInteraction(interaction, GUILD_ONLY_MESSAGE);
        return;
      }

      const voiceChannelId = getVoiceChannelIdFromInteraction(interaction);
      if (!voiceChannelId) {
        await replyToInteraction(interaction, 'You need to join a voice channel before requesting music.');
        return;
      }

      const query = interaction.options.getString('query', true).trim();
      await interaction.deferReply();

      await runMusicCommand(interaction, context, COMMAND_NAME, async (guildId) => {
        const { track, playlistName } = await context.music.play({ guildId, voiceChannelId, query });
        let content = `▶️ Now playing ${formatTrackTitle(track)}.`;
        if (playlistName) {
          content += ` From playlist **${playlistName}**.`;
        }
        return content;
      });
    },
  };
}
