import { escapeMarkdown, MessageFlags, type ChatInputCommandInteraction } from 'discord.js';
import { ChannelTimeoutError, isMusicError, LavalinkError } from '@cadence/music';
import type { Playable } from '@cadence/music';
import { MusicServiceError } from '../services/music.js';
import type { CommandContext } from './types.js';

export const GUILD_ONLY_MESSAGE = 'This command can only be used inside a Discord server.';

const MS_IN_SECOND = 1000;
const SECONDS_IN_MINUTE = 60;

export function getVoiceChannelIdFromInteraction(interaction: ChatInputCommandInteraction): string | null {
  const member = interaction.member;
  if (!member) {
    return null;
  }

  if ('voice' in member) {
    return member.voice?.channelId ?? null;
  }

  return interaction.guild?.members.cache.get(interaction.user.id)?.voice?.channelId ?? null;
}

export async function replyToInteraction(
  interaction: ChatInputCommandInteraction,
  content: string,
  options: { ephemeral?: boolean } = {},
): Promise<void> {
  const payload = options.ephemeral === false ? { content } : ({ content, flags: MessageFlags.Ephemeral } as const);

  if (interaction.deferred || interaction.replied) {
    await interaction.followUp(payload);
  } else {
    await interaction.reply(payload);
  }
}

/** A user-facing message for errors the music layer raises on purpose, or null for unexpected ones. */
export function resolveMusicErrorMessage(error: unknown): string | null {
  if (error instanceof MusicServiceError) {
    return error.message;
  }
  if (error instanceof ChannelTimeoutError) {
    return 'I could not connect to your voice channel in time. Please try again.';
  }
  if (error instanceof LavalinkError) {
    return 'The audio node rejected that request. Please try again shortly.';
  }
  if (isMusicError(error) && error.code === 'INVALID_CHANNEL_STATE') {
    return 'I am not connected to a voice channel here.';
  }
  return null;
}

/**
 * Runs a guild-scoped music action and replies with its result, turning known failures into replies and logging
 * the rest.
 */
export async function runMusicCommand(
  interaction: ChatInputCommandInteraction,
  context: CommandContext,
  commandName: string,
  action: (guildId: string) => Promise<string>,
): Promise<void> {
  const guildId = interaction.inCachedGuild() ? interaction.guildId : null;
  if (!guildId) {
    await replyToInteraction(interaction, GUILD_ONLY_MESSAGE);
    return;
  }

  try {
    const content = await action(guildId);
    await replyToInteraction(interaction, content, { ephemeral: false });
  } catch (error) {
    const message = resolveMusicErrorMessage(error);
    if (message) {
      await replyToInteraction(interaction, message);
      return;
    }
    context.logger.error({ err: error, guildId, command: commandName }, 'Music command failed');
    await replyToInteraction(interaction, 'Something went wrong while handling that music request. Please try again shortly.');
  }
}

export function formatTrackTitle(track: Playable): string {
  const { title, author, length, isStream } = track.info;
  let formatted = `**${escapeMarkdown(title.length > 0 ? title : 'Untitled track')}**`;
  if (author.length > 0) {
    formatted += ` by ${escapeMarkdown(author)}`;
  }
  if (!isStream && length > 0) {
    formatted += ` (${formatDuration(length)})`;
  }
  return formatted;
}

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs < 0) {
    return 'live';
  }

  const totalSeconds = Math.floor(durationMs / MS_IN_SECOND);
  const minutes = Math.floor(totalSeconds / SECONDS_IN_MINUTE);
  const seconds = totalSeconds % SECONDS_IN_MINUTE;

  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
}
