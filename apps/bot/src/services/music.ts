import type { Logger } from '@cadence/logger';
import {
  InvalidChannelStateError,
  Player,
  type NodePool,
  type Playable,
  type TrackSearchResult,
  type VoiceSessionClient,
} from '@cadence/music';
import { withSpan } from '@cadence/telemetry';
import type { VoiceEventTarget } from '@cadence/discord';

export type MusicServiceErrorCode = 'NO_PLAYER' | 'NO_RESULTS' | 'WRONG_CHANNEL';

export class MusicServiceError extends Error {
  constructor(
    public readonly code: MusicServiceErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'MusicServiceError';
  }
}

export interface VoiceTransport extends VoiceSessionClient {
  bind(guildId: string, target: VoiceEventTarget): void;
}

export type PlayerDirectory = Pick<NodePool, 'getNode' | 'getPlayer'>;

export interface MusicServiceOptions {
  connectTimeoutSeconds: number;
  selfDeaf: boolean;
}

export interface PlayRequest {
  guildId: string;
  voiceChannelId: string;
  query: string;
}

export interface PlayOutcome {
  track: Playable;
  playlistName?: string;
}

export class MusicService {
  private readonly logger: Logger;

  constructor(
    private readonly pool: PlayerDirectory,
    private readonly transport: VoiceTransport,
    private readonly options: MusicServiceOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ scope: 'music' });
  }

  async play(request: PlayRequest): Promise<PlayOutcome> {
    return withSpan('music.play', { guildId: request.guildId }, async () => {
      const result = await this.pool.getNode().loadTracks(request.query);
      const track = pickTrack(result);
      if (!track) {
        throw new MusicServiceError('NO_RESULTS', `I could not find any tracks for "${request.query}".`);
      }

      const player = await this.ensurePlayer(request.guildId, request.voiceChannelId);
      await player.play(track);

      this.logger.info(
        {
          guildId: request.guildId,
          voiceChannelId: request.voiceChannelId,
          track: track.info.title,
          loadType: result.loadType,
        },
        'Started playback',
      );

      return { track, playlistName: result.playlistName };
    });
  }

  async pause(guildId: string): Promise<boolean> {
    return withSpan('music.pause', { guildId }, async () => {
      const player = this.requirePlayer(guildId);
      if (player.paused) {
        return false;
      }
      await player.pause(true);
      return true;
    });
  }

  async resume(guildId: string): Promise<boolean> {
    return withSpan('music.resume', { guildId }, async () => {
      const player = this.requirePlayer(guildId);
      if (!player.paused) {
        return false;
      }
      await player.pause(false);
      return true;
    });
  }

  async skip(guildId: string): Promise<Playable | null> {
    return withSpan('music.skip', { guildId }, () => this.requirePlayer(guildId).skip());
  }

  async seek(guildId: string, positionMs: number): Promise<boolean> {
    return withSpan('music.seek', { guildId, positionMs }, async () => {
      const player = this.requirePlayer(guildId);
      if (!player.current) {
        return false;
      }
      await player.seek(positionMs);
      return true;
    });
  }

  /** Returns the volume the player settled on after clamping. */
  async setVolume(guildId: string, level: number): Promise<number> {
    return withSpan('music.volume', { guildId, level }, async () => {
      const player = this.requirePlayer(guildId);
      await player.setVolume(level);
      return player.volume;
    });
  }

  async leave(guildId: string): Promise<void> {
    await withSpan('music.leave', { guildId }, async () => {
      await this.requirePlayer(guildId).disconnect();
      this.logger.info({ guildId }, 'Left voice channel');
    });
  }

  private async ensurePlayer(guildId: string, voiceChannelId: string): Promise<Player> {
    const existing = this.pool.getPlayer(guildId);
    if (existing && existing.state !== 'invalidated') {
      if (existing.channel && existing.channel.id !== voiceChannelId) {
        throw new MusicServiceError('WRONG_CHANNEL', `I'm already playing in <#${existing.channel.id}>.`);
      }
      if (existing.state !== 'connected') {
        await existing.connect({
          timeout: this.options.connectTimeoutSeconds,
          selfDeaf: this.options.selfDeaf,
          reconnect: true,
        });
      }
      return existing;
    }

    const channel = this.transport.resolveChannel(voiceChannelId);
    if (!channel) {
      throw new InvalidChannelStateError(`Voice channel ${voiceChannelId} is not available.`);
    }

    const player = new Player({ client: this.transport, channel, pool: this.pool, logger: this.logger });
    this.transport.bind(guildId, player);
    await player.connect({ timeout: this.options.connectTimeoutSeconds, selfDeaf: this.options.selfDeaf });

    return player;
  }

  private requirePlayer(guildId: string): Player {
    const player = this.pool.getPlayer(guildId);
    if (!player || player.state === 'invalidated') {
      throw new MusicServiceError('NO_PLAYER', 'There is nothing playing right now.');
    }
    return player;
  }
}

function pickTrack(result: TrackSearchResult): Playable | undefined {
  if (result.selectedTrackIndex !== undefined) {
    return result.tracks[result.selectedTrackIndex] ?? result.tracks[0];
  }
  return result.tracks[0];
}
