import { vi } from 'vitest';
import type { LavalinkPlayer, Playable, PlayerUpdateRequest } from '@cadence/schemas';
import type {
  CleanupOutcome,
  Player,
  RemoteSessionGateway,
  VoiceChannelRef,
  VoiceSessionClient,
  VoiceStateChange,
} from '../src/player.js';

export const GUILD_ID = 'guild-1';
export const CHANNEL: VoiceChannelRef = { id: 'channel-1', guildId: GUILD_ID, name: 'General' };

export function createTrack(id: string): Playable {
  return {
    encoded: `encoded-${id}`,
    info: {
      identifier: id,
      isSeekable: true,
      author: 'Test Artist',
      length: 180_000,
      isStream: false,
      position: 0,
      title: `Track ${id}`,
      uri: null,
      sourceName: 'youtube',
    },
  };
}

export function remotePlayer(guildId: string): LavalinkPlayer {
  return {
    guildId,
    track: null,
    volume: 100,
    paused: false,
    state: { time: 0, position: 0, connected: true, ping: 12 },
    voice: {},
  };
}

/** In-memory node: a real registry with the REST calls mocked. */
export class FakeGateway implements RemoteSessionGateway {
  readonly players = new Map<string, Player>();

  readonly updatePlayer = vi.fn(
    async (guildId: string, _data: PlayerUpdateRequest, _options?: { replace?: boolean }): Promise<LavalinkPlayer> =>
      remotePlayer(guildId),
  );

  readonly destroyPlayer = vi.fn(async (_guildId: string): Promise<void> => undefined);

  constructor(
    readonly id = 'node-test',
    private readonly extraPlayers = 0,
  ) {}

  get playerCount(): number {
    return this.players.size + this.extraPlayers;
  }

  attachPlayer(guildId: string, player: Player): void {
    const existing = this.players.get(guildId);
    if (existing && existing !== player) {
      throw new Error(`Guild ${guildId} already has a player`);
    }
    this.players.set(guildId, player);
  }

  detachPlayer(guildId: string, player: Player): boolean {
    if (this.players.get(guildId) !== player) {
      return false;
    }
    this.players.delete(guildId);
    return true;
  }
}

export class FakeVoiceClient implements VoiceSessionClient {
  private readonly bound = new Set<string>([GUILD_ID]);

  readonly changeVoiceState = vi.fn(async (_guildId: string, _change: VoiceStateChange): Promise<void> => undefined);

  readonly resolveChannel = vi.fn(
    (channelId: string): VoiceChannelRef | null => ({ id: channelId, guildId: GUILD_ID, name: 'General' }),
  );

  readonly cleanup = vi.fn(
    (guildId: string): CleanupOutcome =>
      this.bound.delete(guildId) ? { status: 'cleaned' } : { status: 'already-clean' },
  );
}
