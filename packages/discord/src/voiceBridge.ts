import { GatewayOpcodes, type Client } from 'discord.js';
import { createLogger, type Logger } from '@cadence/logger';
import {
  InvalidChannelStateError,
  type CleanupOutcome,
  type Player,
  type VoiceChannelRef,
  type VoiceSessionClient,
  type VoiceStateChange,
} from '@cadence/music';
import { gatewayVoicePacketSchema, type GatewayVoicePacket } from '@cadence/schemas';

export type VoiceEventTarget = Pick<Player, 'handleVoiceStateUpdate' | 'handleVoiceServerUpdate'>;

/**
 * Connects players to a discord.js client: voice packets from the gateway are routed to the player bound to their
 * guild, and join/leave requests go out as op 4 on the guild's shard.
 */
export class DiscordVoiceBridge implements VoiceSessionClient {
  private readonly logger: Logger;
  private readonly targets = new Map<string, VoiceEventTarget>();
  private attached = false;

  private readonly rawListener = (packet: unknown): void => {
    const parsed = gatewayVoicePacketSchema.safeParse(packet);
    if (!parsed.success) {
      return;
    }
    this.route(parsed.data);
  };

  constructor(
    private readonly client: Client,
    logger: Logger = createLogger({ name: 'voice-bridge' }),
  ) {
    this.logger = logger.child({ scope: 'voice-bridge' });
  }

  attach(): void {
    if (this.attached) {
      return;
    }
    this.client.on('raw', this.rawListener);
    this.attached = true;
  }

  detach(): void {
    this.client.off('raw', this.rawListener);
    this.attached = false;
  }

  bind(guildId: string, target: VoiceEventTarget): void {
    this.targets.set(guildId, target);
  }

  isBound(guildId: string): boolean {
    return this.targets.has(guildId);
  }

  cleanup(guildId: string): CleanupOutcome {
    return this.targets.delete(guildId) ? { status: 'cleaned' } : { status: 'already-clean' };
  }

  resolveChannel(channelId: string): VoiceChannelRef | null {
    const channel = this.client.channels.cache.get(channelId);
    if (!channel || !channel.isVoiceBased()) {
      return null;
    }
    return { id: channel.id, guildId: channel.guildId, name: channel.name };
  }

  async changeVoiceState(guildId: string, change: VoiceStateChange): Promise<void> {
    this.sendPayloadToGuild(guildId, {
      op: GatewayOpcodes.VoiceStateUpdate,
      d: {
        guild_id: guildId,
        channel_id: change.channelId,
        self_mute: change.selfMute,
        self_deaf: change.selfDeaf,
      },
    });
  }

  private route(packet: GatewayVoicePacket): void {
    const guildId = packet.d.guild_id;
    const target = this.targets.get(guildId);
    if (!target) {
      return;
    }

    if (packet.t === 'VOICE_STATE_UPDATE') {
      if (packet.d.user_id !== this.client.user?.id) {
        return;
      }
      void target
        .handleVoiceStateUpdate({ channelId: packet.d.channel_id, sessionId: packet.d.session_id })
        .catch((error: unknown) => {
          this.logger.error({ err: error, guildId }, 'Player failed to handle voice state update');
        });
      return;
    }

    void target
      .handleVoiceServerUpdate({ token: packet.d.token, endpoint: packet.d.endpoint })
      .catch((error: unknown) => {
        this.logger.error({ err: error, guildId }, 'Player failed to handle voice server update');
      });
  }

  private sendPayloadToGuild(guildId: string, payload: Record<string, unknown>): void {
    const guild = this.client.guilds.cache.get(guildId);
    if (!guild) {
      throw new InvalidChannelStateError(`Guild ${guildId} is not available to this client`);
    }

    const shard = guild.shard ?? this.client.ws.shards.get(guild.shardId) ?? this.client.ws.shards.first();
    if (!shard) {
      throw new InvalidChannelStateError(`No gateway shard is available for guild ${guildId}`);
    }

    shard.send(payload);
  }
}
