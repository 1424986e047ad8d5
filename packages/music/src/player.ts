import { Mutex } from 'async-mutex';
import { ResettableSignal, SignalWaitError } from '@cadence/core';
import { createLogger, type Logger } from '@cadence/logger';
import type { LavalinkPlayer, Playable, PlayerUpdateRequest } from '@cadence/schemas';
import {
  ChannelTimeoutError,
  InvalidChannelStateError,
  InvalidNodeError,
  LavalinkError,
  NotImplementedError,
} from './errors.js';
import { leastLoaded } from './pool.js';
import { VoiceStateAccumulator } from './voiceState.js';

export const MIN_VOLUME = 0;
export const MAX_VOLUME = 1000;
export const DEFAULT_VOLUME = 100;
export const DEFAULT_CONNECT_TIMEOUT_SECONDS = 5;

const MS_IN_SECOND = 1000;

export type ConnectionState = 'disconnected' | 'awaiting-confirmation' | 'connected' | 'invalidated';

export interface VoiceChannelRef {
  id: string;
  guildId: string;
  name?: string;
}

export interface VoiceStateChange {
  channelId: string | null;
  selfDeaf: boolean;
  selfMute: boolean;
}

export type CleanupOutcome =
  | { status: 'cleaned' }
  | { status: 'already-clean' }
  | { status: 'failed'; error: unknown };

/** The voice gateway transport a player joins and leaves channels through. */
export interface VoiceSessionClient {
  changeVoiceState(guildId: string, change: VoiceStateChange): Promise<void>;
  resolveChannel(channelId: string): VoiceChannelRef | null;
  cleanup?(guildId: string): CleanupOutcome;
}

/** The audio node's player API, plus the registry of players it hosts. */
export interface RemoteSessionGateway {
  readonly id: string;
  readonly playerCount: number;
  attachPlayer(guildId: string, player: Player): void;
  detachPlayer(guildId: string, player: Player): boolean;
  updatePlayer(guildId: string, data: PlayerUpdateRequest, options?: { replace?: boolean }): Promise<LavalinkPlayer>;
  destroyPlayer(guildId: string): Promise<void>;
}

export interface NodeSelector {
  getNode(): RemoteSessionGateway;
}

export interface MembershipUpdate {
  channelId: string | null;
  sessionId: string;
}

export interface CredentialsUpdate {
  token: string;
  endpoint: string | null;
}

export interface PlayerOptions {
  client: VoiceSessionClient;
  channel?: VoiceChannelRef | null;
  node?: RemoteSessionGateway;
  nodes?: readonly RemoteSessionGateway[];
  pool?: NodeSelector;
  logger?: Logger;
}

export interface ConnectOptions {
  /** Seconds to wait for the node to confirm the voice session. */
  timeout?: number;
  reconnect?: boolean;
  selfDeaf?: boolean;
  selfMute?: boolean;
  signal?: AbortSignal;
}

export interface PlayOptions {
  replace?: boolean;
  start?: number;
  end?: number;
  volume?: number;
  paused?: boolean;
}

interface PlaybackState {
  current: Playable | null;
  original: Playable | null;
  previous: Playable | null;
  paused: boolean;
  volume: number;
}

export function clampVolume(value: number): number {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Volume must be a finite number, received ${value}`);
  }
  return Math.max(MIN_VOLUME, Math.min(MAX_VOLUME, Math.round(value)));
}

/**
 * Controls one guild's player on a Lavalink node.
 *
 * The voice handshake is assembled from the gateway's state and server updates and forwarded to the node; `connect`
 * resolves once the node has accepted it. Every state change, inbound or outbound, runs under a per-player lock in
 * arrival order. A player that has been disconnected, or that lost its channel, is spent.
 */
export class Player {
  readonly client: VoiceSessionClient;

  private readonly logger: Logger;
  private readonly lock = new Mutex();
  private readonly voice = new VoiceStateAccumulator();
  private readonly connection = new ResettableSignal();
  private readonly selectedNode: RemoteSessionGateway;

  private boundChannel: VoiceChannelRef | null;
  private boundGuildId: string | null = null;
  private connectionState: ConnectionState = 'disconnected';
  private voiceConnected = false;

  private readonly playback: PlaybackState = {
    current: null,
    original: null,
    previous: null,
    paused: false,
    volume: DEFAULT_VOLUME,
  };

  constructor(options: PlayerOptions) {
    this.client = options.client;
    this.boundChannel = options.channel ?? null;
    this.selectedNode = selectNode(options);
    this.logger = (options.logger ?? createLogger({ name: 'player' })).child({
      scope: 'player',
      node: this.selectedNode.id,
    });
  }

  get node(): RemoteSessionGateway {
    return this.selectedNode;
  }

  /** Set by the first `connect`; null before that. */
  get guildId(): string | null {
    return this.boundGuildId;
  }

  get channel(): VoiceChannelRef | null {
    return this.boundChannel;
  }

  get state(): ConnectionState {
    return this.connectionState;
  }

  get connected(): boolean {
    return this.boundChannel !== null && this.voiceConnected;
  }

  get current(): Playable | null {
    return this.playback.current;
  }

  /** The track most recently started with `replace`, kept while non-replacing plays go through. */
  get original(): Playable | null {
    return this.playback.original;
  }

  get previous(): Playable | null {
    return this.playback.previous;
  }

  get volume(): number {
    return this.playback.volume;
  }

  get paused(): boolean {
    return this.playback.paused;
  }

  get playing(): boolean {
    return this.voiceConnected && this.playback.current !== null;
  }

  async connect(options: ConnectOptions = {}): Promise<void> {
    const timeout = options.timeout ?? DEFAULT_CONNECT_TIMEOUT_SECONDS;

    const channel = await this.lock.runExclusive(async () => {
      if (this.connectionState === 'invalidated') {
        throw new InvalidChannelStateError('Player has been disconnected and cannot be reused; create a new player.');
      }

      const target = this.boundChannel;
      if (!target) {
        throw new InvalidChannelStateError('Player tried to connect without a valid channel.');
      }

      if (!this.boundGuildId) {
        this.boundGuildId = target.guildId;
        this.selectedNode.attachPlayer(target.guildId, this);
      }

      if (this.connectionState !== 'connected') {
        this.connectionState = 'awaiting-confirmation';
      }

      this.logger.info(
        { guildId: target.guildId, channelId: target.id, reconnect: options.reconnect ?? false },
        'Joining voice channel',
      );

      try {
        await this.client.changeVoiceState(target.guildId, {
          channelId: target.id,
          selfDeaf: options.selfDeaf ?? false,
          selfMute: options.selfMute ?? false,
        });
      } catch (error) {
        if (this.connectionState === 'awaiting-confirmation') {
          this.connectionState = 'disconnected';
        }
        throw error;
      }

      return target;
    });

    try {
      await this.connection.wait({ timeoutMs: timeout * MS_IN_SECOND, signal: options.signal });
    } catch (error) {
      if (!(error instanceof SignalWaitError)) {
        throw error;
      }

      await this.lock.runExclusive(() => {
        if (this.connectionState === 'awaiting-confirmation') {
          this.connectionState = 'disconnected';
        }
      });

      this.logger.warn({ guildId: channel.guildId, channelId: channel.id, timeout, reason: error.reason }, 'Voice connection was not confirmed');
      throw new ChannelTimeoutError(describeChannel(channel), timeout);
    }
  }

  async handleVoiceStateUpdate(update: MembershipUpdate): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (this.connectionState === 'invalidated') {
        return;
      }

      if (!update.channelId) {
        this.logger.info({ guildId: this.boundGuildId }, 'Voice channel membership lost');
        await this.destroyLocked();
        return;
      }

      this.voiceConnected = true;
      this.voice.applyMembership(update.sessionId);
      this.boundChannel = this.client.resolveChannel(update.channelId) ?? this.boundChannel;

      await this.dispatchVoiceUpdate();
    });
  }

  async handleVoiceServerUpdate(update: CredentialsUpdate): Promise<void> {
    await this.lock.runExclusive(async () => {
      if (this.connectionState === 'invalidated') {
        return;
      }

      this.voice.applyCredentials(update.token, update.endpoint);
      await this.dispatchVoiceUpdate();
    });
  }

  /** Called by the node when Lavalink reports that a track finished or was stopped. */
  async handleTrackEnd(track: Playable): Promise<void> {
    await this.lock.runExclusive(() => {
      if (this.playback.current?.encoded === track.encoded) {
        this.playback.current = null;
      }
    });
  }

  async play(track: Playable, options: PlayOptions = {}): Promise<Playable> {
    return this.lock.runExclusive(async () => {
      const guildId = this.requireGuild();
      const { replace = true, start = 0, end } = options;
      const snapshot = { ...this.playback };

      const volume = options.volume === undefined ? this.playback.volume : clampVolume(options.volume);
      this.playback.volume = volume;

      if (replace || !this.playback.current) {
        this.playback.current = track;
        this.playback.original = track;
      }
      this.playback.previous = snapshot.current;

      const paused = options.paused ?? this.playback.paused;

      const request: PlayerUpdateRequest = {
        track: { encoded: track.encoded },
        volume,
        position: start,
        endTime: end ?? null,
        paused,
      };

      try {
        await this.selectedNode.updatePlayer(guildId, request, { replace });
      } catch (error) {
        this.playback.current = snapshot.current;
        this.playback.original = snapshot.original;
        this.playback.previous = snapshot.previous;
        this.playback.volume = snapshot.volume;
        throw error;
      }

      this.playback.paused = paused;
      this.logger.debug({ guildId, track: track.info.title, replace, volume, paused }, 'Started track');

      return track;
    });
  }

  /** Pauses (`true`) or resumes (`false`). Local state changes only once the node accepts. */
  async pause(value: boolean): Promise<void> {
    await this.lock.runExclusive(async () => {
      const guildId = this.requireGuild();
      await this.selectedNode.updatePlayer(guildId, { paused: value });
      this.playback.paused = value;
    });
  }

  async seek(position = 0): Promise<void> {
    await this.lock.runExclusive(async () => {
      const guildId = this.requireGuild();
      if (!this.playback.current) {
        return;
      }
      await this.selectedNode.updatePlayer(guildId, { position });
    });
  }

  async setFilter(): Promise<void> {
    throw new NotImplementedError('Player filters');
  }

  /** Sets the volume as a percentage; values outside 0..1000 are clamped. */
  async setVolume(value = DEFAULT_VOLUME): Promise<void> {
    const volume = clampVolume(value);
    await this.lock.runExclusive(async () => {
      const guildId = this.requireGuild();
      await this.selectedNode.updatePlayer(guildId, { volume });
      this.playback.volume = volume;
    });
  }

  /**
   * Stops the current track and returns it. The node reports the stop as a track end, which clears `current`
   * through {@link handleTrackEnd}.
   */
  async skip(): Promise<Playable | null> {
    return this.lock.runExclusive(async () => {
      const guildId = this.requireGuild();
      const skipped = this.playback.current;
      await this.selectedNode.updatePlayer(guildId, { track: { encoded: null } }, { replace: true });
      return skipped;
    });
  }

  async stop(): Promise<Playable | null> {
    return this.skip();
  }

  /**
   * Leaves the voice channel and removes the player from its node. Any playing track stops. The instance must not
   * be reused afterwards.
   */
  async disconnect(): Promise<void> {
    await this.lock.runExclusive(() => this.disconnectLocked());
  }

  private async dispatchVoiceUpdate(): Promise<void> {
    const guildId = this.boundGuildId;
    if (!guildId) {
      return;
    }

    const descriptor = this.voice.takePending();
    if (!descriptor) {
      return;
    }

    this.logger.debug({ guildId, endpoint: descriptor.endpoint }, 'Dispatching voice update');

    try {
      await this.selectedNode.updatePlayer(guildId, { voice: descriptor });
    } catch (error) {
      if (!(error instanceof LavalinkError)) {
        throw error;
      }
      this.logger.warn({ err: error, guildId }, 'Node rejected voice update; disconnecting');
      await this.disconnectLocked();
      return;
    }

    this.voice.markPushed(descriptor);
    this.connectionState = 'connected';
    this.connection.raise();
  }

  private async disconnectLocked(): Promise<void> {
    const guildId = this.requireGuild();
    await this.destroyLocked();
    await this.client.changeVoiceState(guildId, { channelId: null, selfDeaf: false, selfMute: false });
    this.logger.info({ guildId }, 'Disconnected player');
  }

  private async destroyLocked(): Promise<void> {
    this.invalidate();

    const guildId = this.boundGuildId;
    if (!guildId || !this.selectedNode.detachPlayer(guildId, this)) {
      return;
    }

    try {
      await this.selectedNode.destroyPlayer(guildId);
    } catch (error) {
      if (!(error instanceof LavalinkError)) {
        throw error;
      }
      this.logger.warn({ err: error, guildId }, 'Failed to destroy remote player');
    }
  }

  private invalidate(): void {
    this.voiceConnected = false;
    this.connection.reset();
    this.voice.reset();
    this.connectionState = 'invalidated';

    const guildId = this.boundGuildId;
    if (!guildId || !this.client.cleanup) {
      return;
    }

    const outcome = this.client.cleanup(guildId);
    if (outcome.status === 'failed') {
      throw outcome.error;
    }
    if (outcome.status === 'already-clean') {
      this.logger.debug({ guildId }, 'Voice client had nothing to clean up');
    }
  }

  private requireGuild(): string {
    if (!this.boundGuildId) {
      throw new InvalidChannelStateError('Player is not connected to a guild; call connect() first.');
    }
    return this.boundGuildId;
  }
}

function selectNode(options: PlayerOptions): RemoteSessionGateway {
  if (options.node) {
    return options.node;
  }

  const fromList = options.nodes ? leastLoaded(options.nodes) : null;
  if (fromList) {
    return fromList;
  }

  if (options.pool) {
    return options.pool.getNode();
  }

  throw new InvalidNodeError('A player needs a node, a list of nodes or a node pool');
}

function describeChannel(channel: VoiceChannelRef): string {
  return channel.name ? `${channel.name} (${channel.id})` : channel.id;
}
