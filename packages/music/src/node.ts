import { EventEmitter } from 'node:events';
import WebSocket from 'ws';
import { sleep } from '@cadence/core';
import { createLogger, type Logger } from '@cadence/logger';
import {
  lavalinkErrorBodySchema,
  lavalinkPlayerSchema,
  loadResultSchema,
  nodeMessageSchema,
  type LavalinkPlayer,
  type LoadResult,
  type NodeStats,
  type Playable,
  type PlayerUpdateRequest,
} from '@cadence/schemas';
import { InvalidNodeError, LavalinkError } from './errors.js';
import type { Player, RemoteSessionGateway } from './player.js';

const DEFAULT_RECONNECT_DELAY_MS = 5_000;

export type NodeStatus = 'disconnected' | 'connecting' | 'connected';

export interface NodeOptions {
  id: string;
  host: string;
  port: number;
  password: string;
  secure?: boolean;
  clientName: string;
  userId?: string;
  logger?: Logger;
  reconnectDelayMs?: number;
  fetch?: typeof fetch;
}

export interface TrackSearchResult {
  loadType: LoadResult['loadType'];
  tracks: Playable[];
  playlistName?: string;
  selectedTrackIndex?: number;
}

/**
 * A Lavalink v4 node. Player state is changed over REST against the session id handed out on the websocket's
 * `ready` op. Emits `ready`, `stats`, `playerUpdate`, `event` and `disconnect`.
 */
export class Node extends EventEmitter implements RemoteSessionGateway {
  readonly id: string;

  private readonly password: string;
  private readonly clientName: string;
  private readonly restBase: string;
  private readonly socketUrl: string;
  private readonly reconnectDelayMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;
  private readonly players = new Map<string, Player>();

  private socket: WebSocket | null = null;
  private session: string | null = null;
  private userId: string | null;
  private nodeStatus: NodeStatus = 'disconnected';
  private latestStats: NodeStats | null = null;
  private closing = false;

  constructor(options: NodeOptions) {
    super();
    this.id = options.id;
    this.password = options.password;
    this.clientName = options.clientName;
    this.userId = options.userId ?? null;
    this.reconnectDelayMs = options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = (options.logger ?? createLogger({ name: 'node' })).child({ scope: 'node', node: options.id });

    const secure = options.secure ?? false;
    this.restBase = `${secure ? 'https' : 'http'}://${options.host}:${options.port}`;
    this.socketUrl = `${secure ? 'wss' : 'ws'}://${options.host}:${options.port}/v4/websocket`;
  }

  get status(): NodeStatus {
    return this.nodeStatus;
  }

  get sessionId(): string | null {
    return this.session;
  }

  get stats(): NodeStats | null {
    return this.latestStats;
  }

  get playerCount(): number {
    return this.players.size;
  }

  getPlayer(guildId: string): Player | undefined {
    return this.players.get(guildId);
  }

  attachPlayer(guildId: string, player: Player): void {
    const existing = this.players.get(guildId);
    if (existing === player) {
      return;
    }
    if (existing) {
      throw new Error(`Guild ${guildId} already has a player on node ${this.id}`);
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

  /** Opens the websocket and resolves once the node has sent `ready`. */
  async connect(userId: string | null = this.userId): Promise<void> {
    if (!userId) {
      throw new InvalidNodeError(`Node ${this.id} needs the bot user id before connecting`);
    }

    this.userId = userId;
    this.closing = false;
    this.nodeStatus = 'connecting';

    const headers: Record<string, string> = {
      Authorization: this.password,
      'User-Id': userId,
      'Client-Name': this.clientName,
    };
    if (this.session) {
      headers['Session-Id'] = this.session;
    }

    const socket = new WebSocket(this.socketUrl, { headers });
    this.socket = socket;

    socket.on('message', (data) => {
      this.handlePayload(decodeRawData(data));
    });
    socket.on('error', (error) => {
      this.logger.error({ err: error }, 'Lavalink node socket error');
    });
    socket.on('close', (code, reason) => {
      this.handleClose(socket, code, reason.toString('utf8'));
    });

    await new Promise<void>((resolve, reject) => {
      const onReady = () => {
        socket.off('error', onError);
        resolve();
      };
      const onError = (error: Error) => {
        this.off('ready', onReady);
        this.nodeStatus = 'disconnected';
        reject(error);
      };
      this.once('ready', onReady);
      socket.once('error', onError);
    });
  }

  close(): void {
    this.closing = true;
    this.nodeStatus = 'disconnected';
    this.socket?.close(1000, 'Client closing');
    this.socket = null;
  }

  /** Applies one websocket message from the node. */
  handlePayload(raw: string): void {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ err: error }, 'Received malformed payload from node');
      return;
    }

    const parsed = nodeMessageSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.debug({ issues: parsed.error.issues }, 'Ignoring unrecognised node payload');
      return;
    }

    const message = parsed.data;
    switch (message.op) {
      case 'ready':
        this.session = message.sessionId;
        this.nodeStatus = 'connected';
        this.logger.info({ sessionId: message.sessionId, resumed: message.resumed }, 'Lavalink node ready');
        this.emit('ready', message);
        return;
      case 'stats': {
        const { op: _op, ...stats } = message;
        this.latestStats = stats;
        this.emit('stats', stats);
        return;
      }
      case 'playerUpdate':
        this.emit('playerUpdate', message);
        return;
      case 'event':
        this.emit('event', message);
        if (message.type === 'TrackEndEvent') {
          const player = this.players.get(message.guildId);
          if (player) {
            void player.handleTrackEnd(message.track).catch((error: unknown) => {
              this.logger.error({ err: error, guildId: message.guildId }, 'Player failed to handle track end');
            });
          }
        }
        return;
    }
  }

  async updatePlayer(
    guildId: string,
    data: PlayerUpdateRequest,
    options: { replace?: boolean } = {},
  ): Promise<LavalinkPlayer> {
    const url = this.buildUrl(`/v4/sessions/${this.requireSession()}/players/${guildId}`);
    url.searchParams.set('noReplace', String(!(options.replace ?? true)));

    const body = await this.request(url, 'PATCH', data);
    const parsed = lavalinkPlayerSchema.safeParse(body);
    if (!parsed.success) {
      throw new LavalinkError({
        status: 0,
        error: 'Invalid Response',
        message: `Node ${this.id} returned an unexpected player payload`,
        path: url.pathname,
      });
    }
    return parsed.data;
  }

  async destroyPlayer(guildId: string): Promise<void> {
    const url = this.buildUrl(`/v4/sessions/${this.requireSession()}/players/${guildId}`);
    await this.request(url, 'DELETE');
  }

  async loadTracks(query: string): Promise<TrackSearchResult> {
    const identifier = looksLikeUrl(query) ? query : `ytsearch:${query}`;
    const url = this.buildUrl('/v4/loadtracks');
    url.searchParams.set('identifier', identifier);

    const body = await this.request(url, 'GET');
    const parsed = loadResultSchema.safeParse(body);
    if (!parsed.success) {
      throw new LavalinkError({
        status: 0,
        error: 'Invalid Response',
        message: `Node ${this.id} returned an unexpected loadtracks payload`,
        path: url.pathname,
      });
    }

    const result = parsed.data;
    this.logger.debug({ loadType: result.loadType, identifier }, 'Parsed Lavalink loadtracks response');

    switch (result.loadType) {
      case 'track':
        return { loadType: result.loadType, tracks: [result.data] };
      case 'playlist':
        return {
          loadType: result.loadType,
          tracks: result.data.tracks,
          playlistName: result.data.info.name,
          selectedTrackIndex: result.data.info.selectedTrack >= 0 ? result.data.info.selectedTrack : undefined,
        };
      case 'search':
        return { loadType: result.loadType, tracks: result.data };
      case 'empty':
        return { loadType: result.loadType, tracks: [] };
      case 'error':
        throw new LavalinkError({
          status: 200,
          error: result.data.severity,
          message: result.data.message ?? `Failed to load tracks for ${identifier}`,
          path: url.pathname,
        });
    }
  }

  private async request(url: URL, method: 'GET' | 'PATCH' | 'DELETE', payload?: unknown): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: this.password,
          'Client-Name': this.clientName,
          'Content-Type': 'application/json',
        },
        body: payload === undefined ? undefined : JSON.stringify(payload),
      });
    } catch (error) {
      throw new LavalinkError(
        { status: 0, error: 'Network Error', message: `Request to node ${this.id} failed`, path: url.pathname },
        { cause: error },
      );
    }

    const body = await readJson(response);
    if (!response.ok) {
      const parsed = lavalinkErrorBodySchema.safeParse(body);
      throw new LavalinkError(
        parsed.success
          ? parsed.data
          : { status: response.status, error: response.statusText || 'Unknown Error', path: url.pathname },
      );
    }

    return body;
  }

  private requireSession(): string {
    if (!this.session) {
      throw new LavalinkError({
        status: 0,
        error: 'No Session',
        message: `Node ${this.id} has no active session`,
      });
    }
    return this.session;
  }

  private buildUrl(path: string): URL {
    return new URL(path, this.restBase);
  }

  private handleClose(socket: WebSocket, code: number, reason: string): void {
    if (this.socket !== socket) {
      return;
    }

    this.socket = null;
    this.nodeStatus = 'disconnected';
    this.emit('disconnect', { code, reason });

    if (this.closing) {
      this.logger.info({ code, reason }, 'Lavalink node connection closed');
      return;
    }

    this.logger.warn({ code, reason, retryInMs: this.reconnectDelayMs }, 'Lavalink node disconnected');
    void sleep(this.reconnectDelayMs)
      .then(() => (this.closing ? undefined : this.connect()))
      .catch((error: unknown) => {
        this.logger.error({ err: error }, 'Failed to reconnect Lavalink node');
      });
  }
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function decodeRawData(data: WebSocket.RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data).toString('utf8');
  }
  return data.toString('utf8');
}

function looksLikeUrl(query: string): boolean {
  return /^https?:\/\//i.test(query) || /^spotify:/i.test(query) || /^soundcloud:/i.test(query);
}
