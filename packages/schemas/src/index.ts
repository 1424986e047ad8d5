import { z } from 'zod';

// Discord gateway voice packets, as delivered on the client's `raw` event.

export const voiceStateUpdateDataSchema = z.object({
  guild_id: z.string().min(1),
  channel_id: z.string().min(1).nullable(),
  user_id: z.string().min(1),
  session_id: z.string().min(1),
});

export const voiceServerUpdateDataSchema = z.object({
  guild_id: z.string().min(1),
  token: z.string().min(1),
  endpoint: z.string().nullable(),
});

export const gatewayVoicePacketSchema = z.discriminatedUnion('t', [
  z.object({ t: z.literal('VOICE_STATE_UPDATE'), d: voiceStateUpdateDataSchema }),
  z.object({ t: z.literal('VOICE_SERVER_UPDATE'), d: voiceServerUpdateDataSchema }),
]);

export type VoiceStateUpdateData = z.infer<typeof voiceStateUpdateDataSchema>;
export type VoiceServerUpdateData = z.infer<typeof voiceServerUpdateDataSchema>;
export type GatewayVoicePacket = z.infer<typeof gatewayVoicePacketSchema>;

// Lavalink v4

export const trackInfoSchema = z
  .object({
    identifier: z.string(),
    isSeekable: z.boolean(),
    author: z.string(),
    length: z.number(),
    isStream: z.boolean(),
    position: z.number(),
    title: z.string(),
    uri: z.string().nullable().optional(),
    artworkUrl: z.string().nullable().optional(),
    isrc: z.string().nullable().optional(),
    sourceName: z.string(),
  })
  .passthrough();

export const trackSchema = z
  .object({
    encoded: z.string().min(1),
    info: trackInfoSchema,
    pluginInfo: z.record(z.unknown()).optional(),
    userData: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type Playable = z.infer<typeof trackSchema>;

export const playerStateSchema = z.object({
  time: z.number(),
  position: z.number(),
  connected: z.boolean(),
  ping: z.number(),
});

export const voiceSessionSchema = z.object({
  token: z.string(),
  endpoint: z.string(),
  sessionId: z.string(),
});

export type VoiceSession = z.infer<typeof voiceSessionSchema>;

export const lavalinkPlayerSchema = z
  .object({
    guildId: z.string(),
    track: trackSchema.nullable(),
    volume: z.number().int(),
    paused: z.boolean(),
    state: playerStateSchema,
    voice: voiceSessionSchema.partial(),
    filters: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type LavalinkPlayer = z.infer<typeof lavalinkPlayerSchema>;

export const lavalinkErrorBodySchema = z.object({
  timestamp: z.number(),
  status: z.number().int(),
  error: z.string(),
  message: z.string().optional(),
  path: z.string(),
  trace: z.string().optional(),
});

export type LavalinkErrorBody = z.infer<typeof lavalinkErrorBodySchema>;

export const trackEndReasonSchema = z.enum(['finished', 'loadFailed', 'stopped', 'replaced', 'cleanup']);

export const nodeStatsSchema = z.object({
  players: z.number().int(),
  playingPlayers: z.number().int(),
  uptime: z.number(),
  memory: z.object({
    free: z.number(),
    used: z.number(),
    allocated: z.number(),
    reservable: z.number(),
  }),
  cpu: z.object({
    cores: z.number(),
    systemLoad: z.number(),
    lavalinkLoad: z.number(),
  }),
  frameStats: z
    .object({
      sent: z.number(),
      nulled: z.number(),
      deficit: z.number(),
    })
    .nullable()
    .optional(),
});

export type NodeStats = z.infer<typeof nodeStatsSchema>;

const eventBaseSchema = z.object({ op: z.literal('event'), guildId: z.string() });

export const nodeEventSchema = z.discriminatedUnion('type', [
  eventBaseSchema.extend({ type: z.literal('TrackStartEvent'), track: trackSchema }),
  eventBaseSchema.extend({ type: z.literal('TrackEndEvent'), track: trackSchema, reason: trackEndReasonSchema }),
  eventBaseSchema.extend({
    type: z.literal('TrackExceptionEvent'),
    track: trackSchema,
    exception: z.object({ message: z.string().nullable(), severity: z.string(), cause: z.string() }),
  }),
  eventBaseSchema.extend({ type: z.literal('TrackStuckEvent'), track: trackSchema, thresholdMs: z.number() }),
  eventBaseSchema.extend({
    type: z.literal('WebSocketClosedEvent'),
    code: z.number().int(),
    reason: z.string(),
    byRemote: z.boolean(),
  }),
]);

export type NodeEvent = z.infer<typeof nodeEventSchema>;
export type TrackEndEvent = Extract<NodeEvent, { type: 'TrackEndEvent' }>;

export const nodeMessageSchema = z.union([
  z.object({ op: z.literal('ready'), resumed: z.boolean(), sessionId: z.string().min(1) }),
  nodeStatsSchema.extend({ op: z.literal('stats') }),
  z.object({ op: z.literal('playerUpdate'), guildId: z.string(), state: playerStateSchema }),
  nodeEventSchema,
]);

export type NodeMessage = z.infer<typeof nodeMessageSchema>;

export const loadResultSchema = z.discriminatedUnion('loadType', [
  z.object({ loadType: z.literal('track'), data: trackSchema }),
  z.object({
    loadType: z.literal('playlist'),
    data: z.object({
      info: z.object({ name: z.string(), selectedTrack: z.number().int() }),
      tracks: z.array(trackSchema),
    }),
  }),
  z.object({ loadType: z.literal('search'), data: z.array(trackSchema) }),
  z.object({ loadType: z.literal('empty'), data: z.object({}).passthrough().optional() }),
  z.object({
    loadType: z.literal('error'),
    data: z.object({ message: z.string().nullable(), severity: z.string(), cause: z.string() }),
  }),
]);

export type LoadResult = z.infer<typeof loadResultSchema>;

/** Body of `PATCH /v4/sessions/{sessionId}/players/{guildId}`. Omitted fields are left unchanged by the node. */
export interface PlayerUpdateRequest {
  track?: {
    encoded?: string | null;
    identifier?: string;
    userData?: Record<string, unknown>;
  };
  position?: number;
  endTime?: number | null;
  volume?: number;
  paused?: boolean;
  filters?: Record<string, unknown>;
  voice?: VoiceSession;
}
