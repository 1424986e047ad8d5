export * from './errors.js';
export * from './node.js';
export * from './player.js';
export * from './pool.js';
export * from './voiceState.js';
export type { LavalinkPlayer, Playable, PlayerUpdateRequest, VoiceSession } from '@cadence/schemas';
