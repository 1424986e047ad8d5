import { describe, expect, it } from 'vitest';
import { createLogger } from '@cadence/logger';
import {
  ChannelTimeoutError,
  InvalidChannelStateError,
  InvalidNodeError,
  LavalinkError,
  NotImplementedError,
} from '../src/errors.js';
import { clampVolume, Player } from '../src/player.js';
import { CHANNEL, createTrack, FakeGateway, FakeVoiceClient, GUILD_ID } from './helpers.js';

const VOICE = { sessionId: 'session-1', token: 'test-token', endpoint: 'eu-west.discord.media' };

function createPlayer() {
  const gateway = new FakeGateway();
  const client = new FakeVoiceClient();
  const player = new Player({ client, channel: CHANNEL, node: gateway, logger: createLogger({ level: 'silent' }) });
  return { player, gateway, client };
}

async function connectPlayer(player: Player): Promise<void> {
  const connecting = player.connect({ timeout: 1 });
  await player.handleVoiceStateUpdate({ channelId: CHANNEL.id, sessionId: VOICE.sessionId });
  await player.handleVoiceServerUpdate({ token: VOICE.token, endpoint: VOICE.endpoint });
  await connecting;
}

function nodeFailure(): LavalinkError {
  return new LavalinkError({ status: 500, error: 'Internal Server Error', message: 'boom' });
}

describe('Player connection', () => {
  it('pushes the voice descriptor once when the state update arrives first', async () => {
    const { player, gateway, client } = createPlayer();

    await connectPlayer(player);

    expect(client.changeVoiceState).toHaveBeenCalledWith(GUILD_ID, {
      channelId: CHANNEL.id,
      selfDeaf: false,
      selfMute: false,
    });
    expect(gateway.updatePlayer).toHaveBeenCalledTimes(1);
    expect(gateway.updatePlayer).toHaveBeenCalledWith(GUILD_ID, { voice: VOICE });
    expect(player.state).toBe('connected');
    expect(player.connected).toBe(true);
    expect(player.guildId).toBe(GUILD_ID);
    expect(gateway.players.get(GUILD_ID)).toBe(player);
  });

  it('pushes the voice descriptor once when the server update arrives first', async () => {
    const { player, gateway } = createPlayer();

    const connecting = player.connect({ timeout: 1, selfDeaf: true });
    await player.handleVoiceServerUpdate({ token: VOICE.token, endpoint: VOICE.endpoint });
    expect(gateway.updatePlayer).not.toHaveBeenCalled();

    await player.handleVoiceStateUpdate({ channelId: CHANNEL.id, sessionId: VOICE.sessionId });
    await connecting;

    expect(gateway.updatePlayer).toHaveBeenCalledTimes(1);
    expect(gateway.updatePlayer).toHaveBeenCalledWith(GUILD_ID, { voice: VOICE });
    expect(player.state).toBe('connected');
  });

  it('does not push again for repeated identical events, but does for changed credentials', async () => {
    const { player, gateway } = createPlayer();
    await connectPlayer(player);

    await player.handleVoiceServerUpdate({ token: VOICE.token, endpoint: VOICE.endpoint });
    await player.handleVoiceStateUpdate({ channelId: CHANNEL.id, sessionId: VOICE.sessionId });
    expect(gateway.updatePlayer).toHaveBeenCalledTimes(1);

    await player.handleVoiceServerUpdate({ token: 'test-token-2', endpoint: 'us-east.discord.media' });
    expect(gateway.updatePlayer).toHaveBeenCalledTimes(2);
    expect(gateway.updatePlayer).toHaveBeenLastCalledWith(GUILD_ID, {
      voice: { sessionId: 'session-1', token: 'test-token-2', endpoint: 'us-east.discord.media' },
    });
  });

  it('never pushes while the endpoint is absent', async () => {
    const { player, gateway } = createPlayer();

    const connecting = player.connect({ timeout: 0.05 }).catch((error: unknown) => error);
    await player.handleVoiceStateUpdate({ channelId: CHANNEL.id, sessionId: VOICE.sessionId });
    await player.handleVoiceServerUpdate({ token: VOICE.token, endpoint: null });

    expect(await connecting).toBeInstanceOf(ChannelTimeoutError);
    expect(gateway.updatePlayer).not.toHaveBeenCalled();
  });

  it('times out when the node never confirms the session', async () => {
    const { player } = createPlayer();

    const error = await player.connect({ timeout: 0.01 }).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(ChannelTimeoutError);
    expect(error).toMatchObject({
      channel: 'General (channel-1)',
      timeout: 0.01,
      message: 'Unable to connect to General (channel-1) as it exceeded the timeout of 0.01 seconds.',
    });
    expect(player.state).toBe('disconnected');
  });

  it('reports an aborted wait as a timeout', async () => {
    const { player } = createPlayer();
    const controller = new AbortController();

    const connecting = player.connect({ timeout: 5, signal: controller.signal });
    controller.abort();

    await expect(connecting).rejects.toBeInstanceOf(ChannelTimeoutError);
  });

  it('can connect again after a timed out attempt', async () => {
    const { player, gateway } = createPlayer();

    await expect(player.connect({ timeout: 0.01 })).rejects.toBeInstanceOf(ChannelTimeoutError);
    expect(player.state).toBe('disconnected');

    await connectPlayer(player);

    expect(player.state).toBe('connected');
    expect(gateway.updatePlayer).toHaveBeenCalledTimes(1);
    expect(gateway.players.size).toBe(1);
  });

  it('can connect again after an aborted attempt', async () => {
    const { player } = createPlayer();

    await expect(player.connect({ timeout: 5, signal: AbortSignal.abort() })).rejects.toBeInstanceOf(
      ChannelTimeoutError,
    );
    await connectPlayer(player);

    expect(player.state).toBe('connected');
  });

  it('returns to disconnected when the join request fails', async () => {
    const { player, gateway, client } = createPlayer();
    const failure = new Error('no shard');
    client.changeVoiceState.mockRejectedValueOnce(failure);

    await expect(player.connect({ timeout: 0.01 })).rejects.toBe(failure);

    expect(player.state).toBe('disconnected');
    expect(gateway.players.get(GUILD_ID)).toBe(player);

    await connectPlayer(player);
    expect(player.state).toBe('connected');
  });

  it('registers with its node only once across reconnects', async () => {
    const { player, gateway, client } = createPlayer();
    await connectPlayer(player);

    await player.connect({ timeout: 1, reconnect: true });

    expect(gateway.players.size).toBe(1);
    expect(client.changeVoiceState).toHaveBeenCalledTimes(2);
  });

  it('disconnects when the node rejects the voice descriptor', async () => {
    const { player, gateway, client } = createPlayer();
    gateway.updatePlayer.mockRejectedValueOnce(nodeFailure());

    const connecting = player.connect({ timeout: 0.05 }).catch((error: unknown) => error);
    await player.handleVoiceStateUpdate({ channelId: CHANNEL.id, sessionId: VOICE.sessionId });
    await player.handleVoiceServerUpdate({ token: VOICE.token, endpoint: VOICE.endpoint });

    expect(await connecting).toBeInstanceOf(ChannelTimeoutError);
    expect(player.state).toBe('invalidated');
    expect(gateway.players.size).toBe(0);
    expect(gateway.destroyPlayer).toHaveBeenCalledWith(GUILD_ID);
    expect(client.changeVoiceState).toHaveBeenLastCalledWith(GUILD_ID, {
      channelId: null,
      selfDeaf: false,
      selfMute: false,
    });
  });

  it('invalidates and deregisters on membership loss while awaiting confirmation', async () => {
    const { player, gateway, client } = createPlayer();

    const connecting = player.connect({ timeout: 0.05 }).catch((error: unknown) => error);
    await player.handleVoiceStateUpdate({ channelId: null, sessionId: VOICE.sessionId });

    expect(player.state).toBe('invalidated');
    expect(player.connected).toBe(false);
    expect(gateway.players.size).toBe(0);
    expect(gateway.destroyPlayer).toHaveBeenCalledWith(GUILD_ID);
    expect(client.cleanup).toHaveBeenCalledWith(GUILD_ID);
    expect(await connecting).toBeInstanceOf(ChannelTimeoutError);
    expect(player.state).toBe('invalidated');
  });

  it('ignores gateway events once invalidated', async () => {
    const { player, gateway } = createPlayer();
    await connectPlayer(player);
    await player.disconnect();

    await player.handleVoiceServerUpdate({ token: 'test-token-2', endpoint: VOICE.endpoint });

    expect(gateway.updatePlayer).toHaveBeenCalledTimes(1);
  });

  it('refuses to connect once invalidated or without a channel', async () => {
    const { player } = createPlayer();
    await connectPlayer(player);
    await player.disconnect();

    await expect(player.connect()).rejects.toBeInstanceOf(InvalidChannelStateError);

    const unbound = new Player({
      client: new FakeVoiceClient(),
      node: new FakeGateway(),
      logger: createLogger({ level: 'silent' }),
    });
    await expect(unbound.connect()).rejects.toThrow('Player tried to connect without a valid channel.');
  });
});

describe('Player disconnect', () => {
  it('destroys the remote player and leaves the channel', async () => {
    const { player, gateway, client } = createPlayer();
    await connectPlayer(player);

    await player.disconnect();

    expect(player.state).toBe('invalidated');
    expect(gateway.players.size).toBe(0);
    expect(gateway.destroyPlayer).toHaveBeenCalledTimes(1);
    expect(client.changeVoiceState).toHaveBeenLastCalledWith(GUILD_ID, {
      channelId: null,
      selfDeaf: false,
      selfMute: false,
    });
  });

  it('is safe to call twice', async () => {
    const { player, gateway, client } = createPlayer();
    await connectPlayer(player);

    await player.disconnect();
    await expect(player.disconnect()).resolves.toBeUndefined();

    expect(gateway.destroyPlayer).toHaveBeenCalledTimes(1);
    expect(client.cleanup).toHaveBeenNthCalledWith(2, GUILD_ID);
  });

  it('swallows node errors while destroying the remote player', async () => {
    const { player, gateway } = createPlayer();
    await connectPlayer(player);
    gateway.destroyPlayer.mockRejectedValueOnce(nodeFailure());

    await expect(player.disconnect()).resolves.toBeUndefined();
    expect(player.state).toBe('invalidated');
  });

  it('propagates a failed transport cleanup', async () => {
    const { player, client } = createPlayer();
    await connectPlayer(player);
    const failure = new Error('cleanup failed');
    client.cleanup.mockReturnValueOnce({ status: 'failed', error: failure });

    await expect(player.disconnect()).rejects.toBe(failure);
  });

  it('requires a guild identity', async () => {
    const { player } = createPlayer();

    await expect(player.disconnect()).rejects.toBeInstanceOf(InvalidChannelStateError);
  });
});

describe('Player playback', () => {
  it('sends the track and records the previous one', async () => {
    const { player, gateway } = createPlayer();
    await connectPlayer(player);
    const first = createTrack('a');
    const second = createTrack('b');

    await player.play(first);
    const result = await player.play(second, { replace: true });

    expect(result).toBe(second);
    expect(player.current).toBe(second);
    expect(player.original).toBe(second);
    expect(player.previous).toBe(first);
    expect(player.playing).toBe(true);
    expect(gateway.updatePlayer).toHaveBeenLastCalledWith(
      GUILD_ID,
      { track: { encoded: 'encoded-b' }, volume: 100, position: 0, endTime: null, paused: false },
      { replace: true },
    );
  });

  it('keeps the current track for a non-replacing play', async () => {
    const { player, gateway } = createPlayer();
    await connectPlayer(player);
    const first = createTrack('a');

    await player.play(first);
    await player.play(createTrack('b'), { replace: false, start: 5_000, end: 60_000, paused: true });

    expect(player.current).toBe(first);
    expect(player.original).toBe(first);
    expect(player.previous).toBe(first);
    expect(player.paused).toBe(true);
    expect(gateway.updatePlayer).toHaveBeenLastCalledWith(
      GUILD_ID,
      { track: { encoded: 'encoded-b' }, volume: 100, position: 5_000, endTime: 60_000, paused: true },
      { replace: false },
    );
  });

  it('restores its previous state when the node rejects a play', async () => {
    const { player, gateway } = createPlayer();
    await connectPlayer(player);
    const first = createTrack('a');
    await player.play(first);

    const failure = nodeFailure();
    gateway.updatePlayer.mockRejectedValueOnce(failure);

    await expect(player.play(createTrack('b'), { volume: 500 })).rejects.toBe(failure);
    expect(player.current).toBe(first);
    expect(player.original).toBe(first);
    expect(player.previous).toBeNull();
    expect(player.volume).toBe(100);
  });

  it('clamps the volume passed to play', async () => {
    const { player, gateway } = createPlayer();
    await connectPlayer(player);

    await player.play(createTrack('a'), { volume: 1_500 });

    expect(player.volume).toBe(1_000);
    expect(gateway.updatePlayer).toHaveBeenLastCalledWith(
      GUILD_ID,
      { track: { encoded: 'encoded-a' }, volume: 1_000, position: 0, endTime: null, paused: false },
      { replace: true },
    );
  });

  it('clamps volume changes to the supported range', async () => {
    const { player, gateway } = createPlayer();
    await connectPlayer(player);

    await player.setVolume(-5);
    expect(player.volume).toBe(0);

    await player.setVolume(5_000);
    expect(player.volume).toBe(1_000);

    await player.setVolume(100);
    await player.setVolume(100);
    expect(player.volume).toBe(100);
    expect(gateway.updatePlayer).toHaveBeenLastCalledWith(GUILD_ID, { volume: 100 });
  });

  it('commits a pause only after the node accepts it', async () => {
    const { player, gateway } = createPlayer();
    await connectPlayer(player);

    gateway.updatePlayer.mockRejectedValueOnce(nodeFailure());
    await expect(player.pause(true)).rejects.toBeInstanceOf(LavalinkError);
    expect(player.paused).toBe(false);

    await player.pause(true);
    expect(player.paused).toBe(true);
    expect(gateway.updatePlayer).toHaveBeenLastCalledWith(GUILD_ID, { paused: true });
  });

  it('does not seek without a current track', async () => {
    const { player, gateway } = createPlayer();
    await connectPlayer(player);
    gateway.updatePlayer.mockClear();

    await player.seek(30_000);

    expect(gateway.updatePlayer).not.toHaveBeenCalled();
  });

  it('seeks within the current track', async () => {
    const { player, gateway } = createPlayer();
    await connectPlayer(player);
    await player.play(createTrack('a'));

    await player.seek(30_000);

    expect(gateway.updatePlayer).toHaveBeenLastCalledWith(GUILD_ID, { position: 30_000 });
  });

  it('stops the current track on skip and clears it once the node reports the end', async () => {
    const { player, gateway } = createPlayer();
    await connectPlayer(player);
    const track = createTrack('a');
    await player.play(track);

    const skipped = await player.skip();

    expect(skipped).toBe(track);
    expect(gateway.updatePlayer).toHaveBeenLastCalledWith(GUILD_ID, { track: { encoded: null } }, { replace: true });

    await player.handleTrackEnd(track);
    expect(player.current).toBeNull();
    expect(player.playing).toBe(false);
  });

  it('keeps the current track when a different track ends', async () => {
    const { player } = createPlayer();
    await connectPlayer(player);
    const track = createTrack('a');
    await player.play(track);

    await player.handleTrackEnd(createTrack('b'));

    expect(player.current).toBe(track);
  });

  it('clears the remote track on skip even when nothing is current', async () => {
    const { player, gateway } = createPlayer();
    await connectPlayer(player);
    gateway.updatePlayer.mockClear();

    await expect(player.stop()).resolves.toBeNull();

    expect(gateway.updatePlayer).toHaveBeenCalledTimes(1);
    expect(gateway.updatePlayer).toHaveBeenCalledWith(GUILD_ID, { track: { encoded: null } }, { replace: true });
  });

  it('runs concurrent operations one at a time in arrival order', async () => {
    const { player, gateway } = createPlayer();
    await connectPlayer(player);
    const first = createTrack('a');
    const third = createTrack('c');
    await player.play(first);
    const failure = nodeFailure();
    gateway.updatePlayer.mockRejectedValueOnce(failure);

    const failing = player.play(createTrack('b'), { volume: 500 }).catch((error: unknown) => error);
    const succeeding = player.play(third);

    expect(await failing).toBe(failure);
    await expect(succeeding).resolves.toBe(third);
    expect(player.current).toBe(third);
    expect(player.previous).toBe(first);
    expect(player.volume).toBe(100);
  });

  it('requires a guild identity for every playback operation', async () => {
    const { player } = createPlayer();

    await expect(player.play(createTrack('a'))).rejects.toThrow(
      'Player is not connected to a guild; call connect() first.',
    );
    await expect(player.pause(true)).rejects.toBeInstanceOf(InvalidChannelStateError);
    await expect(player.seek()).rejects.toBeInstanceOf(InvalidChannelStateError);
    await expect(player.setVolume(50)).rejects.toBeInstanceOf(InvalidChannelStateError);
    await expect(player.skip()).rejects.toBeInstanceOf(InvalidChannelStateError);
  });

  it('does not support filters yet', async () => {
    const { player } = createPlayer();

    await expect(player.setFilter()).rejects.toBeInstanceOf(NotImplementedError);
  });
});

describe('Player node selection', () => {
  it('picks the least loaded node from a list', () => {
    const busy = new FakeGateway('busy', 4);
    const idle = new FakeGateway('idle', 1);

    const player = new Player({ client: new FakeVoiceClient(), nodes: [busy, idle], logger: createLogger({ level: 'silent' }) });

    expect(player.node).toBe(idle);
  });

  it('falls back to the pool', () => {
    const node = new FakeGateway();

    const player = new Player({
      client: new FakeVoiceClient(),
      pool: { getNode: () => node },
      logger: createLogger({ level: 'silent' }),
    });

    expect(player.node).toBe(node);
  });

  it('fails without any node source', () => {
    expect(() => new Player({ client: new FakeVoiceClient(), nodes: [] })).toThrow(InvalidNodeError);
  });
});

describe('clampVolume', () => {
  it('rounds and clamps', () => {
    expect(clampVolume(49.6)).toBe(50);
    expect(clampVolume(-1)).toBe(0);
    expect(clampVolume(1_001)).toBe(1_000);
  });

  it('rejects non-finite values', () => {
    expect(() => clampVolume(Number.NaN)).toThrow(RangeError);
  });
});
