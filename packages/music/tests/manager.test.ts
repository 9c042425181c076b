import { afterEach, describe, expect, it, vi } from 'vitest';
import { PlayerManager, type PlayerManagerOptions } from '../src/manager.js';
import type { NodeDefinition } from '../src/node.js';
import type { FetchLike } from '../src/rest.js';
import type { SocketFactory } from '../src/socket.js';
import {
  collectNotifications,
  createSocketFactory,
  makeTrack,
  makeVoice,
  requester,
  silentLogger,
  titles,
  type FakeSocket,
  type FakeSocketFactory,
} from './helpers.js';

const nodeA: NodeDefinition = {
  id: 'node-a',
  host: 'audio-a.test',
  port: 2333,
  password: 'test-secret',
  secure: false,
  transport: 'websocket',
};
const nodeB: NodeDefinition = { ...nodeA, id: 'node-b', host: 'audio-b.test' };

const searchBody = JSON.stringify({
  loadType: 'search',
  data: [
    {
      encoded: 'encoded-a',
      info: { identifier: 'a', title: 'Track A', author: 'Test Artist', length: 180000, isStream: false, uri: 'https://media.test/a' },
    },
  ],
});

const managers: PlayerManager[] = [];

function createManager(overrides: Partial<PlayerManagerOptions> = {}) {
  const sockets = createSocketFactory();
  const fetch = vi.fn<FetchLike>(async (input) =>
    input.includes('/v4/loadtracks') ? new Response(searchBody, { status: 200 }) : new Response(null, { status: 204 }),
  );
  const manager = new PlayerManager({
    userId: 'bot-1',
    clientName: 'cadence-tests',
    nodes: [nodeA, nodeB],
    reconnect: {
      baseDelayMs: 5,
      maxDelayMs: 20,
      factor: 2,
      resumeWindowMs: 60_000,
      readyTimeoutMs: 1_000,
      unhealthyThreshold: 3,
    },
    player: { queueLimit: 10, idleTimeoutMs: 60_000, autoSkipLimit: 3, defaultVolume: 100 },
    logger: silentLogger,
    socketFactory: sockets.factory,
    fetch,
    random: () => 0,
    now: () => 1_000,
    ...overrides,
  });
  managers.push(manager);
  return { manager, sockets, fetch };
}

function socketsFor(factory: FakeSocketFactory, node: NodeDefinition): FakeSocket[] {
  return factory.sockets.filter((socket) => socket.request.url.includes(node.host));
}

function latestFor(factory: FakeSocketFactory, node: NodeDefinition): FakeSocket {
  const socket = socketsFor(factory, node).at(-1);
  if (!socket) {
    throw new Error(`No socket for ${node.id}`);
  }
  return socket;
}

function connectAll(overrides: Partial<PlayerManagerOptions> = {}) {
  const setup = createManager(overrides);
  setup.manager.connect();
  for (const node of overrides.nodes ?? [nodeA, nodeB]) {
    latestFor(setup.sockets, node).ready(`session-${node.id}`);
  }
  return setup;
}

const flush = () => new Promise<void>((resolve) => setTimeout(resolve, 10));

describe('PlayerManager', () => {
  afterEach(async () => {
    await Promise.all(managers.splice(0).map((manager) => manager.shutdown()));
  });

  it('refuses to create players while no node is ready', async () => {
    const { manager } = createManager();
    manager.connect();

    await expect(manager.create('guild-1')).rejects.toMatchObject({ code: 'NODE_UNAVAILABLE' });
    expect(manager.size).toBe(0);
  });

  it('spreads players across the least-loaded nodes', async () => {
    const { manager } = connectAll();

    const first = await manager.create('guild-1');
    const second = await manager.create('guild-2');
    const again = await manager.create('guild-1', { textChannelId: 'text-9' });

    expect(first.node.id).toBe('node-a');
    expect(second.node.id).toBe('node-b');
    expect(again).toBe(first);
    expect(first.textChannelId).toBe('text-9');
    expect(manager.health().nodes.map((node) => [node.id, node.boundPlayers])).toEqual([
      ['node-a', 1],
      ['node-b', 1],
    ]);
  });

  it('prefers the node reporting less load when player counts tie', async () => {
    const { manager, sockets } = connectAll();
    const stats = (lavalinkLoad: number) => ({
      op: 'stats',
      players: 0,
      playingPlayers: 0,
      uptime: 1,
      memory: { free: 1, used: 1, allocated: 1, reservable: 1 },
      cpu: { cores: 1, systemLoad: 0, lavalinkLoad },
    });
    latestFor(sockets, nodeA).receive(stats(0.9));
    latestFor(sockets, nodeB).receive(stats(0.2));

    const player = await manager.create('guild-1');

    expect(player.node.id).toBe('node-b');
  });

  it('sends the voice update on assign and plays the resolved track', async () => {
    const { manager, sockets, fetch } = connectAll();

    await manager.assign('guild-1', makeVoice());
    const result = await manager.play('guild-1', 'night drive', requester, { textChannelId: 'text-1' });

    const socket = latestFor(sockets, nodeA);
    expect(socket.frames().slice(1)).toEqual([
      { op: 'voiceUpdate', guildId: 'guild-1', sessionId: 'session-1', event: { token: 'voice-token', endpoint: 'voice.test:443' } },
      { op: 'play', guildId: 'guild-1', track: 'encoded-a' },
    ]);
    expect(fetch.mock.calls[0]?.[0]).toBe('http://audio-a.test:2333/v4/loadtracks?identifier=ytsearch%3Anight%20drive');
    expect(result.started?.track.info.title).toBe('Track A');
    expect(manager.getPlayer('guild-1')?.textChannelId).toBe('text-1');
  });

  it('routes node events only to players bound to that node', async () => {
    const { manager, sockets } = connectAll();
    const notifications = collectNotifications(manager);
    const player = await manager.assign('guild-1', makeVoice());
    await player.enqueue([makeTrack('a')], requester);

    latestFor(sockets, nodeB).receive({ op: 'event', type: 'TrackStartEvent', guildId: 'guild-1', track: 'encoded-a' });
    latestFor(sockets, nodeA).receive({ op: 'event', type: 'TrackStartEvent', guildId: 'guild-9', track: 'encoded-a' });
    latestFor(sockets, nodeA).receive({ op: 'event', type: 'TrackStartEvent', guildId: 'guild-1', track: 'encoded-a' });
    await flush();

    expect(notifications).toHaveLength(1);
    expect(notifications[0]).toMatchObject({ type: 'nowPlaying', guildId: 'guild-1' });
  });

  it('re-sends voice updates after a resume and keeps the queue', async () => {
    const { manager, sockets } = connectAll();
    const player = await manager.assign('guild-1', makeVoice());
    await player.enqueue([makeTrack('a'), makeTrack('b')], requester);

    latestFor(sockets, nodeA).close(1006, 'connection lost');
    await vi.waitFor(() => expect(socketsFor(sockets, nodeA)).toHaveLength(2));
    const resumed = latestFor(sockets, nodeA);
    resumed.ready('session-node-a', true);

    await vi.waitFor(() => expect(resumed.ops()).toEqual(['voiceUpdate']));
    expect(player.status).toBe('playing');
    expect(player.node.id).toBe('node-a');
    expect(player.current?.track.info.title).toBe('Track A');
    expect(titles(player.snapshot().upcoming)).toEqual(['Track B']);
  });

  it('stalls players when the resume window runs out and plays nothing until rebound', async () => {
    const { manager, sockets } = connectAll({
      autoRebind: false,
      reconnect: { baseDelayMs: 5, maxDelayMs: 20, factor: 2, resumeWindowMs: 30, readyTimeoutMs: 1_000, unhealthyThreshold: 3 },
    });
    const notifications = collectNotifications(manager);
    const player = await manager.assign('guild-1', makeVoice());
    await player.enqueue([makeTrack('a')], requester);

    latestFor(sockets, nodeA).close(1006, 'connection lost');
    await vi.waitFor(() => expect(player.status).toBe('stalled'));
    await expect(player.skip()).rejects.toMatchObject({ code: 'INVALID_STATE' });

    const laterSockets = socketsFor(sockets, nodeA).slice(1);
    expect(laterSockets.flatMap((socket) => socket.ops())).toEqual([]);
    expect(notifications.map((notification) => notification.type)).toEqual(['playerStalled']);

    expect(await manager.rebind('guild-1')).toBe(true);

    expect(player.node.id).toBe('node-b');
    expect(player.status).toBe('playing');
    expect(latestFor(sockets, nodeB).ops()).toEqual(['configureResuming', 'voiceUpdate', 'play']);
  });

  it('moves stalled players to a healthy node when a resume is refused', async () => {
    const { manager, sockets } = connectAll();
    const player = await manager.assign('guild-1', makeVoice());
    await player.enqueue([makeTrack('a')], requester);

    latestFor(sockets, nodeA).close(1006, 'connection lost');
    await vi.waitFor(() => expect(socketsFor(sockets, nodeA)).toHaveLength(2));
    const restarted = latestFor(sockets, nodeA);
    restarted.ready('session-node-a-2', false);

    await vi.waitFor(() => expect(player.node.id).toBe('node-b'));
    await vi.waitFor(() => expect(latestFor(sockets, nodeB).ops()).toEqual(['configureResuming', 'voiceUpdate', 'play']));
    expect(restarted.ops()).toEqual(['configureResuming']);
    expect(player.status).toBe('playing');
  });

  it('destroys a player that has no healthy node to move to', async () => {
    const { manager, sockets } = connectAll({ nodes: [nodeA] });
    const notifications = collectNotifications(manager);
    await manager.assign('guild-1', makeVoice());

    latestFor(sockets, nodeA).close(1006, 'connection lost');

    expect(await manager.rebind('guild-1')).toBe(false);
    expect(manager.getPlayer('guild-1')).toBeUndefined();
    expect(notifications).toMatchObject([{ type: 'playerDestroyed', reason: 'nodeUnavailable', guildId: 'guild-1' }]);
  });

  it('destroys the player when the resume window expires on a node that went unhealthy', async () => {
    const sockets = createSocketFactory();
    let refuse = false;
    const refusing: SocketFactory = (request, handlers) => {
      const socket = sockets.factory(request, handlers);
      if (refuse) {
        setTimeout(() => socket.close(1006, 'connection refused'), 0);
      }
      return socket;
    };
    const { manager } = createManager({
      nodes: [nodeA],
      socketFactory: refusing,
      reconnect: { baseDelayMs: 5, maxDelayMs: 20, factor: 2, resumeWindowMs: 150, readyTimeoutMs: 1_000, unhealthyThreshold: 2 },
    });
    const notifications = collectNotifications(manager);
    manager.connect();
    latestFor(sockets, nodeA).ready('session-node-a');
    const player = await manager.assign('guild-1', makeVoice());
    await player.enqueue([makeTrack('a')], requester);

    refuse = true;
    latestFor(sockets, nodeA).close(1006, 'connection lost');

    await vi.waitFor(() => expect(player.status).toBe('destroyed'), { timeout: 2_000 });
    expect(manager.getPlayer('guild-1')).toBeUndefined();
    expect(manager.health().nodes[0]?.healthy).toBe(false);
    expect(notifications.map((notification) => notification.type)).toEqual(['playerStalled', 'playerDestroyed']);
    expect(notifications.at(-1)).toMatchObject({ type: 'playerDestroyed', reason: 'nodeUnavailable' });
  });

  it('releases a player once and tells the node to discard it', async () => {
    const { manager, sockets } = connectAll();
    const notifications = collectNotifications(manager);
    await manager.assign('guild-1', makeVoice());

    expect(await manager.release('guild-1')).toBe(true);
    expect(await manager.release('guild-1')).toBe(false);

    expect(latestFor(sockets, nodeA).ops().slice(-2)).toEqual(['stop', 'destroy']);
    expect(notifications).toMatchObject([{ type: 'playerDestroyed', reason: 'released' }]);
    expect(manager.size).toBe(0);
  });

  it('destroys every player and closes the nodes on shutdown', async () => {
    const { manager, sockets } = connectAll();
    const notifications = collectNotifications(manager);
    await manager.create('guild-1');
    await manager.create('guild-2');

    await manager.shutdown();

    expect(notifications.map((notification) => notification.type === 'playerDestroyed' && notification.reason)).toEqual([
      'shutdown',
      'shutdown',
    ]);
    expect(sockets.sockets.every((socket) => socket.closed)).toBe(true);
    expect(manager.health().nodes.map((node) => node.state)).toEqual(['disconnected', 'disconnected']);
    await expect(manager.create('guild-3')).rejects.toMatchObject({ code: 'NODE_UNAVAILABLE' });
  });
});
