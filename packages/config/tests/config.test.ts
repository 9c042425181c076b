import { describe, expect, it } from 'vitest';
import { loadWorkerConfig } from '../src/index.js';

const baseEnv = {
  REDIS_URL: 'redis://localhost:6379',
  DISCORD_TOKEN: 'test-token',
  LAVALINK_PASSWORD: 'test-secret',
};

describe('loadWorkerConfig', () => {
  it('applies defaults for a single node configured through plain variables', () => {
    const config = loadWorkerConfig({ ...baseEnv });

    expect(config.environment).toBe('development');
    expect(config.lavalink.nodes).toEqual([
      { id: 'primary', host: 'lavalink', port: 2333, password: 'test-secret', secure: false, transport: 'websocket' },
    ]);
    expect(config.lavalink.reconnect).toEqual({
      baseDelayMs: 1000,
      maxDelayMs: 30000,
      factor: 2,
      resumeWindowMs: 60000,
      readyTimeoutMs: 5000,
      unhealthyThreshold: 5,
    });
    expect(config.lavalink.rest.searchPrefix).toBe('ytsearch:');
    expect(config.player).toEqual({ queueLimit: 1000, idleTimeoutMs: 10000, autoSkipLimit: 3, defaultVolume: 100 });
  });

  it('parses a JSON node list and fills missing fields from the single-node variables', () => {
    const config = loadWorkerConfig({
      ...baseEnv,
      LAVALINK_SECURE: 'yes',
      LAVALINK_NODES: JSON.stringify([
        { id: 'eu', host: 'eu.audio.internal', port: '443', transport: 'rest' },
        { host: 'us.audio.internal', password: 'other-secret', secure: false },
      ]),
    });

    expect(config.lavalink.nodes).toEqual([
      { id: 'eu', host: 'eu.audio.internal', port: 443, password: 'test-secret', secure: true, transport: 'rest' },
      { id: 'node-2', host: 'us.audio.internal', port: 2333, password: 'other-secret', secure: false, transport: 'websocket' },
    ]);
  });

  it('reads player limits and reconnect policy overrides', () => {
    const config = loadWorkerConfig({
      ...baseEnv,
      PLAYER_QUEUE_LIMIT: '50',
      PLAYER_AUTO_SKIP_LIMIT: '5',
      NODE_RECONNECT_BASE_MS: '500',
      NODE_RECONNECT_FACTOR: '1.5',
    });

    expect(config.player.queueLimit).toBe(50);
    expect(config.player.autoSkipLimit).toBe(5);
    expect(config.lavalink.reconnect.baseDelayMs).toBe(500);
    expect(config.lavalink.reconnect.factor).toBe(1.5);
  });

  it('rejects malformed node lists', () => {
    expect(() => loadWorkerConfig({ ...baseEnv, LAVALINK_NODES: '{"id":"x"}' })).toThrow(
      'Failed to parse LAVALINK_NODES: LAVALINK_NODES must be a JSON array',
    );
    expect(() =>
      loadWorkerConfig({ ...baseEnv, LAVALINK_NODES: JSON.stringify([{ id: 'a' }, { id: 'a' }]) }),
    ).toThrow('LAVALINK_NODES contains duplicate node ids');
  });

  it('rejects unknown transports', () => {
    expect(() => loadWorkerConfig({ ...baseEnv, LAVALINK_TRANSPORT: 'carrier-pigeon' })).toThrow(
      'Unknown Lavalink transport "carrier-pigeon"',
    );
  });

  it('requires the Discord token and Redis URL', () => {
    expect(() => loadWorkerConfig({ LAVALINK_PASSWORD: 'test-secret' })).toThrow();
  });

  it('rejects a reconnect ceiling below the base delay', () => {
    expect(() =>
      loadWorkerConfig({ ...baseEnv, NODE_RECONNECT_BASE_MS: '5000', NODE_RECONNECT_MAX_MS: '1000' }),
    ).toThrow('NODE_RECONNECT_MAX_MS must not be lower than NODE_RECONNECT_BASE_MS');
  });
});
