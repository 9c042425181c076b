import { createLogger } from '@cadence/logger';
import { PlayerManager, type FetchLike, type NodeSocket, type SocketFactory, type SocketHandlers } from '@cadence/music';

export const silentLogger = createLogger({ level: 'silent' });

export const requester = { userId: 'user-1', username: 'listener' };

function json(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

/** Answers track searches with a single track titled after the query; "nothing" finds nothing. */
export const searchFetch: FetchLike = async (input) => {
  const url = new URL(input);
  if (url.pathname !== '/v4/loadtracks') {
    return new Response(null, { status: 204 });
  }
  const query = (url.searchParams.get('identifier') ?? '').replace(/^ytsearch:/, '');
  if (query === 'nothing') {
    return json({ loadType: 'empty', data: {} });
  }
  return json({
    loadType: 'search',
    data: [
      {
        encoded: `encoded-${query}`,
        info: { identifier: query, title: query, author: 'Test Artist', length: 180_000, isStream: false },
      },
    ],
  });
};

export interface ReadyManager {
  manager: PlayerManager;
  frames: string[];
}

/** A one-node manager whose node is ready as soon as it connects. */
export function createReadyManager(): ReadyManager {
  const frames: string[] = [];
  const handlers: SocketHandlers[] = [];
  const socketFactory: SocketFactory = (_request, socketHandlers) => {
    handlers.push(socketHandlers);
    const socket: NodeSocket = {
      send: async (data) => {
        frames.push(data);
      },
      close: (code = 1000, reason = '') => socketHandlers.close(code, reason),
      terminate: () => socketHandlers.close(1006, 'terminated'),
    };
    return socket;
  };

  const manager = new PlayerManager({
    userId: 'bot-1',
    clientName: 'cadence-tests',
    nodes: [{ id: 'node-a', host: 'audio.test', port: 2333, password: 'test-secret', secure: false, transport: 'websocket' }],
    reconnect: {
      baseDelayMs: 1_000,
      maxDelayMs: 5_000,
      factor: 2,
      resumeWindowMs: 60_000,
      readyTimeoutMs: 5_000,
      unhealthyThreshold: 3,
    },
    player: { queueLimit: 50, idleTimeoutMs: 60_000, autoSkipLimit: 3, defaultVolume: 100 },
    logger: silentLogger,
    socketFactory,
    fetch: searchFetch,
    random: () => 0,
  });

  manager.connect();
  for (const socketHandlers of handlers) {
    socketHandlers.open();
    socketHandlers.message(JSON.stringify({ op: 'ready', sessionId: 'session-1', resumed: false }));
  }

  return { manager, frames };
}
