import { createLogger } from '@cadence/logger';
import type { PlayerCommand } from '@cadence/schemas';
import { vi, type Mock } from 'vitest';
import type { PlayerNode } from '../src/player.js';
import type { NodeSocket, SocketFactory, SocketHandlers, SocketRequest } from '../src/socket.js';
import type { LoadResult, PlaybackNotification, QueueEntry, Requester, Track, TrackInfo, VoiceSession } from '../src/types.js';

export const silentLogger = createLogger({ level: 'silent' });

export const requester: Requester = { userId: 'user-1', username: 'listener' };

export function makeTrack(id: string, info: Partial<TrackInfo> = {}): Track {
  return {
    encoded: `encoded-${id}`,
    info: {
      identifier: id,
      title: `Track ${id.toUpperCase()}`,
      author: 'Test Artist',
      lengthMs: 180_000,
      isStream: false,
      isSeekable: true,
      uri: `https://media.test/${id}`,
      sourceName: 'http',
      artworkUrl: null,
      ...info,
    },
  };
}

export function makeVoice(guildId = 'guild-1', overrides: Partial<VoiceSession> = {}): VoiceSession {
  return {
    guildId,
    channelId: 'voice-1',
    sessionId: 'session-1',
    token: 'voice-token',
    endpoint: 'voice.test:443',
    ...overrides,
  };
}

export interface FakeNode extends PlayerNode {
  readonly sent: PlayerCommand[];
  readonly resolveTracks: Mock<(query: string, signal?: AbortSignal) => Promise<LoadResult>>;
}

export function createFakeNode(id = 'node-a', results: Record<string, LoadResult> = {}): FakeNode {
  const sent: PlayerCommand[] = [];
  const resolveTracks = vi.fn(
    async (query: string, _signal?: AbortSignal): Promise<LoadResult> => results[query] ?? { type: 'noMatches' },
  );
  return {
    id,
    sent,
    resolveTracks,
    rest: { resolveTracks },
    send: vi.fn(async (command: PlayerCommand) => {
      sent.push(command);
    }),
  };
}

export function playedTracks(node: FakeNode): string[] {
  return node.sent.flatMap((command) => (command.op === 'play' ? [command.track] : []));
}

export function titles(entries: QueueEntry[]): string[] {
  return entries.map((entry) => entry.track.info.title);
}

export function collectNotifications(emitter: {
  on(event: 'notification', listener: (notification: PlaybackNotification) => void): unknown;
}): PlaybackNotification[] {
  const notifications: PlaybackNotification[] = [];
  emitter.on('notification', (notification) => {
    notifications.push(notification);
  });
  return notifications;
}

export class FakeSocket implements NodeSocket {
  public readonly sent: string[] = [];
  public closed = false;

  constructor(
    public readonly request: SocketRequest,
    private readonly handlers: SocketHandlers,
  ) {}

  public async send(data: string): Promise<void> {
    this.sent.push(data);
  }

  public close(code = 1000, reason = ''): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.handlers.close(code, reason);
  }

  public terminate(): void {
    this.close(1006, 'terminated');
  }

  public open(): void {
    this.handlers.open();
  }

  public receive(message: unknown): void {
    this.handlers.message(typeof message === 'string' ? message : JSON.stringify(message));
  }

  public ready(sessionId: string, resumed = false): void {
    this.open();
    this.receive({ op: 'ready', sessionId, resumed });
  }

  public frames(): unknown[] {
    return this.sent.map((frame): unknown => JSON.parse(frame));
  }

  public ops(): string[] {
    return this.frames().flatMap((frame) =>
      typeof frame === 'object' && frame !== null && 'op' in frame && typeof frame.op === 'string' ? [frame.op] : [],
    );
  }
}

export interface FakeSocketFactory {
  factory: SocketFactory;
  sockets: FakeSocket[];
  latest(): FakeSocket;
}

export function createSocketFactory(): FakeSocketFactory {
  const sockets: FakeSocket[] = [];
  return {
    sockets,
    factory: (request, handlers) => {
      const socket = new FakeSocket(request, handlers);
      sockets.push(socket);
      return socket;
    },
    latest: () => {
      const socket = sockets.at(-1);
      if (!socket) {
        throw new Error('No socket has been opened');
      }
      return socket;
    },
  };
}
