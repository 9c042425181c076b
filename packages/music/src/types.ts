import type { NodeStats, Track, TrackEndReason, TrackException } from '@cadence/schemas';

export type { NodeStats, Track, TrackEndReason, TrackException, TrackInfo } from '@cadence/schemas';

export type LoopMode = 'none' | 'track' | 'queue' | 'random';

export type PlayerStatus = 'idle' | 'playing' | 'paused' | 'stalled' | 'destroyed';

export interface Requester {
  userId: string;
  username: string;
}

export interface QueueEntry {
  readonly track: Track;
  readonly requester: Requester;
  readonly enqueuedAt: number;
}

export interface VoiceSession {
  guildId: string;
  channelId: string;
  sessionId: string;
  token: string;
  endpoint: string;
}

export type PlayerEvent =
  | { type: 'trackStart'; encodedTrack: string }
  | { type: 'trackEnd'; encodedTrack: string; reason: TrackEndReason }
  | { type: 'trackException'; encodedTrack: string; message: string; severity: string; cause: string | null }
  | { type: 'trackStuck'; encodedTrack: string; thresholdMs: number }
  | { type: 'playerUpdate'; positionMs: number; timestamp: number; connected: boolean }
  | { type: 'connectionClosed'; code: number; reason: string; byRemote: boolean };

export type InboundMessage =
  | { op: 'ready'; sessionId: string; resumed: boolean }
  | { op: 'stats'; stats: NodeStats }
  | { op: 'playerUpdate'; guildId: string; state: { positionMs: number; timestamp: number; connected: boolean } }
  | { op: 'event'; guildId: string; event: PlayerEvent | { type: 'unknown'; rawType: string } }
  | { op: 'unknown'; rawOp: string };

export type LoadResult =
  | { type: 'noMatches' }
  | { type: 'track'; track: Track }
  | { type: 'playlist'; name: string; tracks: Track[]; selectedIndex: number }
  | { type: 'search'; tracks: Track[] }
  | { type: 'failed'; cause: TrackException };

export type TrackFailureReason = 'loadFailed' | 'exception' | 'stuck';

export type DestroyReason = 'idle' | 'released' | 'nodeUnavailable' | 'shutdown';

export type NotificationDetail =
  | { type: 'nowPlaying'; entry: QueueEntry }
  | { type: 'queueEmpty' }
  | { type: 'trackFailed'; entry: QueueEntry; reason: TrackFailureReason; message: string; failures: number }
  | { type: 'playerStalled'; nodeId: string }
  | { type: 'playerDestroyed'; reason: DestroyReason };

export type PlaybackNotification = {
  guildId: string;
  textChannelId: string | null;
} & NotificationDetail;

export interface PlayResult {
  loadResult: LoadResult;
  added: QueueEntry[];
  started: QueueEntry | null;
}

export interface PlayerSnapshot {
  guildId: string;
  nodeId: string;
  status: PlayerStatus;
  loopMode: LoopMode;
  volume: number;
  positionMs: number;
  voiceConnected: boolean;
  current: QueueEntry | null;
  upcoming: QueueEntry[];
  voiceChannelId: string | null;
  textChannelId: string | null;
  lastActivityAt: number;
}
