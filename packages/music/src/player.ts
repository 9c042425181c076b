import { SerialQueue } from '@cadence/core';
import type { Logger } from '@cadence/logger';
import type { PlayerCommand } from '@cadence/schemas';
import { EventEmitter } from 'eventemitter3';
import { PlaybackError, isPlaybackError } from './errors.js';
import { TrackQueue, type RandomSource } from './queue.js';
import type { RestClient } from './rest.js';
import type {
  DestroyReason,
  LoadResult,
  LoopMode,
  NotificationDetail,
  PlaybackNotification,
  PlayerEvent,
  PlayerSnapshot,
  PlayerStatus,
  PlayResult,
  QueueEntry,
  Requester,
  Track,
  TrackEndReason,
  TrackFailureReason,
  VoiceSession,
} from './types.js';

export const MIN_VOLUME = 0;
export const MAX_VOLUME = 1000;

/** The slice of a node connection a player talks to. */
export interface PlayerNode {
  readonly id: string;
  readonly rest: Pick<RestClient, 'resolveTracks'>;
  send(command: PlayerCommand): Promise<void>;
}

export interface PlayerOptions {
  guildId: string;
  node: PlayerNode;
  logger: Logger;
  textChannelId?: string | null;
  queueLimit: number;
  autoSkipLimit: number;
  idleTimeoutMs: number;
  defaultVolume?: number;
  random?: RandomSource;
  now?: () => number;
}

export interface PlayerEvents {
  notification: (notification: PlaybackNotification) => void;
}

export interface EnqueueOptions {
  selectedIndex?: number;
}

export interface EnqueueResult {
  added: QueueEntry[];
  started: QueueEntry | null;
}

interface StartOptions {
  positionMs?: number;
  paused?: boolean;
}

type ActiveStatus = Exclude<PlayerStatus, 'stalled' | 'destroyed'>;

/**
 * Per-guild playback state machine.
 *
 * Every public operation and every node event runs through one serial queue,
 * so queue mutations never interleave. Destroying the player aborts in-flight
 * track resolution and rejects anything still waiting in the queue with
 * `PLAYER_DESTROYED`; no command reaches the node afterwards except the
 * teardown itself.
 */
export class Player extends EventEmitter<PlayerEvents> {
  public readonly guildId: string;

  private nodeRef: PlayerNode;
  private readonly logger: Logger;
  private readonly queue: TrackQueue;
  private readonly serial = new SerialQueue();
  private readonly abort = new AbortController();
  private readonly random: RandomSource;
  private readonly now: () => number;

  private statusValue: PlayerStatus = 'idle';
  private resumeStatus: ActiveStatus = 'idle';
  private loopModeValue: LoopMode = 'none';
  private volumeValue: number;
  private volumeSynced = false;
  private positionMs = 0;
  private voiceConnected = false;
  private positionUpdatedAt: number;
  private voice: VoiceSession | null = null;
  private textChannelIdValue: string | null;
  private pendingPlay: StartOptions | null = null;
  private suppressEndFor: string | null = null;
  private failures = 0;
  private lastActivityAt: number;

  private occupancy: number | null = null;
  private idleTimer: NodeJS.Timeout | null = null;
  private destroying: Promise<void> | null = null;

  constructor(private readonly options: PlayerOptions) {
    super();
    this.guildId = options.guildId;
    this.nodeRef = options.node;
    this.logger = options.logger.child({ scope: 'player', guildId: options.guildId });
    this.queue = new TrackQueue(options.queueLimit);
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.volumeValue = clampVolume(options.defaultVolume ?? 100);
    this.textChannelIdValue = options.textChannelId ?? null;
    this.positionUpdatedAt = this.now();
    this.lastActivityAt = this.now();
  }

  public get node(): PlayerNode {
    return this.nodeRef;
  }

  public get status(): PlayerStatus {
    return this.statusValue;
  }

  public get loopMode(): LoopMode {
    return this.loopModeValue;
  }

  public get volume(): number {
    return this.volumeValue;
  }

  public get current(): QueueEntry | null {
    return this.queue.current;
  }

  public get currentIndex(): number | undefined {
    return this.queue.index;
  }

  public get voiceSession(): VoiceSession | null {
    return this.voice ? { ...this.voice } : null;
  }

  public get textChannelId(): string | null {
    return this.textChannelIdValue;
  }

  public set textChannelId(value: string | null) {
    this.textChannelIdValue = value;
  }

  public get destroyed(): boolean {
    return this.destroying !== null;
  }

  public get position(): number {
    const current = this.queue.current;
    if (this.statusValue !== 'playing' || !current) {
      return this.positionMs;
    }
    const elapsed = Math.max(0, this.now() - this.positionUpdatedAt);
    const estimate = this.positionMs + elapsed;
    return current.track.info.isStream ? estimate : Math.min(estimate, current.track.info.lengthMs);
  }

  public snapshot(): PlayerSnapshot {
    return {
      guildId: this.guildId,
      nodeId: this.nodeRef.id,
      status: this.statusValue,
      loopMode: this.loopModeValue,
      volume: this.volumeValue,
      positionMs: this.position,
      voiceConnected: this.voiceConnected,
      current: this.queue.current,
      upcoming: this.queue.upcoming(),
      voiceChannelId: this.voice?.channelId ?? null,
      textChannelId: this.textChannelIdValue,
      lastActivityAt: this.lastActivityAt,
    };
  }

  /** Resolves a query on the bound node and enqueues what it finds. */
  public play(query: string, requester: Requester): Promise<PlayResult> {
    return this.run(async () => {
      const loadResult = await this.nodeRef.rest.resolveTracks(query, this.abort.signal);
      this.assertAlive();
      const { tracks, selectedIndex } = pickTracks(loadResult);
      if (tracks.length === 0) {
        return { loadResult, added: [], started: null };
      }
      const result = await this.append(tracks, requester, selectedIndex);
      return { loadResult, ...result };
    });
  }

  public enqueue(tracks: Track[], requester: Requester, options: EnqueueOptions = {}): Promise<EnqueueResult> {
    return this.run(() => this.append(tracks, requester, options.selectedIndex ?? 0));
  }

  /** Returns the entry that started, or null when playback went idle. */
  public skip(): Promise<QueueEntry | null> {
    return this.run(async () => {
      this.assertActive('skip');
      this.failures = 0;
      const next = this.queue.nextIndex(this.loopModeValue, this.random, true);
      if (next === undefined) {
        await this.dispatch({ op: 'stop', guildId: this.guildId });
        this.goIdle();
        return null;
      }
      return this.startAt(next);
    });
  }

  public previous(): Promise<QueueEntry> {
    return this.run(async () => {
      this.assertActive('go back');
      const index = this.queue.previousIndex();
      if (index === undefined) {
        throw new PlaybackError('AT_BOUNDARY', 'Already at the start of the queue');
      }
      this.failures = 0;
      return this.startAt(index);
    });
  }

  /** Returns false when the player was already paused. */
  public pause(): Promise<boolean> {
    return this.run(async () => {
      if (this.statusValue === 'paused') {
        return false;
      }
      this.assertActive('pause');
      this.positionMs = this.position;
      this.positionUpdatedAt = this.now();
      this.statusValue = 'paused';
      await this.dispatch({ op: 'pause', guildId: this.guildId, state: true });
      return true;
    });
  }

  /** Returns false when the player was already playing. */
  public resume(): Promise<boolean> {
    return this.run(async () => {
      if (this.statusValue === 'playing') {
        return false;
      }
      this.assertActive('resume');
      this.positionUpdatedAt = this.now();
      this.statusValue = 'playing';
      await this.dispatch({ op: 'pause', guildId: this.guildId, state: false });
      return true;
    });
  }

  /** Returns the clamped position that was sent. */
  public seek(positionMs: number): Promise<number> {
    return this.run(async () => {
      this.assertActive('seek');
      const current = this.queue.current;
      if (!current || !current.track.info.isSeekable) {
        throw new PlaybackError('INVALID_STATE', 'The current track cannot be seeked');
      }
      const target = Math.round(Math.min(Math.max(positionMs, 0), current.track.info.lengthMs));
      this.setPosition(target);
      await this.dispatch({ op: 'seek', guildId: this.guildId, positionMs: target });
      return target;
    });
  }

  public setVolume(volume: number): Promise<number> {
    return this.run(async () => {
      this.volumeValue = clampVolume(volume);
      if (this.voice && this.statusValue !== 'stalled') {
        await this.dispatch({ op: 'volume', guildId: this.guildId, volume: this.volumeValue });
        this.volumeSynced = true;
      } else {
        this.volumeSynced = false;
      }
      return this.volumeValue;
    });
  }

  public setLoopMode(mode: LoopMode): Promise<LoopMode> {
    return this.run(() => {
      this.loopModeValue = mode;
      return mode;
    });
  }

  /** Stops playback and empties the queue. Returns how many entries were dropped. */
  public stop(): Promise<number> {
    return this.run(async () => {
      const dropped = this.queue.length;
      if (this.statusValue === 'stalled') {
        this.queue.clear();
        this.resumeStatus = 'idle';
        return dropped;
      }
      if (this.statusValue !== 'idle') {
        await this.dispatch({ op: 'stop', guildId: this.guildId });
      }
      this.goIdle();
      return dropped;
    });
  }

  /** Drops every entry except the one playing. */
  public clear(): Promise<number> {
    return this.run(() => {
      const before = this.queue.length;
      this.queue.retainCurrent();
      return before - this.queue.length;
    });
  }

  /** Removes the upcoming entry at a 1-based position. */
  public remove(position: number): Promise<QueueEntry> {
    return this.run(() => this.queue.removeUpcoming(position));
  }

  public shuffle(): Promise<number> {
    return this.run(() => this.queue.shuffleUpcoming(this.random));
  }

  /**
   * Replaces the voice session as a whole and forwards it to the node. A play
   * that was waiting for voice credentials is sent right after.
   */
  public updateVoice(session: VoiceSession): Promise<void> {
    return this.run(async () => {
      if (session.guildId !== this.guildId) {
        throw new PlaybackError('INVALID_STATE', `Voice session for guild ${session.guildId} given to ${this.guildId}`);
      }
      this.voice = { ...session };
      if (this.statusValue === 'stalled') {
        return;
      }
      await this.syncVoice();
      await this.flushPendingPlay();
    });
  }

  /** Re-sends the voice update after the node resumed its session. */
  public resyncVoice(): Promise<void> {
    return this.run(async () => {
      if (!this.voice || this.statusValue === 'stalled') {
        return;
      }
      await this.dispatch(this.voiceUpdateCommand(this.voice));
    });
  }

  public handleEvent(event: PlayerEvent): Promise<void> {
    if (this.destroying) {
      this.logger.debug({ type: event.type }, 'Dropped event for destroyed player');
      return Promise.resolve();
    }
    return this.run(() => this.applyEvent(event));
  }

  /** Freezes the player after its node lost the session. */
  public stall(): Promise<void> {
    return this.run(() => {
      if (this.statusValue === 'stalled') {
        return;
      }
      this.positionMs = this.position;
      this.positionUpdatedAt = this.now();
      this.resumeStatus = toActive(this.statusValue);
      this.statusValue = 'stalled';
      this.volumeSynced = false;
      this.voiceConnected = false;
      this.logger.warn({ nodeId: this.nodeRef.id, positionMs: this.positionMs }, 'Player stalled');
      this.notify({ type: 'playerStalled', nodeId: this.nodeRef.id });
    });
  }

  /**
   * Moves the player to another node and picks up where it left off. The
   * current track is resolved again on the new node; when that yields nothing
   * the previous encoded handle is reused. Returns false when `onlyIfStalled`
   * is set and the player is not stalled.
   */
  public rebind(node: PlayerNode, options: { onlyIfStalled?: boolean } = {}): Promise<boolean> {
    return this.run(async () => {
      const wasStalled = this.statusValue === 'stalled';
      if (options.onlyIfStalled && !wasStalled) {
        return false;
      }

      const previous = this.nodeRef;
      const target = wasStalled ? this.resumeStatus : toActive(this.statusValue);
      if (!wasStalled) {
        this.positionMs = this.position;
        this.positionUpdatedAt = this.now();
        if (previous !== node) {
          await previous.send({ op: 'destroy', guildId: this.guildId }).catch((error: unknown) => {
            this.logger.warn({ err: error, nodeId: previous.id }, 'Failed to discard player on previous node');
          });
        }
      }

      this.nodeRef = node;
      this.statusValue = target;
      this.resumeStatus = 'idle';
      this.volumeSynced = false;
      this.logger.info({ from: previous.id, to: node.id, status: this.statusValue }, 'Player rebound');

      if (this.voice) {
        await this.syncVoice();
      }

      const index = this.queue.index;
      const current = this.queue.current;
      if (this.statusValue === 'idle' || index === undefined || !current) {
        return true;
      }

      const track = await this.resolveAgain(current.track);
      this.assertAlive();
      if (track !== current.track) {
        this.queue.replaceCurrent({ ...current, track });
      }
      await this.startAt(index, { positionMs: this.positionMs, paused: this.statusValue === 'paused' });
      return true;
    });
  }

  /**
   * Resets the idle timer. With nobody but the bot left in the channel the
   * player destroys itself after the configured timeout.
   */
  public updateOccupancy(listeners: number): void {
    if (this.destroying) {
      return;
    }
    this.occupancy = listeners;
    this.lastActivityAt = this.now();
    this.clearIdleTimer();
    if (listeners > 0) {
      return;
    }
    this.idleTimer = setTimeout(() => this.expireIdle(), this.options.idleTimeoutMs);
  }

  public destroy(reason: DestroyReason): Promise<void> {
    if (!this.destroying) {
      this.destroying = this.teardown(reason);
    }
    return this.destroying;
  }

  private async teardown(reason: DestroyReason): Promise<void> {
    const error = new PlaybackError('PLAYER_DESTROYED', `Player for guild ${this.guildId} was destroyed`);
    this.clearIdleTimer();
    this.abort.abort(error);
    this.serial.close(error);
    await this.serial.drain();

    if (this.statusValue !== 'stalled') {
      const node = this.nodeRef;
      const commands: PlayerCommand[] = [
        { op: 'stop', guildId: this.guildId },
        { op: 'destroy', guildId: this.guildId },
      ];
      for (const command of commands) {
        await node.send(command).catch((sendError: unknown) => {
          this.logger.warn({ err: sendError, op: command.op }, 'Failed to send teardown command');
        });
      }
    }

    this.statusValue = 'destroyed';
    this.pendingPlay = null;
    this.queue.clear();
    this.logger.info({ reason }, 'Player destroyed');
    this.notify({ type: 'playerDestroyed', reason });
  }

  private expireIdle(): void {
    this.idleTimer = null;
    void this.run(() => this.occupancy === 0)
      .then((expired) => (expired ? this.destroy('idle') : undefined))
      .catch((error: unknown) => {
        if (!isPlaybackError(error, 'PLAYER_DESTROYED')) {
          this.logger.error({ err: error }, 'Idle expiry failed');
        }
      });
  }

  private async applyEvent(event: PlayerEvent): Promise<void> {
    if (this.statusValue === 'stalled') {
      this.logger.debug({ type: event.type }, 'Ignored event while stalled');
      return;
    }

    if (event.type === 'playerUpdate') {
      this.voiceConnected = event.connected;
      if (this.statusValue !== 'idle') {
        this.positionMs = event.positionMs;
        this.positionUpdatedAt = this.now();
      }
      return;
    }
    if (event.type === 'connectionClosed') {
      this.logger.warn(
        { code: event.code, reason: event.reason, byRemote: event.byRemote },
        'Voice connection closed on node',
      );
      return;
    }

    const current = this.queue.current;
    if (!current || current.track.encoded !== event.encodedTrack) {
      this.logger.debug({ type: event.type }, 'Ignored event for a track that is not current');
      return;
    }

    switch (event.type) {
      case 'trackStart':
        this.suppressEndFor = null;
        this.notify({ type: 'nowPlaying', entry: current });
        return;
      case 'trackEnd':
        if (this.suppressEndFor === event.encodedTrack) {
          this.suppressEndFor = null;
          return;
        }
        await this.handleTrackEnd(current, event.reason);
        return;
      case 'trackException':
        this.suppressEndFor = event.encodedTrack;
        await this.fail(current, 'exception', event.message);
        return;
      case 'trackStuck':
        this.suppressEndFor = event.encodedTrack;
        await this.fail(current, 'stuck', `Track got stuck for ${event.thresholdMs} ms`);
        return;
    }
  }

  private async handleTrackEnd(current: QueueEntry, reason: TrackEndReason): Promise<void> {
    switch (reason) {
      case 'finished':
        this.failures = 0;
        await this.advance();
        return;
      case 'loadFailed':
        await this.fail(current, 'loadFailed', 'Track failed to load');
        return;
      case 'stopped':
      case 'cleanup':
        this.goIdle();
        return;
      case 'replaced':
        return;
    }
  }

  private async fail(entry: QueueEntry, reason: TrackFailureReason, message: string): Promise<void> {
    this.failures += 1;
    const failures = this.failures;
    this.logger.warn({ reason, failures, title: entry.track.info.title, message }, 'Track failed');

    if (failures < this.options.autoSkipLimit) {
      await this.advance();
      return;
    }

    await this.dispatch({ op: 'stop', guildId: this.guildId });
    this.goIdle();
    this.notify({ type: 'trackFailed', entry, reason, message, failures });
  }

  private async advance(): Promise<void> {
    const next = this.queue.nextIndex(this.loopModeValue, this.random);
    if (next === undefined) {
      this.goIdle();
      this.notify({ type: 'queueEmpty' });
      return;
    }

    try {
      await this.startAt(next);
    } catch (error) {
      if (!isPlaybackError(error, 'COMMAND_REJECTED')) {
        throw error;
      }
      const entry = this.queue.current;
      if (entry) {
        await this.fail(entry, 'loadFailed', error.message);
      }
    }
  }

  private async append(tracks: Track[], requester: Requester, selectedIndex: number): Promise<EnqueueResult> {
    this.assertAlive();
    const enqueuedAt = this.now();
    const entries = tracks.map((track) => ({ track, requester: { ...requester }, enqueuedAt }));
    const start = this.queue.append(entries);
    this.lastActivityAt = enqueuedAt;
    const offset = selectedIndex >= 0 && selectedIndex < entries.length ? selectedIndex : 0;

    if (this.statusValue === 'stalled') {
      if (this.resumeStatus === 'idle') {
        this.queue.select(start + offset);
        this.positionMs = 0;
        this.resumeStatus = 'playing';
      }
      return { added: entries, started: null };
    }

    if (this.statusValue !== 'idle') {
      return { added: entries, started: null };
    }

    this.failures = 0;
    const started = await this.startAt(start + offset);
    return { added: entries, started };
  }

  private async startAt(index: number, options: StartOptions = {}): Promise<QueueEntry> {
    const entry = this.queue.select(index);
    const paused = options.paused ?? false;
    const positionMs = options.positionMs ?? 0;
    this.statusValue = paused ? 'paused' : 'playing';
    this.setPosition(positionMs);
    this.lastActivityAt = this.now();

    if (!this.voice) {
      this.pendingPlay = { positionMs, paused };
      this.logger.debug({ title: entry.track.info.title }, 'Play deferred until voice credentials arrive');
      return entry;
    }

    this.pendingPlay = null;
    await this.dispatch(this.playCommand(entry, positionMs, paused));
    return entry;
  }

  private async flushPendingPlay(): Promise<void> {
    const pending = this.pendingPlay;
    const entry = this.queue.current;
    this.pendingPlay = null;
    if (!pending || !entry) {
      return;
    }
    await this.dispatch(this.playCommand(entry, pending.positionMs ?? 0, pending.paused ?? false));
  }

  private async syncVoice(): Promise<void> {
    if (!this.voice) {
      return;
    }
    await this.dispatch(this.voiceUpdateCommand(this.voice));
    if (!this.volumeSynced && this.volumeValue !== 100) {
      await this.dispatch({ op: 'volume', guildId: this.guildId, volume: this.volumeValue });
    }
    this.volumeSynced = true;
  }

  private async resolveAgain(track: Track): Promise<Track> {
    const identifier = track.info.uri ?? track.info.identifier;
    try {
      const result = await this.nodeRef.rest.resolveTracks(identifier, this.abort.signal);
      const { tracks, selectedIndex } = pickTracks(result);
      const match = tracks.find((candidate) => candidate.info.identifier === track.info.identifier);
      return match ?? tracks[selectedIndex] ?? track;
    } catch (error) {
      if (this.abort.signal.aborted) {
        throw error;
      }
      this.logger.warn({ err: error, identifier }, 'Could not resolve track on new node, reusing encoded track');
      return track;
    }
  }

  private playCommand(entry: QueueEntry, positionMs: number, paused: boolean): PlayerCommand {
    return {
      op: 'play',
      guildId: this.guildId,
      track: entry.track.encoded,
      startTimeMs: positionMs > 0 ? positionMs : undefined,
      paused: paused ? true : undefined,
    };
  }

  private voiceUpdateCommand(session: VoiceSession): PlayerCommand {
    return {
      op: 'voiceUpdate',
      guildId: this.guildId,
      sessionId: session.sessionId,
      event: { token: session.token, endpoint: session.endpoint },
    };
  }

  private async dispatch(command: PlayerCommand): Promise<void> {
    if (this.destroying) {
      this.logger.debug({ op: command.op }, 'Dropped command for destroyed player');
      return;
    }
    if (this.statusValue === 'stalled') {
      this.logger.debug({ op: command.op }, 'Dropped command while stalled');
      return;
    }
    await this.nodeRef.send(command);
  }

  private goIdle(): void {
    this.statusValue = 'idle';
    this.queue.clear();
    this.pendingPlay = null;
    this.suppressEndFor = null;
    this.setPosition(0);
  }

  private setPosition(positionMs: number): void {
    this.positionMs = positionMs;
    this.positionUpdatedAt = this.now();
  }

  private notify(detail: NotificationDetail): void {
    this.emit('notification', { guildId: this.guildId, textChannelId: this.textChannelIdValue, ...detail });
  }

  private assertAlive(): void {
    if (this.destroying) {
      throw new PlaybackError('PLAYER_DESTROYED', `Player for guild ${this.guildId} was destroyed`);
    }
  }

  private assertActive(action: string): void {
    if (this.statusValue !== 'playing' && this.statusValue !== 'paused') {
      throw new PlaybackError('INVALID_STATE', `Cannot ${action} while the player is ${this.statusValue}`);
    }
  }

  private clearIdleTimer(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
  }

  private run<T>(task: () => Promise<T> | T): Promise<T> {
    return this.serial.run(() => {
      this.assertAlive();
      return task();
    });
  }
}

function toActive(status: PlayerStatus): ActiveStatus {
  return status === 'stalled' || status === 'destroyed' ? 'idle' : status;
}

function clampVolume(volume: number): number {
  if (!Number.isFinite(volume)) {
    return 100;
  }
  return Math.round(Math.min(Math.max(volume, MIN_VOLUME), MAX_VOLUME));
}

/** Maps a load result onto the tracks to enqueue and the one to start with. */
export function pickTracks(result: LoadResult): { tracks: Track[]; selectedIndex: number } {
  switch (result.type) {
    case 'noMatches':
      return { tracks: [], selectedIndex: 0 };
    case 'track':
      return { tracks: [result.track], selectedIndex: 0 };
    case 'search':
      return { tracks: result.tracks.slice(0, 1), selectedIndex: 0 };
    case 'playlist':
      return { tracks: result.tracks, selectedIndex: result.selectedIndex };
    case 'failed':
      throw new PlaybackError('TRACK_LOAD_FAILED', result.cause.message, { cause: result.cause });
  }
}
