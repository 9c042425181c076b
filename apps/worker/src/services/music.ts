import { escapeMarkdown, type MessageCreateOptions } from 'discord.js';
import type { Logger } from '@cadence/logger';
import {
  isPlaybackError,
  type ManagerHealth,
  type PlaybackNotification,
  type Player,
  type PlayResult,
  type QueueEntry,
  type Requester,
  type Track,
} from '@cadence/music';
import type {
  JobEnvelope,
  MusicLoopJob,
  MusicPlayJob,
  MusicQueueJob,
  MusicRemoveJob,
  MusicSeekJob,
  MusicVolumeJob,
} from '@cadence/schemas';

export interface MusicResponse {
  handled: boolean;
  payload?: MessageCreateOptions;
}

/** The player manager operations the service needs. */
export interface MusicManager {
  getPlayer(guildId: string): Player | undefined;
  play(guildId: string, query: string, requester: Requester, options?: { textChannelId?: string | null }): Promise<PlayResult>;
  release(guildId: string): Promise<boolean>;
  health(): ManagerHealth;
}

export interface VoiceController {
  join(guildId: string, channelId: string): boolean;
  leave(guildId: string): boolean;
  voiceChannelOf(guildId: string): string | null;
}

const QUEUE_PAGE_SIZE = 10;
const MS_IN_SECOND = 1000;
const SECONDS_IN_MINUTE = 60;
const MINUTES_IN_HOUR = 60;

const NOTHING_PLAYING = 'There is nothing playing right now.';

export class MusicPlaybackService {
  private readonly logger: Logger;

  constructor(
    private readonly manager: MusicManager,
    private readonly voice: VoiceController,
    logger: Logger,
  ) {
    this.logger = logger.child({ scope: 'music' });
  }

  public async handle(job: JobEnvelope): Promise<MusicResponse> {
    try {
      switch (job.type) {
        case 'music.play':
          return await this.handlePlay(job);
        case 'music.skip':
          return await this.withPlayer(job.guildId, async (player) => {
            const next = await player.skip();
            return next
              ? `⏭️ Skipped to ${formatTrackTitle(next.track)} (requested by <@${next.requester.userId}>).`
              : '⏭️ Skipped the current track. The queue is now empty.';
          });
        case 'music.previous':
          return await this.withPlayer(job.guildId, async (player) => {
            const entry = await player.previous();
            return `⏮️ Back to ${formatTrackTitle(entry.track)}.`;
          });
        case 'music.pause':
          return await this.withPlayer(job.guildId, async (player) =>
            (await player.pause()) ? '⏸️ Paused the current track.' : 'Playback is already paused.',
          );
        case 'music.resume':
          return await this.withPlayer(job.guildId, async (player) =>
            (await player.resume()) ? '▶️ Resumed playback.' : 'Playback is already running.',
          );
        case 'music.seek':
          return await this.handleSeek(job);
        case 'music.volume':
          return await this.handleVolume(job);
        case 'music.loop':
          return await this.handleLoop(job);
        case 'music.shuffle':
          return await this.withPlayer(job.guildId, async (player) => {
            const shuffled = await player.shuffle();
            return shuffled > 1 ? `🔀 Shuffled ${shuffled} upcoming tracks.` : 'There is nothing to shuffle.';
          });
        case 'music.remove':
          return await this.handleRemove(job);
        case 'music.stop':
          return await this.withPlayer(job.guildId, async (player) => {
            await player.stop();
            return '⏹️ Stopped playback and cleared the queue.';
          });
        case 'music.queue':
          return this.handleQueue(job);
        case 'music.leave':
          return await this.handleLeave(job.guildId);
        case 'music.nodes':
          return reply(formatNodeHealth(this.manager.health()));
      }
    } catch (error) {
      const player = this.manager.getPlayer(job.guildId);
      const message = describePlaybackError(error, player);
      if (message) {
        this.logger.debug({ err: error, jobType: job.type, guildId: job.guildId }, 'Music job refused');
        return reply(message);
      }
      this.logger.error({ err: error, jobType: job.type, guildId: job.guildId }, 'Music job handler threw error');
      return reply('Something went wrong while handling that music request. Please try again shortly.');
    }
  }

  /** Renders a player notification for its text channel, or null when nothing should be posted. */
  public renderNotification(notification: PlaybackNotification): MessageCreateOptions | null {
    switch (notification.type) {
      case 'nowPlaying': {
        const { entry } = notification;
        return {
          content: `🎶 Now playing ${formatTrackTitle(entry.track)} (requested by <@${entry.requester.userId}>).`,
        };
      }
      case 'queueEmpty':
        return { content: '📭 The queue has finished.' };
      case 'trackFailed':
        return {
          content: `⚠️ Stopped playback after ${notification.failures} failed tracks. Last error on ${formatTrackTitle(notification.entry.track)}: ${escapeMarkdown(notification.message)}`,
        };
      case 'playerStalled':
        return { content: '📡 Lost the connection to the audio node. Playback will continue once it is back.' };
      case 'playerDestroyed':
        this.voice.leave(notification.guildId);
        switch (notification.reason) {
          case 'idle':
            return { content: '👋 Left the voice channel because nobody was listening.' };
          case 'nodeUnavailable':
            return { content: '🔌 No audio node is available, so playback has ended.' };
          case 'released':
          case 'shutdown':
            return null;
        }
    }
  }

  private async handlePlay(job: MusicPlayJob): Promise<MusicResponse> {
    if (this.voice.voiceChannelOf(job.guildId) !== job.voiceChannelId) {
      this.voice.join(job.guildId, job.voiceChannelId);
    }

    const result = await this.manager.play(job.guildId, job.query, job.requester, { textChannelId: job.textChannelId });
    const first = result.added[0];
    if (!first) {
      return reply(`I could not find any tracks for **${escapeMarkdown(job.query)}**.`);
    }

    this.logger.info(
      {
        guildId: job.guildId,
        voiceChannelId: job.voiceChannelId,
        textChannelId: job.textChannelId,
        queuedCount: result.added.length,
        started: result.started !== null,
        requesterId: job.requester.userId,
      },
      'Handled music.play job',
    );

    if (result.started) {
      let content = `▶️ Now playing ${formatTrackTitle(result.started.track)} (requested by <@${result.started.requester.userId}>).`;
      if (result.added.length > 1) {
        content += ` ${result.added.length - 1} more queued.`;
      }
      return reply(content);
    }

    let content = `➕ Added ${formatTrackTitle(first.track)} to the queue.`;
    if (result.added.length > 1) {
      content += ` (${result.added.length} tracks queued)`;
    }
    if (result.loadResult.type === 'playlist') {
      content += ` from playlist **${escapeMarkdown(result.loadResult.name)}**`;
    }
    return reply(content);
  }

  private handleSeek(job: MusicSeekJob): Promise<MusicResponse> {
    return this.withPlayer(job.guildId, async (player) => {
      const position = await player.seek(job.positionMs);
      return `⏩ Moved to **${formatDuration(position)}**.`;
    });
  }

  private handleVolume(job: MusicVolumeJob): Promise<MusicResponse> {
    const { level } = job;
    return this.withPlayer(job.guildId, async (player) => {
      if (level === undefined) {
        return `🔊 Current volume is **${player.volume}%**.`;
      }
      const applied = await player.setVolume(level);
      this.logger.info({ guildId: job.guildId, volume: applied }, 'Adjusted playback volume');
      return `🔊 Set volume to **${applied}%**.`;
    });
  }

  private handleLoop(job: MusicLoopJob): Promise<MusicResponse> {
    return this.withPlayer(job.guildId, async (player) => {
      const mode = await player.setLoopMode(job.mode);
      return mode === 'none' ? '➡️ Looping is off.' : `🔁 Loop mode set to **${mode}**.`;
    });
  }

  private handleRemove(job: MusicRemoveJob): Promise<MusicResponse> {
    return this.withPlayer(job.guildId, async (player) => {
      try {
        const removed = await player.remove(job.position);
        return `🗑️ Removed ${formatTrackTitle(removed.track)} from the queue.`;
      } catch (error) {
        if (isPlaybackError(error, 'OUT_OF_RANGE')) {
          return `There is no track at position ${job.position}.`;
        }
        throw error;
      }
    });
  }

  private handleQueue(job: MusicQueueJob): MusicResponse {
    const player = this.manager.getPlayer(job.guildId);
    const snapshot = player?.snapshot();
    if (!snapshot || (!snapshot.current && snapshot.upcoming.length === 0)) {
      return reply('The queue is currently empty.');
    }

    const lines: string[] = [];
    if (snapshot.current) {
      const state = snapshot.status === 'paused' ? ' (paused)' : snapshot.status === 'stalled' ? ' (reconnecting)' : '';
      lines.push(
        `**Now playing:** ${formatTrackTitle(snapshot.current.track)}${state} requested by <@${snapshot.current.requester.userId}>`,
      );
    } else {
      lines.push('Nothing is currently playing.');
    }

    if (snapshot.upcoming.length > 0) {
      const pages = Math.ceil(snapshot.upcoming.length / QUEUE_PAGE_SIZE);
      const page = Math.min(job.page ?? 1, pages);
      const offset = (page - 1) * QUEUE_PAGE_SIZE;
      lines.push('');
      lines.push(pages > 1 ? `**Up next** (page ${page}/${pages}):` : '**Up next:**');
      snapshot.upcoming.slice(offset, offset + QUEUE_PAGE_SIZE).forEach((entry: QueueEntry, index) => {
        lines.push(`${offset + index + 1}. ${formatTrackTitle(entry.track)} <@${entry.requester.userId}>`);
      });
    }

    if (snapshot.loopMode !== 'none') {
      lines.push('');
      lines.push(`Loop: **${snapshot.loopMode}**`);
    }

    return reply(lines.join('\n'));
  }

  private async handleLeave(guildId: string): Promise<MusicResponse> {
    const released = await this.manager.release(guildId);
    const left = this.voice.voiceChannelOf(guildId) !== null;
    this.voice.leave(guildId);
    return reply(released || left ? '👋 Left the voice channel.' : 'I am not in a voice channel.');
  }

  private async withPlayer(guildId: string, action: (player: Player) => Promise<string>): Promise<MusicResponse> {
    const player = this.manager.getPlayer(guildId);
    if (!player) {
      return reply(NOTHING_PLAYING);
    }
    return reply(await action(player));
  }
}

function reply(content: string): MusicResponse {
  return { handled: true, payload: { content } };
}

export function describePlaybackError(error: unknown, player?: Player): string | null {
  if (!isPlaybackError(error)) {
    return null;
  }
  switch (error.code) {
    case 'QUEUE_FULL':
      return 'The queue is full.';
    case 'AT_BOUNDARY':
      return 'There is no previous track.';
    case 'OUT_OF_RANGE':
      return 'There is no track at that position.';
    case 'TRACK_LOAD_FAILED':
      return `I could not load that track: ${escapeMarkdown(error.message)}`;
    case 'NODE_UNAVAILABLE':
      return 'No audio node is available right now. Please try again shortly.';
    case 'INVALID_STATE':
      if (player?.status === 'stalled') {
        return 'Playback is on hold while the audio node reconnects.';
      }
      if (player === undefined || player.status === 'idle') {
        return NOTHING_PLAYING;
      }
      return `${error.message}.`;
    case 'PLAYER_DESTROYED':
      return 'The player was shut down before that request finished.';
    case 'COMMAND_REJECTED':
      return 'The audio node refused that request.';
  }
}

export function formatTrackTitle(track: Track): string {
  const { title, author, lengthMs, isStream } = track.info;
  let formatted = `**${escapeMarkdown(title.length > 0 ? title : 'Untitled track')}**`;
  if (author.length > 0) {
    formatted += ` by ${escapeMarkdown(author)}`;
  }
  if (isStream) {
    formatted += ' (live)';
  } else if (lengthMs > 0) {
    formatted += ` (${formatDuration(lengthMs)})`;
  }
  return formatted;
}

export function formatDuration(durationMs: number): string {
  const totalSeconds = Math.floor(Math.max(durationMs, 0) / MS_IN_SECOND);
  const seconds = totalSeconds % SECONDS_IN_MINUTE;
  const totalMinutes = Math.floor(totalSeconds / SECONDS_IN_MINUTE);
  const minutes = totalMinutes % MINUTES_IN_HOUR;
  const hours = Math.floor(totalMinutes / MINUTES_IN_HOUR);
  const paddedSeconds = seconds.toString().padStart(2, '0');

  return hours > 0 ? `${hours}:${minutes.toString().padStart(2, '0')}:${paddedSeconds}` : `${minutes}:${paddedSeconds}`;
}

function formatNodeHealth(health: ManagerHealth): string {
  const lines = health.nodes.map((node) => {
    const marker = node.state === 'ready' && node.healthy ? '🟢' : node.healthy ? '🟡' : '🔴';
    const load = node.stats ? ` load ${(node.stats.cpu.lavalinkLoad * 100).toFixed(1)}%` : '';
    return `${marker} **${escapeMarkdown(node.id)}** ${node.state}, ${node.boundPlayers} players${load}`;
  });
  lines.push(`Players: ${health.players} (${health.stalledPlayers} waiting for a node)`);
  return lines.join('\n');
}
