import { computeBackoffDelay } from '@cadence/core';
import type { Logger } from '@cadence/logger';
import type { NodeStats, PlayerCommand } from '@cadence/schemas';
import { EventEmitter } from 'eventemitter3';
import { decodeMessage, encodeCommand, type FrameData } from './codec.js';
import { PlaybackError, RestError, TransportError } from './errors.js';
import type { RestClient } from './rest.js';
import { createWebSocket, type NodeSocket, type SocketFactory } from './socket.js';
import type { InboundMessage, PlayerEvent } from './types.js';

export type NodeConnectionState = 'disconnected' | 'connecting' | 'authenticated' | 'ready' | 'reconnecting';

export type NodeTransport = 'websocket' | 'rest';

export interface NodeDefinition {
  id: string;
  host: string;
  port: number;
  password: string;
  secure: boolean;
  transport: NodeTransport;
}

export interface ReconnectPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
  resumeWindowMs: number;
  readyTimeoutMs: number;
  unhealthyThreshold: number;
}

export interface NodeConnectionOptions {
  definition: NodeDefinition;
  userId: string;
  clientName: string;
  reconnect: ReconnectPolicy;
  rest: RestClient;
  logger: Logger;
  socketFactory?: SocketFactory;
}

export interface NodeConnectionEvents {
  stateChange: (state: NodeConnectionState, previous: NodeConnectionState) => void;
  ready: (session: { sessionId: string; resumed: boolean }) => void;
  resumed: () => void;
  sessionLost: () => void;
  unhealthy: (failures: number) => void;
  stats: (stats: NodeStats) => void;
  dispatch: (guildId: string, event: PlayerEvent) => void;
}

export interface NodeHealth {
  id: string;
  transport: NodeTransport;
  state: NodeConnectionState;
  healthy: boolean;
  failures: number;
  sessionId: string | null;
  stats: NodeStats | null;
}

/**
 * Owns the single control socket to one node.
 *
 * A socket is only created once the previous one reported `close`, so two
 * sessions never overlap. Losing a ready socket opens a resume window: while
 * it is open, reconnects carry the old session id and player commands are
 * buffered. If the node resumes the session the buffer is flushed and
 * `resumed` fires; if the window lapses or the node starts a fresh session,
 * the buffer is dropped and `sessionLost` fires.
 */
export class NodeConnection extends EventEmitter<NodeConnectionEvents> {
  public readonly id: string;
  public readonly transport: NodeTransport;
  public readonly rest: RestClient;

  private readonly logger: Logger;
  private readonly socketFactory: SocketFactory;

  private stateValue: NodeConnectionState = 'disconnected';
  private sessionIdValue: string | null = null;
  private statsValue: NodeStats | null = null;
  private failures = 0;
  private healthyValue = true;

  private socket: NodeSocket | null = null;
  private socketClosed: Promise<void> = Promise.resolve();
  private generation = 0;
  private resumeAttempt = false;
  private pending: PlayerCommand[] = [];
  private shutdownRequested = false;

  private reconnectTimer: NodeJS.Timeout | null = null;
  private readyTimer: NodeJS.Timeout | null = null;
  private resumeWindowTimer: NodeJS.Timeout | null = null;

  constructor(private readonly options: NodeConnectionOptions) {
    super();
    this.id = options.definition.id;
    this.transport = options.definition.transport;
    this.rest = options.rest;
    this.logger = options.logger.child({ scope: 'node', nodeId: options.definition.id });
    this.socketFactory = options.socketFactory ?? createWebSocket;
  }

  public get state(): NodeConnectionState {
    return this.stateValue;
  }

  public get sessionId(): string | null {
    return this.sessionIdValue;
  }

  public get stats(): NodeStats | null {
    return this.statsValue;
  }

  public get healthy(): boolean {
    return this.healthyValue;
  }

  public get available(): boolean {
    return this.stateValue === 'ready' && this.healthyValue && !this.shutdownRequested;
  }

  public health(): NodeHealth {
    return {
      id: this.id,
      transport: this.transport,
      state: this.stateValue,
      healthy: this.healthyValue,
      failures: this.failures,
      sessionId: this.sessionIdValue,
      stats: this.statsValue,
    };
  }

  public connect(): void {
    if (this.shutdownRequested) {
      throw new TransportError(`Node ${this.id} has been shut down`);
    }
    if (this.stateValue !== 'disconnected' || this.socket || this.reconnectTimer) {
      return;
    }
    this.openSocket();
  }

  /**
   * Delivers a player command. Commands issued while a resume is still
   * possible are buffered; otherwise they are dropped with a warning, since
   * transport failures are handled by reconnecting rather than per command.
   * Nodes using the REST transport surface server rejections as
   * `COMMAND_REJECTED`.
   */
  public async send(command: PlayerCommand): Promise<void> {
    if (this.shutdownRequested) {
      this.logger.debug({ op: command.op, guildId: command.guildId }, 'Dropped command after shutdown');
      return;
    }

    if (this.stateValue !== 'ready') {
      if (this.sessionIdValue !== null && this.resumeWindowTimer !== null) {
        this.pending.push(command);
        this.logger.debug(
          { op: command.op, guildId: command.guildId, buffered: this.pending.length },
          'Buffered command until the session resumes',
        );
        return;
      }
      this.logger.warn(
        { op: command.op, guildId: command.guildId, state: this.stateValue },
        'Dropped command for unavailable node',
      );
      return;
    }

    await this.deliver(command);
  }

  public async shutdown(): Promise<void> {
    if (this.shutdownRequested) {
      await this.socketClosed;
      return;
    }

    this.shutdownRequested = true;
    this.clearTimer('reconnectTimer');
    this.clearTimer('readyTimer');
    this.clearTimer('resumeWindowTimer');
    this.pending = [];

    const socket = this.socket;
    if (socket) {
      socket.close(1000, 'shutdown');
      await this.socketClosed;
    }
    this.socket = null;
    this.setState('disconnected');
    this.logger.info('Node connection shut down');
  }

  private openSocket(): void {
    if (this.socket) {
      this.logger.warn('Skipped connect attempt while the previous socket is still open');
      return;
    }

    const resuming = this.stateValue === 'reconnecting' && this.sessionIdValue !== null;
    this.resumeAttempt = resuming;
    if (!resuming) {
      this.setState('connecting');
    }

    const { definition, userId, clientName } = this.options;
    const headers: Record<string, string> = {
      Authorization: definition.password,
      'User-Id': userId,
      'Client-Name': clientName,
    };
    if (resuming && this.sessionIdValue) {
      headers['Session-Id'] = this.sessionIdValue;
    }
    const url = `${definition.secure ? 'wss' : 'ws'}://${definition.host}:${definition.port}/v4/websocket`;

    this.generation += 1;
    const generation = this.generation;
    let markClosed: () => void = () => undefined;
    this.socketClosed = new Promise<void>((resolve) => {
      markClosed = resolve;
    });

    this.logger.debug({ url, resuming }, 'Opening node socket');

    try {
      this.socket = this.socketFactory(
        { url, headers },
        {
          open: () => this.handleOpen(generation),
          message: (data) => this.handleFrame(generation, data),
          close: (code, reason) => {
            if (generation === this.generation) {
              markClosed();
            }
            this.handleClose(generation, code, reason);
          },
          error: (error) => this.handleSocketError(generation, error),
        },
      );
    } catch (error) {
      markClosed();
      this.socket = null;
      this.logger.error({ err: error }, 'Failed to create node socket');
      this.registerFailure();
      return;
    }

    this.readyTimer = setTimeout(() => this.handleReadyTimeout(generation), this.options.reconnect.readyTimeoutMs);
  }

  private handleOpen(generation: number): void {
    if (generation !== this.generation) {
      return;
    }
    this.setState('authenticated');
  }

  private handleFrame(generation: number, data: FrameData): void {
    if (generation !== this.generation) {
      return;
    }

    const result = decodeMessage(data);
    if (!result.ok) {
      this.logger.warn({ err: result.error, issues: result.error.issues }, 'Discarded malformed frame from node');
      return;
    }

    this.dispatchMessage(result.message);
  }

  private dispatchMessage(message: InboundMessage): void {
    switch (message.op) {
      case 'ready':
        this.handleReady(message.sessionId, message.resumed);
        return;
      case 'stats':
        this.statsValue = message.stats;
        this.emit('stats', message.stats);
        return;
      case 'playerUpdate':
        this.emit('dispatch', message.guildId, { type: 'playerUpdate', ...message.state });
        return;
      case 'event':
        if (message.event.type === 'unknown') {
          this.logger.debug({ guildId: message.guildId, type: message.event.rawType }, 'Ignored unknown node event');
          return;
        }
        this.emit('dispatch', message.guildId, message.event);
        return;
      case 'unknown':
        this.logger.debug({ op: message.rawOp }, 'Ignored unknown node op');
        return;
    }
  }

  private handleReady(sessionId: string, resumed: boolean): void {
    this.clearTimer('readyTimer');
    this.clearTimer('resumeWindowTimer');

    const attemptedResume = this.resumeAttempt;
    this.resumeAttempt = false;
    this.failures = 0;
    if (!this.healthyValue) {
      this.healthyValue = true;
      this.logger.info('Node recovered and is healthy again');
    }
    this.sessionIdValue = sessionId;
    this.setState('ready');

    if (attemptedResume && resumed) {
      this.logger.info({ sessionId, buffered: this.pending.length }, 'Resumed node session');
      void this.flushPending();
      this.emit('ready', { sessionId, resumed: true });
      this.emit('resumed');
      return;
    }

    if (this.pending.length > 0) {
      this.logger.warn({ dropped: this.pending.length }, 'Dropped buffered commands for a lost session');
      this.pending = [];
    }
    this.configureResuming(sessionId);

    if (attemptedResume) {
      this.logger.warn({ sessionId }, 'Node rejected the session resume');
      this.emit('sessionLost');
    } else {
      this.logger.info({ sessionId }, 'Node session ready');
    }
    this.emit('ready', { sessionId, resumed: false });
  }

  private handleClose(generation: number, code: number, reason: string): void {
    if (generation !== this.generation) {
      return;
    }

    this.socket = null;
    this.clearTimer('readyTimer');

    if (this.shutdownRequested) {
      this.setState('disconnected');
      return;
    }

    if (this.stateValue === 'ready') {
      this.logger.warn({ code, reason }, 'Lost connection to node');
      this.setState('reconnecting');
      this.resumeWindowTimer = setTimeout(() => this.expireResumeWindow(), this.options.reconnect.resumeWindowMs);
      this.scheduleReconnect();
      return;
    }

    this.logger.warn({ code, reason, state: this.stateValue }, 'Node connection attempt failed');
    this.registerFailure();
  }

  private handleSocketError(generation: number, error: Error): void {
    if (generation !== this.generation) {
      return;
    }
    this.logger.warn({ err: error }, 'Node socket error');
  }

  private handleReadyTimeout(generation: number): void {
    if (generation !== this.generation || this.stateValue === 'ready') {
      return;
    }
    this.readyTimer = null;
    this.logger.warn({ timeoutMs: this.options.reconnect.readyTimeoutMs }, 'Node did not become ready in time');
    this.socket?.terminate();
  }

  private registerFailure(): void {
    this.failures += 1;
    const { unhealthyThreshold } = this.options.reconnect;
    if (this.healthyValue && this.failures >= unhealthyThreshold) {
      this.healthyValue = false;
      this.logger.error({ failures: this.failures }, 'Node marked unhealthy');
      this.emit('unhealthy', this.failures);
    }

    const canResume = this.sessionIdValue !== null && this.resumeWindowTimer !== null;
    this.setState(canResume ? 'reconnecting' : 'disconnected');
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer || this.shutdownRequested) {
      return;
    }
    const { baseDelayMs, factor, maxDelayMs } = this.options.reconnect;
    const delayMs = computeBackoffDelay(this.failures, { baseDelayMs, factor, maxDelayMs });
    this.logger.debug({ delayMs, failures: this.failures }, 'Scheduled node reconnect');
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.openSocket();
    }, delayMs);
  }

  private expireResumeWindow(): void {
    this.resumeWindowTimer = null;
    if (this.stateValue === 'ready' || this.shutdownRequested) {
      return;
    }

    this.logger.warn(
      { sessionId: this.sessionIdValue, dropped: this.pending.length },
      'Resume window expired, node session lost',
    );
    this.sessionIdValue = null;
    this.resumeAttempt = false;
    this.pending = [];
    this.setState('connecting');
    this.emit('sessionLost');
  }

  private configureResuming(sessionId: string): void {
    const timeoutSeconds = Math.max(1, Math.ceil(this.options.reconnect.resumeWindowMs / 1000));
    if (this.transport === 'rest') {
      void this.rest.updateSession(sessionId, { resuming: true, timeoutSeconds }).catch((error: unknown) => {
        this.logger.warn({ err: error }, 'Failed to enable session resuming');
      });
      return;
    }
    void this.write(encodeCommand({ op: 'configureResuming', key: sessionId, timeoutSeconds }));
  }

  private async flushPending(): Promise<void> {
    const commands = this.pending;
    this.pending = [];
    for (const command of commands) {
      try {
        await this.deliver(command);
      } catch (error) {
        this.logger.warn({ err: error, op: command.op, guildId: command.guildId }, 'Buffered command failed');
      }
    }
  }

  private async deliver(command: PlayerCommand): Promise<void> {
    if (this.transport === 'rest') {
      await this.deliverViaRest(command);
      return;
    }
    await this.write(encodeCommand(command));
  }

  private async write(frame: string): Promise<void> {
    const socket = this.socket;
    if (!socket) {
      this.logger.warn('Dropped frame because the node socket is closed');
      return;
    }
    try {
      await socket.send(frame);
    } catch (error) {
      this.logger.warn({ err: error }, 'Failed to write to node socket');
    }
  }

  private async deliverViaRest(command: PlayerCommand): Promise<void> {
    const sessionId = this.sessionIdValue;
    if (!sessionId) {
      this.logger.warn({ op: command.op, guildId: command.guildId }, 'Dropped command without a node session');
      return;
    }

    try {
      switch (command.op) {
        case 'play':
          await this.rest.updatePlayer(
            sessionId,
            command.guildId,
            {
              encodedTrack: command.track,
              position: command.startTimeMs,
              endTime: command.endTimeMs,
              paused: command.paused,
            },
            { noReplace: command.noReplace },
          );
          return;
        case 'stop':
          await this.rest.updatePlayer(sessionId, command.guildId, { encodedTrack: null });
          return;
        case 'pause':
          await this.rest.updatePlayer(sessionId, command.guildId, { paused: command.state });
          return;
        case 'seek':
          await this.rest.updatePlayer(sessionId, command.guildId, { position: command.positionMs });
          return;
        case 'volume':
          await this.rest.updatePlayer(sessionId, command.guildId, { volume: command.volume });
          return;
        case 'voiceUpdate':
          await this.rest.updatePlayer(sessionId, command.guildId, {
            voice: { token: command.event.token, endpoint: command.event.endpoint, sessionId: command.sessionId },
          });
          return;
        case 'destroy':
          await this.rest.destroyPlayer(sessionId, command.guildId);
          return;
      }
    } catch (error) {
      if (error instanceof RestError && error.kind === 'rejected') {
        throw new PlaybackError('COMMAND_REJECTED', `Node ${this.id} rejected ${command.op}: ${error.message}`, {
          cause: error,
        });
      }
      this.logger.warn({ err: error, op: command.op, guildId: command.guildId }, 'Node REST command failed');
    }
  }

  private setState(next: NodeConnectionState): void {
    const previous = this.stateValue;
    if (previous === next) {
      return;
    }
    this.stateValue = next;
    this.logger.debug({ state: next, previous }, 'Node state changed');
    this.emit('stateChange', next, previous);
  }

  private clearTimer(name: 'reconnectTimer' | 'readyTimer' | 'resumeWindowTimer'): void {
    const timer = this[name];
    if (timer) {
      clearTimeout(timer);
      this[name] = null;
    }
  }
}
