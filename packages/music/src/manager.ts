import { KeyedSerialQueue } from '@cadence/core';
import type { Logger } from '@cadence/logger';
import { EventEmitter } from 'eventemitter3';
import { PlaybackError, isPlaybackError } from './errors.js';
import {
  NodeConnection,
  type NodeConnectionState,
  type NodeDefinition,
  type NodeHealth,
  type ReconnectPolicy,
} from './node.js';
import { Player } from './player.js';
import type { RandomSource } from './queue.js';
import { RestClient, type FetchLike } from './rest.js';
import type { SocketFactory } from './socket.js';
import type { DestroyReason, PlaybackNotification, PlayResult, Requester, VoiceSession } from './types.js';

export interface PlayerDefaults {
  queueLimit: number;
  idleTimeoutMs: number;
  autoSkipLimit: number;
  defaultVolume: number;
}

export interface RestDefaults {
  retryAttempts?: number;
  retryBaseDelayMs?: number;
  timeoutMs?: number;
  searchPrefix?: string;
}

export interface PlayerManagerOptions {
  userId: string;
  clientName: string;
  nodes: NodeDefinition[];
  reconnect: ReconnectPolicy;
  player: PlayerDefaults;
  logger: Logger;
  rest?: RestDefaults;
  /** Move stalled players to another node as soon as one is available. Defaults to true. */
  autoRebind?: boolean;
  socketFactory?: SocketFactory;
  fetch?: FetchLike;
  random?: RandomSource;
  now?: () => number;
}

export interface PlayerManagerEvents {
  notification: (notification: PlaybackNotification) => void;
  nodeState: (nodeId: string, state: NodeConnectionState, previous: NodeConnectionState) => void;
  nodeUnhealthy: (nodeId: string, failures: number) => void;
}

export interface CreatePlayerOptions {
  textChannelId?: string | null;
}

export interface RebindOptions {
  onlyIfStalled?: boolean;
  destroyWhenUnavailable?: boolean;
}

export interface NodeHealthReport extends NodeHealth {
  boundPlayers: number;
}

export interface ManagerHealth {
  nodes: NodeHealthReport[];
  players: number;
  stalledPlayers: number;
}

/**
 * Owns the node connections and the guild to player registry. Registry
 * mutations for one guild are serialized; different guilds never wait on
 * each other.
 */
export class PlayerManager extends EventEmitter<PlayerManagerEvents> {
  private readonly logger: Logger;
  private readonly nodes = new Map<string, NodeConnection>();
  private readonly players = new Map<string, Player>();
  private readonly locks = new KeyedSerialQueue();
  private readonly autoRebind: boolean;
  private shuttingDown = false;

  constructor(private readonly options: PlayerManagerOptions) {
    super();
    this.logger = options.logger.child({ scope: 'player-manager' });
    this.autoRebind = options.autoRebind ?? true;

    if (options.nodes.length === 0) {
      throw new Error('At least one node must be configured');
    }

    for (const definition of options.nodes) {
      if (this.nodes.has(definition.id)) {
        throw new Error(`Duplicate node id "${definition.id}"`);
      }
      const rest = new RestClient({
        node: definition,
        clientName: options.clientName,
        logger: options.logger,
        fetch: options.fetch,
        ...options.rest,
      });
      const node = new NodeConnection({
        definition,
        userId: options.userId,
        clientName: options.clientName,
        reconnect: options.reconnect,
        rest,
        logger: options.logger,
        socketFactory: options.socketFactory,
      });
      this.attachNode(node);
      this.nodes.set(definition.id, node);
    }
  }

  public connect(): void {
    for (const node of this.nodes.values()) {
      node.connect();
    }
  }

  public getNode(id: string): NodeConnection | undefined {
    return this.nodes.get(id);
  }

  public getPlayer(guildId: string): Player | undefined {
    return this.players.get(guildId);
  }

  public get size(): number {
    return this.players.size;
  }

  /** Returns the guild's player, creating it on the least-loaded healthy node. */
  public create(guildId: string, options: CreatePlayerOptions = {}): Promise<Player> {
    return this.locks.run(guildId, () => this.obtain(guildId, options));
  }

  /** Hands the guild's current voice credentials to its player, creating one if needed. */
  public assign(guildId: string, session: VoiceSession, options: CreatePlayerOptions = {}): Promise<Player> {
    return this.locks.run(guildId, async () => {
      const player = this.obtain(guildId, options);
      await player.updateVoice(session);
      return player;
    });
  }

  public async play(
    guildId: string,
    query: string,
    requester: Requester,
    options: CreatePlayerOptions = {},
  ): Promise<PlayResult> {
    const player = await this.create(guildId, options);
    return player.play(query, requester);
  }

  public updateOccupancy(guildId: string, listeners: number): void {
    this.players.get(guildId)?.updateOccupancy(listeners);
  }

  /**
   * Moves a player to the least-loaded healthy node. When none is available
   * the player is destroyed unless `destroyWhenUnavailable` is false, in which
   * case it stays where it is. Returns whether the player was moved.
   */
  public rebind(guildId: string, options: RebindOptions = {}): Promise<boolean> {
    return this.locks.run(guildId, async () => {
      const player = this.players.get(guildId);
      if (!player) {
        return false;
      }

      const node = this.selectNode();
      if (!node) {
        const eligible = !options.onlyIfStalled || player.status === 'stalled';
        if (eligible && (options.destroyWhenUnavailable ?? true)) {
          this.logger.warn({ guildId }, 'No healthy node to rebind player, destroying it');
          await this.destroyPlayer(player, 'nodeUnavailable');
        }
        return false;
      }

      return player.rebind(node, { onlyIfStalled: options.onlyIfStalled });
    });
  }

  /** Destroys the guild's player. Returns false when there was none. */
  public release(guildId: string, reason: DestroyReason = 'released'): Promise<boolean> {
    return this.locks.run(guildId, async () => {
      const player = this.players.get(guildId);
      if (!player) {
        return false;
      }
      await this.destroyPlayer(player, reason);
      return true;
    });
  }

  public health(): ManagerHealth {
    const bound = this.countBoundPlayers();
    let stalledPlayers = 0;
    for (const player of this.players.values()) {
      if (player.status === 'stalled') {
        stalledPlayers += 1;
      }
    }
    return {
      nodes: [...this.nodes.values()].map((node) => ({ ...node.health(), boundPlayers: bound.get(node.id) ?? 0 })),
      players: this.players.size,
      stalledPlayers,
    };
  }

  public async shutdown(): Promise<void> {
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    const guildIds = [...this.players.keys()];
    await Promise.all(guildIds.map((guildId) => this.release(guildId, 'shutdown')));
    await Promise.all([...this.nodes.values()].map((node) => node.shutdown()));
    this.logger.info({ players: guildIds.length }, 'Player manager shut down');
  }

  /** Least bound players first, then lowest reported node load, then id. */
  public selectNode(): NodeConnection | null {
    const bound = this.countBoundPlayers();
    const candidates = [...this.nodes.values()].filter((node) => node.available);
    candidates.sort((a, b) => {
      const byPlayers = (bound.get(a.id) ?? 0) - (bound.get(b.id) ?? 0);
      if (byPlayers !== 0) {
        return byPlayers;
      }
      const byLoad = (a.stats?.cpu.lavalinkLoad ?? 0) - (b.stats?.cpu.lavalinkLoad ?? 0);
      if (byLoad !== 0) {
        return byLoad;
      }
      return a.id.localeCompare(b.id);
    });
    return candidates[0] ?? null;
  }

  private obtain(guildId: string, options: CreatePlayerOptions): Player {
    if (this.shuttingDown) {
      throw new PlaybackError('NODE_UNAVAILABLE', 'The player manager is shutting down');
    }

    const existing = this.players.get(guildId);
    if (existing) {
      if (options.textChannelId) {
        existing.textChannelId = options.textChannelId;
      }
      return existing;
    }

    const node = this.selectNode();
    if (!node) {
      throw new PlaybackError('NODE_UNAVAILABLE', 'No healthy audio node is available');
    }

    const { player: defaults } = this.options;
    const player = new Player({
      guildId,
      node,
      logger: this.options.logger,
      textChannelId: options.textChannelId ?? null,
      queueLimit: defaults.queueLimit,
      autoSkipLimit: defaults.autoSkipLimit,
      idleTimeoutMs: defaults.idleTimeoutMs,
      defaultVolume: defaults.defaultVolume,
      random: this.options.random,
      now: this.options.now,
    });
    player.on('notification', (notification) => {
      if (notification.type === 'playerDestroyed' && this.players.get(guildId) === player) {
        this.players.delete(guildId);
      }
      this.emit('notification', notification);
    });
    this.players.set(guildId, player);
    this.logger.info({ guildId, nodeId: node.id }, 'Created player');
    return player;
  }

  private async destroyPlayer(player: Player, reason: DestroyReason): Promise<void> {
    if (this.players.get(player.guildId) === player) {
      this.players.delete(player.guildId);
    }
    await player.destroy(reason);
  }

  private attachNode(node: NodeConnection): void {
    node.on('stateChange', (state, previous) => this.emit('nodeState', node.id, state, previous));

    node.on('dispatch', (guildId, event) => {
      const player = this.players.get(guildId);
      if (!player || player.node.id !== node.id) {
        this.logger.debug({ guildId, nodeId: node.id, type: event.type }, 'Dropped event for unknown player');
        return;
      }
      void player.handleEvent(event).catch((error: unknown) => this.logPlayerError(guildId, error, 'Event handling failed'));
    });

    node.on('resumed', () => {
      for (const player of this.boundTo(node)) {
        void player
          .resyncVoice()
          .catch((error: unknown) => this.logPlayerError(player.guildId, error, 'Voice resync failed'));
      }
    });

    node.on('sessionLost', () => {
      const bound = this.boundTo(node);
      if (bound.length > 0) {
        this.logger.warn({ nodeId: node.id, players: bound.length }, 'Node session lost, stalling players');
      }
      for (const player of bound) {
        const stalled = player
          .stall()
          .catch((error: unknown) => this.logPlayerError(player.guildId, error, 'Stall failed'));
        if (this.autoRebind) {
          // A node that already crossed the failure threshold will not fire `unhealthy` again.
          void stalled.then(() => this.scheduleRebind(player.guildId, !node.healthy));
        }
      }
    });

    node.on('ready', () => {
      if (!this.autoRebind) {
        return;
      }
      for (const player of this.players.values()) {
        if (player.status === 'stalled') {
          this.scheduleRebind(player.guildId, false);
        }
      }
    });

    node.on('unhealthy', (failures) => {
      this.emit('nodeUnhealthy', node.id, failures);
      if (this.selectNode()) {
        return;
      }
      for (const player of this.players.values()) {
        if (player.status === 'stalled') {
          this.scheduleRebind(player.guildId, true);
        }
      }
    });
  }

  private scheduleRebind(guildId: string, destroyWhenUnavailable: boolean): void {
    void this.rebind(guildId, { onlyIfStalled: true, destroyWhenUnavailable }).catch((error: unknown) =>
      this.logPlayerError(guildId, error, 'Rebind failed'),
    );
  }

  private boundTo(node: NodeConnection): Player[] {
    return [...this.players.values()].filter((player) => player.node.id === node.id);
  }

  private countBoundPlayers(): Map<string, number> {
    const counts = new Map<string, number>();
    for (const player of this.players.values()) {
      counts.set(player.node.id, (counts.get(player.node.id) ?? 0) + 1);
    }
    return counts;
  }

  private logPlayerError(guildId: string, error: unknown, message: string): void {
    if (isPlaybackError(error, 'PLAYER_DESTROYED')) {
      this.logger.debug({ guildId }, message);
      return;
    }
    this.logger.error({ err: error, guildId }, message);
  }
}
