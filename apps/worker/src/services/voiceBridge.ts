import type { Logger } from '@cadence/logger';
import type { DestroyReason, VoiceSession } from '@cadence/music';
import {
  voicePacketSchema,
  voicePacketTypes,
  type GuildCreatePacket,
  type VoiceServerUpdatePacket,
  type VoiceStateUpdatePacket,
} from '@cadence/schemas';

/** The part of the player manager the bridge drives. */
export interface VoiceTarget {
  assign(guildId: string, session: VoiceSession): Promise<unknown>;
  release(guildId: string, reason?: DestroyReason): Promise<boolean>;
  updateOccupancy(guildId: string, listeners: number): void;
}

export interface VoiceStateCommand {
  op: 4;
  d: {
    guild_id: string;
    channel_id: string | null;
    self_mute: boolean;
    self_deaf: boolean;
  };
}

/** Sends a gateway payload on the shard owning the guild. Returns false when no shard could take it. */
export type GatewaySender = (guildId: string, payload: VoiceStateCommand) => boolean;

export interface VoiceBridgeOptions {
  target: VoiceTarget;
  send: GatewaySender;
  userId: () => string | null;
  logger: Logger;
}

interface PendingVoice {
  channelId: string | null;
  sessionId: string | null;
  token: string | null;
  endpoint: string | null;
}

/**
 * Turns raw gateway voice packets into complete voice sessions and listener
 * counts. The gateway delivers the session id and the server credentials in
 * separate packets, in either order.
 */
export class VoiceBridge {
  private readonly logger: Logger;
  private readonly pending = new Map<string, PendingVoice>();
  private readonly listeners = new Map<string, Map<string, string>>();

  constructor(private readonly options: VoiceBridgeOptions) {
    this.logger = options.logger.child({ scope: 'voice-bridge' });
  }

  public handlePacket(packet: unknown): void {
    if (!isVoicePacketCandidate(packet)) {
      return;
    }

    const parsed = voicePacketSchema.safeParse(packet);
    if (!parsed.success) {
      this.logger.warn({ type: packet.t, issues: parsed.error.issues.length }, 'Dropped malformed voice packet');
      return;
    }

    const voicePacket = parsed.data;
    switch (voicePacket.t) {
      case 'VOICE_STATE_UPDATE':
        this.handleVoiceState(voicePacket);
        return;
      case 'VOICE_SERVER_UPDATE':
        this.handleVoiceServer(voicePacket);
        return;
      case 'GUILD_CREATE':
        this.handleGuildCreate(voicePacket);
        return;
    }
  }

  public join(guildId: string, channelId: string): boolean {
    return this.sendVoiceState(guildId, channelId);
  }

  public leave(guildId: string): boolean {
    this.pending.delete(guildId);
    return this.sendVoiceState(guildId, null);
  }

  public voiceChannelOf(guildId: string): string | null {
    return this.pending.get(guildId)?.channelId ?? null;
  }

  /** Non-bot members sharing the bot's voice channel. */
  public listenerCount(guildId: string): number {
    const channelId = this.voiceChannelOf(guildId);
    if (!channelId) {
      return 0;
    }
    let count = 0;
    for (const memberChannel of this.listeners.get(guildId)?.values() ?? []) {
      if (memberChannel === channelId) {
        count += 1;
      }
    }
    return count;
  }

  private handleVoiceState(packet: VoiceStateUpdatePacket): void {
    const { guild_id: guildId, channel_id: channelId, user_id: userId, session_id: sessionId } = packet.d;

    if (userId === this.options.userId()) {
      if (channelId === null) {
        this.pending.delete(guildId);
        this.logger.info({ guildId }, 'Left voice channel, releasing player');
        void this.options.target.release(guildId, 'released').catch((error: unknown) => {
          this.logger.warn({ err: error, guildId }, 'Failed to release player after leaving voice');
        });
        return;
      }

      const entry = this.entryFor(guildId);
      entry.channelId = channelId;
      entry.sessionId = sessionId;
      this.tryAssign(guildId, entry);
      this.refreshOccupancy(guildId);
      return;
    }

    const members = this.membersOf(guildId);
    if (channelId === null || packet.d.member?.user.bot === true) {
      members.delete(userId);
    } else {
      members.set(userId, channelId);
    }
    this.refreshOccupancy(guildId);
  }

  private handleVoiceServer(packet: VoiceServerUpdatePacket): void {
    const { guild_id: guildId, token, endpoint } = packet.d;
    if (endpoint === null) {
      this.logger.debug({ guildId }, 'Voice server is being reallocated');
      return;
    }

    const entry = this.entryFor(guildId);
    entry.token = token;
    entry.endpoint = endpoint;
    this.tryAssign(guildId, entry);
  }

  private handleGuildCreate(packet: GuildCreatePacket): void {
    const guildId = packet.d.id;
    const bots = new Set(packet.d.members.filter((member) => member.user.bot === true).map((member) => member.user.id));
    const selfId = this.options.userId();
    const members = new Map<string, string>();

    for (const state of packet.d.voice_states) {
      if (state.user_id === selfId || bots.has(state.user_id) || state.channel_id === null) {
        continue;
      }
      members.set(state.user_id, state.channel_id);
    }

    this.listeners.set(guildId, members);
    this.refreshOccupancy(guildId);
  }

  private tryAssign(guildId: string, entry: PendingVoice): void {
    const { channelId, sessionId, token, endpoint } = entry;
    if (!channelId || !sessionId || !token || !endpoint) {
      return;
    }

    const session: VoiceSession = { guildId, channelId, sessionId, token, endpoint };
    void this.options.target.assign(guildId, session).catch((error: unknown) => {
      this.logger.warn({ err: error, guildId }, 'Failed to hand voice session to player');
    });
  }

  private refreshOccupancy(guildId: string): void {
    if (!this.voiceChannelOf(guildId)) {
      return;
    }
    this.options.target.updateOccupancy(guildId, this.listenerCount(guildId));
  }

  private sendVoiceState(guildId: string, channelId: string | null): boolean {
    const sent = this.options.send(guildId, {
      op: 4,
      d: { guild_id: guildId, channel_id: channelId, self_mute: false, self_deaf: true },
    });
    if (!sent) {
      this.logger.warn({ guildId, channelId }, 'No gateway shard available for voice state update');
    }
    return sent;
  }

  private entryFor(guildId: string): PendingVoice {
    let entry = this.pending.get(guildId);
    if (!entry) {
      entry = { channelId: null, sessionId: null, token: null, endpoint: null };
      this.pending.set(guildId, entry);
    }
    return entry;
  }

  private membersOf(guildId: string): Map<string, string> {
    let members = this.listeners.get(guildId);
    if (!members) {
      members = new Map();
      this.listeners.set(guildId, members);
    }
    return members;
  }
}

function isVoicePacketCandidate(packet: unknown): packet is { t: string } {
  return (
    typeof packet === 'object' &&
    packet !== null &&
    't' in packet &&
    typeof packet.t === 'string' &&
    voicePacketTypes.has(packet.t)
  );
}
