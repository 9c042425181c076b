import { z } from 'zod';

const trackInfoSchema = z
  .object({
    identifier: z.string(),
    title: z.string(),
    author: z.string(),
    length: z.number().nonnegative(),
    isStream: z.boolean(),
    isSeekable: z.boolean().optional(),
    uri: z.string().nullish(),
    sourceName: z.string().nullish(),
    artworkUrl: z.string().nullish(),
  })
  .transform((info) => ({
    identifier: info.identifier,
    title: info.title,
    author: info.author,
    lengthMs: info.length,
    isStream: info.isStream,
    isSeekable: info.isSeekable ?? !info.isStream,
    uri: info.uri ?? null,
    sourceName: info.sourceName ?? null,
    artworkUrl: info.artworkUrl ?? null,
  }));

/**
 * A resolved track. Older nodes send the opaque handle as `track`, newer ones
 * as `encoded`; both normalise to `encoded`.
 */
export const trackSchema = z
  .object({
    encoded: z.string().min(1).optional(),
    track: z.string().min(1).optional(),
    info: trackInfoSchema,
  })
  .transform((value, ctx) => {
    const encoded = value.encoded ?? value.track;
    if (!encoded) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Track is missing its encoded handle' });
      return z.NEVER;
    }
    return { encoded, info: value.info };
  });

export type Track = z.output<typeof trackSchema>;
export type TrackInfo = Track['info'];

export const trackExceptionSchema = z
  .object({
    message: z.string().nullish(),
    severity: z.string().default('common'),
    cause: z.string().nullish(),
  })
  .transform((exception) => ({
    message: exception.message ?? 'Unknown error',
    severity: exception.severity.toLowerCase(),
    cause: exception.cause ?? null,
  }));

export type TrackException = z.output<typeof trackExceptionSchema>;

export type TrackEndReason = 'finished' | 'loadFailed' | 'stopped' | 'replaced' | 'cleanup';

const trackEndReasons: Record<string, TrackEndReason> = {
  finished: 'finished',
  loadfailed: 'loadFailed',
  stopped: 'stopped',
  replaced: 'replaced',
  cleanup: 'cleanup',
};

// Accepts both FINISHED/LOAD_FAILED and finished/loadFailed spellings.
export const trackEndReasonSchema = z.string().transform((value, ctx): TrackEndReason => {
  const reason = trackEndReasons[value.replace(/_/g, '').toLowerCase()];
  if (!reason) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown track end reason "${value}"` });
    return z.NEVER;
  }
  return reason;
});

const eventTrackSchema = z
  .union([z.string().min(1), trackSchema])
  .transform((value) => (typeof value === 'string' ? value : value.encoded));

export const readyMessageSchema = z.object({
  op: z.literal('ready'),
  resumed: z.boolean().default(false),
  sessionId: z.string().min(1),
});

export const playerUpdateMessageSchema = z.object({
  op: z.literal('playerUpdate'),
  guildId: z.string().min(1),
  state: z
    .object({
      positionMs: z.number().optional(),
      position: z.number().optional(),
      timestamp: z.number().optional(),
      time: z.number().optional(),
      connected: z.boolean().default(true),
    })
    .transform((state) => ({
      positionMs: Math.max(0, state.positionMs ?? state.position ?? 0),
      timestamp: state.timestamp ?? state.time ?? 0,
      connected: state.connected,
    })),
});

export const nodeStatsSchema = z.object({
  players: z.number().int().nonnegative(),
  playingPlayers: z.number().int().nonnegative(),
  uptime: z.number().nonnegative(),
  memory: z.object({
    free: z.number(),
    used: z.number(),
    allocated: z.number(),
    reservable: z.number(),
  }),
  cpu: z.object({
    cores: z.number(),
    systemLoad: z.number(),
    lavalinkLoad: z.number(),
  }),
  frameStats: z
    .object({
      sent: z.number(),
      nulled: z.number(),
      deficit: z.number(),
    })
    .nullish()
    .transform((frameStats) => frameStats ?? null),
});

export type NodeStats = z.output<typeof nodeStatsSchema>;

export const statsMessageSchema = nodeStatsSchema.extend({
  op: z.literal('stats'),
});

export const eventEnvelopeSchema = z.object({
  op: z.literal('event'),
  type: z.string().min(1),
  guildId: z.string().min(1),
});

export const trackStartEventSchema = eventEnvelopeSchema.extend({
  type: z.literal('TrackStartEvent'),
  track: eventTrackSchema,
});

export const trackEndEventSchema = eventEnvelopeSchema.extend({
  type: z.literal('TrackEndEvent'),
  track: eventTrackSchema,
  reason: trackEndReasonSchema,
});

export const trackExceptionEventSchema = eventEnvelopeSchema.extend({
  type: z.literal('TrackExceptionEvent'),
  track: eventTrackSchema,
  exception: trackExceptionSchema.optional(),
  error: z.string().optional(),
});

export const trackStuckEventSchema = eventEnvelopeSchema.extend({
  type: z.literal('TrackStuckEvent'),
  track: eventTrackSchema,
  thresholdMs: z.number().nonnegative(),
});

export const webSocketClosedEventSchema = eventEnvelopeSchema.extend({
  type: z.literal('WebSocketClosedEvent'),
  code: z.number().int(),
  reason: z.string().default(''),
  byRemote: z.boolean().default(false),
});

export const nodeEventSchema = z.discriminatedUnion('type', [
  trackStartEventSchema,
  trackEndEventSchema,
  trackExceptionEventSchema,
  trackStuckEventSchema,
  webSocketClosedEventSchema,
]);

export const knownEventTypes: ReadonlySet<string> = new Set(nodeEventSchema.options.map((option) => option.shape.type.value));

export type NodeEventFrame = z.output<typeof nodeEventSchema>;

const legacyLoadTypeSchema = z.enum(['TRACK_LOADED', 'PLAYLIST_LOADED', 'SEARCH_RESULT', 'NO_MATCHES', 'LOAD_FAILED']);

export const legacyLoadResultSchema = z.object({
  loadType: legacyLoadTypeSchema,
  playlistInfo: z
    .object({
      name: z.string().nullish(),
      selectedTrack: z.number().int().nullish(),
    })
    .optional(),
  tracks: z.array(trackSchema).default([]),
  exception: trackExceptionSchema.nullish(),
});

export const loadResultSchema = z.discriminatedUnion('loadType', [
  z.object({ loadType: z.literal('track'), data: trackSchema }),
  z.object({
    loadType: z.literal('playlist'),
    data: z.object({
      info: z.object({
        name: z.string(),
        selectedTrack: z.number().int().default(-1),
      }),
      tracks: z.array(trackSchema),
    }),
  }),
  z.object({ loadType: z.literal('search'), data: z.array(trackSchema) }),
  z.object({ loadType: z.literal('empty') }),
  z.object({ loadType: z.literal('error'), data: trackExceptionSchema }),
]);

export const errorResponseSchema = z.object({
  timestamp: z.number().optional(),
  status: z.number().int().optional(),
  error: z.string().optional(),
  message: z.string().optional(),
  path: z.string().optional(),
});

export const nodeInfoSchema = z.object({
  version: z
    .object({
      semver: z.string(),
    })
    .optional(),
  sourceManagers: z.array(z.string()).default([]),
  filters: z.array(z.string()).default([]),
});

export type NodeInfo = z.output<typeof nodeInfoSchema>;

export interface PlayCommand {
  op: 'play';
  guildId: string;
  track: string;
  startTimeMs?: number;
  endTimeMs?: number;
  noReplace?: boolean;
  paused?: boolean;
}

export interface StopCommand {
  op: 'stop';
  guildId: string;
}

export interface PauseCommand {
  op: 'pause';
  guildId: string;
  state: boolean;
}

export interface SeekCommand {
  op: 'seek';
  guildId: string;
  positionMs: number;
}

export interface VolumeCommand {
  op: 'volume';
  guildId: string;
  volume: number;
}

export interface VoiceUpdateCommand {
  op: 'voiceUpdate';
  guildId: string;
  sessionId: string;
  event: {
    token: string;
    endpoint: string;
  };
}

export interface DestroyCommand {
  op: 'destroy';
  guildId: string;
}

export interface ConfigureResumingCommand {
  op: 'configureResuming';
  key: string;
  timeoutSeconds: number;
}

export type PlayerCommand =
  | PlayCommand
  | StopCommand
  | PauseCommand
  | SeekCommand
  | VolumeCommand
  | VoiceUpdateCommand
  | DestroyCommand;

export type OutboundCommand = PlayerCommand | ConfigureResumingCommand;
