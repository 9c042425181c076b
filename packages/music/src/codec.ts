import {
  eventEnvelopeSchema,
  knownEventTypes,
  nodeEventSchema,
  nodeStatsSchema,
  playerUpdateMessageSchema,
  readyMessageSchema,
  type NodeEventFrame,
  type OutboundCommand,
} from '@cadence/schemas';
import { z } from 'zod';
import { CodecError } from './errors.js';
import type { InboundMessage, PlayerEvent } from './types.js';

export type FrameData = string | Buffer | ArrayBuffer | Buffer[];

export type DecodeResult = { ok: true; message: InboundMessage } | { ok: false; error: CodecError };

const opEnvelopeSchema = z.object({ op: z.string().min(1) });

export function encodeCommand(command: OutboundCommand): string {
  return JSON.stringify(command);
}

export function frameToString(data: FrameData): string {
  if (typeof data === 'string') {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  return Buffer.from(new Uint8Array(data)).toString('utf8');
}

/**
 * Decodes one inbound frame. Unknown fields are stripped; unknown `op` and
 * event `type` values decode to explicit unknown variants. Anything that
 * fails validation comes back as a `CodecError` instead of throwing.
 */
export function decodeMessage(data: FrameData): DecodeResult {
  let raw: unknown;
  try {
    raw = JSON.parse(frameToString(data));
  } catch (error) {
    return { ok: false, error: new CodecError('Frame is not valid JSON', [], { cause: error }) };
  }

  const envelope = opEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    return malformed('Frame has no op field', envelope.error);
  }

  switch (envelope.data.op) {
    case 'ready': {
      const parsed = readyMessageSchema.safeParse(raw);
      if (!parsed.success) {
        return malformed('Malformed ready frame', parsed.error);
      }
      return ok({ op: 'ready', sessionId: parsed.data.sessionId, resumed: parsed.data.resumed });
    }
    case 'stats': {
      const parsed = nodeStatsSchema.safeParse(raw);
      if (!parsed.success) {
        return malformed('Malformed stats frame', parsed.error);
      }
      return ok({ op: 'stats', stats: parsed.data });
    }
    case 'playerUpdate': {
      const parsed = playerUpdateMessageSchema.safeParse(raw);
      if (!parsed.success) {
        return malformed('Malformed playerUpdate frame', parsed.error);
      }
      return ok({ op: 'playerUpdate', guildId: parsed.data.guildId, state: parsed.data.state });
    }
    case 'event':
      return decodeEvent(raw);
    default:
      return ok({ op: 'unknown', rawOp: envelope.data.op });
  }
}

function decodeEvent(raw: unknown): DecodeResult {
  const envelope = eventEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    return malformed('Malformed event frame', envelope.error);
  }

  const { guildId, type } = envelope.data;
  if (!knownEventTypes.has(type)) {
    return ok({ op: 'event', guildId, event: { type: 'unknown', rawType: type } });
  }

  const parsed = nodeEventSchema.safeParse(raw);
  if (!parsed.success) {
    return malformed(`Malformed ${type} frame`, parsed.error);
  }
  return ok({ op: 'event', guildId, event: toPlayerEvent(parsed.data) });
}

function toPlayerEvent(frame: NodeEventFrame): PlayerEvent {
  switch (frame.type) {
    case 'TrackStartEvent':
      return { type: 'trackStart', encodedTrack: frame.track };
    case 'TrackEndEvent':
      return { type: 'trackEnd', encodedTrack: frame.track, reason: frame.reason };
    case 'TrackExceptionEvent':
      return {
        type: 'trackException',
        encodedTrack: frame.track,
        message: frame.exception?.message ?? frame.error ?? 'Unknown error',
        severity: frame.exception?.severity ?? 'common',
        cause: frame.exception?.cause ?? null,
      };
    case 'TrackStuckEvent':
      return { type: 'trackStuck', encodedTrack: frame.track, thresholdMs: frame.thresholdMs };
    case 'WebSocketClosedEvent':
      return { type: 'connectionClosed', code: frame.code, reason: frame.reason, byRemote: frame.byRemote };
  }
}

function ok(message: InboundMessage): DecodeResult {
  return { ok: true, message };
}

function malformed(message: string, error: z.ZodError): DecodeResult {
  const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  return { ok: false, error: new CodecError(message, issues, { cause: error }) };
}
