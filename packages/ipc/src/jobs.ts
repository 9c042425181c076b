import { z } from 'zod';
import { jobEnvelopeSchema, type JobEnvelope } from '@cadence/schemas';
import { STREAMS } from '@cadence/storage';
import type { RedisClient } from './index.js';

const JOB_PAYLOAD_FIELD = 'payload';

export const JOB_STREAM_KEY = STREAMS.jobs;
export const JOB_DEAD_LETTER_KEY = STREAMS.jobsDlq;

export interface JobStreamEntry {
  id: string;
  stream: string;
  payload: string;
}

export interface ReadJobOptions {
  count?: number;
  blockMs?: number;
}

export class JobDecodeError extends Error {
  readonly entryId: string;

  constructor(entryId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'JobDecodeError';
    this.entryId = entryId;
  }
}

const streamReplySchema = z
  .array(z.tuple([z.string(), z.array(z.tuple([z.string(), z.array(z.string()).nullable()]))]))
  .nullable();

export async function ensureJobConsumerGroup(
  redis: RedisClient,
  group: string,
  streamKey: string = JOB_STREAM_KEY,
): Promise<void> {
  try {
    await redis.xgroup('CREATE', streamKey, group, '0', 'MKSTREAM');
  } catch (error) {
    if (!(error instanceof Error)) {
      throw error;
    }
    if (!error.message.includes('BUSYGROUP')) {
      throw error;
    }
  }
}

export function buildReadGroupArgs(
  group: string,
  consumer: string,
  options: ReadJobOptions,
  streams: string[],
): Array<string | number> {
  const args: Array<string | number> = ['GROUP', group, consumer];

  if (typeof options.count === 'number' && options.count > 0) {
    args.push('COUNT', options.count);
  }

  if (typeof options.blockMs === 'number' && options.blockMs > 0) {
    args.push('BLOCK', options.blockMs);
  }

  args.push('STREAMS', ...streams);
  for (let index = 0; index < streams.length; index += 1) {
    args.push('>');
  }
  return args;
}

/** Flattens an XREADGROUP reply into one entry per stream record. */
export function parseStreamReply(reply: unknown): JobStreamEntry[] {
  const response = streamReplySchema.parse(reply);
  if (!response) {
    return [];
  }

  const entries: JobStreamEntry[] = [];
  for (const [streamKey, streamEntries] of response) {
    for (const [entryId, fields] of streamEntries) {
      const record: Record<string, string> = {};
      for (let index = 0; fields && index + 1 < fields.length; index += 2) {
        const field = fields[index];
        const value = fields[index + 1];
        if (field !== undefined && value !== undefined) {
          record[field] = value;
        }
      }
      entries.push({
        id: entryId,
        stream: streamKey,
        payload: record[JOB_PAYLOAD_FIELD] ?? '',
      });
    }
  }

  return entries;
}

export async function readJobStream(
  redis: RedisClient,
  group: string,
  consumer: string,
  options: ReadJobOptions = {},
  streamKeys: string | string[] = JOB_STREAM_KEY,
): Promise<JobStreamEntry[]> {
  const streams = Array.isArray(streamKeys) ? streamKeys : [streamKeys];
  const reply = await redis.call('XREADGROUP', buildReadGroupArgs(group, consumer, options, streams));
  return parseStreamReply(reply);
}

export function decodeJobEntry(entry: JobStreamEntry): JobEnvelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(entry.payload);
  } catch (error) {
    throw new JobDecodeError(entry.id, `Job entry ${entry.id} is not valid JSON`, { cause: error });
  }

  const result = jobEnvelopeSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new JobDecodeError(entry.id, `Job entry ${entry.id} failed validation: ${issues.join('; ')}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export async function acknowledgeJob(redis: RedisClient, group: string, entry: JobStreamEntry): Promise<void> {
  await redis.xack(entry.stream, group, entry.id);
}

export async function deadLetterJob(redis: RedisClient, entry: JobStreamEntry, reason: string): Promise<void> {
  await redis.xadd(
    JOB_DEAD_LETTER_KEY,
    '*',
    JOB_PAYLOAD_FIELD,
    entry.payload,
    'source',
    entry.stream,
    'entryId',
    entry.id,
    'reason',
    reason,
  );
}
