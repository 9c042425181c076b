import { Redis } from 'ioredis';
import { customAlphabet } from 'nanoid';
import { KEYSPACES } from '@cadence/storage';

export type RedisClient = Redis;

const workerIdAlphabet = customAlphabet('abcdefghijklmnopqrstuvwxyz0123456789', 10);

export interface RedisConfig {
  lazyConnect?: boolean;
}

export function createRedisClient(url: string, config: RedisConfig = {}): RedisClient {
  return new Redis(url, {
    lazyConnect: config.lazyConnect ?? true,
  });
}

export function generateWorkerId(): string {
  return `worker-${workerIdAlphabet()}`;
}

export async function refreshWorkerPresence(
  redis: RedisClient,
  workerId: string,
  ttlSeconds = 30,
): Promise<void> {
  await redis.set(KEYSPACES.workerPresence(workerId), String(Date.now()), 'EX', ttlSeconds);
}

export async function clearWorkerPresence(redis: RedisClient, workerId: string): Promise<void> {
  await redis.del(KEYSPACES.workerPresence(workerId));
}

/**
 * Marks an idempotency key as seen. Returns false when another delivery of the
 * same job already claimed it within the TTL.
 */
export async function claimJobOnce(redis: RedisClient, idempotencyKey: string, ttlSeconds = 300): Promise<boolean> {
  const claimed = await redis.set(KEYSPACES.jobDedupe(idempotencyKey), '1', 'EX', ttlSeconds, 'NX');
  return claimed === 'OK';
}

export * from './jobs.js';
