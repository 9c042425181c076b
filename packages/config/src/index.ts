import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const environmentSchema = z.enum(['development', 'test', 'staging', 'production']).default('development');

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const baseSchema = z.object({
  NODE_ENV: environmentSchema,
  REDIS_URL: z.string().min(1, 'REDIS_URL is required'),
  OTLP_ENDPOINT: z.string().url().optional(),
});

type BaseEnv = z.infer<typeof baseSchema>;

const workerSchema = baseSchema.extend({
  DISCORD_TOKEN: z.string().min(1, 'DISCORD_TOKEN is required'),
  LAVALINK_NODES: z.string().optional(),
  LAVALINK_HOST: z.string().default('lavalink'),
  LAVALINK_PORT: z.coerce.number().int().positive().default(2333),
  LAVALINK_PASSWORD: z.string().min(1, 'LAVALINK_PASSWORD is required'),
  LAVALINK_ID: z.string().default('primary'),
  LAVALINK_SECURE: z.string().optional(),
  LAVALINK_TRANSPORT: z.string().optional(),
  LAVALINK_CLIENT_NAME: z.string().default('cadence-worker'),
  NODE_RECONNECT_BASE_MS: positiveInt(1000),
  NODE_RECONNECT_MAX_MS: positiveInt(30000),
  NODE_RECONNECT_FACTOR: z.coerce.number().min(1).default(2),
  NODE_RESUME_WINDOW_MS: positiveInt(60000),
  NODE_READY_TIMEOUT_MS: positiveInt(5000),
  NODE_UNHEALTHY_THRESHOLD: positiveInt(5),
  REST_RETRY_ATTEMPTS: positiveInt(3),
  REST_RETRY_BASE_MS: nonNegativeInt(250),
  REST_TIMEOUT_MS: positiveInt(10000),
  SEARCH_PREFIX: z.string().min(1).default('ytsearch:'),
  PLAYER_QUEUE_LIMIT: positiveInt(1000),
  PLAYER_IDLE_TIMEOUT_MS: positiveInt(10000),
  PLAYER_AUTO_SKIP_LIMIT: positiveInt(3),
  PLAYER_DEFAULT_VOLUME: z.coerce.number().int().min(0).max(1000).default(100),
});

type WorkerEnv = z.infer<typeof workerSchema>;

export type NodeTransport = 'websocket' | 'rest';

export interface LavalinkNodeConfig {
  id: string;
  host: string;
  port: number;
  password: string;
  secure: boolean;
  transport: NodeTransport;
}

export interface ReconnectConfig {
  baseDelayMs: number;
  maxDelayMs: number;
  factor: number;
  resumeWindowMs: number;
  readyTimeoutMs: number;
  unhealthyThreshold: number;
}

export interface RestConfig {
  retryAttempts: number;
  retryBaseDelayMs: number;
  timeoutMs: number;
  searchPrefix: string;
}

export interface PlayerConfig {
  queueLimit: number;
  idleTimeoutMs: number;
  autoSkipLimit: number;
  defaultVolume: number;
}

export interface WorkerConfig {
  environment: BaseEnv['NODE_ENV'];
  redisUrl: string;
  otlpEndpoint?: string;
  discordToken: string;
  lavalink: {
    nodes: LavalinkNodeConfig[];
    clientName: string;
    reconnect: ReconnectConfig;
    rest: RestConfig;
  };
  player: PlayerConfig;
}

export function loadWorkerConfig(source: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const env = workerSchema.parse(source);
  if (env.NODE_RECONNECT_MAX_MS < env.NODE_RECONNECT_BASE_MS) {
    throw new Error('NODE_RECONNECT_MAX_MS must not be lower than NODE_RECONNECT_BASE_MS');
  }

  return {
    environment: env.NODE_ENV,
    redisUrl: env.REDIS_URL,
    otlpEndpoint: env.OTLP_ENDPOINT,
    discordToken: env.DISCORD_TOKEN,
    lavalink: {
      nodes: parseLavalinkNodes(env),
      clientName: env.LAVALINK_CLIENT_NAME,
      reconnect: {
        baseDelayMs: env.NODE_RECONNECT_BASE_MS,
        maxDelayMs: env.NODE_RECONNECT_MAX_MS,
        factor: env.NODE_RECONNECT_FACTOR,
        resumeWindowMs: env.NODE_RESUME_WINDOW_MS,
        readyTimeoutMs: env.NODE_READY_TIMEOUT_MS,
        unhealthyThreshold: env.NODE_UNHEALTHY_THRESHOLD,
      },
      rest: {
        retryAttempts: env.REST_RETRY_ATTEMPTS,
        retryBaseDelayMs: env.REST_RETRY_BASE_MS,
        timeoutMs: env.REST_TIMEOUT_MS,
        searchPrefix: env.SEARCH_PREFIX,
      },
    },
    player: {
      queueLimit: env.PLAYER_QUEUE_LIMIT,
      idleTimeoutMs: env.PLAYER_IDLE_TIMEOUT_MS,
      autoSkipLimit: env.PLAYER_AUTO_SKIP_LIMIT,
      defaultVolume: env.PLAYER_DEFAULT_VOLUME,
    },
  };
}

function parseLavalinkNodes(env: WorkerEnv): LavalinkNodeConfig[] {
  if (typeof env.LAVALINK_NODES === 'string' && env.LAVALINK_NODES.trim().length > 0) {
    let nodes: LavalinkNodeConfig[];
    try {
      const parsed: unknown = JSON.parse(env.LAVALINK_NODES);
      if (!Array.isArray(parsed)) {
        throw new Error('LAVALINK_NODES must be a JSON array');
      }
      nodes = parsed.map((entry: unknown, index) => {
        const node = isRecord(entry) ? entry : {};
        return {
          id: normaliseString(node.id, `node-${index + 1}`),
          host: normaliseString(node.host, env.LAVALINK_HOST),
          port: normalisePort(node.port, env.LAVALINK_PORT),
          password: normaliseString(node.password, env.LAVALINK_PASSWORD),
          secure: normaliseBoolean(node.secure, env.LAVALINK_SECURE),
          transport: normaliseTransport(node.transport, env.LAVALINK_TRANSPORT),
        };
      });
    } catch (error) {
      if (error instanceof Error) {
        throw new Error(`Failed to parse LAVALINK_NODES: ${error.message}`);
      }
      throw new Error('Failed to parse LAVALINK_NODES: Unknown error');
    }

    if (nodes.length === 0) {
      throw new Error('LAVALINK_NODES must list at least one node');
    }
    const ids = new Set(nodes.map((node) => node.id));
    if (ids.size !== nodes.length) {
      throw new Error('LAVALINK_NODES contains duplicate node ids');
    }
    return nodes;
  }

  return [
    {
      id: env.LAVALINK_ID,
      host: env.LAVALINK_HOST,
      port: env.LAVALINK_PORT,
      password: env.LAVALINK_PASSWORD,
      secure: normaliseBoolean(undefined, env.LAVALINK_SECURE),
      transport: normaliseTransport(undefined, env.LAVALINK_TRANSPORT),
    },
  ];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normaliseString(value: unknown, fallback: string): string {
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }
  if (fallback.trim().length > 0) {
    return fallback.trim();
  }
  throw new Error('Expected non-empty string');
}

function normalisePort(value: unknown, fallback: number): number {
  const candidate = typeof value === 'number' ? value : Number(value);
  if (Number.isInteger(candidate) && candidate > 0 && candidate < 65536) {
    return candidate;
  }
  if (Number.isInteger(fallback) && fallback > 0 && fallback < 65536) {
    return fallback;
  }
  throw new Error('Invalid Lavalink port');
}

function normaliseBoolean(value: unknown, fallback: unknown): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const normalised = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'y', 'on'].includes(normalised)) {
      return true;
    }
    if (['0', 'false', 'no', 'n', 'off'].includes(normalised)) {
      return false;
    }
  }

  if (typeof fallback === 'boolean') {
    return fallback;
  }
  if (typeof fallback === 'string' && fallback.trim().length > 0) {
    return normaliseBoolean(fallback, undefined);
  }
  return false;
}

function normaliseTransport(value: unknown, fallback: unknown): NodeTransport {
  for (const candidate of [value, fallback]) {
    if (typeof candidate !== 'string' || candidate.trim().length === 0) {
      continue;
    }
    const normalised = candidate.trim().toLowerCase();
    if (normalised === 'websocket' || normalised === 'ws') {
      return 'websocket';
    }
    if (normalised === 'rest' || normalised === 'http') {
      return 'rest';
    }
    throw new Error(`Unknown Lavalink transport "${candidate}"`);
  }
  return 'websocket';
}
