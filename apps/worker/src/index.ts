import { Client, GatewayIntentBits, type MessageCreateOptions } from 'discord.js';
import { loadWorkerConfig } from '@cadence/config';
import { createLogger, type Logger } from '@cadence/logger';
import { bootstrapTelemetry } from '@cadence/telemetry';
import {
  acknowledgeJob,
  claimJobOnce,
  clearWorkerPresence,
  createRedisClient,
  deadLetterJob,
  decodeJobEntry,
  ensureJobConsumerGroup,
  generateWorkerId,
  JobDecodeError,
  readJobStream,
  refreshWorkerPresence,
  type JobStreamEntry,
  type RedisClient,
} from '@cadence/ipc';
import { PlayerManager } from '@cadence/music';
import type { JobEnvelope } from '@cadence/schemas';
import { MusicPlaybackService } from './services/music.js';
import { VoiceBridge, type GatewaySender, type VoiceTarget } from './services/voiceBridge.js';

const JOB_CONSUMER_GROUP = 'cadence-workers';
const JOB_BLOCK_MS = 5000;
const JOB_BATCH_SIZE = 5;
const PRESENCE_INTERVAL_MS = 10_000;
const HEALTH_LOG_INTERVAL_MS = 60_000;

async function main() {
  const config = loadWorkerConfig();
  const telemetry = await bootstrapTelemetry({
    serviceName: 'cadence-worker',
    serviceNamespace: 'apps',
    otlpEndpoint: config.otlpEndpoint,
  });
  const logger = createLogger({ name: 'worker' });
  const workerId = generateWorkerId();

  logger.info({ workerId, nodes: config.lavalink.nodes.map((node) => node.id) }, 'Worker starting up');

  const redis = createRedisClient(config.redisUrl);
  await ensureJobConsumerGroup(redis, JOB_CONSUMER_GROUP);
  await refreshWorkerPresence(redis, workerId);

  const presenceInterval = setInterval(() => {
    void refreshWorkerPresence(redis, workerId).catch((error: unknown) => {
      logger.warn({ err: error, workerId }, 'Failed to refresh worker presence heartbeat');
    });
  }, PRESENCE_INTERVAL_MS);
  presenceInterval.unref();

  const client = new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages, GatewayIntentBits.GuildVoiceStates],
  });

  let manager: PlayerManager | null = null;
  const voiceTarget: VoiceTarget = {
    assign: (guildId, session) =>
      manager ? manager.assign(guildId, session) : Promise.reject(new Error('Player manager is not ready')),
    release: (guildId, reason) => (manager ? manager.release(guildId, reason) : Promise.resolve(false)),
    updateOccupancy: (guildId, listeners) => manager?.updateOccupancy(guildId, listeners),
  };
  const sendToGateway: GatewaySender = (guildId, payload) => {
    const guild = client.guilds.cache.get(guildId);
    if (!guild) {
      return false;
    }
    guild.shard.send(payload);
    return true;
  };
  const voice = new VoiceBridge({
    target: voiceTarget,
    send: sendToGateway,
    userId: () => client.user?.id ?? null,
    logger,
  });

  client.on('raw', (packet: unknown) => voice.handlePacket(packet));
  client.on('error', (err) => {
    logger.error({ err, workerId }, 'Worker Discord client error');
  });

  const ready = new Promise<string>((resolve) => {
    client.once('ready', (readyClient) => {
      logger.info({ workerId, user: readyClient.user.tag }, 'Worker bot connected to Discord gateway');
      resolve(readyClient.user.id);
    });
  });

  await client.login(config.discordToken);
  const userId = await ready;

  const playerManager = new PlayerManager({
    userId,
    clientName: config.lavalink.clientName,
    nodes: config.lavalink.nodes,
    reconnect: config.lavalink.reconnect,
    rest: config.lavalink.rest,
    player: config.player,
    logger,
  });
  manager = playerManager;
  const music = new MusicPlaybackService(playerManager, voice, logger);

  playerManager.on('notification', (notification) => {
    const payload = music.renderNotification(notification);
    if (!payload || !notification.textChannelId) {
      return;
    }
    void sendToChannel(client, notification.textChannelId, payload).catch((error: unknown) => {
      logger.warn(
        { err: error, guildId: notification.guildId, textChannelId: notification.textChannelId },
        'Failed to post playback notification',
      );
    });
  });
  playerManager.on('nodeState', (nodeId, state, previous) => {
    logger.info({ nodeId, state, previous }, 'Audio node state changed');
  });
  playerManager.on('nodeUnhealthy', (nodeId, failures) => {
    logger.warn({ nodeId, failures }, 'Audio node marked unhealthy');
  });
  playerManager.connect();

  const healthInterval = setInterval(() => {
    logger.info({ workerId, health: playerManager.health() }, 'Player manager health');
  }, HEALTH_LOG_INTERVAL_MS);
  healthInterval.unref();

  const jobLoopController = new AbortController();

  const processEntry = async (entry: JobStreamEntry) => {
    let job: JobEnvelope;
    try {
      job = decodeJobEntry(entry);
    } catch (error) {
      if (!(error instanceof JobDecodeError)) {
        throw error;
      }
      logger.warn({ err: error, workerId, entryId: entry.id }, 'Moving undecodable job to the dead-letter stream');
      await deadLetterJob(redis, entry, error.message);
      return;
    }

    if (!(await claimJobOnce(redis, job.idempotencyKey))) {
      logger.info({ workerId, jobId: job.id, idempotencyKey: job.idempotencyKey }, 'Skipping duplicate job');
      return;
    }

    logger.info({ workerId, jobType: job.type, jobId: job.id, guildId: job.guildId }, 'Received job from queue');
    const response = await music.handle(job);
    if (response.handled && response.payload) {
      try {
        await sendToChannel(client, job.textChannelId, response.payload);
      } catch (error) {
        logger.error(
          { err: error, workerId, jobId: job.id, guildId: job.guildId, textChannelId: job.textChannelId },
          'Failed to send music response message',
        );
      }
    }
  };

  const processJobs = async () => {
    while (!jobLoopController.signal.aborted) {
      try {
        const entries = await readJobStream(redis, JOB_CONSUMER_GROUP, workerId, {
          blockMs: JOB_BLOCK_MS,
          count: JOB_BATCH_SIZE,
        });

        for (const entry of entries) {
          try {
            await processEntry(entry);
          } catch (error) {
            logger.error({ err: error, workerId, entryId: entry.id }, 'Failed processing job entry');
          }
          await acknowledge(redis, entry, logger, workerId);
        }
      } catch (error) {
        if (jobLoopController.signal.aborted) {
          break;
        }
        logger.error({ err: error, workerId }, 'Job polling loop failure');
      }
    }
  };

  const jobLoopPromise = processJobs();

  const shutdown = async () => {
    logger.info({ workerId }, 'Worker shutting down');
    clearInterval(presenceInterval);
    clearInterval(healthInterval);
    jobLoopController.abort();
    redis.disconnect();
    await jobLoopPromise;
    await playerManager.shutdown().catch((error: unknown) => {
      logger.warn({ err: error }, 'Player manager shutdown reported error');
    });
    await client.destroy();
    const cleanup = createRedisClient(config.redisUrl);
    await clearWorkerPresence(cleanup, workerId).catch((error: unknown) => {
      logger.warn({ err: error, workerId }, 'Failed to clear worker presence');
    });
    cleanup.disconnect();
    await telemetry.shutdown();
    process.exit(0);
  };

  const onSignal = () => {
    void shutdown().catch((error: unknown) => {
      logger.error({ err: error }, 'Worker shutdown failed');
      process.exit(1);
    });
  };
  process.once('SIGTERM', onSignal);
  process.once('SIGINT', onSignal);
}

async function acknowledge(redis: RedisClient, entry: JobStreamEntry, logger: Logger, workerId: string): Promise<void> {
  try {
    await acknowledgeJob(redis, JOB_CONSUMER_GROUP, entry);
  } catch (error) {
    logger.error({ err: error, workerId, entryId: entry.id }, 'Failed to acknowledge job');
  }
}

async function sendToChannel(client: Client, channelId: string, payload: MessageCreateOptions): Promise<void> {
  const channel = await client.channels.fetch(channelId);
  if (!channel || !channel.isSendable()) {
    throw new Error(`Channel ${channelId} is not a text channel`);
  }
  await channel.send(payload);
}

main().catch((error: unknown) => {
  const logger = createLogger({ name: 'worker' });
  logger.error({ err: error }, 'Worker failed to start');
  process.exit(1);
});
