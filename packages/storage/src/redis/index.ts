export const STREAMS = {
  jobs: 'cadence:jobs',
  jobsDlq: 'cadence:jobs:dlq',
};

export const KEYSPACES = {
  jobDedupe: (idempotencyKey: string) => `cadence:jobs:dedupe:${idempotencyKey}`,
  workerPresence: (workerId: string) => `cadence:workers:presence:${workerId}`,
};
