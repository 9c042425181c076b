import { describe, expect, it } from 'vitest';
import { bootstrapTelemetry, createTelemetryResource } from '../src/index.js';

describe('telemetry', () => {
  it('describes the service with namespace and version defaults', () => {
    const resource = createTelemetryResource({ serviceName: 'cadence-worker' });

    expect(resource.attributes).toMatchObject({
      'service.name': 'cadence-worker',
      'service.namespace': 'cadence',
      'service.version': '0.1.0',
      'deployment.environment.name': 'test',
    });
  });

  it('returns an inactive handle when disabled', async () => {
    const handle = await bootstrapTelemetry({ serviceName: 'cadence-worker', enabled: false });

    expect(handle.active).toBe(false);
    await expect(handle.shutdown()).resolves.toBeUndefined();
  });
});
