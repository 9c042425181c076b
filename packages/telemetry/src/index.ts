import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { resourceFromAttributes, type Resource } from '@opentelemetry/resources';
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from '@opentelemetry/semantic-conventions';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';

const ATTR_SERVICE_NAMESPACE = 'service.namespace';
const ATTR_DEPLOYMENT_ENVIRONMENT = 'deployment.environment.name';

export interface TelemetryOptions {
  serviceName: string;
  serviceNamespace?: string;
  serviceVersion?: string;
  otlpEndpoint?: string;
  /** When false the SDK is never started and shutdown resolves immediately. */
  enabled?: boolean;
}

export interface TelemetryHandle {
  readonly active: boolean;
  shutdown: () => Promise<void>;
}

export function createTelemetryResource(options: TelemetryOptions): Resource {
  return resourceFromAttributes({
    [ATTR_SERVICE_NAME]: options.serviceName,
    [ATTR_SERVICE_NAMESPACE]: options.serviceNamespace ?? 'cadence',
    [ATTR_SERVICE_VERSION]: options.serviceVersion ?? '0.1.0',
    [ATTR_DEPLOYMENT_ENVIRONMENT]: process.env.NODE_ENV ?? 'development',
  });
}

export function bootstrapTelemetry(options: TelemetryOptions): Promise<TelemetryHandle> {
  if (options.enabled === false) {
    return Promise.resolve({ active: false, shutdown: () => Promise.resolve() });
  }

  const traceExporter = options.otlpEndpoint
    ? new OTLPTraceExporter({ url: `${options.otlpEndpoint.replace(/\/+$/, '')}/v1/traces` })
    : undefined;

  const sdk = new NodeSDK({
    resource: createTelemetryResource(options),
    traceExporter,
    instrumentations: [
      getNodeAutoInstrumentations({
        '@opentelemetry/instrumentation-fs': { enabled: false },
      }),
    ],
  });

  sdk.start();

  return Promise.resolve({
    active: true,
    shutdown: () => sdk.shutdown(),
  });
}
