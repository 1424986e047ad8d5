import { SpanStatusCode, trace, type Attributes } from '@opentelemetry/api';
import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { resourceFromAttributes } from '@opentelemetry/resources';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';

const TRACER_NAME = 'cadence';

export interface TelemetryOptions {
  serviceName: string;
  serviceNamespace?: string;
  serviceVersion?: string;
  environment?: string;
  /** Traces are exported only when an OTLP endpoint is given. */
  otlpEndpoint?: string;
}

export interface TelemetryHandle {
  shutdown: () => Promise<void>;
}

export function bootstrapTelemetry(options: TelemetryOptions): TelemetryHandle {
  const resource = resourceFromAttributes({
    [SemanticResourceAttributes.SERVICE_NAME]: options.serviceName,
    [SemanticResourceAttributes.SERVICE_NAMESPACE]: options.serviceNamespace ?? 'cadence',
    [SemanticResourceAttributes.SERVICE_VERSION]: options.serviceVersion ?? '0.1.0',
    [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: options.environment ?? 'development',
  });

  const traceExporter = options.otlpEndpoint
    ? new OTLPTraceExporter({ url: `${options.otlpEndpoint}/v1/traces` })
    : undefined;

  const sdk = new NodeSDK({
    resource,
    traceExporter,
    instrumentations: [
      getNodeAutoInstrumentations({
        '@opentelemetry/instrumentation-fs': { enabled: false },
      }),
    ],
  });

  sdk.start();

  return {
    shutdown: () => sdk.shutdown(),
  };
}

/** Runs `operation` inside an active span, recording a thrown error on it before rethrowing. */
export async function withSpan<T>(name: string, attributes: Attributes, operation: () => Promise<T>): Promise<T> {
  return trace.getTracer(TRACER_NAME).startActiveSpan(name, { attributes }, async (span) => {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
      }
      span.setStatus({ code: SpanStatusCode.ERROR, message: error instanceof Error ? error.message : String(error) });
      throw error;
    } finally {
      span.end();
    }
  });
}
