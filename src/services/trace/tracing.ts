/**
 * Tracer provider setup for the CLI and for library consumers that
 * have no OpenTelemetry SDK of their own
 */

import { Resource } from '@opentelemetry/resources';
import {
  ConsoleSpanExporter,
  SimpleSpanProcessor,
  type SpanExporter
} from '@opentelemetry/sdk-trace-base';
import { NodeTracerProvider } from '@opentelemetry/sdk-trace-node';
import { SEMRESATTRS_SERVICE_NAME } from '@opentelemetry/semantic-conventions';
import { logger } from '../../core/logger.js';

export interface TracingOptions {
  serviceName: string;
  /** Where finished spans go; the console when omitted */
  exporter?: SpanExporter;
}

/**
 * Register a global Node tracer provider with async context propagation
 */
export function setupTracing(options: TracingOptions): NodeTracerProvider {
  const provider = new NodeTracerProvider({
    resource: new Resource({ [SEMRESATTRS_SERVICE_NAME]: options.serviceName }),
    spanProcessors: [new SimpleSpanProcessor(options.exporter ?? new ConsoleSpanExporter())]
  });
  provider.register();
  logger.debug('Tracing enabled', { serviceName: options.serviceName });
  return provider;
}
