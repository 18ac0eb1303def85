/**
 * @toolgate/observability: OTel Setup
 *
 * Configures an OpenTelemetry TracerProvider whose tracer is handed to the
 * generation handler.
 */

import type { Tracer } from '@opentelemetry/api';
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
  type SpanExporter,
} from '@opentelemetry/sdk-trace-base';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface OTelConfig {
  /** Instrumentation scope name of the returned tracer */
  serviceName?: string;
  /** Span exporters to register */
  exporters?: SpanExporter[];
}

// ---------------------------------------------------------------------------
// Setup
// ---------------------------------------------------------------------------

let _provider: BasicTracerProvider | null = null;
let _inMemoryExporter: InMemorySpanExporter | null = null;

/**
 * Initialize OTel tracing. Without exporters, spans are kept in memory and
 * can be read back with `getInMemoryExporter()`.
 */
export function setupTelemetry(config: OTelConfig = {}): Tracer {
  const serviceName = config.serviceName ?? 'toolgate';

  const provider = new BasicTracerProvider();
  _provider = provider;

  const exporters: SpanExporter[] = [...(config.exporters ?? [])];

  if (exporters.length === 0) {
    _inMemoryExporter = new InMemorySpanExporter();
    exporters.push(_inMemoryExporter);
  } else {
    _inMemoryExporter = null;
  }

  for (const exporter of exporters) {
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
  }

  // Tracer comes from this provider instance, not the global singleton,
  // which can only be registered once.
  return provider.getTracer(serviceName);
}

/**
 * Shutdown telemetry. Flushes all pending spans.
 */
export async function shutdownTelemetry(): Promise<void> {
  if (_provider) {
    await _provider.shutdown();
    _provider = null;
  }
}

/**
 * Get the in-memory exporter for testing/inspection.
 */
export function getInMemoryExporter(): InMemorySpanExporter | null {
  return _inMemoryExporter;
}
