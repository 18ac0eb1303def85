/**
 * @toolgate/observability
 */

export type { EndSpanOptions, SpanAttributes } from './generation-tracer.js';
export { GenerationTracer } from './generation-tracer.js';
export type { OTelConfig } from './otel-setup.js';
export {
  getInMemoryExporter,
  setupTelemetry,
  shutdownTelemetry,
} from './otel-setup.js';
