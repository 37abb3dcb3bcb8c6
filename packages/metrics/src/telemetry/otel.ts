// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Minimal OpenTelemetry Span interface.
 *
 * This avoids a hard dependency on @opentelemetry/api. Any OTel-compatible
 * tracer that produces spans with these methods can be used.
 */
export interface OTelSpanLike {
  setAttribute(key: string, value: string | number | boolean): this;
  setStatus(status: { code: number; message?: string }): this;
  addEvent(name: string, attributes?: Record<string, string | number | boolean>): this;
  end(): void;
}

/** Minimal OpenTelemetry Tracer interface. */
export interface OTelTracerLike {
  startSpan(
    name: string,
    options?: { attributes?: Record<string, string | number | boolean> },
  ): OTelSpanLike;
}

export interface MetricsOTelConfig {
  tracer: OTelTracerLike;
  /** Service name attribute added to all spans. Defaults to "clubledger-metrics". */
  serviceName?: string;
}

/** OTel span status codes (matching OpenTelemetry SpanStatusCode). */
const SPAN_STATUS_OK = 1;
const SPAN_STATUS_ERROR = 2;

/**
 * MetricsTracer wraps each engine computation in a span named
 * `clubledger.metrics.<name>`.
 *
 * Usage:
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const engine = new MetricsEngine({
 *   ledger,
 *   tracer: new MetricsTracer({ tracer: trace.getTracer('clubledger') }),
 * });
 * ```
 */
export class MetricsTracer {
  readonly #tracer: OTelTracerLike;
  readonly #serviceName: string;

  constructor(config: MetricsOTelConfig) {
    this.#tracer = config.tracer;
    this.#serviceName = config.serviceName ?? 'clubledger-metrics';
  }

  /**
   * Run `computeFn` inside a span. The span ends with status OK on success,
   * or ERROR with the failure message before the error is rethrown.
   */
  async traceComputation<T>(
    name: string,
    yearLabel: string,
    computeFn: () => Promise<T>,
  ): Promise<T> {
    const span = this.#tracer.startSpan(`clubledger.metrics.${name}`, {
      attributes: {
        'service.name': this.#serviceName,
        'clubledger.year_label': yearLabel,
      },
    });

    try {
      const result = await computeFn();
      span.setStatus({ code: SPAN_STATUS_OK });
      return result;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      span.setStatus({ code: SPAN_STATUS_ERROR, message });
      span.addEvent('clubledger.error', { 'error.message': message });
      throw error;
    } finally {
      span.end();
    }
  }
}
