// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * @clubledger/metrics — Metrics Event Emitter
 *
 * `MetricsEventEmitter` is a typed publish-subscribe bus for engine
 * lifecycle events. Hosts attach their logger or metrics sink here.
 *
 * Supported events (see EVENT_* constants below):
 *   - metrics:computed       — fired after every successful computation
 *   - ledger:value:coerced   — fired when a malformed ledger value was read as 0
 *   - ledger:access:failed   — fired when a ledger read fails
 *
 * Usage:
 * ```ts
 * import { MetricsEventEmitter, EVENT_VALUE_COERCED } from '@clubledger/metrics';
 *
 * const events = new MetricsEventEmitter();
 * events.on(EVENT_VALUE_COERCED, (payload) => {
 *   console.warn(`${payload.entity}.${payload.field} of ${payload.rowId} read as 0`);
 * });
 * ```
 */

// ---------------------------------------------------------------------------
// Event type constants
// ---------------------------------------------------------------------------

export const EVENT_METRICS_COMPUTED = 'metrics:computed' as const;

export const EVENT_VALUE_COERCED = 'ledger:value:coerced' as const;

export const EVENT_ACCESS_FAILED = 'ledger:access:failed' as const;

/** Union of all supported event name constants. */
export type MetricsEventName =
  | typeof EVENT_METRICS_COMPUTED
  | typeof EVENT_VALUE_COERCED
  | typeof EVENT_ACCESS_FAILED;

// ---------------------------------------------------------------------------
// Event payload interfaces
// ---------------------------------------------------------------------------

export interface MetricsComputedEventPayload {
  /** Engine method name, e.g. `computeBudgetMetrics`. */
  readonly metric: string;
  readonly yearLabel: string;
  /** Wall-clock duration including ledger reads. */
  readonly durationMs: number;
  /** ISO 8601 timestamp of completion. */
  readonly timestamp: string;
}

export interface ValueCoercedEventPayload {
  readonly entity: string;
  readonly field: string;
  readonly rowId: string;
  /** The stored value that did not parse. */
  readonly rawValue: unknown;
  readonly timestamp: string;
}

export interface AccessFailedEventPayload {
  /** Ledger operation that failed, e.g. `listTransactions`. */
  readonly operation: string;
  readonly yearLabel: string;
  readonly message: string;
  readonly timestamp: string;
}

// ---------------------------------------------------------------------------
// Event payload map
// ---------------------------------------------------------------------------

export interface MetricsEventPayloadMap {
  [EVENT_METRICS_COMPUTED]: MetricsComputedEventPayload;
  [EVENT_VALUE_COERCED]: ValueCoercedEventPayload;
  [EVENT_ACCESS_FAILED]: AccessFailedEventPayload;
}

export type MetricsEventListener<E extends MetricsEventName> = (
  payload: MetricsEventPayloadMap[E],
) => void;

// ---------------------------------------------------------------------------
// MetricsEventEmitter
// ---------------------------------------------------------------------------

interface ListenerEntry {
  readonly listener: (payload: unknown) => void;
  readonly once: boolean;
}

/**
 * Typed event emitter. Listeners run synchronously in registration order.
 * Listener lists are replaced, never mutated, so a listener that subscribes
 * or unsubscribes during `emit` takes effect from the next event.
 */
export class MetricsEventEmitter {
  readonly #listeners = new Map<MetricsEventName, readonly ListenerEntry[]>();

  on<E extends MetricsEventName>(event: E, listener: MetricsEventListener<E>): this {
    return this.#register(event, listener as (payload: unknown) => void, false);
  }

  once<E extends MetricsEventName>(event: E, listener: MetricsEventListener<E>): this {
    return this.#register(event, listener as (payload: unknown) => void, true);
  }

  /** Remove every registration of `listener` for `event`. */
  off<E extends MetricsEventName>(event: E, listener: MetricsEventListener<E>): this {
    const target = listener as (payload: unknown) => void;
    this.#update(event, (entries) => entries.filter((entry) => entry.listener !== target));
    return this;
  }

  /** @returns `true` if at least one listener was invoked. */
  emit<E extends MetricsEventName>(event: E, payload: MetricsEventPayloadMap[E]): boolean {
    const entries = this.#listeners.get(event) ?? [];
    if (entries.length === 0) return false;

    this.#update(event, (current) => current.filter((entry) => !entry.once));
    for (const { listener } of entries) {
      listener(payload);
    }
    return true;
  }

  #register(event: MetricsEventName, listener: (payload: unknown) => void, once: boolean): this {
    this.#update(event, (entries) => [...entries, { listener, once }]);
    return this;
  }

  #update(
    event: MetricsEventName,
    change: (entries: readonly ListenerEntry[]) => readonly ListenerEntry[],
  ): void {
    const next = change(this.#listeners.get(event) ?? []);
    if (next.length === 0) {
      this.#listeners.delete(event);
    } else {
      this.#listeners.set(event, next);
    }
  }
}
