/**
 * EventDispatcher: EventBus implementation that fans each hook out to
 * any number of listeners.
 *
 * Implements the EventBus interface so it drops into the pool cache,
 * access validator, middleware and health aggregator.
 *
 * Features:
 * - Multiple listeners per event type via `.on(type, listener)`
 * - Wildcard `'*'` listener receives every event
 * - Async dispatch on queueMicrotask, so listeners run after the request step
 * - Sync mode for tests: events dispatched inline
 * - A throwing listener is reported to `onError` and skipped
 * - Every dispatched event has `type` and `timestamp` fields
 * - `.on()` returns unsubscribe function for easy cleanup
 *
 * Usage:
 * ```typescript
 * const dispatcher = new EventDispatcher();
 *
 * // Audit every denial
 * const unsub = dispatcher.on('access.denied', (e) => {
 *   auditLog.append(e);
 * });
 *
 * const pools = new PlantPoolCache({ registry, factory, central, events: dispatcher });
 *
 * // Cleanup
 * unsub();
 * ```
 */

import type { EventBus } from '../interfaces/event-bus';
import { now } from '../utils/time';

// ── Event Types ─────────────────────────────────────────────────

/** All event type strings emitted by the system. */
export type EventType =
  // Pools
  | 'pool.created'
  | 'pool.failed'
  | 'pool.error'
  | 'pools.closed'
  // Access
  | 'access.granted'
  | 'access.denied'
  | 'access.failed'
  // Requests
  | 'context.attached'
  | 'request.rejected'
  // Health
  | 'health.checked';

/** Every dispatched event carries its type and a millisecond timestamp. */
export interface DispatchedEvent {
  readonly type: EventType;
  readonly timestamp: number;
  readonly [key: string]: unknown;
}

/** Listener callback signature. */
export type EventListener = (event: DispatchedEvent) => void;

type Payload<K extends keyof EventBus> = Parameters<NonNullable<EventBus[K]>>[0];

// ── Options ─────────────────────────────────────────────────────

export interface EventDispatcherOptions {
  /**
   * Dispatch mode.
   * - `'async'` (default): listeners fire on the next microtask.
   * - `'sync'`: listeners fire inline. Use for testing or when you need
   *   to assert events immediately after an operation.
   */
  mode?: 'sync' | 'async';

  /**
   * Called when a listener throws. Without this, errors are dropped
   * (listeners must never crash the host). Set this to log or report.
   */
  onError?: (error: unknown, event: DispatchedEvent) => void;
}

// ── EventDispatcher ─────────────────────────────────────────────

export class EventDispatcher implements Required<EventBus> {
  private readonly _listeners = new Map<string, Set<EventListener>>();
  private readonly _mode: 'sync' | 'async';
  private readonly _onError?: (error: unknown, event: DispatchedEvent) => void;

  readonly onPoolCreated = (e: Payload<'onPoolCreated'>): void => this._dispatch('pool.created', e);
  readonly onPoolFailed = (e: Payload<'onPoolFailed'>): void => this._dispatch('pool.failed', e);
  readonly onPoolError = (e: Payload<'onPoolError'>): void => this._dispatch('pool.error', e);
  readonly onPoolsClosed = (e: Payload<'onPoolsClosed'>): void => this._dispatch('pools.closed', e);
  readonly onAccessGranted = (e: Payload<'onAccessGranted'>): void => this._dispatch('access.granted', e);
  readonly onAccessDenied = (e: Payload<'onAccessDenied'>): void => this._dispatch('access.denied', e);
  readonly onAccessFailed = (e: Payload<'onAccessFailed'>): void => this._dispatch('access.failed', e);
  readonly onContextAttached = (e: Payload<'onContextAttached'>): void => this._dispatch('context.attached', e);
  readonly onRequestRejected = (e: Payload<'onRequestRejected'>): void => this._dispatch('request.rejected', e);
  readonly onHealthChecked = (e: Payload<'onHealthChecked'>): void => this._dispatch('health.checked', e);

  constructor(options: EventDispatcherOptions = {}) {
    this._mode = options.mode ?? 'async';
    this._onError = options.onError;
  }

  // ── Public API ──────────────────────────────────────────────────

  /**
   * Subscribe to an event type. Use `'*'` to receive all events.
   * Returns an unsubscribe function.
   */
  on(type: EventType | '*', listener: EventListener): () => void {
    let set = this._listeners.get(type);
    if (!set) {
      set = new Set();
      this._listeners.set(type, set);
    }
    const listeners = set;
    listeners.add(listener);
    return () => { listeners.delete(listener); };
  }

  off(type: EventType | '*', listener: EventListener): void {
    this._listeners.get(type)?.delete(listener);
  }

  /**
   * Remove all listeners for a type, or all listeners if no type specified.
   */
  removeAll(type?: EventType | '*'): void {
    if (type) {
      this._listeners.delete(type);
    } else {
      this._listeners.clear();
    }
  }

  listenerCount(type?: EventType | '*'): number {
    if (type) {
      return this._listeners.get(type)?.size ?? 0;
    }
    let total = 0;
    for (const set of this._listeners.values()) {
      total += set.size;
    }
    return total;
  }

  /**
   * Wait for all pending async dispatches to complete.
   * In sync mode, resolves immediately.
   */
  async flush(): Promise<void> {
    await Promise.resolve();
    await Promise.resolve();
  }

  // ── Internal ────────────────────────────────────────────────────

  private _dispatch(type: EventType, payload: Record<string, unknown>): void {
    const specific = this._listeners.get(type);
    const wildcard = this._listeners.get('*');

    if (!specific?.size && !wildcard?.size) return;

    const event: DispatchedEvent = Object.freeze({ ...payload, type, timestamp: now() });

    if (this._mode === 'sync') {
      this._callListeners(specific, event);
      this._callListeners(wildcard, event);
    } else {
      queueMicrotask(() => {
        this._callListeners(specific, event);
        this._callListeners(wildcard, event);
      });
    }
  }

  private _callListeners(listeners: Set<EventListener> | undefined, event: DispatchedEvent): void {
    if (!listeners) return;
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (err) {
        this._onError?.(err, event);
      }
    }
  }
}
