// =============================================================================
// EventBus — Typed workflow lifecycle events
// =============================================================================

import type { WorkflowEvent, WorkflowEventType } from "../domain/graph.schema.js";

type EventKey = WorkflowEventType | "*";

export type WorkflowEventOf<T extends WorkflowEventType> = Extract<WorkflowEvent, { type: T }>;

export type WorkflowEventHandler = (event: WorkflowEvent) => void;

export interface EventBusOptions {
  /** Maximum listeners allowed per event type (default: 100). */
  maxListenersPerEvent?: number;
  /** Receives a listener's exception; the remaining listeners still run. Default: console.error */
  onListenerError?: (error: unknown, event: WorkflowEvent) => void;
}

function isEventOf<T extends WorkflowEventType>(
  event: WorkflowEvent,
  type: T,
): event is WorkflowEventOf<T> {
  return event.type === type;
}

/**
 * Process-wide bus for run and node lifecycle events.
 * Listeners run synchronously in subscription order; specific listeners before wildcard ones.
 */
export class EventBus {
  private readonly listeners = new Map<EventKey, Set<WorkflowEventHandler>>();
  private readonly maxListenersPerEvent: number;
  private readonly onListenerError: (error: unknown, event: WorkflowEvent) => void;

  constructor(options?: EventBusOptions) {
    this.maxListenersPerEvent = options?.maxListenersPerEvent ?? 100;
    this.onListenerError =
      options?.onListenerError ??
      ((error, event) => console.error(`EventBus: listener for "${event.type}" failed:`, error));
  }

  /** Subscribe to one event type. Returns an unsubscribe fn. */
  on<T extends WorkflowEventType>(
    eventType: T,
    handler: (event: WorkflowEventOf<T>) => void,
  ): () => void {
    return this.subscribe(eventType, (event) => {
      if (isEventOf(event, eventType)) handler(event);
    });
  }

  /** Subscribe to every event. Returns an unsubscribe fn. */
  onAny(handler: WorkflowEventHandler): () => void {
    return this.subscribe("*", handler);
  }

  /** A listener that throws is reported through `onListenerError` and skipped. */
  emit(event: WorkflowEvent): void {
    const keys: EventKey[] = [event.type, "*"];
    for (const key of keys) {
      const handlers = this.listeners.get(key);
      if (!handlers) continue;
      for (const handler of handlers) {
        try {
          handler(event);
        } catch (err) {
          this.onListenerError(err, event);
        }
      }
    }
  }

  /** Return the number of listeners for a given event type. */
  listenerCount(eventType: EventKey): number {
    return this.listeners.get(eventType)?.size ?? 0;
  }

  removeAllListeners(): void {
    this.listeners.clear();
  }

  private subscribe(key: EventKey, handler: WorkflowEventHandler): () => void {
    let set = this.listeners.get(key);
    if (!set) {
      set = new Set();
      this.listeners.set(key, set);
    }
    if (set.size >= this.maxListenersPerEvent) {
      throw new Error(
        `EventBus: max listeners (${this.maxListenersPerEvent}) reached for "${key}"`,
      );
    }
    const listeners = set;
    listeners.add(handler);
    return () => {
      listeners.delete(handler);
      if (listeners.size === 0) this.listeners.delete(key);
    };
  }
}
