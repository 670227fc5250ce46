/**
 * Event bus for live session feedback
 * Type-safe pub/sub event system
 */

import type { ClockRegressionEvent } from '../clock/clockAdapter.js';
import type { MatchFeedback } from '../matching/matchingEngine.js';
import type { Anomaly } from '../model.js';
import { createLogger } from '../util/logger.js';
import type { SessionResult } from './trainingSession.js';

const log = createLogger('session:event-bus');

// Event type definitions
export interface DojoEvents {
  // Matching feedback
  'feedback:hit': Extract<MatchFeedback, { kind: 'hit' }>;
  'feedback:miss': Extract<MatchFeedback, { kind: 'miss' }>;
  'feedback:extra': Extract<MatchFeedback, { kind: 'extra' }>;

  // Annotations
  'recorder:anomaly': { anomaly: Anomaly };
  'clock:regression': { regression: ClockRegressionEvent };

  // Lifecycle
  'session:finished': { result: SessionResult };
  'session:cancelled': { result: SessionResult };
}

type EventCallback<T> = (data: T) => void;
export type EventName = keyof DojoEvents;
type ListenerMap = { [K in EventName]: Set<EventCallback<DojoEvents[K]>> };

function emptyListeners(): ListenerMap {
  return {
    'feedback:hit': new Set(),
    'feedback:miss': new Set(),
    'feedback:extra': new Set(),
    'recorder:anomaly': new Set(),
    'clock:regression': new Set(),
    'session:finished': new Set(),
    'session:cancelled': new Set(),
  };
}

/**
 * EventBus class - lightweight pub/sub system
 */
export class EventBus {
  private listeners: ListenerMap = emptyListeners();

  /**
   * Subscribe to an event
   * @returns Unsubscribe function
   */
  on<K extends EventName>(eventName: K, callback: EventCallback<DojoEvents[K]>): () => void {
    const callbacks: Set<EventCallback<DojoEvents[K]>> = this.listeners[eventName];
    callbacks.add(callback);

    return () => {
      callbacks.delete(callback);
    };
  }

  /**
   * Subscribe to an event (once)
   * Automatically unsubscribes after first invocation
   */
  once<K extends EventName>(eventName: K, callback: EventCallback<DojoEvents[K]>): void {
    const unsubscribe = this.on(eventName, data => {
      unsubscribe();
      callback(data);
    });
  }

  /**
   * Emit an event. A throwing listener is logged and does not stop the
   * others.
   */
  emit<K extends EventName>(eventName: K, data: DojoEvents[K]): void {
    const callbacks: Set<EventCallback<DojoEvents[K]>> = this.listeners[eventName];

    [...callbacks].forEach(callback => {
      try {
        callback(data);
      } catch (error) {
        log.error(`Error in event listener for ${eventName}:`, error);
      }
    });
  }

  /**
   * Unsubscribe from an event
   * @param callback The callback to remove (if not provided, removes all)
   */
  off<K extends EventName>(eventName: K, callback?: EventCallback<DojoEvents[K]>): void {
    const callbacks: Set<EventCallback<DojoEvents[K]>> = this.listeners[eventName];
    if (callback) callbacks.delete(callback);
    else callbacks.clear();
  }

  clear(): void {
    this.listeners = emptyListeners();
  }

  listenerCount(eventName: EventName): number {
    return this.listeners[eventName].size;
  }
}

export default EventBus;
