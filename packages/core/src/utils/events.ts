/**
 * Event emitter utility
 *
 * Small type-safe emitter for notifications that leave a component
 * (media key pressed). Listener errors are logged and
 * never reach the emitter.
 */

import { createLogger } from './logger';

const logger = createLogger('EventEmitter');

export type EventListener<T = unknown> = (data: T) => void;

export type EventMap = Record<string, unknown>;

export class EventEmitter<Events extends EventMap = EventMap> {
  private eventListeners: { [K in keyof Events]?: Set<EventListener<Events[K]>> } = {};

  /**
   * Add event listener
   *
   * @returns Function that removes the listener
   */
  on<K extends keyof Events>(event: K, listener: EventListener<Events[K]>): () => void {
    let listeners = this.eventListeners[event];
    if (!listeners) {
      listeners = new Set<EventListener<Events[K]>>();
      this.eventListeners[event] = listeners;
    }
    listeners.add(listener);

    return () => this.off(event, listener);
  }

  /**
   * Remove event listener
   */
  off<K extends keyof Events>(event: K, listener: EventListener<Events[K]>): void {
    const listeners = this.eventListeners[event];
    if (listeners) {
      listeners.delete(listener);
      if (listeners.size === 0) {
        delete this.eventListeners[event];
      }
    }
  }

  /**
   * Emit event
   *
   * @returns Whether any listener was called
   */
  emit<K extends keyof Events>(event: K, data: Events[K]): boolean {
    const listeners = this.eventListeners[event];
    if (!listeners || listeners.size === 0) {
      return false;
    }

    listeners.forEach((listener) => {
      try {
        listener(data);
      } catch (error) {
        logger.error({ event: String(event), err: error }, 'Error in listener');
      }
    });

    return true;
  }
}
