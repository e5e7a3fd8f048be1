/**
 * EventBus: typed EventEmitter wrapper for issuer events.
 *
 * Listener errors are isolated in emit() so a failing subscriber never
 * aborts a settlement call that has already committed.
 */

import { EventEmitter } from 'node:events';
import type { IssuerEventMap } from './event-types.js';

type Listener<K extends keyof IssuerEventMap> = (data: IssuerEventMap[K]) => void;

export class EventBus {
  private readonly emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.on('error', (err: unknown) => {
      console.error('[EventBus] listener error:', err);
    });
  }

  on<K extends keyof IssuerEventMap>(event: K, listener: Listener<K>): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends keyof IssuerEventMap>(event: K, listener: Listener<K>): this {
    this.emitter.off(event, listener);
    return this;
  }

  /**
   * Emit with per-listener error isolation.
   * @returns true if at least one listener was registered.
   */
  emit<K extends keyof IssuerEventMap>(event: K, data: IssuerEventMap[K]): boolean {
    const listeners = this.emitter.listeners(event);
    if (listeners.length === 0) return false;

    for (const listener of listeners) {
      try {
        listener(data);
      } catch (err) {
        console.error(`[EventBus] listener error on '${event}':`, err);
      }
    }
    return true;
  }

  removeAllListeners(event?: keyof IssuerEventMap): this {
    if (event) {
      this.emitter.removeAllListeners(event);
    } else {
      this.emitter.removeAllListeners();
    }
    return this;
  }

  listenerCount(event: keyof IssuerEventMap): number {
    return this.emitter.listenerCount(event);
  }
}
