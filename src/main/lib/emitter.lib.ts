/**
 * Typed event emitter
 * Observers get a typed callback and an unsubscribe function; a throwing
 * observer is logged and never reaches the emitting state machine
 */

import { EventEmitter } from 'events';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export type EventMap = Record<string, unknown[]>;

export type Unsubscribe = () => void;

export class TypedEmitter<Events extends EventMap> {
  private readonly emitter = new EventEmitter();

  constructor(private readonly label: string) {
    // Presentation layers may attach many observers per session
    this.emitter.setMaxListeners(0);
  }

  on<K extends keyof Events & string>(event: K, listener: (...args: Events[K]) => void): Unsubscribe {
    const guarded = (...args: Events[K]) => {
      try {
        listener(...args);
      } catch (err) {
        logger.error(`${this.label} observer for "${event}" failed:`, errorMessage(err));
      }
    };
    this.emitter.on(event, guarded);
    return () => {
      this.emitter.off(event, guarded);
    };
  }

  emit<K extends keyof Events & string>(event: K, ...args: Events[K]): void {
    this.emitter.emit(event, ...args);
  }

  listenerCount<K extends keyof Events & string>(event: K): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
  }
}
