import { EventEmitter } from 'node:events';

import { clientLogger, normalizeError, type ClientLogger } from '../observability/logger';
import type { Unsubscribe } from '../types';

export type Listener<T> = (value: T) => void;

const VALUE_EVENT = 'value';

/**
 * Broadcast stream: every listener attached at emit time receives the value.
 * Late listeners get nothing from the past. A throwing listener is logged and
 * does not stop delivery to the others.
 */
export class BroadcastStream<T> {
  private readonly emitter = new EventEmitter();
  protected readonly logger: ClientLogger;

  constructor(name: string, logger: ClientLogger = clientLogger) {
    this.logger = logger.child({ stream: name });
    this.emitter.setMaxListeners(0);
  }

  get listenerCount(): number {
    return this.emitter.listenerCount(VALUE_EVENT);
  }

  subscribe(listener: Listener<T>): Unsubscribe {
    const guarded = (value: T) => {
      try {
        listener(value);
      } catch (error) {
        this.logger.error({ err: normalizeError(error) }, 'stream listener threw');
      }
    };
    this.emitter.on(VALUE_EVENT, guarded);
    return () => {
      this.emitter.off(VALUE_EVENT, guarded);
    };
  }

  emit(value: T): void {
    this.emitter.emit(VALUE_EVENT, value);
  }
}

/**
 * Latest-value stream: a new listener is called with the current value
 * immediately, then with every change.
 */
export class ValueStream<T> extends BroadcastStream<T> {
  constructor(private current: T, name: string, logger?: ClientLogger) {
    super(name, logger);
  }

  get value(): T {
    return this.current;
  }

  subscribe(listener: Listener<T>): Unsubscribe {
    const unsubscribe = super.subscribe(listener);
    try {
      listener(this.current);
    } catch (error) {
      this.logger.error({ err: normalizeError(error) }, 'stream listener threw');
    }
    return unsubscribe;
  }

  emit(value: T): void {
    this.current = value;
    super.emit(value);
  }
}
