/**
 * A small typed event emitter. Extend `EventEmitterProtected` when only the
 * owning class may emit (the lifecycle controller and pipeline orchestrator
 * do), or `EventEmitter` when any holder may emit.
 *
 * Listener errors never propagate into the emitting code; they go to the
 * configured error reporter instead.
 */

import {
  type CallbackErrorReporter,
  reportCallbackError,
  safeHandleCallback,
} from './safe-handle-callback';

export type EventCallback<T> = (data: T) => void | Promise<void>;

export class EventEmitterProtected<Events extends object> {
  private events: { [K in keyof Events]?: Set<EventCallback<Events[K]>> } =
    {};
  private onListenerError: CallbackErrorReporter;

  constructor(options: { onListenerError?: CallbackErrorReporter } = {}) {
    this.onListenerError = options.onListenerError ?? reportCallbackError;
  }

  /**
   * Subscribe to an event
   * @returns A function to unsubscribe from the event
   */
  public on<K extends keyof Events>(
    event: K,
    callback: EventCallback<Events[K]>,
  ): () => void {
    const callbacks =
      this.events[event] ?? new Set<EventCallback<Events[K]>>();
    callbacks.add(callback);
    this.events[event] = callbacks;

    return () => {
      const current = this.events[event];

      if (current) {
        current.delete(callback);

        if (current.size === 0) {
          delete this.events[event];
        }
      }
    };
  }

  /**
   * Subscribe to an event once - automatically unsubscribes after first emission
   */
  public once<K extends keyof Events>(
    event: K,
    callback: EventCallback<Events[K]>,
  ): () => void {
    const unsubscribe = this.on(event, (data: Events[K]) => {
      unsubscribe();
      return callback(data);
    });

    return unsubscribe;
  }

  public listenerCount(event: keyof Events): number {
    return this.events[event]?.size ?? 0;
  }

  /**
   * Remove listeners for one event, or for all events when none is given
   */
  public clear(event?: keyof Events): void {
    if (event === undefined) {
      this.events = {};
    } else {
      delete this.events[event];
    }
  }

  protected emit<K extends keyof Events>(event: K, data: Events[K]): void {
    const callbacks = this.events[event];

    if (!callbacks) {
      return;
    }

    // copy so listeners that unsubscribe mid-emit don't disturb iteration
    for (const callback of [...callbacks]) {
      safeHandleCallback(
        `event handler for ${String(event)}`,
        callback,
        [data],
        this.onListenerError,
      );
    }
  }
}

/**
 * Event emitter whose `emit` is public.
 */
export class EventEmitter<
  Events extends object,
> extends EventEmitterProtected<Events> {
  public emit<K extends keyof Events>(event: K, data: Events[K]): void {
    super.emit(event, data);
  }
}
