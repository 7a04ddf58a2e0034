/**
 * Event Pool
 *
 * One pool per event class: a Signal of subscribers plus a FIFO queue of
 * pending values. The bus holds pools through the type-erased
 * EventPoolHandle so pools of different classes share one slot array.
 */

import type winston from 'winston';
import { EventBusError, EventBusErrorCode } from './errors';
import { Connection, Signal, type BoundListener, type Listener, type SignalOptions } from './signal';
import type { EventClass, EventConstructor } from './type-registry';

/**
 * Type-erased view of a pool, used for bulk dispatch and clear
 */
export interface EventPoolHandle {
  /** Dispatch the pending queue, returning the number of values dispatched */
  dispatchQueued(): number;
  /** Discard the pending queue, returning the number of values discarded */
  clearQueue(): number;
}

export interface EventPoolOptions extends SignalOptions {
  logger?: winston.Logger;
  /** Label used in log output, e.g. `Damage#0` */
  label?: string;
}

/**
 * Build one event value from constructor arguments
 */
export function buildEvent<T, A extends unknown[]>(type: EventConstructor<T, A>, args: A): T {
  return new type(...args);
}

export class EventPool<T> implements EventPoolHandle {
  readonly eventType: EventClass<T>;
  private readonly signal: Signal<T>;
  private readonly logger?: winston.Logger;
  private readonly label: string;
  private queue: T[] = [];

  constructor(eventType: EventClass<T>, options: EventPoolOptions = {}) {
    this.eventType = eventType;
    this.signal = new Signal<T>({
      maxListeners: options.maxListeners,
      verboseMemoryLeak: options.verboseMemoryLeak
    });
    this.logger = options.logger;
    this.label = options.label ?? (eventType.name || 'AnonymousEvent');
  }

  /**
   * Deliver `event` to every subscriber now
   */
  trigger(event: T): void {
    this.signal.emit(event);
  }

  /**
   * Hold `event` until the next dispatchQueued()
   */
  enqueue(event: T): void {
    this.assertUsable();
    this.queue.push(event);
  }

  /**
   * Deliver every value pending at the time of the call, oldest first
   *
   * The queue is swapped out before delivery starts, so values enqueued by
   * subscribers during this call wait for the next one. When a subscriber
   * throws, the failing value is dropped and the values not yet delivered
   * go back to the head of the queue before the error is rethrown.
   */
  dispatchQueued(): number {
    this.assertUsable();
    const snapshot = this.queue;
    if (snapshot.length === 0) {
      return 0;
    }
    this.queue = [];

    let index = 0;
    try {
      for (; index < snapshot.length; index++) {
        this.signal.emit(snapshot[index]);
      }
    } catch (error) {
      // Shut down from inside a subscriber: nothing left to restore
      if (this.signal.isDisposed) {
        throw error;
      }
      const undelivered = snapshot.slice(index + 1);
      this.queue = undelivered.concat(this.queue);
      this.logger?.warn(
        `Dispatch of ${this.label} aborted by a subscriber after ${index} of ${snapshot.length} events; ` +
          `${undelivered.length} returned to the queue`
      );
      throw error;
    }

    return snapshot.length;
  }

  /**
   * Drop every pending value without delivering it
   */
  clearQueue(): number {
    this.assertUsable();
    const discarded = this.queue.length;
    this.queue = [];
    return discarded;
  }

  subscribe(listener: Listener<T>): Connection {
    return this.signal.bind(listener);
  }

  subscribeMethod<O>(target: O, method: BoundListener<O, T>): Connection {
    return this.signal.bindMethod(target, method);
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  get subscriberCount(): number {
    return this.signal.size;
  }

  /**
   * Drop pending values and unbind every subscriber. Connections taken from
   * this pool throw on disconnect() afterwards.
   */
  dispose(): void {
    this.queue = [];
    this.signal.dispose();
  }

  private assertUsable(): void {
    if (this.signal.isDisposed) {
      throw new EventBusError(EventBusErrorCode.DISPOSED, `Event pool ${this.label} used after dispose()`);
    }
  }
}
