/**
 * Multicast Signal and Connections
 *
 * A Signal fans one value out to every bound listener, synchronously and in
 * bind order, on top of an EventEmitter2 instance with wildcards disabled.
 * Each bind returns a Connection that can remove exactly that registration.
 */

import { EventEmitter2 } from 'eventemitter2';
import { v4 as uuidv4 } from 'uuid';
import { EventBusError, EventBusErrorCode } from './errors';

/**
 * Free-callable listener. Its return value is ignored.
 */
export type Listener<T> = (event: T) => void;

/**
 * Method listener, invoked with `this` bound to its target
 */
export type BoundListener<O, T> = (this: O, event: T) => void;

/**
 * Signal configuration options
 */
export interface SignalOptions {
  /** Listener count above which the emitter prints a leak warning (0 = unlimited) */
  maxListeners?: number;
  /** Include the event name in the leak warning */
  verboseMemoryLeak?: boolean;
}

const DISPATCH = 'dispatch';

/**
 * Revocable handle to one listener registration
 *
 * Disconnecting twice is harmless and reports `false` the second time.
 * Disconnecting after the owning signal was disposed is a caller error.
 */
export class Connection {
  readonly id: string = uuidv4();
  private active = true;

  constructor(
    private readonly detach: () => void,
    private readonly isDisposed: () => boolean
  ) {}

  get connected(): boolean {
    return this.active && !this.isDisposed();
  }

  /**
   * Remove the registration
   *
   * @returns true if this call removed it, false if it was already removed
   * @throws {EventBusError} E_EVENT_003 once the owning signal is disposed
   */
  disconnect(): boolean {
    if (this.isDisposed()) {
      throw new EventBusError(
        EventBusErrorCode.DISPOSED,
        `Connection ${this.id} used after its event bus was shut down`
      );
    }
    if (!this.active) {
      return false;
    }
    this.active = false;
    this.detach();
    return true;
  }
}

export class Signal<T> {
  private readonly emitter: EventEmitter2;
  private disposed = false;

  constructor(options: SignalOptions = {}) {
    this.emitter = new EventEmitter2({
      wildcard: false,
      maxListeners: options.maxListeners ?? 50,
      verboseMemoryLeak: options.verboseMemoryLeak ?? false
    });
  }

  /**
   * Bind a free-callable listener
   */
  bind(listener: Listener<T>): Connection {
    this.assertUsable();

    // A fresh wrapper per bind keeps registrations of the same function apart
    const registration = (event: T): void => {
      listener(event);
    };
    this.emitter.on(DISPATCH, registration);

    return new Connection(
      () => {
        this.emitter.off(DISPATCH, registration);
      },
      () => this.disposed
    );
  }

  /**
   * Bind a method of `target`
   */
  bindMethod<O>(target: O, method: BoundListener<O, T>): Connection {
    return this.bind(event => method.call(target, event));
  }

  /**
   * Invoke every bound listener with `event`. A throwing listener stops the
   * fan-out and the error reaches the caller.
   */
  emit(event: T): void {
    this.assertUsable();
    this.emitter.emit(DISPATCH, event);
  }

  /**
   * Number of bound listeners
   */
  get size(): number {
    return this.emitter.listenerCount(DISPATCH);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  dispose(): void {
    this.emitter.removeAllListeners();
    this.disposed = true;
  }

  private assertUsable(): void {
    if (this.disposed) {
      throw new EventBusError(EventBusErrorCode.DISPOSED, 'Signal used after dispose()');
    }
  }
}
