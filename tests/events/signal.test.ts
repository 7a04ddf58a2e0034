/**
 * Signal and Connection Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Signal } from '../../src/events/signal';
import { EventBusError, EventBusErrorCode } from '../../src/events/errors';

class Ping {
  constructor(readonly seq: number) {}
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

describe('Signal', () => {
  let signal: Signal<Ping>;

  beforeEach(() => {
    signal = new Signal<Ping>();
  });

  it('should invoke listeners in bind order', () => {
    const calls: string[] = [];

    signal.bind(event => calls.push(`a:${event.seq}`));
    signal.bind(event => calls.push(`b:${event.seq}`));
    signal.bind(event => calls.push(`c:${event.seq}`));
    signal.emit(new Ping(7));

    expect(calls).toEqual(['a:7', 'b:7', 'c:7']);
  });

  it('should call bound methods with their target as this', () => {
    class Counter {
      total = 0;
      add(event: Ping): void {
        this.total += event.seq;
      }
    }
    const counter = new Counter();

    signal.bindMethod(counter, Counter.prototype.add);
    signal.emit(new Ping(2));
    signal.emit(new Ping(3));

    expect(counter.total).toBe(5);
  });

  it('should stop fan-out at the first throwing listener', () => {
    const calls: string[] = [];

    signal.bind(() => calls.push('first'));
    signal.bind(() => {
      throw new Error('listener failed');
    });
    signal.bind(() => calls.push('third'));

    expect(() => signal.emit(new Ping(1))).toThrow('listener failed');
    expect(calls).toEqual(['first']);
  });

  it('should count bound listeners', () => {
    expect(signal.size).toBe(0);

    const connection = signal.bind(() => undefined);
    signal.bind(() => undefined);
    expect(signal.size).toBe(2);

    connection.disconnect();
    expect(signal.size).toBe(1);
  });

  describe('Connection', () => {
    it('should remove only its own registration', () => {
      const calls: string[] = [];
      const first = signal.bind(() => calls.push('first'));
      signal.bind(() => calls.push('second'));

      expect(first.disconnect()).toBe(true);
      signal.emit(new Ping(1));

      expect(calls).toEqual(['second']);
    });

    it('should keep two registrations of one function apart', () => {
      let count = 0;
      const listener = (): void => {
        count++;
      };

      const first = signal.bind(listener);
      signal.bind(listener);
      signal.emit(new Ping(1));
      expect(count).toBe(2);

      first.disconnect();
      signal.emit(new Ping(2));
      expect(count).toBe(3);
    });

    it('should report false on a repeated disconnect', () => {
      const connection = signal.bind(() => undefined);

      expect(connection.connected).toBe(true);
      expect(connection.disconnect()).toBe(true);
      expect(connection.connected).toBe(false);
      expect(connection.disconnect()).toBe(false);
      expect(signal.size).toBe(0);
    });

    it('should carry a unique id', () => {
      const a = signal.bind(() => undefined);
      const b = signal.bind(() => undefined);

      expect(a.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
      expect(a.id).not.toBe(b.id);
    });
  });

  describe('dispose', () => {
    it('should reject emit and bind after dispose', () => {
      signal.dispose();

      expect(signal.isDisposed).toBe(true);
      expect(() => signal.emit(new Ping(1))).toThrow(EventBusError);
      expect(() => signal.bind(() => undefined)).toThrow(EventBusError);
    });

    it('should invalidate outstanding connections', () => {
      const connection = signal.bind(() => undefined);
      signal.dispose();

      expect(connection.connected).toBe(false);
      const error = captureError(() => connection.disconnect());
      expect(error).toBeInstanceOf(EventBusError);
      expect(error).toMatchObject({ code: EventBusErrorCode.DISPOSED });
    });
  });
});
