import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EventBus, type RedemptionPaidEvent } from '../index.js';

const paid: RedemptionPaidEvent = {
  beneficiary: '0x2222222222222222222222222222222222222222',
  amount: 20n,
  index: 3,
  timestamp: 1_700_000_000,
};

describe('EventBus', () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  it('delivers typed payloads to listeners', () => {
    const listener = vi.fn();
    bus.on('queue:paid', listener);

    expect(bus.emit('queue:paid', paid)).toBe(true);
    expect(listener).toHaveBeenCalledWith(paid);
  });

  it('returns false when nobody listens', () => {
    expect(bus.emit('queue:paid', paid)).toBe(false);
  });

  it('isolates a throwing listener from the others', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const second = vi.fn();
    bus.on('queue:paid', () => {
      throw new Error('boom');
    });
    bus.on('queue:paid', second);

    expect(() => bus.emit('queue:paid', paid)).not.toThrow();
    expect(second).toHaveBeenCalledOnce();
    expect(errorSpy).toHaveBeenCalledOnce();
    errorSpy.mockRestore();
  });

  it('off removes a single listener', () => {
    const listener = vi.fn();
    bus.on('queue:paid', listener);
    bus.off('queue:paid', listener);
    bus.emit('queue:paid', paid);
    expect(listener).not.toHaveBeenCalled();
  });

  it('removeAllListeners clears one event or all events', () => {
    bus.on('queue:paid', vi.fn());
    bus.on('config:changed', vi.fn());

    bus.removeAllListeners('queue:paid');
    expect(bus.listenerCount('queue:paid')).toBe(0);
    expect(bus.listenerCount('config:changed')).toBe(1);

    bus.removeAllListeners();
    expect(bus.listenerCount('config:changed')).toBe(0);
  });
});
