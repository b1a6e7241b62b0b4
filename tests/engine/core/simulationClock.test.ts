import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SimulationClock } from '@/engine/core/SimulationClock';
import { EventBus } from '@/engine/core/EventBus';

describe('SimulationClock', () => {
  let bus: EventBus;
  let clock: SimulationClock;
  const handlers = { forward: vi.fn(), reverse: vi.fn() };

  beforeEach(() => {
    bus = new EventBus();
    clock = new SimulationClock(bus);
    handlers.forward.mockReset();
    handlers.reverse.mockReset();
  });

  it('starts running forward', () => {
    expect(clock.getState()).toBe('running');
    expect(clock.isPaused()).toBe(false);
    expect(clock.getDirection()).toBe('forward');
  });

  it('runs the forward handler while running', () => {
    expect(clock.tick(handlers)).toBe('running');
    expect(handlers.forward).toHaveBeenCalledTimes(1);
    expect(handlers.reverse).not.toHaveBeenCalled();
  });

  it('does nothing while paused', () => {
    clock.setPaused(true);

    expect(clock.tick(handlers)).toBe('paused');
    expect(handlers.forward).not.toHaveBeenCalled();
    expect(handlers.reverse).not.toHaveBeenCalled();
  });

  it('runs the reverse handler while reversing', () => {
    clock.setDirection('reverse');

    expect(clock.tick(handlers)).toBe('reversing');
    expect(clock.getDirection()).toBe('reverse');
    expect(handlers.reverse).toHaveBeenCalledTimes(1);
  });

  it('returns to running on forward, unpause and resume', () => {
    clock.setDirection('reverse');
    clock.setDirection('forward');
    expect(clock.getState()).toBe('running');

    clock.setPaused(true);
    clock.setPaused(false);
    expect(clock.getState()).toBe('running');

    clock.setDirection('reverse');
    clock.resume();
    expect(clock.getState()).toBe('running');
  });

  it('publishes only actual state changes', () => {
    const changes: string[] = [];
    bus.on('clock:stateChanged', (data) => changes.push(`${data.from}->${data.to}`));

    clock.setPaused(true);
    clock.setPaused(true);
    clock.setDirection('reverse');
    clock.resume();
    clock.resume();

    expect(changes).toEqual(['running->paused', 'paused->reversing', 'reversing->running']);
  });

  it('never changes state on its own', () => {
    clock.setDirection('reverse');
    for (let i = 0; i < 5; i++) clock.tick(handlers);

    expect(clock.getState()).toBe('reversing');
  });
});
