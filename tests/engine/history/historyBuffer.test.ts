import { describe, it, expect } from 'vitest';
import { HistoryBuffer } from '@/engine/history/HistoryBuffer';
import { createDrone } from '@/engine/components/Drone';
import type { WorldSnapshot } from '@/engine/ecs/World';

function snapshotAt(tick: number): WorldSnapshot {
  return {
    tick,
    drones: [createDrone({ id: 'drone_1', team: 'friendly', x: tick, y: 0, speed: 200, radius: 8 })],
    bases: [],
    groups: [],
    nextGroupId: 1,
  };
}

function filled(capacity: number, count: number): HistoryBuffer {
  const buffer = new HistoryBuffer(capacity);
  for (let tick = 1; tick <= count; tick++) {
    buffer.push(snapshotAt(tick));
  }
  return buffer;
}

describe('HistoryBuffer', () => {
  it('requires a positive integer capacity', () => {
    expect(() => new HistoryBuffer(0)).toThrow('positive integer');
    expect(() => new HistoryBuffer(1.5)).toThrow('positive integer');
  });

  it('starts empty', () => {
    const buffer = new HistoryBuffer(5);

    expect(buffer.length).toBe(0);
    expect(buffer.getCursor()).toBe(-1);
    expect(buffer.current()).toBeUndefined();
    expect(buffer.oldestTick()).toBeUndefined();
  });

  it('appends in order and points the cursor at the newest entry', () => {
    const buffer = filled(5, 3);

    expect(buffer.length).toBe(3);
    expect(buffer.getCursor()).toBe(2);
    expect(buffer.getTicks()).toEqual([1, 2, 3]);
  });

  it('evicts the oldest snapshot at capacity', () => {
    const buffer = filled(3, 5);

    expect(buffer.length).toBe(3);
    expect(buffer.getTicks()).toEqual([3, 4, 5]);
    expect(buffer.oldestTick()).toBe(3);
    expect(buffer.newestTick()).toBe(5);
  });

  it('steps back one snapshot at a time until the oldest', () => {
    const buffer = filled(3, 5);

    expect(buffer.stepBack()?.tick).toBe(4);
    expect(buffer.stepBack()?.tick).toBe(3);
    expect(buffer.stepBack()).toBeUndefined();
    expect(buffer.getCursor()).toBe(0);
  });

  it('jumps back and clamps to the oldest snapshot', () => {
    const buffer = filled(10, 5);

    expect(buffer.jumpBack(2)?.tick).toBe(3);
    expect(buffer.jumpBack(10)?.tick).toBe(1);
    expect(buffer.getCursor()).toBe(0);
  });

  it('returns nothing when jumping in an empty buffer', () => {
    expect(new HistoryBuffer(3).jumpBack(5)).toBeUndefined();
  });

  it('drops the rewound-away future on the next append', () => {
    const buffer = filled(10, 5);
    buffer.stepBack();
    buffer.stepBack();

    buffer.push(snapshotAt(10));

    expect(buffer.getTicks()).toEqual([1, 2, 3, 10]);
    expect(buffer.getCursor()).toBe(3);
  });

  it('hands out independent copies', () => {
    const buffer = filled(5, 2);
    const copy = buffer.current();
    if (copy) copy.drones[0].x = 999;

    expect(buffer.current()?.drones[0].x).toBe(2);
    expect(buffer.at(0)?.drones[0].x).toBe(1);
  });

  it('clears all entries', () => {
    const buffer = filled(5, 4);
    buffer.clear();

    expect(buffer.length).toBe(0);
    expect(buffer.getCursor()).toBe(-1);
    expect(buffer.getTicks()).toEqual([]);
  });
});
