import type { WorldSnapshot } from '../ecs/World';
import { cloneDrone } from '../components/Drone';
import { cloneBase } from '../components/Base';
import { cloneCommandGroup } from '../components/CommandGroup';

export function cloneSnapshot(snapshot: WorldSnapshot): WorldSnapshot {
  return {
    tick: snapshot.tick,
    drones: snapshot.drones.map(cloneDrone),
    bases: snapshot.bases.map(cloneBase),
    groups: snapshot.groups.map(cloneCommandGroup),
    nextGroupId: snapshot.nextGroupId,
  };
}

/**
 * HistoryBuffer - Fixed-capacity ring of world snapshots with a playback cursor.
 *
 * Storage is allocated once; appends past capacity overwrite the oldest slot.
 * The cursor marks the snapshot the live world currently reflects. Appending
 * while the cursor sits behind the newest entry first drops everything after
 * it: a rewound-away future is never replayed.
 *
 * Every snapshot handed out is a deep copy.
 */
export class HistoryBuffer {
  private readonly slots: Array<WorldSnapshot | undefined>;
  private start = 0;
  private size = 0;
  private cursor = -1;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`HistoryBuffer: capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<WorldSnapshot | undefined>(capacity).fill(undefined);
  }

  public get capacity(): number {
    return this.slots.length;
  }

  public get length(): number {
    return this.size;
  }

  /** Index (0 = oldest) of the snapshot the live world reflects, -1 when empty */
  public getCursor(): number {
    return this.cursor;
  }

  /** Append a snapshot; the buffer takes ownership of it */
  public push(snapshot: WorldSnapshot): void {
    // Drop the un-taken future after a rewind
    if (this.cursor < this.size - 1) {
      this.truncate(this.cursor + 1);
    }

    if (this.size < this.capacity) {
      this.slots[this.slotIndex(this.size)] = snapshot;
      this.size++;
    } else {
      this.slots[this.start] = snapshot;
      this.start = (this.start + 1) % this.capacity;
    }
    this.cursor = this.size - 1;
  }

  /**
   * Move the cursor one snapshot back.
   * @returns A copy of that snapshot, or undefined at the oldest entry
   */
  public stepBack(): WorldSnapshot | undefined {
    if (this.cursor <= 0) return undefined;
    this.cursor--;
    return this.copyAt(this.cursor);
  }

  /**
   * Move the cursor `ticks` snapshots back, clamped to the oldest entry.
   * @returns A copy of that snapshot, or undefined when the buffer is empty
   */
  public jumpBack(ticks: number): WorldSnapshot | undefined {
    if (this.size === 0) return undefined;
    this.cursor = Math.max(0, this.cursor - Math.max(0, Math.floor(ticks)));
    return this.copyAt(this.cursor);
  }

  /** Copy of the snapshot at `index` (0 = oldest) */
  public at(index: number): WorldSnapshot | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) return undefined;
    return this.copyAt(index);
  }

  public current(): WorldSnapshot | undefined {
    return this.cursor < 0 ? undefined : this.copyAt(this.cursor);
  }

  public oldestTick(): number | undefined {
    return this.size === 0 ? undefined : this.slots[this.start]?.tick;
  }

  public newestTick(): number | undefined {
    return this.size === 0 ? undefined : this.slots[this.slotIndex(this.size - 1)]?.tick;
  }

  /** Ticks of all stored snapshots, oldest first */
  public getTicks(): number[] {
    const ticks: number[] = [];
    for (let i = 0; i < this.size; i++) {
      const snapshot = this.slots[this.slotIndex(i)];
      if (snapshot) ticks.push(snapshot.tick);
    }
    return ticks;
  }

  public clear(): void {
    this.slots.fill(undefined);
    this.start = 0;
    this.size = 0;
    this.cursor = -1;
  }

  private truncate(length: number): void {
    for (let i = length; i < this.size; i++) {
      this.slots[this.slotIndex(i)] = undefined;
    }
    this.size = length;
  }

  private slotIndex(index: number): number {
    return (this.start + index) % this.capacity;
  }

  private copyAt(index: number): WorldSnapshot | undefined {
    const snapshot = this.slots[this.slotIndex(index)];
    return snapshot ? cloneSnapshot(snapshot) : undefined;
  }
}
