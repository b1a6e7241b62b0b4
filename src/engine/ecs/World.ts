import { cloneDrone, setIdle, type Drone, type Team } from '../components/Drone';
import { cloneBase, type Base } from '../components/Base';
import { cloneCommandGroup, removeMember, type CommandGroup } from '../components/CommandGroup';
import type { System } from './System';
import { clamp, type Point } from '@/utils/math';
import { debugFormation, debugPerformance } from '@/utils/debugLogger';

export interface WorldOptions {
  /** Fixed physics step in seconds */
  dt: number;
  width: number;
  height: number;
}

/**
 * Independent deep copy of the world's entity data at one tick.
 * Shares no mutable references with the live world or any other snapshot.
 */
export interface WorldSnapshot {
  tick: number;
  drones: Drone[];
  bases: Base[];
  groups: CommandGroup[];
  nextGroupId: number;
}

/** What a drone's destruction took with it */
export interface DestroyResult {
  drone: Drone;
  /** Groups left without members and discarded */
  discardedGroupIds: number[];
  /** Drones whose tail/intercept target was the destroyed drone */
  orphanedIds: string[];
}

/**
 * World - single owned aggregate of all simulation state.
 *
 * Maps preserve insertion order, which is the iteration order every system
 * uses; snapshots record that order so a restored world iterates identically.
 */
export class World {
  public readonly dt: number;
  public readonly width: number;
  public readonly height: number;

  public tick = 0;
  public nextGroupId = 1;

  public readonly drones: Map<string, Drone> = new Map();
  public readonly bases: Map<string, Base> = new Map();
  public readonly groups: Map<number, CommandGroup> = new Map();

  private systems: System[] = [];

  constructor(options: WorldOptions) {
    this.dt = options.dt;
    this.width = options.width;
    this.height = options.height;
  }

  /** Simulation time in seconds */
  public getTime(): number {
    return this.tick * this.dt;
  }

  // ==========================================================================
  // ENTITIES
  // ==========================================================================

  public addDrone(drone: Drone): Drone {
    if (this.drones.has(drone.id)) {
      throw new Error(`World: duplicate drone id "${drone.id}"`);
    }
    this.drones.set(drone.id, drone);
    return drone;
  }

  public addBase(base: Base): Base {
    if (this.bases.has(base.id)) {
      throw new Error(`World: duplicate base id "${base.id}"`);
    }
    this.bases.set(base.id, base);
    return base;
  }

  public getDrone(id: string): Drone | undefined {
    return this.drones.get(id);
  }

  public getBase(id: string): Base | undefined {
    return this.bases.get(id);
  }

  public getDrones(): Drone[] {
    return Array.from(this.drones.values());
  }

  public getDronesByTeam(team: Team): Drone[] {
    const result: Drone[] = [];
    for (const drone of this.drones.values()) {
      if (drone.team === team) result.push(drone);
    }
    return result;
  }

  /**
   * Remove a drone and everything that referenced it: its group membership
   * (discarding the group if it empties) and any tail/intercept linkage
   * pointing at it (those drones go idle).
   */
  public destroyDrone(id: string): DestroyResult | undefined {
    const drone = this.drones.get(id);
    if (!drone) return undefined;

    this.drones.delete(id);
    drone.mode = 'destroyed';
    drone.vx = 0;
    drone.vy = 0;

    const discardedGroupIds: number[] = [];
    if (drone.groupId !== null) {
      const group = this.groups.get(drone.groupId);
      if (group) {
        removeMember(group, id);
        if (group.memberIds.length === 0) {
          this.groups.delete(group.id);
          discardedGroupIds.push(group.id);
          debugFormation.log(`[World] Group ${group.id} discarded: all members destroyed`);
        }
      }
      drone.groupId = null;
    }

    const orphanedIds: string[] = [];
    for (const other of this.drones.values()) {
      if (other.tailTargetId === id || other.interceptTargetId === id) {
        setIdle(other);
        orphanedIds.push(other.id);
      }
    }

    return { drone, discardedGroupIds, orphanedIds };
  }

  public clampToBounds(drone: Drone): void {
    drone.x = clamp(drone.x, 0, this.width);
    drone.y = clamp(drone.y, 0, this.height);
  }

  // ==========================================================================
  // GROUPS
  // ==========================================================================

  /**
   * Allocate a new command group. Members are pulled out of any group they
   * were travelling with; groups emptied that way are discarded and returned.
   */
  public createGroup(destination: Point, memberIds: string[]): { group: CommandGroup; discardedGroupIds: number[] } {
    const discardedGroupIds: number[] = [];
    const members: string[] = [];

    for (const id of memberIds) {
      const drone = this.drones.get(id);
      if (!drone || members.includes(id)) continue;
      members.push(id);

      if (drone.groupId !== null) {
        const previous = this.groups.get(drone.groupId);
        if (previous) {
          removeMember(previous, id);
          if (previous.memberIds.length === 0) {
            this.groups.delete(previous.id);
            discardedGroupIds.push(previous.id);
          }
        }
      }
    }

    const group: CommandGroup = {
      id: this.nextGroupId++,
      memberIds: members,
      destination: { x: destination.x, y: destination.y },
      arrivedIds: [],
    };
    this.groups.set(group.id, group);

    for (const id of members) {
      const drone = this.drones.get(id);
      if (drone) drone.groupId = group.id;
    }

    return { group, discardedGroupIds };
  }

  /**
   * Detach a drone from its group without destroying it (e.g. it was given
   * a different task). Returns the id of the group if that emptied it.
   */
  public leaveGroup(drone: Drone): number | null {
    if (drone.groupId === null) return null;
    const group = this.groups.get(drone.groupId);
    drone.groupId = null;
    if (!group) return null;

    removeMember(group, drone.id);
    if (group.memberIds.length === 0) {
      this.groups.delete(group.id);
      return group.id;
    }
    return null;
  }

  public getGroup(id: number): CommandGroup | undefined {
    return this.groups.get(id);
  }

  public removeGroup(id: number): boolean {
    return this.groups.delete(id);
  }

  // ==========================================================================
  // SNAPSHOTS
  // ==========================================================================

  public snapshot(): WorldSnapshot {
    return {
      tick: this.tick,
      drones: Array.from(this.drones.values(), cloneDrone),
      bases: Array.from(this.bases.values(), cloneBase),
      groups: Array.from(this.groups.values(), cloneCommandGroup),
      nextGroupId: this.nextGroupId,
    };
  }

  /**
   * Replace all entity data with a deep copy of `snapshot`.
   * The snapshot itself is never aliased, so later mutation of the live world
   * cannot corrupt stored history.
   */
  public restore(snapshot: WorldSnapshot): void {
    this.drones.clear();
    this.bases.clear();
    this.groups.clear();

    for (const drone of snapshot.drones) {
      this.drones.set(drone.id, cloneDrone(drone));
    }
    for (const base of snapshot.bases) {
      this.bases.set(base.id, cloneBase(base));
    }
    for (const group of snapshot.groups) {
      this.groups.set(group.id, cloneCommandGroup(group));
    }

    this.tick = snapshot.tick;
    this.nextGroupId = snapshot.nextGroupId;
  }

  public clear(): void {
    this.drones.clear();
    this.bases.clear();
    this.groups.clear();
    this.tick = 0;
    this.nextGroupId = 1;
  }

  // ==========================================================================
  // SYSTEMS
  // ==========================================================================

  public addSystem(system: System): void {
    this.systems.push(system);
    this.systems.sort((a, b) => a.priority - b.priority);
    system.init(this);
  }

  public getSystems(): readonly System[] {
    return this.systems;
  }

  /**
   * Run every enabled system once, in priority order.
   */
  public update(deltaTime: number): void {
    const slowSystems: string[] = [];

    for (const system of this.systems) {
      if (!system.enabled) continue;

      const start = performance.now();
      system.update(deltaTime);
      const elapsed = performance.now() - start;

      if (elapsed > 5) {
        slowSystems.push(`${system.name}:${elapsed.toFixed(1)}ms`);
      }
    }

    if (slowSystems.length > 0) {
      debugPerformance.warn(`[World] Slow systems at tick ${this.tick}: ${slowSystems.join(', ')}`);
    }
  }
}
