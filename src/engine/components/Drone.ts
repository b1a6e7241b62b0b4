import { clonePoint, type Point } from '@/utils/math';
import { clonePattern, type PatternData } from './Pattern';

export type Team = 'friendly' | 'enemy';

export type DroneMode =
  | 'idle'
  | 'moving'
  | 'patrolling'
  | 'tailing'
  | 'intercepting'
  | 'holding'
  | 'returning'
  | 'destroyed';

export interface Drone {
  /** Stable, unique identifier (e.g. "drone_1", "enemy_2") */
  id: string;
  team: Team;
  x: number;
  y: number;
  vx: number;
  vy: number;
  mode: DroneMode;
  /** World units per second */
  speed: number;
  radius: number;

  /** Destination for moving/returning drones */
  target: Point | null;
  /** Command group this drone is travelling with */
  groupId: number | null;

  tailTargetId: string | null;
  tailDistance: number | null;

  interceptTargetId: string | null;
  /** Cached planner output */
  interceptPoint: Point | null;
  /** Absolute simulation time (seconds) the planner expects the enemy at interceptPoint */
  interceptEta: number | null;
  /** Tick at which the planner may be retried after a failed plan */
  interceptRetryTick: number | null;

  pattern: PatternData | null;
  baseId: string | null;
}

export interface DroneInit {
  id: string;
  team: Team;
  x: number;
  y: number;
  speed: number;
  radius: number;
  mode?: DroneMode;
  pattern?: PatternData | null;
  baseId?: string | null;
}

export function createDrone(init: DroneInit): Drone {
  return {
    id: init.id,
    team: init.team,
    x: init.x,
    y: init.y,
    vx: 0,
    vy: 0,
    mode: init.mode ?? (init.pattern ? 'patrolling' : 'idle'),
    speed: init.speed,
    radius: init.radius,
    target: null,
    groupId: null,
    tailTargetId: null,
    tailDistance: null,
    interceptTargetId: null,
    interceptPoint: null,
    interceptEta: null,
    interceptRetryTick: null,
    pattern: init.pattern ? clonePattern(init.pattern) : null,
    baseId: init.baseId ?? null,
  };
}

export function cloneDrone(drone: Drone): Drone {
  return {
    ...drone,
    target: clonePoint(drone.target),
    interceptPoint: clonePoint(drone.interceptPoint),
    pattern: drone.pattern ? clonePattern(drone.pattern) : null,
  };
}

/**
 * Drop tail and intercept linkage. Used whenever a drone receives a new task
 * or its linked target disappears.
 */
export function clearPursuit(drone: Drone): void {
  drone.tailTargetId = null;
  drone.tailDistance = null;
  drone.interceptTargetId = null;
  drone.interceptPoint = null;
  drone.interceptEta = null;
  drone.interceptRetryTick = null;
}

/**
 * Put a drone at rest with no task, target, pattern or pursuit linkage.
 */
export function setIdle(drone: Drone): void {
  drone.mode = 'idle';
  drone.vx = 0;
  drone.vy = 0;
  drone.target = null;
  drone.pattern = null;
  clearPursuit(drone);
}
