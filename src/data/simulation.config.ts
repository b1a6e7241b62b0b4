/**
 * SimulationConfig - Centralized simulation tunables
 *
 * SINGLE SOURCE OF TRUTH for timing, speeds, sizes and planner parameters.
 * Systems read these through SimulationConfig so tests can override them.
 */

// =============================================================================
// TIMING
// =============================================================================

/** Ticks per second of the fixed-timestep loop */
export const TICK_RATE = 50;

/**
 * Physics step in seconds. Always used as the integration step regardless
 * of how late the host process delivers a tick.
 */
export const FIXED_DT = 1 / TICK_RATE;

// =============================================================================
// WORLD
// =============================================================================

/** Units of: world units */
export const WORLD_WIDTH = 1000;
export const WORLD_HEIGHT = 1000;

// =============================================================================
// DRONES
// =============================================================================

/** Units of: world units per second */
export const FRIENDLY_SPEED = 200;
export const ENEMY_SPEED = 40;

/** Collision and sizing radius shared by both teams */
export const DRONE_RADIUS = 8;

/** A moving drone within this distance of its target snaps onto it */
export const ARRIVAL_THRESHOLD = 5;

// =============================================================================
// FORMATION
// =============================================================================

/** Grid cell spacing used when a group disperses at its destination */
export const FORMATION_SPACING = DRONE_RADIUS * 2;

// =============================================================================
// TAILING
// =============================================================================

/** Standoff error band within which a tailing drone holds still */
export const TAIL_DEAD_ZONE = 2.0;

export const DEFAULT_TAIL_DISTANCE = 100;

// =============================================================================
// INTERCEPT PLANNER
// =============================================================================

/** Seconds of enemy trajectory searched for a rendezvous */
export const INTERCEPT_HORIZON = 30;

/** Seconds between sampled trajectory points */
export const INTERCEPT_STEP = 0.1;

/** Replan when the enemy's predicted rendezvous position drifts this far */
export const INTERCEPT_DRIFT_THRESHOLD = 10;

/** Ticks between planner retries while no feasible intercept exists */
export const INTERCEPT_RETRY_TICKS = 25;

// =============================================================================
// HISTORY
// =============================================================================

/** Snapshots kept in the rewind buffer (10 s at 50 Hz) */
export const HISTORY_CAPACITY = 500;

/** Ticks restored by a jump-back (5 s at 50 Hz) */
export const JUMP_BACK_TICKS = 250;

export interface SimulationConfig {
  tickRate: number;
  dt: number;
  worldWidth: number;
  worldHeight: number;
  friendlySpeed: number;
  enemySpeed: number;
  droneRadius: number;
  arrivalThreshold: number;
  formationSpacing: number;
  tailDeadZone: number;
  defaultTailDistance: number;
  interceptHorizon: number;
  interceptStep: number;
  interceptDriftThreshold: number;
  interceptRetryTicks: number;
  historyCapacity: number;
  jumpBackTicks: number;
}

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  tickRate: TICK_RATE,
  dt: FIXED_DT,
  worldWidth: WORLD_WIDTH,
  worldHeight: WORLD_HEIGHT,
  friendlySpeed: FRIENDLY_SPEED,
  enemySpeed: ENEMY_SPEED,
  droneRadius: DRONE_RADIUS,
  arrivalThreshold: ARRIVAL_THRESHOLD,
  formationSpacing: FORMATION_SPACING,
  tailDeadZone: TAIL_DEAD_ZONE,
  defaultTailDistance: DEFAULT_TAIL_DISTANCE,
  interceptHorizon: INTERCEPT_HORIZON,
  interceptStep: INTERCEPT_STEP,
  interceptDriftThreshold: INTERCEPT_DRIFT_THRESHOLD,
  interceptRetryTicks: INTERCEPT_RETRY_TICKS,
  historyCapacity: HISTORY_CAPACITY,
  jumpBackTicks: JUMP_BACK_TICKS,
};

export function resolveSimulationConfig(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  return { ...DEFAULT_SIMULATION_CONFIG, ...overrides };
}
