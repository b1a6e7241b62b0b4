/**
 * SimulationEvents - Typed event payloads for the EventBus
 *
 * Event naming convention: "category:action" (e.g., "drone:destroyed", "group:dispersed")
 */

import type { Team } from '../components/Drone';
import type { Point } from '@/utils/math';
import type { ClockState } from './SimulationClock';
import type { SimulationCommand, CommandResult } from './SimulationCommand';

// ============================================================================
// MOVEMENT EVENTS
// ============================================================================

/** Data for drone:arrived event */
export interface DroneArrivedEventData {
  droneId: string;
  tick: number;
  /** Group the arrival was reported to, null for a solo arrival */
  groupId: number | null;
  position: Point;
}

// ============================================================================
// COMBAT EVENTS
// ============================================================================

/** Data for collision:pair event, one per qualifying (friendly, enemy) pair */
export interface CollisionPairEventData {
  tick: number;
  friendlyId: string;
  enemyId: string;
  distance: number;
}

/** Data for drone:destroyed event */
export interface DroneDestroyedEventData {
  tick: number;
  droneId: string;
  team: Team;
  position: Point;
  /** Nearest qualifying opponent */
  creditedTo: string;
}

/** Data for pursuit:lost event, raised when a tail/intercept target disappears */
export interface PursuitLostEventData {
  tick: number;
  droneId: string;
  targetId: string;
}

/** Data for intercept:planned event */
export interface InterceptPlannedEventData {
  tick: number;
  droneId: string;
  targetId: string;
  point: Point;
  /** Absolute simulation time (seconds) of the rendezvous */
  eta: number;
  samples: number;
}

/** Data for intercept:infeasible event */
export interface InterceptInfeasibleEventData {
  tick: number;
  droneId: string;
  targetId: string;
  samples: number;
}

// ============================================================================
// FORMATION EVENTS
// ============================================================================

export interface GroupCreatedEventData {
  groupId: number;
  memberIds: string[];
  destination: Point;
}

export interface GroupDispersedEventData {
  tick: number;
  groupId: number;
  cells: Array<{ droneId: string; x: number; y: number }>;
}

export interface GroupDiscardedEventData {
  groupId: number;
  reason: 'members_destroyed' | 'members_reassigned';
}

// ============================================================================
// CLOCK AND HISTORY EVENTS
// ============================================================================

export interface ClockStateChangedEventData {
  from: ClockState;
  to: ClockState;
}

export interface HistoryRestoredEventData {
  tick: number;
  reason: 'reverse' | 'jump';
}

export interface HistoryExhaustedEventData {
  tick: number;
}

export interface SimulationTickEventData {
  tick: number;
  time: number;
  droneCount: number;
}

export interface SimulationResetEventData {
  droneCount: number;
  baseCount: number;
}

export interface CommandAppliedEventData {
  command: SimulationCommand;
  result: CommandResult;
}

export interface EventBusErrorsEventData {
  event: string;
  errorCount: number;
  errors: Array<{ handlerId: number; message: string }>;
}

/**
 * Every event the simulation publishes, keyed by name
 */
export interface SimulationEventMap {
  'simulation:tick': SimulationTickEventData;
  'simulation:reset': SimulationResetEventData;
  'drone:arrived': DroneArrivedEventData;
  'drone:destroyed': DroneDestroyedEventData;
  'collision:pair': CollisionPairEventData;
  'pursuit:lost': PursuitLostEventData;
  'intercept:planned': InterceptPlannedEventData;
  'intercept:infeasible': InterceptInfeasibleEventData;
  'group:created': GroupCreatedEventData;
  'group:dispersed': GroupDispersedEventData;
  'group:discarded': GroupDiscardedEventData;
  'clock:stateChanged': ClockStateChangedEventData;
  'history:restored': HistoryRestoredEventData;
  'history:exhausted': HistoryExhaustedEventData;
  'command:received': SimulationCommand;
  'command:applied': CommandAppliedEventData;
  'eventbus:errors': EventBusErrorsEventData;
}

export type SimulationEventName = keyof SimulationEventMap;
