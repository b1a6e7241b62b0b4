import type { SystemDefinition } from '../core/SystemRegistry';
import type { ISimulationInstance } from '../core/ISimulationInstance';

import { PatternSystem } from './PatternSystem';
import { MovementSystem } from './MovementSystem';
import { InterceptSystem } from './InterceptSystem';
import { TailSystem } from './TailSystem';
import { CollisionSystem } from './CollisionSystem';
import { FormationSystem } from './FormationSystem';

/**
 * System Dependency Definitions
 *
 * EXECUTION ORDER LAYERS:
 * 1. Pattern Layer: PatternSystem (patrolling drones move first, so pursuers
 *    read this tick's target positions)
 * 2. Controller Layer: MovementSystem, InterceptSystem, TailSystem (one per
 *    drone, selected by mode)
 * 3. Resolution Layer: CollisionSystem (sees every post-movement position)
 * 4. Grouping Layer: FormationSystem (evaluates arrivals of survivors)
 *
 * History recording is not a system: the simulation appends a snapshot after
 * the last system has run.
 */
export const SYSTEM_DEFINITIONS: SystemDefinition[] = [
  {
    name: 'PatternSystem',
    dependencies: [],
    factory: (sim: ISimulationInstance) => new PatternSystem(sim),
  },
  {
    name: 'MovementSystem',
    dependencies: ['PatternSystem'],
    factory: (sim: ISimulationInstance) => new MovementSystem(sim),
  },
  {
    name: 'InterceptSystem',
    dependencies: ['PatternSystem'],
    factory: (sim: ISimulationInstance) => new InterceptSystem(sim),
  },
  {
    name: 'TailSystem',
    dependencies: ['PatternSystem'],
    factory: (sim: ISimulationInstance) => new TailSystem(sim),
  },
  {
    name: 'CollisionSystem',
    dependencies: ['MovementSystem', 'InterceptSystem', 'TailSystem'],
    factory: (sim: ISimulationInstance) => new CollisionSystem(sim),
  },
  {
    name: 'FormationSystem',
    dependencies: ['CollisionSystem'],
    factory: (sim: ISimulationInstance) => new FormationSystem(sim),
  },
];
