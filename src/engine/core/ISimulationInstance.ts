/**
 * ISimulationInstance - What systems may see of the simulation that owns them
 *
 * Systems receive the World through System.init() and everything else through
 * this interface, never through module-level state.
 */

import type { EventBus } from './EventBus';
import type { SimulationConfig } from '@/data/simulation.config';

export interface ISimulationInstance {
  /** Event bus for pub/sub communication between systems */
  readonly eventBus: EventBus;

  /** Tunables (tick rate, speeds, thresholds, planner parameters) */
  readonly config: SimulationConfig;
}
