import { System } from '../ecs/System';
import type { ISimulationInstance } from '../core/ISimulationInstance';
import { advancePattern } from '../components/Pattern';
import { setIdle } from '../components/Drone';

/**
 * PatternSystem - Advances patrolling drones (enemy bounce/orbit patterns,
 * friendly waypoint patrols) one fixed step along their pattern.
 */
export class PatternSystem extends System {
  public readonly name = 'PatternSystem';

  constructor(sim: ISimulationInstance) {
    super(sim);
  }

  public update(deltaTime: number): void {
    for (const drone of this.world.drones.values()) {
      if (drone.mode !== 'patrolling') continue;

      if (!drone.pattern) {
        setIdle(drone);
        continue;
      }

      const pose = advancePattern(drone, drone.pattern, drone.speed, deltaTime);
      drone.x = pose.x;
      drone.y = pose.y;
      drone.vx = pose.vx;
      drone.vy = pose.vy;
      drone.pattern = pose.pattern;
      this.world.clampToBounds(drone);
    }
  }
}
