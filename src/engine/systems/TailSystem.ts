import { System } from '../ecs/System';
import type { ISimulationInstance } from '../core/ISimulationInstance';
import { setIdle } from '../components/Drone';
import { debugTail } from '@/utils/debugLogger';

/**
 * TailSystem - Dead-zone proportional standoff control.
 *
 * Each tailing drone independently closes or opens the gap to its target at
 * full speed along the line between them, and holds still while the error is
 * inside the dead zone. Drones tailing the same target are not deconflicted.
 */
export class TailSystem extends System {
  public readonly name = 'TailSystem';

  constructor(sim: ISimulationInstance) {
    super(sim);
  }

  public update(deltaTime: number): void {
    const { tailDeadZone, defaultTailDistance } = this.sim.config;

    for (const drone of this.world.drones.values()) {
      if (drone.mode !== 'tailing') continue;

      const targetId = drone.tailTargetId;
      const target = targetId !== null ? this.world.getDrone(targetId) : undefined;
      if (!target || targetId === null) {
        debugTail.log(`[TailSystem] ${drone.id} lost its target`);
        setIdle(drone);
        if (targetId !== null) {
          this.sim.eventBus.emit('pursuit:lost', { tick: this.world.tick, droneId: drone.id, targetId });
        }
        continue;
      }

      const dx = target.x - drone.x;
      const dy = target.y - drone.y;
      const distance = Math.sqrt(dx * dx + dy * dy);
      const error = distance - (drone.tailDistance ?? defaultTailDistance);

      // Coincident positions give no direction to move in
      if (Math.abs(error) <= tailDeadZone || distance === 0) {
        drone.vx = 0;
        drone.vy = 0;
        continue;
      }

      // Toward the target when too far, away when too close
      const sign = error > 0 ? 1 : -1;
      drone.vx = sign * (dx / distance) * drone.speed;
      drone.vy = sign * (dy / distance) * drone.speed;
      drone.x += drone.vx * deltaTime;
      drone.y += drone.vy * deltaTime;
      this.world.clampToBounds(drone);
    }
  }
}
