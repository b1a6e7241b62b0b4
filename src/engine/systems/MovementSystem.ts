import { System } from '../ecs/System';
import type { ISimulationInstance } from '../core/ISimulationInstance';
import { setIdle, type Drone } from '../components/Drone';
import { markArrived } from '../components/CommandGroup';
import { debugMovement } from '@/utils/debugLogger';

/**
 * MovementSystem - Constant-speed flight to an assigned target.
 *
 * Handles `moving` and `returning` drones and keeps `idle`/`holding` drones
 * at rest. There is no deceleration: a drone flies at full speed until it is
 * within the arrival threshold, then snaps onto the target, so it can
 * overshoot by up to speed * dt - threshold.
 */
export class MovementSystem extends System {
  public readonly name = 'MovementSystem';

  constructor(sim: ISimulationInstance) {
    super(sim);
  }

  public update(deltaTime: number): void {
    for (const drone of this.world.drones.values()) {
      switch (drone.mode) {
        case 'moving':
        case 'returning':
          this.advance(drone, deltaTime);
          break;
        case 'idle':
        case 'holding':
          drone.vx = 0;
          drone.vy = 0;
          break;
        default:
          break;
      }
    }
  }

  private advance(drone: Drone, deltaTime: number): void {
    const target = drone.target;
    if (!target) {
      this.world.leaveGroup(drone);
      setIdle(drone);
      return;
    }

    const dx = target.x - drone.x;
    const dy = target.y - drone.y;
    const distance = Math.sqrt(dx * dx + dy * dy);

    if (distance <= this.sim.config.arrivalThreshold) {
      drone.x = target.x;
      drone.y = target.y;
      drone.vx = 0;
      drone.vy = 0;
      this.arrive(drone);
      return;
    }

    drone.vx = (dx / distance) * drone.speed;
    drone.vy = (dy / distance) * drone.speed;
    drone.x += drone.vx * deltaTime;
    drone.y += drone.vy * deltaTime;
    this.world.clampToBounds(drone);
  }

  /**
   * A grouped drone reports to its group and keeps `moving` until the whole
   * group has arrived; anyone else goes idle.
   */
  private arrive(drone: Drone): void {
    const group = drone.mode === 'moving' && drone.groupId !== null
      ? this.world.getGroup(drone.groupId)
      : undefined;

    if (group) {
      if (group.arrivedIds.includes(drone.id)) return;
      markArrived(group, drone.id);
      debugMovement.log(`[MovementSystem] ${drone.id} arrived with group ${group.id} (${group.arrivedIds.length}/${group.memberIds.length})`);
      this.sim.eventBus.emit('drone:arrived', {
        droneId: drone.id,
        tick: this.world.tick,
        groupId: group.id,
        position: { x: drone.x, y: drone.y },
      });
      return;
    }

    this.world.leaveGroup(drone);
    setIdle(drone);
    debugMovement.log(`[MovementSystem] ${drone.id} arrived at (${drone.x.toFixed(1)}, ${drone.y.toFixed(1)})`);
    this.sim.eventBus.emit('drone:arrived', {
      droneId: drone.id,
      tick: this.world.tick,
      groupId: null,
      position: { x: drone.x, y: drone.y },
    });
  }
}
