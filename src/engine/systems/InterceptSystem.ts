import { System } from '../ecs/System';
import type { ISimulationInstance } from '../core/ISimulationInstance';
import { setIdle, type Drone } from '../components/Drone';
import { InterceptPlanner, predictPosition } from '../combat/InterceptPlanner';
import { distanceXY, type Point } from '@/utils/math';
import { debugIntercept } from '@/utils/debugLogger';

/**
 * InterceptSystem - Flies intercepting drones to a cached rendezvous point.
 *
 * Replan triggers:
 * - no cached point (just entered intercept mode);
 * - the target's predicted position at the cached ETA drifted more than the
 *   drift threshold from the cached point;
 * - the cached ETA is more than one planner step in the past.
 *
 * With no feasible rendezvous inside the horizon the drone chases the
 * target's current position and retries the planner every
 * `interceptRetryTicks` ticks.
 */
export class InterceptSystem extends System {
  public readonly name = 'InterceptSystem';

  private planner: InterceptPlanner;

  constructor(sim: ISimulationInstance) {
    super(sim);
    this.planner = new InterceptPlanner({
      horizon: sim.config.interceptHorizon,
      step: sim.config.interceptStep,
    });
  }

  public update(deltaTime: number): void {
    for (const drone of this.world.drones.values()) {
      if (drone.mode !== 'intercepting') continue;

      const targetId = drone.interceptTargetId;
      const target = targetId !== null ? this.world.getDrone(targetId) : undefined;
      if (!target || targetId === null) {
        setIdle(drone);
        if (targetId !== null) {
          this.sim.eventBus.emit('pursuit:lost', { tick: this.world.tick, droneId: drone.id, targetId });
        }
        continue;
      }

      if (this.needsPlan(drone, target)) {
        this.replan(drone, target);
      }

      this.fly(drone, drone.interceptPoint ?? { x: target.x, y: target.y }, deltaTime);
    }
  }

  private needsPlan(drone: Drone, target: Drone): boolean {
    const point = drone.interceptPoint;
    const eta = drone.interceptEta;

    if (point === null || eta === null) {
      // Waiting out the retry interval after a failed plan
      return drone.interceptRetryTick === null || this.world.tick >= drone.interceptRetryTick;
    }

    const remaining = eta - this.world.getTime();
    if (remaining < -this.sim.config.interceptStep) {
      return true;
    }

    const predicted = predictPosition(target, Math.max(0, remaining));
    return distanceXY(predicted, point) > this.sim.config.interceptDriftThreshold;
  }

  private replan(drone: Drone, target: Drone): void {
    const plan = this.planner.plan(drone, target);

    if (plan.feasible) {
      drone.interceptPoint = plan.point;
      drone.interceptEta = this.world.getTime() + plan.time;
      drone.interceptRetryTick = null;
      debugIntercept.log(
        `[InterceptSystem] ${drone.id} -> ${target.id}: rendezvous (${plan.point.x.toFixed(1)}, ${plan.point.y.toFixed(1)}) in ${plan.time.toFixed(2)}s`
      );
      this.sim.eventBus.emit('intercept:planned', {
        tick: this.world.tick,
        droneId: drone.id,
        targetId: target.id,
        point: { x: plan.point.x, y: plan.point.y },
        eta: drone.interceptEta,
        samples: plan.samples,
      });
      return;
    }

    drone.interceptPoint = null;
    drone.interceptEta = null;
    drone.interceptRetryTick = this.world.tick + this.sim.config.interceptRetryTicks;
    debugIntercept.warn(`[InterceptSystem] ${drone.id} -> ${target.id}: no rendezvous within horizon, chasing`);
    this.sim.eventBus.emit('intercept:infeasible', {
      tick: this.world.tick,
      droneId: drone.id,
      targetId: target.id,
      samples: plan.samples,
    });
  }

  /**
   * Constant-speed flight toward `destination`; inside the arrival threshold
   * the drone snaps onto it and waits.
   */
  private fly(drone: Drone, destination: Point, deltaTime: number): void {
    const dx = destination.x - drone.x;
    const dy = destination.y - drone.y;
    const distance = Math.sqrt(dx * dx + dy * dy);

    if (distance <= this.sim.config.arrivalThreshold) {
      drone.x = destination.x;
      drone.y = destination.y;
      drone.vx = 0;
      drone.vy = 0;
      return;
    }

    drone.vx = (dx / distance) * drone.speed;
    drone.vy = (dy / distance) * drone.speed;
    drone.x += drone.vx * deltaTime;
    drone.y += drone.vy * deltaTime;
    this.world.clampToBounds(drone);
  }
}
