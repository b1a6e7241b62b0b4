import type { Drone } from '../components/Drone';
import { advancePattern } from '../components/Pattern';
import { distanceXY, type Point } from '@/utils/math';

export interface InterceptPlannerOptions {
  /** Seconds of target trajectory searched */
  horizon: number;
  /** Seconds between samples */
  step: number;
}

export type InterceptPlan =
  | {
      feasible: true;
      point: Point;
      /** Seconds from now until the rendezvous */
      time: number;
      samples: number;
    }
  | {
      feasible: false;
      samples: number;
    };

/** Anything that can fly to a point: a position and a speed */
export interface Pursuer {
  x: number;
  y: number;
  speed: number;
}

/**
 * Where `target` will be `t` seconds from now.
 * Patrolling drones follow their pattern; anything else is extrapolated
 * along its current velocity (a stationary drone stays put).
 */
export function predictPosition(target: Drone, t: number): Point {
  if (target.mode === 'patrolling' && target.pattern) {
    const pose = advancePattern(target, target.pattern, target.speed, t);
    return { x: pose.x, y: pose.y };
  }
  return { x: target.x + target.vx * t, y: target.y + target.vy * t };
}

/**
 * InterceptPlanner - Brute-force search for the earliest feasible rendezvous.
 *
 * Samples the target's predicted trajectory at t = i * step, i in
 * [0, horizon / step), and accepts the first sample the pursuer can reach in time (flight time <= t + step).
 * O(horizon / step) per plan.
 */
export class InterceptPlanner {
  private readonly horizon: number;
  private readonly step: number;

  constructor(options: InterceptPlannerOptions) {
    if (!(options.step > 0)) {
      throw new Error(`InterceptPlanner: step must be positive, got ${options.step}`);
    }
    this.horizon = options.horizon;
    this.step = options.step;
  }

  public getSampleCount(): number {
    return Math.max(0, Math.round(this.horizon / this.step));
  }

  public plan(pursuer: Pursuer, target: Drone): InterceptPlan {
    const sampleCount = this.getSampleCount();

    for (let i = 0; i < sampleCount; i++) {
      const t = i * this.step;
      const point = predictPosition(target, t);
      const gap = distanceXY(pursuer, point);
      const needed = gap === 0 ? 0 : gap / pursuer.speed;

      if (needed <= t + this.step) {
        return { feasible: true, point, time: t, samples: i + 1 };
      }
    }

    return { feasible: false, samples: sampleCount };
  }
}
