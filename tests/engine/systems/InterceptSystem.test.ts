import { describe, it, expect, beforeEach } from 'vitest';
import { InterceptSystem } from '@/engine/systems/InterceptSystem';
import { World } from '@/engine/ecs/World';
import { EventBus } from '@/engine/core/EventBus';
import { createDrone, type Drone } from '@/engine/components/Drone';
import { DEFAULT_SIMULATION_CONFIG } from '@/data/simulation.config';
import type {
  InterceptInfeasibleEventData,
  InterceptPlannedEventData,
  PursuitLostEventData,
} from '@/engine/core/SimulationEvents';

describe('InterceptSystem', () => {
  const config = DEFAULT_SIMULATION_CONFIG;
  let world: World;
  let system: InterceptSystem;
  let planned: InterceptPlannedEventData[];
  let infeasible: InterceptInfeasibleEventData[];
  let lost: PursuitLostEventData[];

  function interceptor(targetId: string): Drone {
    const d = world.addDrone(createDrone({ id: 'drone_1', team: 'friendly', x: 300, y: 50, speed: 200, radius: 8 }));
    d.mode = 'intercepting';
    d.interceptTargetId = targetId;
    return d;
  }

  function bouncingEnemy(): Drone {
    return world.addDrone(
      createDrone({
        id: 'enemy_1',
        team: 'enemy',
        x: 100,
        y: 50,
        speed: 40,
        radius: 8,
        pattern: { kind: 'bounce', axis: 'x', min: 100, max: 900, direction: 1 },
      })
    );
  }

  function tick(): void {
    world.tick++;
    system.update(config.dt);
  }

  beforeEach(() => {
    const eventBus = new EventBus();
    world = new World({ dt: config.dt, width: config.worldWidth, height: config.worldHeight });
    system = new InterceptSystem({ eventBus, config });
    world.addSystem(system);

    planned = [];
    infeasible = [];
    lost = [];
    eventBus.on('intercept:planned', (data) => planned.push(data));
    eventBus.on('intercept:infeasible', (data) => infeasible.push(data));
    eventBus.on('pursuit:lost', (data) => lost.push(data));
  });

  it('plans a rendezvous ahead of the target and flies toward it', () => {
    bouncingEnemy();
    const d = interceptor('enemy_1');

    tick();

    expect(planned).toHaveLength(1);
    expect(planned[0]).toMatchObject({ tick: 1, droneId: 'drone_1', targetId: 'enemy_1', samples: 9 });
    expect(planned[0].point.x).toBeCloseTo(132);
    expect(planned[0].eta).toBeCloseTo(0.82);
    expect(d.interceptPoint?.x).toBeCloseTo(132);
    expect(d.x).toBe(296);
    expect(d.vx).toBe(-200);
  });

  it('keeps the cached plan while the prediction holds', () => {
    bouncingEnemy();
    interceptor('enemy_1');

    tick();
    tick();
    tick();

    expect(planned).toHaveLength(1);
  });

  it('replans when the target drifts from the prediction', () => {
    const enemy = bouncingEnemy();
    interceptor('enemy_1');

    tick();
    enemy.x = 600;
    tick();

    expect(planned).toHaveLength(2);
    expect(planned[1].point.x).toBeGreaterThan(600);
  });

  it('chases the current position and retries later when no rendezvous exists', () => {
    const enemy = world.addDrone(createDrone({ id: 'enemy_1', team: 'enemy', x: 400, y: 50, speed: 40, radius: 8 }));
    enemy.vx = 500;
    const d = interceptor('enemy_1');

    tick();
    expect(infeasible).toEqual([{ tick: 1, droneId: 'drone_1', targetId: 'enemy_1', samples: 300 }]);
    expect(d.interceptRetryTick).toBe(26);
    expect(d.x).toBe(304);

    tick();
    expect(infeasible).toHaveLength(1);

    world.tick = 25;
    tick();
    expect(infeasible).toHaveLength(2);
  });

  it('goes idle when the target no longer exists', () => {
    const d = interceptor('enemy_9');

    tick();

    expect(d.mode).toBe('idle');
    expect(d.interceptTargetId).toBeNull();
    expect(lost).toEqual([{ tick: 1, droneId: 'drone_1', targetId: 'enemy_9' }]);
  });
});
