import { describe, it, expect, beforeEach } from 'vitest';
import { PatternSystem } from '@/engine/systems/PatternSystem';
import { World } from '@/engine/ecs/World';
import { EventBus } from '@/engine/core/EventBus';
import { createDrone } from '@/engine/components/Drone';
import { DEFAULT_SIMULATION_CONFIG } from '@/data/simulation.config';

describe('PatternSystem', () => {
  const config = DEFAULT_SIMULATION_CONFIG;
  let world: World;
  let system: PatternSystem;

  beforeEach(() => {
    world = new World({ dt: config.dt, width: config.worldWidth, height: config.worldHeight });
    system = new PatternSystem({ eventBus: new EventBus(), config });
    world.addSystem(system);
  });

  it('advances patrolling drones along their pattern', () => {
    const enemy = world.addDrone(
      createDrone({
        id: 'enemy_1',
        team: 'enemy',
        x: 100,
        y: 700,
        speed: 40,
        radius: 8,
        pattern: { kind: 'bounce', axis: 'x', min: 100, max: 900, direction: 1 },
      })
    );

    for (let i = 0; i < 25; i++) system.update(config.dt);

    expect(enemy.mode).toBe('patrolling');
    expect(enemy.x).toBeCloseTo(120);
    expect(enemy.y).toBe(700);
    expect(enemy.vx).toBe(40);
  });

  it('keeps patterns that leave the world inside its bounds', () => {
    const enemy = world.addDrone(
      createDrone({
        id: 'enemy_1',
        team: 'enemy',
        x: 995,
        y: 500,
        speed: 400,
        radius: 8,
        pattern: { kind: 'bounce', axis: 'x', min: 0, max: 2000, direction: 1 },
      })
    );

    system.update(config.dt);

    expect(enemy.x).toBe(1000);
  });

  it('leaves drones in other modes alone', () => {
    const friendly = world.addDrone(createDrone({ id: 'drone_1', team: 'friendly', x: 10, y: 10, speed: 200, radius: 8 }));
    friendly.mode = 'holding';

    system.update(config.dt);

    expect(friendly).toMatchObject({ x: 10, y: 10, mode: 'holding' });
  });

  it('idles a patrolling drone without a pattern', () => {
    const friendly = world.addDrone(createDrone({ id: 'drone_1', team: 'friendly', x: 10, y: 10, speed: 200, radius: 8 }));
    friendly.mode = 'patrolling';

    system.update(config.dt);

    expect(friendly.mode).toBe('idle');
  });
});
