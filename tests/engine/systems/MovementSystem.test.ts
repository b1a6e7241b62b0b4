import { describe, it, expect, beforeEach } from 'vitest';
import { MovementSystem } from '@/engine/systems/MovementSystem';
import { World } from '@/engine/ecs/World';
import { EventBus } from '@/engine/core/EventBus';
import { createDrone, type Drone } from '@/engine/components/Drone';
import { DEFAULT_SIMULATION_CONFIG } from '@/data/simulation.config';
import type { DroneArrivedEventData } from '@/engine/core/SimulationEvents';

describe('MovementSystem', () => {
  const config = DEFAULT_SIMULATION_CONFIG;
  let world: World;
  let system: MovementSystem;
  let arrivals: DroneArrivedEventData[];

  function addFriendly(id: string, x: number, y: number): Drone {
    return world.addDrone(createDrone({ id, team: 'friendly', x, y, speed: 200, radius: 8 }));
  }

  function run(ticks: number): void {
    for (let i = 0; i < ticks; i++) {
      world.tick++;
      system.update(config.dt);
    }
  }

  beforeEach(() => {
    const eventBus = new EventBus();
    world = new World({ dt: config.dt, width: config.worldWidth, height: config.worldHeight });
    system = new MovementSystem({ eventBus, config });
    world.addSystem(system);
    arrivals = [];
    eventBus.on('drone:arrived', (data) => arrivals.push(data));
  });

  it('flies at constant speed toward the target', () => {
    const d = addFriendly('drone_1', 0, 0);
    d.mode = 'moving';
    d.target = { x: 400, y: 0 };

    run(50);

    expect(d.x).toBe(200);
    expect(d.y).toBe(0);
    expect(d.vx).toBe(200);
    expect(d.mode).toBe('moving');
  });

  it('snaps onto the target and goes idle exactly on the arrival tick', () => {
    const d = addFriendly('drone_1', 0, 0);
    d.mode = 'moving';
    d.target = { x: 400, y: 0 };

    run(99);
    expect(d.mode).toBe('moving');
    expect(d.x).toBe(396);

    run(1);
    expect(d.mode).toBe('idle');
    expect(d).toMatchObject({ x: 400, y: 0, vx: 0, vy: 0, target: null });
    expect(arrivals).toEqual([{ droneId: 'drone_1', tick: 100, groupId: null, position: { x: 400, y: 0 } }]);
  });

  it('keeps a grouped drone moving until its group resolves', () => {
    const d = addFriendly('drone_1', 497, 500);
    addFriendly('drone_2', 0, 0);
    const { group } = world.createGroup({ x: 500, y: 500 }, ['drone_1', 'drone_2']);
    d.mode = 'moving';
    d.target = { x: 500, y: 500 };

    run(3);

    expect(d.mode).toBe('moving');
    expect(d.x).toBe(500);
    expect(group.arrivedIds).toEqual(['drone_1']);
    expect(arrivals).toHaveLength(1);
    expect(arrivals[0].groupId).toBe(group.id);
  });

  it('flies returning drones the same way', () => {
    const d = addFriendly('drone_1', 0, 0);
    d.mode = 'returning';
    d.target = { x: 0, y: 3 };

    run(1);

    expect(d.mode).toBe('idle');
    expect(d.y).toBe(3);
  });

  it('idles a moving drone that has no target', () => {
    const d = addFriendly('drone_1', 10, 10);
    d.mode = 'moving';

    run(1);

    expect(d.mode).toBe('idle');
    expect(arrivals).toEqual([]);
  });

  it('holds idle and holding drones still', () => {
    const idle = addFriendly('drone_1', 10, 10);
    const holding = addFriendly('drone_2', 20, 20);
    idle.vx = 5;
    holding.mode = 'holding';
    holding.vy = 5;

    run(1);

    expect(idle).toMatchObject({ x: 10, y: 10, vx: 0, vy: 0 });
    expect(holding).toMatchObject({ x: 20, y: 20, vx: 0, vy: 0, mode: 'holding' });
  });
});
