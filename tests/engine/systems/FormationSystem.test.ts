import { describe, it, expect, beforeEach } from 'vitest';
import { FormationSystem, computeGridFormation } from '@/engine/systems/FormationSystem';
import { World } from '@/engine/ecs/World';
import { EventBus } from '@/engine/core/EventBus';
import { createDrone } from '@/engine/components/Drone';
import { markArrived } from '@/engine/components/CommandGroup';
import { DEFAULT_SIMULATION_CONFIG } from '@/data/simulation.config';
import type { GroupDiscardedEventData, GroupDispersedEventData } from '@/engine/core/SimulationEvents';

describe('computeGridFormation', () => {
  it('lays four members out on a 2x2 grid centered on the destination', () => {
    expect(computeGridFormation({ x: 100, y: 100 }, 4, 16)).toEqual([
      { x: 92, y: 92 },
      { x: 108, y: 92 },
      { x: 92, y: 108 },
      { x: 108, y: 108 },
    ]);
  });

  it('uses ceil(sqrt(n)) columns and fills rows in order', () => {
    expect(computeGridFormation({ x: 100, y: 100 }, 5, 16)).toEqual([
      { x: 84, y: 92 },
      { x: 100, y: 92 },
      { x: 116, y: 92 },
      { x: 84, y: 108 },
      { x: 100, y: 108 },
    ]);
  });

  it('returns no cells for an empty group', () => {
    expect(computeGridFormation({ x: 0, y: 0 }, 0, 16)).toEqual([]);
  });
});

describe('FormationSystem', () => {
  const config = DEFAULT_SIMULATION_CONFIG;
  let world: World;
  let system: FormationSystem;
  let dispersed: GroupDispersedEventData[];
  let discarded: GroupDiscardedEventData[];

  function addAt(id: string, x: number, y: number) {
    const d = world.addDrone(createDrone({ id, team: 'friendly', x, y, speed: 200, radius: 8 }));
    d.mode = 'moving';
    d.target = { x, y };
    return d;
  }

  beforeEach(() => {
    const eventBus = new EventBus();
    world = new World({ dt: config.dt, width: config.worldWidth, height: config.worldHeight });
    system = new FormationSystem({ eventBus, config });
    world.addSystem(system);
    world.tick = 40;

    dispersed = [];
    discarded = [];
    eventBus.on('group:dispersed', (data) => dispersed.push(data));
    eventBus.on('group:discarded', (data) => discarded.push(data));
  });

  it('waits until every member has arrived', () => {
    addAt('drone_1', 500, 500);
    addAt('drone_2', 300, 300);
    const { group } = world.createGroup({ x: 500, y: 500 }, ['drone_1', 'drone_2']);
    markArrived(group, 'drone_1');

    system.update(config.dt);

    expect(world.getGroup(group.id)).toBeDefined();
    expect(dispersed).toEqual([]);
  });

  it('disperses a resolved group into individual grid targets', () => {
    const first = addAt('drone_1', 500, 500);
    const second = addAt('drone_2', 500, 500);
    const { group } = world.createGroup({ x: 500, y: 500 }, ['drone_1', 'drone_2']);
    markArrived(group, 'drone_1');
    markArrived(group, 'drone_2');

    system.update(config.dt);

    expect(world.getGroup(group.id)).toBeUndefined();
    expect(first).toMatchObject({ mode: 'moving', groupId: null, target: { x: 492, y: 500 } });
    expect(second).toMatchObject({ mode: 'moving', groupId: null, target: { x: 508, y: 500 } });
    expect(dispersed).toEqual([
      {
        tick: 40,
        groupId: group.id,
        cells: [
          { droneId: 'drone_1', x: 492, y: 500 },
          { droneId: 'drone_2', x: 508, y: 500 },
        ],
      },
    ]);
  });

  it('idles a lone member already standing on its cell', () => {
    const d = addAt('drone_1', 400, 0);
    const { group } = world.createGroup({ x: 400, y: 0 }, ['drone_1']);
    markArrived(group, 'drone_1');

    system.update(config.dt);

    expect(d).toMatchObject({ mode: 'idle', groupId: null, target: null, x: 400, y: 0 });
  });

  it('clamps cells near the world edge into bounds', () => {
    addAt('drone_1', 1000, 1000);
    addAt('drone_2', 1000, 1000);
    const { group } = world.createGroup({ x: 1000, y: 1000 }, ['drone_1', 'drone_2']);
    markArrived(group, 'drone_1');
    markArrived(group, 'drone_2');

    system.update(config.dt);

    expect(dispersed[0].cells).toEqual([
      { droneId: 'drone_1', x: 992, y: 1000 },
      { droneId: 'drone_2', x: 1000, y: 1000 },
    ]);
  });

  it('discards a group with no members left', () => {
    addAt('drone_1', 0, 0);
    const { group } = world.createGroup({ x: 10, y: 10 }, ['drone_1']);
    group.memberIds = [];

    system.update(config.dt);

    expect(discarded).toEqual([{ groupId: group.id, reason: 'members_destroyed' }]);
    expect(world.groups.size).toBe(0);
  });
});
