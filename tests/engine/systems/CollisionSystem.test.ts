import { describe, it, expect, beforeEach } from 'vitest';
import { CollisionSystem, assignCollisionCredit, findCollisionPairs } from '@/engine/systems/CollisionSystem';
import { World } from '@/engine/ecs/World';
import { EventBus } from '@/engine/core/EventBus';
import { createDrone, type Drone, type Team } from '@/engine/components/Drone';
import { DEFAULT_SIMULATION_CONFIG } from '@/data/simulation.config';
import type { SimulationEventName } from '@/engine/core/SimulationEvents';

function drone(id: string, team: Team, x: number, y: number): Drone {
  return createDrone({ id, team, x, y, speed: team === 'friendly' ? 200 : 40, radius: 8 });
}

describe('findCollisionPairs', () => {
  it('pairs drones closer than the sum of their radii, nearest first', () => {
    const pairs = findCollisionPairs(
      [drone('drone_1', 'friendly', 100, 100), drone('drone_2', 'friendly', 200, 200)],
      [drone('enemy_1', 'enemy', 110, 100), drone('enemy_2', 'enemy', 100, 105), drone('enemy_3', 'enemy', 300, 300)]
    );

    expect(pairs.map((p) => [p.friendly.id, p.enemy.id, p.distance])).toEqual([
      ['drone_1', 'enemy_2', 5],
      ['drone_1', 'enemy_1', 10],
    ]);
  });

  it('does not count touching drones', () => {
    expect(findCollisionPairs([drone('drone_1', 'friendly', 0, 0)], [drone('enemy_1', 'enemy', 16, 0)])).toEqual([]);
  });

  it('orders equal distances by friendly id, then enemy id', () => {
    const pairs = findCollisionPairs(
      [drone('drone_b', 'friendly', 20, 0), drone('drone_a', 'friendly', 0, 0)],
      [drone('enemy_1', 'enemy', 10, 0)]
    );

    expect(pairs.map((p) => p.friendly.id)).toEqual(['drone_a', 'drone_b']);
  });
});

describe('assignCollisionCredit', () => {
  it('credits every drone once, to its nearest opponent', () => {
    const pairs = findCollisionPairs(
      [drone('drone_a', 'friendly', 0, 0), drone('drone_b', 'friendly', 20, 0)],
      [drone('enemy_1', 'enemy', 10, 0)]
    );

    expect([...assignCollisionCredit(pairs)]).toEqual([
      ['drone_a', 'enemy_1'],
      ['enemy_1', 'drone_a'],
      ['drone_b', 'enemy_1'],
    ]);
  });
});

describe('CollisionSystem', () => {
  const config = DEFAULT_SIMULATION_CONFIG;
  let world: World;
  let system: CollisionSystem;
  let events: Array<[SimulationEventName, string]>;

  beforeEach(() => {
    const eventBus = new EventBus();
    world = new World({ dt: config.dt, width: config.worldWidth, height: config.worldHeight });
    system = new CollisionSystem({ eventBus, config });
    world.addSystem(system);
    world.tick = 12;

    events = [];
    eventBus.on('collision:pair', (d) => events.push(['collision:pair', `${d.friendlyId}/${d.enemyId}`]));
    eventBus.on('drone:destroyed', (d) => events.push(['drone:destroyed', `${d.droneId}<-${d.creditedTo}`]));
    eventBus.on('group:discarded', (d) => events.push(['group:discarded', `${d.groupId}:${d.reason}`]));
    eventBus.on('pursuit:lost', (d) => events.push(['pursuit:lost', `${d.droneId}->${d.targetId}`]));
  });

  it('destroys every drone in a qualifying pair exactly once', () => {
    world.addDrone(drone('drone_1', 'friendly', 100, 100));
    world.addDrone(drone('enemy_1', 'enemy', 110, 100));
    world.addDrone(drone('enemy_2', 'enemy', 100, 105));
    world.addDrone(drone('drone_2', 'friendly', 500, 500));

    system.update(config.dt);

    expect(events).toEqual([
      ['collision:pair', 'drone_1/enemy_2'],
      ['collision:pair', 'drone_1/enemy_1'],
      ['drone:destroyed', 'drone_1<-enemy_2'],
      ['drone:destroyed', 'enemy_2<-drone_1'],
      ['drone:destroyed', 'enemy_1<-drone_1'],
    ]);
    expect([...world.drones.keys()]).toEqual(['drone_2']);
  });

  it('discards an emptied group and releases pursuers of destroyed drones', () => {
    world.addDrone(drone('drone_1', 'friendly', 100, 100));
    world.addDrone(drone('enemy_1', 'enemy', 104, 100));
    const chaser = world.addDrone(drone('drone_2', 'friendly', 800, 800));
    chaser.mode = 'intercepting';
    chaser.interceptTargetId = 'enemy_1';
    world.createGroup({ x: 300, y: 300 }, ['drone_1']);

    system.update(config.dt);

    expect(events).toEqual([
      ['collision:pair', 'drone_1/enemy_1'],
      ['drone:destroyed', 'drone_1<-enemy_1'],
      ['group:discarded', '1:members_destroyed'],
      ['drone:destroyed', 'enemy_1<-drone_1'],
      ['pursuit:lost', 'drone_2->enemy_1'],
    ]);
    expect(chaser.mode).toBe('idle');
    expect(world.groups.size).toBe(0);
  });

  it('leaves distant drones alone', () => {
    world.addDrone(drone('drone_1', 'friendly', 100, 100));
    world.addDrone(drone('enemy_1', 'enemy', 200, 100));

    system.update(config.dt);

    expect(events).toEqual([]);
    expect(world.drones.size).toBe(2);
  });
});
