import { System } from '../ecs/System';
import type { ISimulationInstance } from '../core/ISimulationInstance';
import type { Drone } from '../components/Drone';
import { distance } from '@/utils/math';
import { debugCombat } from '@/utils/debugLogger';

export interface CollisionPair {
  friendly: Drone;
  enemy: Drone;
  distance: number;
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Every (friendly, enemy) pair closer than the sum of their radii, nearest
 * first; equal distances are ordered by friendly id, then enemy id.
 */
export function findCollisionPairs(friendlies: Drone[], enemies: Drone[]): CollisionPair[] {
  const pairs: CollisionPair[] = [];

  for (const friendly of friendlies) {
    for (const enemy of enemies) {
      const gap = distance(friendly.x, friendly.y, enemy.x, enemy.y);
      if (gap < friendly.radius + enemy.radius) {
        pairs.push({ friendly, enemy, distance: gap });
      }
    }
  }

  pairs.sort(
    (a, b) =>
      a.distance - b.distance ||
      compareIds(a.friendly.id, b.friendly.id) ||
      compareIds(a.enemy.id, b.enemy.id)
  );
  return pairs;
}

/**
 * Credit each colliding drone to its nearest qualifying opponent.
 * Iteration order of the returned map is the destruction order.
 */
export function assignCollisionCredit(pairs: CollisionPair[]): Map<string, string> {
  const credit = new Map<string, string>();
  for (const pair of pairs) {
    if (!credit.has(pair.friendly.id)) credit.set(pair.friendly.id, pair.enemy.id);
    if (!credit.has(pair.enemy.id)) credit.set(pair.enemy.id, pair.friendly.id);
  }
  return credit;
}

/**
 * CollisionSystem - Destructive friendly/enemy proximity collisions.
 *
 * Detection completes over the post-movement positions before anything is
 * removed. Every drone in any qualifying pair is destroyed exactly once,
 * however many opponents it touched.
 */
export class CollisionSystem extends System {
  public readonly name = 'CollisionSystem';

  constructor(sim: ISimulationInstance) {
    super(sim);
  }

  public update(_deltaTime: number): void {
    const pairs = findCollisionPairs(
      this.world.getDronesByTeam('friendly'),
      this.world.getDronesByTeam('enemy')
    );
    if (pairs.length === 0) return;

    const tick = this.world.tick;
    for (const pair of pairs) {
      this.sim.eventBus.emit('collision:pair', {
        tick,
        friendlyId: pair.friendly.id,
        enemyId: pair.enemy.id,
        distance: pair.distance,
      });
    }

    const credit = assignCollisionCredit(pairs);
    for (const [droneId, creditedTo] of credit) {
      const result = this.world.destroyDrone(droneId);
      if (!result) continue;

      debugCombat.log(`[CollisionSystem] ${droneId} destroyed by ${creditedTo} at tick ${tick}`);
      this.sim.eventBus.emit('drone:destroyed', {
        tick,
        droneId,
        team: result.drone.team,
        position: { x: result.drone.x, y: result.drone.y },
        creditedTo,
      });

      for (const groupId of result.discardedGroupIds) {
        this.sim.eventBus.emit('group:discarded', { groupId, reason: 'members_destroyed' });
      }
      for (const orphanId of result.orphanedIds) {
        if (credit.has(orphanId)) continue;
        this.sim.eventBus.emit('pursuit:lost', { tick, droneId: orphanId, targetId: droneId });
      }
    }
  }
}
