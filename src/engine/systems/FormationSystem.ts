import { System } from '../ecs/System';
import type { ISimulationInstance } from '../core/ISimulationInstance';
import { isGroupResolved, type CommandGroup } from '../components/CommandGroup';
import { setIdle } from '../components/Drone';
import { clamp, distance, type Point } from '@/utils/math';
import { debugFormation } from '@/utils/debugLogger';

/**
 * Square grid cells centered on `center`, one per member, filled row by row.
 * cols = ceil(sqrt(count)), rows = ceil(count / cols).
 */
export function computeGridFormation(center: Point, count: number, spacing: number): Point[] {
  if (count <= 0) return [];

  const cols = Math.ceil(Math.sqrt(count));
  const rows = Math.ceil(count / cols);
  const cells: Point[] = [];

  for (let i = 0; i < count; i++) {
    const col = i % cols;
    const row = Math.floor(i / cols);
    cells.push({
      x: center.x + (col - (cols - 1) / 2) * spacing,
      y: center.y + (row - (rows - 1) / 2) * spacing,
    });
  }

  return cells;
}

/**
 * FormationSystem - Synchronized group arrival and grid dispersal.
 *
 * A group waits until every surviving member has reported arrival, then each
 * member is released with its own grid cell as a new move target. A member
 * already within the arrival threshold of its cell goes idle on the spot.
 */
export class FormationSystem extends System {
  public readonly name = 'FormationSystem';

  constructor(sim: ISimulationInstance) {
    super(sim);
  }

  public update(_deltaTime: number): void {
    for (const group of Array.from(this.world.groups.values())) {
      if (group.memberIds.length === 0) {
        this.world.removeGroup(group.id);
        this.sim.eventBus.emit('group:discarded', { groupId: group.id, reason: 'members_destroyed' });
        continue;
      }

      if (isGroupResolved(group)) {
        this.disperse(group);
      }
    }
  }

  private disperse(group: CommandGroup): void {
    const cells = computeGridFormation(group.destination, group.memberIds.length, this.sim.config.formationSpacing);
    const placed: Array<{ droneId: string; x: number; y: number }> = [];

    group.memberIds.forEach((droneId, index) => {
      const drone = this.world.getDrone(droneId);
      const cell = cells[index];
      if (!drone || !cell) return;

      const x = clamp(cell.x, 0, this.world.width);
      const y = clamp(cell.y, 0, this.world.height);
      drone.groupId = null;
      placed.push({ droneId, x, y });

      // Already standing on its cell: nothing left to fly
      if (distance(drone.x, drone.y, x, y) <= this.sim.config.arrivalThreshold) {
        drone.x = x;
        drone.y = y;
        setIdle(drone);
        return;
      }
      drone.target = { x, y };
      drone.mode = 'moving';
    });

    this.world.removeGroup(group.id);
    debugFormation.log(`[FormationSystem] Group ${group.id} dispersed into ${placed.length} cells`);
    this.sim.eventBus.emit('group:dispersed', { tick: this.world.tick, groupId: group.id, cells: placed });
  }
}
