import type { Point } from '@/utils/math';

/**
 * Drones issued a single move command, tracked until every live member has
 * reached the destination. Members only ever leave the group.
 */
export interface CommandGroup {
  id: number;
  /** Insertion-ordered, duplicate-free */
  memberIds: string[];
  destination: Point;
  /** Subset of memberIds that have reached the destination */
  arrivedIds: string[];
}

export function cloneCommandGroup(group: CommandGroup): CommandGroup {
  return {
    id: group.id,
    memberIds: [...group.memberIds],
    destination: { x: group.destination.x, y: group.destination.y },
    arrivedIds: [...group.arrivedIds],
  };
}

export function markArrived(group: CommandGroup, droneId: string): void {
  if (group.memberIds.includes(droneId) && !group.arrivedIds.includes(droneId)) {
    group.arrivedIds.push(droneId);
  }
}

export function removeMember(group: CommandGroup, droneId: string): void {
  group.memberIds = group.memberIds.filter((id) => id !== droneId);
  group.arrivedIds = group.arrivedIds.filter((id) => id !== droneId);
}

/**
 * A group is resolved once every remaining member has arrived.
 * An empty group is never resolved; it is discarded instead.
 */
export function isGroupResolved(group: CommandGroup): boolean {
  if (group.memberIds.length === 0) return false;
  return group.memberIds.every((id) => group.arrivedIds.includes(id));
}
