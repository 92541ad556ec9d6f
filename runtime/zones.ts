/**
 * Raid room entry detection from template positions
 */
import { Position } from '../spec/types';
import {
  BLOAT_ZONE,
  BOSS_ROOM_ZONES,
  NYLOCAS_ZONE,
  SOTETSEG_ZONE,
  VERZIK_ZONE,
  XARPUS_ZONE,
} from '../spec/constants';

/**
 * Axis-aligned tile range. A player standing inside it has walked through
 * the room's barrier.
 */
export interface Barrier {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

/**
 * Rooms whose region includes a hallway before the fight area
 */
export const ROOM_BARRIERS: ReadonlyMap<number, Barrier> = new Map([
  [BLOAT_ZONE, { minX: Number.NEGATIVE_INFINITY, maxX: 3303, minY: 4446, maxY: 4449 }],
  [NYLOCAS_ZONE, { minX: 3295, maxX: 3296, minY: 4254, maxY: 4254 }],
  [SOTETSEG_ZONE, { minX: 3278, maxX: 3281, minY: 4308, maxY: 4308 }],
  [XARPUS_ZONE, { minX: 3169, maxX: 3171, minY: 4380, maxY: 4380 }],
]);

/**
 * Rooms entered through a spawn or dialogue instead of a region or barrier check
 */
const SIGNAL_ENTRY_ZONES: ReadonlySet<number> = new Set([VERZIK_ZONE]);

export function isBossRoomZone(zoneId: number | null): boolean {
  return zoneId !== null && BOSS_ROOM_ZONES.has(zoneId);
}

/**
 * Boss rooms where arriving in the region is the same as starting the fight
 */
export function isZoneEntryRoom(zoneId: number): boolean {
  return BOSS_ROOM_ZONES.has(zoneId) && !ROOM_BARRIERS.has(zoneId) && !SIGNAL_ENTRY_ZONES.has(zoneId);
}

export function isOnBarrier(position: Position): boolean {
  const barrier = ROOM_BARRIERS.get(position.zoneId);
  if (!barrier) {
    return false;
  }
  return (
    position.x >= barrier.minX &&
    position.x <= barrier.maxX &&
    position.y >= barrier.minY &&
    position.y <= barrier.maxY
  );
}
