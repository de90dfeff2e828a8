/**
 * Room & Furniture Module
 *
 * Operations on individual rooms: derived areas, openings and furniture
 * placement. Furniture is only read by the space-efficiency score; nothing
 * here tries to optimize it.
 */

import { Furniture, Room, RoomType, Orientation } from './types';
import { Point, Rectangle } from '../types/geometry';
import {
  copyRectangle,
  rectangleArea,
  rectangleContains,
  rectanglesIntersect
} from '../geometry/rectangle';

// ============================================================================
// Furniture
// ============================================================================

export interface FurnitureOptions {
  canRotate?: boolean;
  category?: string;
}

export function createFurniture(
  name: string,
  width: number,
  height: number,
  options: FurnitureOptions = {}
): Furniture {
  return {
    name,
    width,
    height,
    canRotate: options.canRotate ?? true,
    category: options.category ?? 'general',
    position: { x: 0, y: 0 },
    isRotated: false,
    isPlaced: false
  };
}

/**
 * Width of the furniture footprint taking rotation into account
 */
export function furnitureCurrentWidth(item: Furniture): number {
  return item.isRotated ? item.height : item.width;
}

/**
 * Height of the furniture footprint taking rotation into account
 */
export function furnitureCurrentHeight(item: Furniture): number {
  return item.isRotated ? item.width : item.height;
}

/**
 * Toggles rotation in place. No-op for items that cannot rotate.
 */
export function rotateFurniture(item: Furniture): void {
  if (item.canRotate) {
    item.isRotated = !item.isRotated;
  }
}

export function furnitureBounds(item: Furniture): Rectangle {
  return {
    x: item.position.x,
    y: item.position.y,
    width: furnitureCurrentWidth(item),
    height: furnitureCurrentHeight(item)
  };
}

function copyFurniture(item: Furniture): Furniture {
  return {
    ...item,
    position: { x: item.position.x, y: item.position.y }
  };
}

// ============================================================================
// Room
// ============================================================================

/**
 * Creates a room. The id is normally assigned by `addRoom` on the owning layout.
 */
export function createRoom(
  id: number,
  type: RoomType,
  bounds: Rectangle,
  minArea: number = 0,
  orientation?: Orientation
): Room {
  return {
    id,
    type,
    bounds: copyRectangle(bounds),
    minArea,
    orientation,
    doors: [],
    windows: [],
    furniture: []
  };
}

export function roomArea(room: Room): number {
  return rectangleArea(room.bounds);
}

/**
 * Area covered by placed furniture
 */
export function roomUsedArea(room: Room): number {
  return room.furniture
    .filter(item => item.isPlaced)
    .reduce((sum, item) => sum + furnitureCurrentWidth(item) * furnitureCurrentHeight(item), 0);
}

export function roomFreeArea(room: Room): number {
  return roomArea(room) - roomUsedArea(room);
}

/**
 * Share of the room covered by placed furniture (0 for an empty room)
 */
export function roomUtilizationRate(room: Room): number {
  const area = roomArea(room);
  return area > 0 ? roomUsedArea(room) / area : 0;
}

export function addDoor(room: Room, door: Rectangle): void {
  room.doors.push(copyRectangle(door));
}

export function addWindow(room: Room, window: Rectangle): void {
  room.windows.push(copyRectangle(window));
}

export function addFurniture(room: Room, item: Furniture): void {
  room.furniture.push(item);
}

/**
 * Checks whether `item` fits at `position`: inside the room, clear of
 * other placed furniture and clear of every door.
 */
export function canPlaceFurniture(room: Room, item: Furniture, position: Point): boolean {
  const candidate: Rectangle = {
    x: position.x,
    y: position.y,
    width: furnitureCurrentWidth(item),
    height: furnitureCurrentHeight(item)
  };

  if (!rectangleContains(room.bounds, candidate)) {
    return false;
  }

  for (const other of room.furniture) {
    if (other !== item && other.isPlaced && rectanglesIntersect(candidate, furnitureBounds(other))) {
      return false;
    }
  }

  return !room.doors.some(door => rectanglesIntersect(candidate, door));
}

/**
 * Places `item` at `position` when allowed. Returns whether it was placed.
 */
export function placeFurniture(room: Room, item: Furniture, position: Point): boolean {
  if (!canPlaceFurniture(room, item, position)) {
    return false;
  }
  item.position = { x: position.x, y: position.y };
  item.isPlaced = true;
  return true;
}

/**
 * Deep copy keeping the id
 */
export function copyRoom(room: Room): Room {
  return {
    id: room.id,
    type: room.type,
    bounds: copyRectangle(room.bounds),
    minArea: room.minArea,
    orientation: room.orientation,
    doors: room.doors.map(copyRectangle),
    windows: room.windows.map(copyRectangle),
    furniture: room.furniture.map(copyFurniture)
  };
}
