/**
 * Layout Module
 *
 * Creation, measurement, validation and copying of layouts.
 */

import {
  Layout,
  LayoutMetadata,
  LayoutValidation,
  Room,
  RoomType,
  SerializedLayout,
  Orientation
} from './types';
import { Rectangle } from '../types/geometry';
import {
  copyRectangle,
  rectangleArea,
  rectangleContains,
  rectanglesIntersect
} from '../geometry/rectangle';
import { createRoom, copyRoom, roomArea } from './room';
import { REQUIRED_ROOM_TYPES } from './constants';

// ============================================================================
// CONSTRUCTION
// ============================================================================

export function createLayout(bounds: Rectangle, generationId: number = 0): Layout {
  return {
    bounds: copyRectangle(bounds),
    rooms: [],
    hallways: [],
    fitnessScore: 0,
    generationId,
    metadata: {},
    nextRoomId: 0
  };
}

/**
 * Creates a room with the next free id and appends it to the layout
 */
export function addRoom(
  layout: Layout,
  type: RoomType,
  bounds: Rectangle,
  minArea: number = 0,
  orientation?: Orientation
): Room {
  const room = createRoom(layout.nextRoomId, type, bounds, minArea, orientation);
  layout.nextRoomId += 1;
  layout.rooms.push(room);
  return room;
}

/**
 * Appends a copy of an existing room (e.g. inherited from another layout),
 * re-identified with the next free id of this layout.
 */
export function adoptRoom(layout: Layout, room: Room): Room {
  const adopted = copyRoom(room);
  adopted.id = layout.nextRoomId;
  layout.nextRoomId += 1;
  layout.rooms.push(adopted);
  return adopted;
}

export function addHallway(layout: Layout, hallway: Rectangle): void {
  layout.hallways.push(copyRectangle(hallway));
}

export function getRoomsByType(layout: Layout, type: RoomType): Room[] {
  return layout.rooms.filter(room => room.type === type);
}

/**
 * The room that stands for its type in pairwise scoring: the last one added
 */
export function getPrimaryRoom(layout: Layout, type: RoomType): Room | undefined {
  for (let i = layout.rooms.length - 1; i >= 0; i--) {
    if (layout.rooms[i].type === type) return layout.rooms[i];
  }
  return undefined;
}

// ============================================================================
// MEASUREMENT
// ============================================================================

export function layoutTotalArea(layout: Layout): number {
  return rectangleArea(layout.bounds);
}

export function layoutRoomArea(layout: Layout): number {
  return layout.rooms.reduce((sum, room) => sum + roomArea(room), 0);
}

export function layoutHallwayArea(layout: Layout): number {
  return layout.hallways.reduce((sum, hallway) => sum + rectangleArea(hallway), 0);
}

/**
 * (room area + corridor area) / footprint area, or 0 for an empty footprint.
 * Overlapping rooms are counted twice, so the rate can exceed 1.
 */
export function layoutUtilizationRate(layout: Layout): number {
  const total = layoutTotalArea(layout);
  if (total === 0) return 0;
  return (layoutRoomArea(layout) + layoutHallwayArea(layout)) / total;
}

// ============================================================================
// VALIDATION
// ============================================================================

/**
 * Lists overlapping rooms, rooms outside the footprint and missing
 * required room types. Advisory: nothing in the search applies it.
 */
export function validateLayout(layout: Layout): LayoutValidation {
  const errors: string[] = [];
  const { rooms } = layout;

  for (let i = 0; i < rooms.length; i++) {
    for (let j = i + 1; j < rooms.length; j++) {
      if (rectanglesIntersect(rooms[i].bounds, rooms[j].bounds)) {
        errors.push(`Room ${rooms[i].type} (#${rooms[i].id}) overlaps ${rooms[j].type} (#${rooms[j].id})`);
      }
    }
  }

  for (const room of rooms) {
    if (!rectangleContains(layout.bounds, room.bounds)) {
      errors.push(`Room ${room.type} (#${room.id}) extends outside the footprint`);
    }
  }

  const present = new Set(rooms.map(room => room.type));
  for (const type of REQUIRED_ROOM_TYPES) {
    if (!present.has(type)) {
      errors.push(`Missing required room: ${type}`);
    }
  }

  return { valid: errors.length === 0, errors };
}

// ============================================================================
// COPY & EXPORT
// ============================================================================

/**
 * Deep copy of the layout. Room ids, score and the id counter are kept;
 * metadata is copied one level deep.
 */
export function copyLayout(layout: Layout): Layout {
  const metadata: LayoutMetadata = { ...layout.metadata };
  if (layout.metadata.unplacedRooms) {
    metadata.unplacedRooms = [...layout.metadata.unplacedRooms];
  }
  if (layout.metadata.droppedRooms) {
    metadata.droppedRooms = [...layout.metadata.droppedRooms];
  }

  return {
    bounds: copyRectangle(layout.bounds),
    rooms: layout.rooms.map(copyRoom),
    hallways: layout.hallways.map(copyRectangle),
    fitnessScore: layout.fitnessScore,
    generationId: layout.generationId,
    metadata,
    nextRoomId: layout.nextRoomId
  };
}

/**
 * Plain record for renderers and exporters
 */
export function serializeLayout(layout: Layout): SerializedLayout {
  return {
    bounds: copyRectangle(layout.bounds),
    rooms: layout.rooms.map(room => ({
      id: room.id,
      type: room.type,
      bounds: copyRectangle(room.bounds),
      area: roomArea(room)
    })),
    hallways: layout.hallways.map(copyRectangle),
    fitnessScore: layout.fitnessScore,
    utilizationRate: layoutUtilizationRate(layout)
  };
}
