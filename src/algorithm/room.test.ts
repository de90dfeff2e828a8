/**
 * Room & Furniture Tests
 */

import {
  createFurniture,
  createRoom,
  rotateFurniture,
  furnitureCurrentWidth,
  furnitureCurrentHeight,
  roomArea,
  roomUsedArea,
  roomFreeArea,
  roomUtilizationRate,
  addDoor,
  addFurniture,
  canPlaceFurniture,
  placeFurniture,
  copyRoom
} from './room';
import { RoomType } from './types';

describe('furniture', () => {
  it('should swap the footprint when rotated', () => {
    const bed = createFurniture('bed', 2, 1.5);
    rotateFurniture(bed);

    expect(furnitureCurrentWidth(bed)).toBe(1.5);
    expect(furnitureCurrentHeight(bed)).toBe(2);
  });

  it('should ignore rotation for fixed items', () => {
    const counter = createFurniture('counter', 3, 0.6, { canRotate: false });
    rotateFurniture(counter);

    expect(counter.isRotated).toBe(false);
    expect(furnitureCurrentWidth(counter)).toBe(3);
  });
});

describe('room', () => {
  it('should derive area and utilization from placed furniture', () => {
    const room = createRoom(0, RoomType.Bedroom, { x: 0, y: 0, width: 4, height: 5 });
    const bed = createFurniture('bed', 2, 2);
    const wardrobe = createFurniture('wardrobe', 1, 1);
    addFurniture(room, bed);
    addFurniture(room, wardrobe);

    expect(placeFurniture(room, bed, { x: 0, y: 0 })).toBe(true);

    expect(roomArea(room)).toBe(20);
    expect(roomUsedArea(room)).toBe(4);
    expect(roomFreeArea(room)).toBe(16);
    expect(roomUtilizationRate(room)).toBe(0.2);
  });

  it('should report zero utilization for an empty footprint', () => {
    const room = createRoom(0, RoomType.Storage, { x: 0, y: 0, width: 0, height: 3 });
    expect(roomUtilizationRate(room)).toBe(0);
  });

  it('should reject furniture outside the room', () => {
    const room = createRoom(0, RoomType.Study, { x: 0, y: 0, width: 3, height: 3 });
    const desk = createFurniture('desk', 2, 1);

    expect(canPlaceFurniture(room, desk, { x: 2, y: 0 })).toBe(false);
    expect(canPlaceFurniture(room, desk, { x: 1, y: 2 })).toBe(true);
  });

  it('should reject furniture overlapping placed items or doors', () => {
    const room = createRoom(0, RoomType.LivingRoom, { x: 0, y: 0, width: 6, height: 6 });
    addDoor(room, { x: 5, y: 0, width: 1, height: 0.2 });
    const sofa = createFurniture('sofa', 2, 1);
    const table = createFurniture('table', 1, 1);
    addFurniture(room, sofa);
    addFurniture(room, table);
    placeFurniture(room, sofa, { x: 0, y: 0 });

    expect(canPlaceFurniture(room, table, { x: 1, y: 0.5 })).toBe(false);
    expect(canPlaceFurniture(room, table, { x: 2, y: 0 })).toBe(true);
    expect(canPlaceFurniture(room, table, { x: 4.5, y: 0 })).toBe(false);
    expect(placeFurniture(room, table, { x: 4.5, y: 0 })).toBe(false);
    expect(table.isPlaced).toBe(false);
  });

  it('should deep copy rooms and keep the id', () => {
    const room = createRoom(7, RoomType.Kitchen, { x: 1, y: 1, width: 3, height: 3 });
    addDoor(room, { x: 1, y: 1, width: 1, height: 0.2 });
    const copy = copyRoom(room);
    copy.bounds.x = 10;
    copy.doors[0].x = 10;

    expect(copy.id).toBe(7);
    expect(room.bounds.x).toBe(1);
    expect(room.doors[0].x).toBe(1);
  });
});
