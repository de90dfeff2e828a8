/**
 * Test Fixtures - Hand-built Layouts
 *
 * Layouts with known geometry for exact assertions.
 */

import { Layout, RoomType } from '../../src/algorithm/types';
import { createLayout, addRoom } from '../../src/algorithm/layout';
import { addWindow } from '../../src/algorithm/room';

/**
 * 20m x 15m footprint holding one room of each required type, no openings.
 *
 * living (0,0) 6x5, kitchen (6,0) 4x5, bedroom (0,5) 5x4, bathroom (5,5) 3x3
 */
export function createCompleteLayout(): Layout {
  const layout = createLayout({ x: 0, y: 0, width: 20, height: 15 });
  addRoom(layout, RoomType.LivingRoom, { x: 0, y: 0, width: 6, height: 5 });
  addRoom(layout, RoomType.Kitchen, { x: 6, y: 0, width: 4, height: 5 });
  addRoom(layout, RoomType.Bedroom, { x: 0, y: 5, width: 5, height: 4 });
  addRoom(layout, RoomType.Bathroom, { x: 5, y: 5, width: 3, height: 3 });
  return layout;
}

/**
 * Single 6m x 5m living room with one window on each side wall
 * (west and east), on a 20m x 15m footprint.
 */
export function createCrossLitLayout(): Layout {
  const layout = createLayout({ x: 0, y: 0, width: 20, height: 15 });
  const living = addRoom(layout, RoomType.LivingRoom, { x: 0, y: 0, width: 6, height: 5 });
  addWindow(living, { x: 0, y: 1, width: 0.1, height: 1.5 });
  addWindow(living, { x: 5.9, y: 1, width: 0.1, height: 1.5 });
  return layout;
}
