/**
 * Floor Plan Search - Random Layout Generator
 *
 * Builds a candidate layout in three passes:
 * 1. Sizes every requested room from its template and shuffles the list
 * 2. Places rooms by first-fit into a list of free regions, splitting each
 *    used region into up to four residual strips (grid compaction when no
 *    region is large enough)
 * 3. Draws straight corridors from the living room to some of the others
 *
 * Generation never fails. Rooms that cannot be placed are dropped and
 * listed in `layout.metadata.unplacedRooms`.
 */

import {
  Layout,
  LayoutConstraints,
  MonteCarloConfig,
  RoomRequirements,
  RoomTemplateCatalog,
  RoomType,
  RoomSize
} from './types';
import { Rectangle } from '../types/geometry';
import {
  expandRectangle,
  rectangleCenter,
  rectangleFromCorners,
  rectanglesIntersect
} from '../geometry/rectangle';
import { createLayout, addRoom, addHallway, getRoomsByType } from './layout';
import { sampleRoomSize } from './templates';
import { GENERATOR } from './constants';
import { SeededRandom } from './utils/random';
import { createLogger } from './utils/logger';

const log = createLogger('generator');

// ============================================================================
// TYPES
// ============================================================================

/**
 * Everything generation reads besides the footprint and the program
 */
export interface GenerationContext {
  config: MonteCarloConfig;
  constraints: LayoutConstraints;
  templates: RoomTemplateCatalog;
  rng: SeededRandom;
}

interface PendingRoom extends RoomSize {
  type: RoomType;
  minArea: number;
}

// ============================================================================
// FREE-REGION PARTITIONING
// ============================================================================

/**
 * A region accepts a room when both sides leave a margin on each end
 */
export function fitsInRegion(region: Rectangle, size: RoomSize, margin: number): boolean {
  return region.width >= size.width + 2 * margin && region.height >= size.height + 2 * margin;
}

/**
 * Residual strips left in `region` around `placed`.
 *
 * Above and below span the full region width; left and right span only the
 * placed room's height. A strip is kept when its extent along the split
 * axis exceeds twice the margin.
 */
export function splitFreeRegion(region: Rectangle, placed: Rectangle, margin: number): Rectangle[] {
  const residuals: Rectangle[] = [];
  const regionBottom = region.y + region.height;
  const regionRight = region.x + region.width;
  const placedBottom = placed.y + placed.height;
  const placedRight = placed.x + placed.width;

  // Above
  if (placed.y - region.y > margin * 2) {
    residuals.push({
      x: region.x,
      y: region.y,
      width: region.width,
      height: placed.y - region.y - margin
    });
  }

  // Below
  if (regionBottom - placedBottom > margin * 2) {
    residuals.push({
      x: region.x,
      y: placedBottom + margin,
      width: region.width,
      height: regionBottom - placedBottom - margin
    });
  }

  // Left
  if (placed.x - region.x > margin * 2) {
    residuals.push({
      x: region.x,
      y: placed.y,
      width: placed.x - region.x - margin,
      height: placed.height
    });
  }

  // Right
  if (regionRight - placedRight > margin * 2) {
    residuals.push({
      x: placedRight + margin,
      y: placed.y,
      width: regionRight - placedRight - margin,
      height: placed.height
    });
  }

  return residuals;
}

/**
 * Scans a unit grid row by row for the first spot inside the
 * margin-reduced footprint that overlaps no placed room.
 */
function findCompactPosition(
  layout: Layout,
  size: RoomSize,
  margin: number
): Rectangle | null {
  const { bounds } = layout;
  const step = GENERATOR.COMPACTION_GRID_STEP;
  const cols = Math.floor(bounds.width / step);
  const rows = Math.floor(bounds.height / step);
  const right = bounds.x + bounds.width;
  const bottom = bounds.y + bounds.height;

  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      const x = bounds.x + col * step + margin;
      const y = bounds.y + row * step + margin;

      if (x + size.width > right - margin || y + size.height > bottom - margin) {
        continue;
      }

      const candidate: Rectangle = { x, y, width: size.width, height: size.height };
      if (!layout.rooms.some(room => rectanglesIntersect(candidate, room.bounds))) {
        return candidate;
      }
    }
  }

  return null;
}

function placeRooms(layout: Layout, pending: PendingRoom[], margin: number, rng: SeededRandom): RoomType[] {
  const freeRegions: Rectangle[] = [layout.bounds];
  const unplaced: RoomType[] = [];

  for (const room of pending) {
    const index = freeRegions.findIndex(region => fitsInRegion(region, room, margin));

    if (index >= 0) {
      const region = freeRegions[index];
      const placed: Rectangle = {
        x: region.x + margin + rng.next() * (region.width - room.width - 2 * margin),
        y: region.y + margin + rng.next() * (region.height - room.height - 2 * margin),
        width: room.width,
        height: room.height
      };
      addRoom(layout, room.type, placed, room.minArea);
      freeRegions.splice(index, 1);
      freeRegions.push(...splitFreeRegion(region, placed, margin));
      continue;
    }

    const compact = findCompactPosition(layout, room, margin);
    if (compact) {
      addRoom(layout, room.type, compact, room.minArea);
    } else {
      log.debug(`dropped ${room.type} (${room.width.toFixed(2)} x ${room.height.toFixed(2)})`);
      unplaced.push(room.type);
    }
  }

  return unplaced;
}

// ============================================================================
// CORRIDORS
// ============================================================================

/**
 * Straight corridor between two room centers along the dominant axis
 */
export function corridorBetween(from: Rectangle, to: Rectangle, width: number): Rectangle {
  const a = rectangleCenter(from);
  const b = rectangleCenter(to);

  const axis = Math.abs(a.x - b.x) > Math.abs(a.y - b.y)
    ? rectangleFromCorners({ x: a.x, y: (a.y + b.y) / 2 }, { x: b.x, y: (a.y + b.y) / 2 })
    : rectangleFromCorners({ x: (a.x + b.x) / 2, y: a.y }, { x: (a.x + b.x) / 2, y: b.y });

  return expandRectangle(axis, width / 2);
}

function addCorridors(layout: Layout, constraints: LayoutConstraints, rng: SeededRandom): void {
  if (layout.rooms.length < 2) return;

  const hub = getRoomsByType(layout, RoomType.LivingRoom)[0];
  if (!hub) return;

  for (const room of layout.rooms) {
    if (room !== hub && rng.chance(GENERATOR.CORRIDOR_PROBABILITY)) {
      addHallway(layout, corridorBetween(hub.bounds, room.bounds, constraints.minHallwayWidth));
    }
  }
}

// ============================================================================
// MAIN ENTRY POINT
// ============================================================================

/**
 * Generates a random layout for `requirements` inside `footprint`.
 * Types without a template are skipped.
 */
export function generateLayout(
  footprint: Rectangle,
  requirements: RoomRequirements,
  context: GenerationContext,
  generationId: number = 0
): Layout {
  const { config, constraints, templates, rng } = context;
  const layout = createLayout(footprint, generationId);

  const pending: PendingRoom[] = [];
  for (const type of Object.values(RoomType)) {
    const count = requirements[type] ?? 0;
    const template = templates[type];
    if (!template) continue;

    for (let i = 0; i < count; i++) {
      pending.push({ type, minArea: template.minArea, ...sampleRoomSize(template, rng) });
    }
  }

  const unplaced = placeRooms(layout, rng.shuffle(pending), config.wallThickness, rng);
  if (unplaced.length > 0) {
    layout.metadata.unplacedRooms = unplaced;
  }

  addCorridors(layout, constraints, rng);

  return layout;
}
