/**
 * Rink Geometry
 *
 * Coordinates are in feet with centre ice at the origin. Normalized
 * coordinates put the attacked net at (+89, 0).
 */

import { RINK } from '../core/constants.js';

export type Point = readonly [number, number];

export type Zone = 'OFF' | 'NEU' | 'DEF';

/**
 * Rotates a point half a turn when the attacked net is at -89
 *
 * @param sign - +1 when the attacking team shoots towards +x, -1 otherwise
 */
export function normalizePoint(x: number, y: number, sign: 1 | -1): Point {
  // 0 * -1 is -0, which serializes as 0 but fails Object.is checks
  return [x * sign || 0, y * sign || 0];
}

/**
 * Distance in feet from a normalized point to the attacked net
 */
export function distanceToNet(x: number, y: number): number {
  return Math.hypot(RINK.GOAL_LINE_X - x, y);
}

/**
 * Angle in degrees between the goal line's normal and the line from the net to a normalized point
 */
export function angleToNet(x: number, y: number): number {
  const depth = Math.abs(RINK.GOAL_LINE_X - x);
  if (depth === 0) return y === 0 ? 0 : 90;
  return (Math.atan(Math.abs(y) / depth) * 180) / Math.PI;
}

/**
 * Zone of a normalized x from the attacking team's perspective
 */
export function zoneOf(x: number): Zone {
  if (x > RINK.BLUE_LINE_X) return 'OFF';
  if (x < -RINK.BLUE_LINE_X) return 'DEF';
  return 'NEU';
}

/**
 * Even-odd ray casting test; points on an edge may fall either way
 */
export function pointInPolygon([x, y]: Point, polygon: ReadonlyArray<Point>): boolean {
  let inside = false;
  for (let i = 0, j = polygon.length - 1; i < polygon.length; j = i++) {
    const [xi, yi] = polygon[i];
    const [xj, yj] = polygon[j];
    const crosses = yi > y !== yj > y && x < ((xj - xi) * (y - yi)) / (yj - yi) + xi;
    if (crosses) inside = !inside;
  }
  return inside;
}

export interface DangerFlags {
  danger: boolean;
  highDanger: boolean;
}

/**
 * Classifies a normalized shot location; the slot counts as high danger only
 */
export function dangerOf(point: Point): DangerFlags {
  if (pointInPolygon(point, RINK.HIGH_DANGER)) return { danger: false, highDanger: true };
  return { danger: pointInPolygon(point, RINK.DANGER), highDanger: false };
}
