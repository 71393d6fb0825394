/**
 * Grid geometry shared by the map, the spatial index and the pathfinder.
 */

export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * Unit step on the grid. Cardinal directions first, then diagonals.
 */
export type Direction =
  | "north"
  | "east"
  | "south"
  | "west"
  | "northeast"
  | "southeast"
  | "southwest"
  | "northwest";

export const DIRECTION_DELTAS: Readonly<Record<Direction, Point>> = {
  north: { x: 0, y: -1 },
  east: { x: 1, y: 0 },
  south: { x: 0, y: 1 },
  west: { x: -1, y: 0 },
  northeast: { x: 1, y: -1 },
  southeast: { x: 1, y: 1 },
  southwest: { x: -1, y: 1 },
  northwest: { x: -1, y: -1 },
};

export const CARDINAL_DIRECTIONS: readonly Direction[] = [
  "north",
  "east",
  "south",
  "west",
];

export const ALL_DIRECTIONS: readonly Direction[] = [
  ...CARDINAL_DIRECTIONS,
  "northeast",
  "southeast",
  "southwest",
  "northwest",
];

export function step(from: Point, direction: Direction): Point {
  const delta = DIRECTION_DELTAS[direction];
  return { x: from.x + delta.x, y: from.y + delta.y };
}

/**
 * Direction that leads from `from` to an adjacent `to`, if any.
 */
export function directionBetween(from: Point, to: Point): Direction | null {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  for (const direction of ALL_DIRECTIONS) {
    const delta = DIRECTION_DELTAS[direction];
    if (delta.x === dx && delta.y === dy) return direction;
  }
  return null;
}

export function manhattanDistance(a: Point, b: Point): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

export function chebyshevDistance(a: Point, b: Point): number {
  return Math.max(Math.abs(a.x - b.x), Math.abs(a.y - b.y));
}

export function samePoint(a: Point, b: Point): boolean {
  return a.x === b.x && a.y === b.y;
}

export function pointToString(p: Point): string {
  return `(${p.x},${p.y})`;
}
