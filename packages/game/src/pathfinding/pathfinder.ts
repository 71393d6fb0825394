/**
 * Pathfinder
 *
 * A* over the map's entering costs. Every call is independent: occupancy
 * changes every turn, so nothing is cached between searches.
 *
 * The heuristic is grid distance scaled by the cheapest entering cost on the
 * map, which never overestimates and stays consistent, so the first time the
 * goal is popped its cost is minimal. Open-set ties on `g + h` pop in
 * insertion order.
 */

import {
  ALL_DIRECTIONS,
  CARDINAL_DIRECTIONS,
  chebyshevDistance,
  CoreError,
  DIRECTION_DELTAS,
  Err,
  manhattanDistance,
  Ok,
  type Point,
  pointToString,
  type Result,
  samePoint,
} from "@delve/contracts";
import type { OccupancyView } from "@delve/ecs";
import type { GameMap } from "../map/game-map";
import { MinHeap } from "./min-heap";

export interface PathOptions {
  /** Cells with a blocker are impassable, except the goal. */
  readonly occupancy?: OccupancyView;
  readonly allowDiagonal?: boolean;
}

export interface PathResult {
  /** Start exclusive, goal inclusive. */
  readonly steps: readonly Point[];
  /** Sum of the entering costs of every step. */
  readonly cost: number;
}

interface OpenEntry {
  readonly cell: number;
  readonly f: number;
  readonly seq: number;
}

function compareOpen(a: OpenEntry, b: OpenEntry): number {
  return a.f - b.f || a.seq - b.seq;
}

export class Pathfinder {
  constructor(
    private readonly map: GameMap,
    private readonly defaults: { readonly allowDiagonal: boolean } = {
      allowDiagonal: false,
    },
  ) {}

  findPath(
    start: Point,
    goal: Point,
    options: PathOptions = {},
  ): Result<PathResult, CoreError> {
    const map = this.map;

    if (!map.isInBounds(start) || !map.isPassable(goal)) {
      return Err(this.noPath(start, goal));
    }
    if (samePoint(start, goal)) {
      return Ok({ steps: [], cost: 0 });
    }

    const allowDiagonal = options.allowDiagonal ?? this.defaults.allowDiagonal;
    const occupancy = options.occupancy;
    const directions = allowDiagonal ? ALL_DIRECTIONS : CARDINAL_DIRECTIONS;
    const distance = allowDiagonal ? chebyshevDistance : manhattanDistance;
    const scale = map.minMoveCost;
    const heuristic = (p: Point): number => distance(p, goal) * scale;

    const width = map.width;
    const size = width * map.height;
    const g = new Float64Array(size).fill(Number.POSITIVE_INFINITY);
    const parent = new Int32Array(size).fill(-1);
    const closed = new Uint8Array(size);
    const open = new MinHeap<OpenEntry>(compareOpen);
    let seq = 0;

    const startCell = start.y * width + start.x;
    const goalCell = goal.y * width + goal.x;
    g[startCell] = 0;
    open.push({ cell: startCell, f: heuristic(start), seq: seq++ });

    while (!open.isEmpty) {
      const current = open.pop();
      if (current === undefined) break;
      if (closed[current.cell] === 1) continue;
      closed[current.cell] = 1;

      if (current.cell === goalCell) {
        return Ok(this.reconstruct(parent, goalCell, g[goalCell]));
      }

      const cx = current.cell % width;
      const cy = (current.cell - cx) / width;

      for (const direction of directions) {
        const delta = DIRECTION_DELTAS[direction];
        const next = { x: cx + delta.x, y: cy + delta.y };
        if (!map.isPassable(next)) continue;

        const nextCell = next.y * width + next.x;
        if (closed[nextCell] === 1) continue;
        if (nextCell !== goalCell && occupancy?.isBlocked(next)) continue;

        const tentative = g[current.cell] + map.moveCost(next);
        if (tentative < g[nextCell]) {
          g[nextCell] = tentative;
          parent[nextCell] = current.cell;
          open.push({ cell: nextCell, f: tentative + heuristic(next), seq: seq++ });
        }
      }
    }

    return Err(this.noPath(start, goal));
  }

  private reconstruct(parent: Int32Array, goalCell: number, cost: number): PathResult {
    const width = this.map.width;
    const steps: Point[] = [];
    let cell = goalCell;
    while (parent[cell] !== -1) {
      steps.push({ x: cell % width, y: Math.floor(cell / width) });
      cell = parent[cell];
    }
    steps.reverse();
    return { steps, cost };
  }

  private noPath(start: Point, goal: Point): CoreError {
    return CoreError.noPathFound(
      `No path from ${pointToString(start)} to ${pointToString(goal)}`,
      { start, goal },
    );
  }
}

/**
 * Sums the entering cost of every step; Infinity if any step is impassable.
 */
export function pathCost(map: GameMap, steps: readonly Point[]): number {
  let total = 0;
  for (const p of steps) {
    total += map.moveCost(p);
  }
  return total;
}
