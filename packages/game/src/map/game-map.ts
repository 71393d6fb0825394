/**
 * Game Map
 *
 * Read-only grid of passability and entering costs, built from what a map
 * provider generated. The pathfinder and the turn scheduler hold a reference
 * to it; nothing mutates it during a turn.
 */

import {
  CoreError,
  Err,
  type MapDescriptor,
  MapDescriptorSchema,
  Ok,
  type Point,
  type Result,
} from "@delve/contracts";

/**
 * Source of maps. Generation algorithms live outside the core.
 */
export interface MapProvider {
  generate(seed: number): MapDescriptor;
}

export class GameMap {
  private readonly passable: Uint8Array;
  private readonly costs: Float64Array;
  private readonly spawns: readonly Point[];

  /** Cheapest cost of entering any passable cell; scales the A* heuristic. */
  readonly minMoveCost: number;

  private constructor(
    readonly width: number,
    readonly height: number,
    descriptor: MapDescriptor,
  ) {
    const size = width * height;
    this.passable = new Uint8Array(size);
    this.costs = new Float64Array(size);

    let min = Number.POSITIVE_INFINITY;
    descriptor.cells.forEach((cell, i) => {
      this.passable[i] = cell.passable ? 1 : 0;
      this.costs[i] = cell.moveCost;
      if (cell.passable && cell.moveCost < min) min = cell.moveCost;
    });

    this.minMoveCost = Number.isFinite(min) ? min : 0;
    this.spawns = Object.freeze(
      descriptor.spawnPoints.map((p) => Object.freeze({ x: p.x, y: p.y })),
    );
  }

  /**
   * Validates a descriptor and builds the map. Fails with INVALID_MAP.
   */
  static fromDescriptor(input: unknown): Result<GameMap, CoreError> {
    const parsed = MapDescriptorSchema.safeParse(input);
    if (!parsed.success) {
      return Err(
        CoreError.mapInvalid("Invalid map descriptor", {
          issues: parsed.error.issues.map((issue) => ({
            path: issue.path.join("."),
            message: issue.message,
          })),
        }),
      );
    }
    const d = parsed.data;
    return Ok(new GameMap(d.width, d.height, d));
  }

  isInBounds(p: Point): boolean {
    return p.x >= 0 && p.x < this.width && p.y >= 0 && p.y < this.height;
  }

  /**
   * Out-of-bounds cells are never passable.
   */
  isPassable(p: Point): boolean {
    if (!this.isInBounds(p)) return false;
    return this.passable[this.toIndex(p)] === 1;
  }

  /**
   * Cost of entering the cell; Infinity when it cannot be entered.
   */
  moveCost(p: Point): number {
    if (!this.isPassable(p)) return Number.POSITIVE_INFINITY;
    return this.costs[this.toIndex(p)];
  }

  get spawnPoints(): readonly Point[] {
    return this.spawns;
  }

  get passableCount(): number {
    let count = 0;
    for (let i = 0; i < this.passable.length; i++) {
      count += this.passable[i];
    }
    return count;
  }

  private toIndex(p: Point): number {
    return p.y * this.width + p.x;
  }
}
