/**
 * Spatial Index
 *
 * Maps grid cells to the entities standing on them. A cell holds at most one
 * blocking entity (an actor) and any number of non-blocking ones (items,
 * corpses). The turn scheduler validates moves against it; the pathfinder
 * treats blocked cells as temporarily impassable.
 *
 * @example
 * const index = new SpatialIndex(40, 25);
 * index.place(goblin, { x: 3, y: 4 }, { blocking: true });
 * index.moveEntity(goblin, { x: 3, y: 4 }, { x: 4, y: 4 });
 * index.query({ x: 4, y: 4 }); // Set { goblin }
 */

import {
  CoreError,
  Err,
  Ok,
  type Point,
  pointToString,
  type Result,
} from "@delve/contracts";
import type { EntityDropListener } from "../core/entity-registry";
import { entityToString } from "../core/entity";
import type { Entity } from "../core/types";

/**
 * Read-only occupancy, as seen by route planning.
 */
export interface OccupancyView {
  isBlocked(p: Point): boolean;
  blockerAt(p: Point): Entity | undefined;
}

export interface PlaceOptions {
  /** Blocking entities exclude other blockers from their cell. Default true. */
  readonly blocking?: boolean;
}

interface Placement {
  cell: number;
  readonly blocking: boolean;
}

const EMPTY: ReadonlySet<Entity> = new Set();

export class SpatialIndex implements OccupancyView, EntityDropListener {
  private readonly blockers = new Map<number, Entity>();
  private readonly loose = new Map<number, Set<Entity>>();
  private readonly placements = new Map<Entity, Placement>();

  constructor(
    readonly width: number,
    readonly height: number,
  ) {}

  get size(): number {
    return this.placements.size;
  }

  isInBounds(p: Point): boolean {
    return p.x >= 0 && p.y >= 0 && p.x < this.width && p.y < this.height;
  }

  /**
   * Puts an entity on a cell.
   * Fails with CELL_OCCUPIED when a blocker lands on a blocked cell.
   */
  place(
    entity: Entity,
    at: Point,
    options: PlaceOptions = {},
  ): Result<void, CoreError> {
    const blocking = options.blocking ?? true;

    if (this.placements.has(entity)) {
      return Err(
        new CoreError("ALREADY_PLACED", `${entityToString(entity)} is already placed`, {
          entity,
        }),
      );
    }
    if (!this.isInBounds(at)) {
      return Err(this.outOfBounds(at));
    }

    const cell = this.toCell(at);
    const occupant = this.blockers.get(cell);
    if (blocking && occupant !== undefined) {
      return Err(this.occupied(at, occupant));
    }

    this.occupy(entity, cell, blocking);
    this.placements.set(entity, { cell, blocking });
    return Ok(undefined);
  }

  /**
   * Moves an entity between cells. Either both the vacate and the occupy
   * happen or neither does.
   */
  moveEntity(entity: Entity, from: Point, to: Point): Result<void, CoreError> {
    const placement = this.placements.get(entity);
    if (placement === undefined || !this.isInBounds(from) || placement.cell !== this.toCell(from)) {
      return Err(
        new CoreError("NOT_PLACED", `${entityToString(entity)} is not at ${pointToString(from)}`, {
          entity,
          from,
        }),
      );
    }
    if (!this.isInBounds(to)) {
      return Err(this.outOfBounds(to));
    }

    const target = this.toCell(to);
    if (target === placement.cell) return Ok(undefined);

    if (placement.blocking) {
      const occupant = this.blockers.get(target);
      if (occupant !== undefined) {
        return Err(this.occupied(to, occupant));
      }
    }

    this.vacate(entity, placement.cell, placement.blocking);
    this.occupy(entity, target, placement.blocking);
    placement.cell = target;
    return Ok(undefined);
  }

  remove(entity: Entity): boolean {
    const placement = this.placements.get(entity);
    if (placement === undefined) return false;
    this.vacate(entity, placement.cell, placement.blocking);
    this.placements.delete(entity);
    return true;
  }

  /**
   * Every entity on the cell, blocker first.
   */
  query(at: Point): ReadonlySet<Entity> {
    if (!this.isInBounds(at)) return EMPTY;
    const cell = this.toCell(at);
    const blocker = this.blockers.get(cell);
    const items = this.loose.get(cell);
    if (blocker === undefined && items === undefined) return EMPTY;

    const result = new Set<Entity>();
    if (blocker !== undefined) result.add(blocker);
    if (items !== undefined) {
      for (const e of items) result.add(e);
    }
    return result;
  }

  blockerAt(at: Point): Entity | undefined {
    if (!this.isInBounds(at)) return undefined;
    return this.blockers.get(this.toCell(at));
  }

  isBlocked(at: Point): boolean {
    return this.blockerAt(at) !== undefined;
  }

  locate(entity: Entity): Point | undefined {
    const placement = this.placements.get(entity);
    return placement === undefined ? undefined : this.toPoint(placement.cell);
  }

  /**
   * Frozen copy of the blockers, taken at turn start for route planning.
   */
  snapshot(): OccupancySnapshot {
    return new OccupancySnapshot(this.width, new Map(this.blockers));
  }

  dropEntity(entity: Entity): void {
    this.remove(entity);
  }

  private occupy(entity: Entity, cell: number, blocking: boolean): void {
    if (blocking) {
      this.blockers.set(cell, entity);
      return;
    }
    const set = this.loose.get(cell);
    if (set) {
      set.add(entity);
    } else {
      this.loose.set(cell, new Set([entity]));
    }
  }

  private vacate(entity: Entity, cell: number, blocking: boolean): void {
    if (blocking) {
      if (this.blockers.get(cell) === entity) this.blockers.delete(cell);
      return;
    }
    const set = this.loose.get(cell);
    if (set) {
      set.delete(entity);
      if (set.size === 0) this.loose.delete(cell);
    }
  }

  private toCell(p: Point): number {
    return p.y * this.width + p.x;
  }

  private toPoint(cell: number): Point {
    return { x: cell % this.width, y: Math.floor(cell / this.width) };
  }

  private outOfBounds(at: Point): CoreError {
    return new CoreError("OUT_OF_BOUNDS", `${pointToString(at)} is outside the index`, {
      at,
      width: this.width,
      height: this.height,
    });
  }

  private occupied(at: Point, occupant: Entity): CoreError {
    return CoreError.cellOccupied(
      `${pointToString(at)} is occupied by ${entityToString(occupant)}`,
      { at, occupant },
    );
  }
}

/**
 * Immutable blocker map for the decision phase.
 */
export class OccupancySnapshot implements OccupancyView {
  constructor(
    private readonly width: number,
    private readonly blockers: ReadonlyMap<number, Entity>,
  ) {}

  isBlocked(p: Point): boolean {
    return this.blockerAt(p) !== undefined;
  }

  blockerAt(p: Point): Entity | undefined {
    if (p.x < 0 || p.y < 0 || p.x >= this.width) return undefined;
    return this.blockers.get(p.y * this.width + p.x);
  }
}
