/**
 * Entity Registry
 *
 * Owns entity identity: creation, destruction and slot recycling.
 * Generation counters make stale references detectable, and a per-entity
 * bitmask records which component kinds the entity currently holds.
 *
 * A slot whose generation is exhausted is retired rather than wrapped, so
 * an old id can never become alive again.
 */

import { CoreError } from "@delve/contracts";
import { createEntity, entityToString, getGeneration, getIndex } from "./entity";
import { ENTITY_CONFIG, type Entity } from "./types";

const { MAX_ENTITIES, GENERATION_MASK } = ENTITY_CONFIG;

/**
 * Anything holding per-entity data that must be released on destroy.
 */
export interface EntityDropListener {
  dropEntity(entity: Entity): void;
}

export class EntityRegistry {
  private readonly alive: Uint8Array;
  private readonly generation: Uint16Array;
  private readonly kindMask: Uint32Array;
  private readonly freeList: number[] = [];
  private readonly dropListeners: EntityDropListener[] = [];
  private nextIndex = 0;
  private count = 0;
  private retired = 0;

  constructor(readonly capacity: number = MAX_ENTITIES) {
    if (capacity < 1 || capacity > MAX_ENTITIES) {
      throw new RangeError(`Registry capacity must be within [1, ${MAX_ENTITIES}]`);
    }
    this.alive = new Uint8Array(capacity);
    this.generation = new Uint16Array(capacity);
    this.kindMask = new Uint32Array(capacity);
  }

  /**
   * Allocates a fresh id, or recycles the most recently freed slot with the
   * generation it was left at.
   */
  create(): Entity {
    let index = this.freeList.pop();

    if (index === undefined) {
      if (this.nextIndex >= this.capacity) {
        throw new CoreError(
          "CAPACITY_EXCEEDED",
          `Max entities (${this.capacity}) reached`,
          { capacity: this.capacity },
        );
      }
      index = this.nextIndex++;
    }

    this.alive[index] = 1;
    this.kindMask[index] = 0;
    this.count++;

    return createEntity(index, this.generation[index]);
  }

  /**
   * Destroys an entity. Every drop listener releases the entity's data
   * before the slot is freed, so a recycled id never sees old components.
   */
  destroy(entity: Entity): void {
    this.assertAlive(entity);

    for (const listener of this.dropListeners) {
      listener.dropEntity(entity);
    }

    const index = getIndex(entity);
    if (this.kindMask[index] !== 0) {
      throw new Error(
        `${entityToString(entity)} still holds component kinds after drop (mask=${this.kindMask[index]})`,
      );
    }

    this.alive[index] = 0;
    this.count--;

    const generation = getGeneration(entity);
    if (generation === GENERATION_MASK) {
      this.retired++;
      return;
    }
    this.generation[index] = generation + 1;
    this.freeList.push(index);
  }

  isAlive(entity: Entity): boolean {
    const index = getIndex(entity);
    if (index >= this.capacity) return false;
    return this.alive[index] === 1 && this.generation[index] === getGeneration(entity);
  }

  /**
   * Throws UNKNOWN_ENTITY for dead or stale references.
   */
  assertAlive(entity: Entity): void {
    if (!this.isAlive(entity)) {
      throw CoreError.unknownEntity(
        `Stale or unknown entity reference: ${entityToString(entity)}`,
        { entity },
      );
    }
  }

  get aliveCount(): number {
    return this.count;
  }

  /** Slots taken out of circulation after their last generation. */
  get retiredCount(): number {
    return this.retired;
  }

  /**
   * All living entities, ascending.
   */
  getAllAlive(): Entity[] {
    const result: Entity[] = [];
    for (let i = 0; i < this.nextIndex; i++) {
      if (this.alive[i] === 1) {
        result.push(createEntity(i, this.generation[i]));
      }
    }
    return result;
  }

  addDropListener(listener: EntityDropListener): void {
    this.dropListeners.push(listener);
  }

  // ==========================================================================
  // Capability tracking
  // ==========================================================================

  setKind(entity: Entity, kindId: number): void {
    this.kindMask[getIndex(entity)] |= 1 << kindId;
  }

  clearKind(entity: Entity, kindId: number): void {
    this.kindMask[getIndex(entity)] &= ~(1 << kindId);
  }

  hasKind(entity: Entity, kindId: number): boolean {
    if (!this.isAlive(entity)) return false;
    return (this.kindMask[getIndex(entity)] & (1 << kindId)) !== 0;
  }

  /**
   * Raw kind bitmask for a living entity, 0 for dead or stale ones.
   */
  kindsOf(entity: Entity): number {
    if (!this.isAlive(entity)) return 0;
    return this.kindMask[getIndex(entity)] >>> 0;
  }
}
