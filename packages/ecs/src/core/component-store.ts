/**
 * Component Store
 *
 * Dense storage for one component kind, keyed by entity.
 * Sparse set: `sparse[index] -> slot`, `dense[slot] -> entity`,
 * `values[slot] -> record`. Insert, lookup and removal are O(1); removal
 * swaps the last slot into the hole, so positional order is not stable
 * across removals.
 */

import type { ComponentSchema } from "./component";
import { getIndex } from "./entity";
import type { EntityDropListener, EntityRegistry } from "./entity-registry";
import { type Entity, INVALID_INDEX } from "./types";

export class ComponentStore<T> implements EntityDropListener {
  private readonly sparse: Uint32Array;
  private readonly dense: Entity[] = [];
  private readonly values: T[] = [];

  constructor(
    readonly schema: ComponentSchema<T>,
    readonly kindId: number,
    private readonly registry: EntityRegistry,
  ) {
    this.sparse = new Uint32Array(registry.capacity).fill(INVALID_INDEX);
  }

  get name(): string {
    return this.schema.name;
  }

  get size(): number {
    return this.dense.length;
  }

  /**
   * Inserts or overwrites the entity's value.
   * Throws UNKNOWN_ENTITY for dead or stale entities.
   */
  insert(entity: Entity, value: T): void {
    this.registry.assertAlive(entity);

    const index = getIndex(entity);
    const slot = this.sparse[index];

    if (slot !== INVALID_INDEX) {
      // A live entity can only match its own slot, older generations were
      // dropped on destroy.
      this.values[slot] = value;
      return;
    }

    this.sparse[index] = this.dense.length;
    this.dense.push(entity);
    this.values.push(value);
    this.registry.setKind(entity, this.kindId);
  }

  /**
   * Removes and returns the entity's value.
   */
  remove(entity: Entity): T | undefined {
    const slot = this.slotOf(entity);
    if (slot === INVALID_INDEX) return undefined;

    const removed = this.values[slot];
    const last = this.dense.length - 1;

    if (slot !== last) {
      const moved = this.dense[last];
      this.dense[slot] = moved;
      this.values[slot] = this.values[last];
      this.sparse[getIndex(moved)] = slot;
    }

    this.dense.pop();
    this.values.pop();
    this.sparse[getIndex(entity)] = INVALID_INDEX;
    this.registry.clearKind(entity, this.kindId);

    return removed;
  }

  has(entity: Entity): boolean {
    return this.slotOf(entity) !== INVALID_INDEX;
  }

  get(entity: Entity): Readonly<T> | undefined {
    const slot = this.slotOf(entity);
    return slot === INVALID_INDEX ? undefined : this.values[slot];
  }

  /**
   * Mutable access to the stored record.
   */
  getMut(entity: Entity): T | undefined {
    const slot = this.slotOf(entity);
    return slot === INVALID_INDEX ? undefined : this.values[slot];
  }

  /**
   * Lazily yields every holder of this component.
   *
   * The pass walks the holders present when it started and re-checks each
   * one before yielding, so removals made mid-pass neither repeat an entity
   * nor skip one that is still present. Entities inserted mid-pass are not
   * visited.
   */
  *iterate(): IterableIterator<[Entity, Readonly<T>]> {
    const holders = this.dense.slice();
    for (const entity of holders) {
      const slot = this.slotOf(entity);
      if (slot !== INVALID_INDEX) {
        yield [entity, this.values[slot]];
      }
    }
  }

  [Symbol.iterator](): IterableIterator<[Entity, Readonly<T>]> {
    return this.iterate();
  }

  entities(): readonly Entity[] {
    return this.dense.slice();
  }

  dropEntity(entity: Entity): void {
    this.remove(entity);
  }

  private slotOf(entity: Entity): number {
    const index = getIndex(entity);
    if (index >= this.sparse.length) return INVALID_INDEX;
    const slot = this.sparse[index];
    if (slot === INVALID_INDEX || this.dense[slot] !== entity) {
      return INVALID_INDEX;
    }
    return slot;
  }
}
