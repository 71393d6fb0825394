/**
 * World
 *
 * The one explicit container for mutable game state: entity registry,
 * component stores and spatial index. It is passed by reference into the
 * scheduler and systems; there are no process-wide singletons.
 */

import type { Point } from "@delve/contracts";
import { SpatialIndex } from "../spatial/spatial-index";
import type { ComponentSchema } from "./component";
import { ComponentStore } from "./component-store";
import { EntityRegistry } from "./entity-registry";
import { joinAll } from "./query";
import { ENTITY_CONFIG, type Entity, MAX_COMPONENT_KINDS } from "./types";

export interface WorldOptions {
  /** Entity capacity. Defaults to the id space (65,535). */
  readonly maxEntities?: number;
  /** Grid size of the spatial index; usually the map's dimensions. */
  readonly bounds?: { readonly width: number; readonly height: number };
}

/**
 * Type safety note: stores are kept as `ComponentStore<unknown>` because
 * kinds are heterogeneous. The schema passed to `store()` carries the type
 * back out at the API boundary.
 */
export class World {
  public readonly entities: EntityRegistry;
  public readonly spatial: SpatialIndex;

  private readonly stores = new Map<string, ComponentStore<unknown>>();

  constructor(options: WorldOptions = {}) {
    this.entities = new EntityRegistry(
      options.maxEntities ?? ENTITY_CONFIG.MAX_ENTITIES,
    );
    const bounds = options.bounds ?? { width: 0xffff, height: 0xffff };
    this.spatial = new SpatialIndex(bounds.width, bounds.height);
    this.entities.addDropListener(this.spatial);
  }

  // ============================================================================
  // Component kinds
  // ============================================================================

  /**
   * Registers a component kind and returns its store. Registering the same
   * schema twice returns the existing store.
   */
  register<T>(schema: ComponentSchema<T>): ComponentStore<T> {
    const existing = this.stores.get(schema.name);
    if (existing !== undefined) {
      if (existing.schema !== schema) {
        throw new Error(`A different component named "${schema.name}" is already registered`);
      }
      return this.store(schema);
    }
    if (this.stores.size >= MAX_COMPONENT_KINDS) {
      throw new Error(`Cannot register more than ${MAX_COMPONENT_KINDS} component kinds`);
    }

    const store = new ComponentStore<T>(schema, this.stores.size, this.entities);
    this.stores.set(schema.name, store as ComponentStore<unknown>);
    this.entities.addDropListener(store);
    return store;
  }

  store<T>(schema: ComponentSchema<T>): ComponentStore<T> {
    const store = this.stores.get(schema.name);
    if (store === undefined || store.schema !== schema) {
      throw new Error(`Component not registered: ${schema.name}`);
    }
    return store as ComponentStore<T>;
  }

  // ============================================================================
  // Entity management
  // ============================================================================

  spawn(): Entity {
    return this.entities.create();
  }

  /**
   * Destroys an entity; every store and the spatial index drop it first.
   * Throws UNKNOWN_ENTITY for stale references.
   */
  destroy(entity: Entity): void {
    this.entities.destroy(entity);
  }

  isAlive(entity: Entity): boolean {
    return this.entities.isAlive(entity);
  }

  // ============================================================================
  // Component shortcuts
  // ============================================================================

  insert<T>(entity: Entity, schema: ComponentSchema<T>, value: T): void {
    this.store(schema).insert(entity, value);
  }

  get<T>(entity: Entity, schema: ComponentSchema<T>): Readonly<T> | undefined {
    return this.store(schema).get(entity);
  }

  getMut<T>(entity: Entity, schema: ComponentSchema<T>): T | undefined {
    return this.store(schema).getMut(entity);
  }

  remove<T>(entity: Entity, schema: ComponentSchema<T>): T | undefined {
    return this.store(schema).remove(entity);
  }

  has(entity: Entity, schema: ComponentSchema<unknown>): boolean {
    const store = this.stores.get(schema.name);
    return store !== undefined && store.has(entity);
  }

  /**
   * Joins the stores of the given kinds; see `join()`.
   */
  join<A>(a: ComponentSchema<A>): IterableIterator<[Entity, Readonly<A>]>;
  join<A, B>(
    a: ComponentSchema<A>,
    b: ComponentSchema<B>,
  ): IterableIterator<[Entity, Readonly<A>, Readonly<B>]>;
  join<A, B, C>(
    a: ComponentSchema<A>,
    b: ComponentSchema<B>,
    c: ComponentSchema<C>,
  ): IterableIterator<[Entity, Readonly<A>, Readonly<B>, Readonly<C>]>;
  join(...schemas: ComponentSchema<unknown>[]): IterableIterator<[Entity, ...unknown[]]> {
    return joinAll(schemas.map((schema) => this.store(schema)));
  }

  /**
   * Names of the component kinds the entity currently holds.
   */
  kindsOf(entity: Entity): string[] {
    const mask = this.entities.kindsOf(entity);
    const names: string[] = [];
    for (const store of this.stores.values()) {
      if (mask & (1 << store.kindId)) names.push(store.name);
    }
    return names;
  }

  locate(entity: Entity): Point | undefined {
    return this.spatial.locate(entity);
  }

  getStats(): WorldStats {
    return {
      entityCount: this.entities.aliveCount,
      componentKindCount: this.stores.size,
      placedCount: this.spatial.size,
    };
  }
}

export interface WorldStats {
  entityCount: number;
  componentKindCount: number;
  placedCount: number;
}
