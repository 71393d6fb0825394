/**
 * Joins
 *
 * Systems that need several component kinds per entity iterate the smallest
 * store and probe the others by entity, skipping entities that lack any of
 * the required kinds.
 */

import type { ComponentStore } from "./component-store";
import type { Entity } from "./types";

export function join<A>(
  a: ComponentStore<A>,
): IterableIterator<[Entity, Readonly<A>]>;
export function join<A, B>(
  a: ComponentStore<A>,
  b: ComponentStore<B>,
): IterableIterator<[Entity, Readonly<A>, Readonly<B>]>;
export function join<A, B, C>(
  a: ComponentStore<A>,
  b: ComponentStore<B>,
  c: ComponentStore<C>,
): IterableIterator<[Entity, Readonly<A>, Readonly<B>, Readonly<C>]>;
export function join<A, B, C, D>(
  a: ComponentStore<A>,
  b: ComponentStore<B>,
  c: ComponentStore<C>,
  d: ComponentStore<D>,
): IterableIterator<
  [Entity, Readonly<A>, Readonly<B>, Readonly<C>, Readonly<D>]
>;
export function join(
  ...stores: ComponentStore<unknown>[]
): IterableIterator<[Entity, ...unknown[]]> {
  return joinAll(stores);
}

/**
 * Untyped join over any number of stores; rows hold values in store order.
 */
export function* joinAll(
  stores: readonly ComponentStore<unknown>[],
): IterableIterator<[Entity, ...unknown[]]> {
  const driver = smallest(stores);
  if (driver === undefined) return;

  outer: for (const [entity] of driver.iterate()) {
    const row: [Entity, ...unknown[]] = [entity];
    for (const store of stores) {
      const value = store.get(entity);
      if (value === undefined) continue outer;
      row.push(value);
    }
    yield row;
  }
}

/**
 * Entities holding every given kind, in the driving store's order.
 */
export function entitiesWith(
  ...stores: ComponentStore<unknown>[]
): Entity[] {
  const driver = smallest(stores);
  if (driver === undefined) return [];
  return driver.entities().filter((e) => stores.every((s) => s.has(e)));
}

function smallest(
  stores: readonly ComponentStore<unknown>[],
): ComponentStore<unknown> | undefined {
  let best: ComponentStore<unknown> | undefined;
  for (const store of stores) {
    if (best === undefined || store.size < best.size) best = store;
  }
  return best;
}
