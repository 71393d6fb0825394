/**
 * Entity ID Management
 *
 * Entity = unsigned 32-bit integer: [index:16][generation:16]
 */

import { __DEV__, ENTITY_CONFIG, type Entity, NULL_ENTITY } from "./types";

const { GENERATION_BITS, MAX_ENTITIES, GENERATION_MASK } = ENTITY_CONFIG;

/**
 * Creates an Entity from index and generation.
 */
export function createEntity(index: number, generation: number): Entity {
  if (__DEV__) {
    if (index < 0 || index >= MAX_ENTITIES) {
      throw new RangeError(
        `Entity index ${index} out of bounds [0, ${MAX_ENTITIES})`,
      );
    }
    if (generation < 0 || generation > GENERATION_MASK) {
      throw new RangeError(
        `Generation ${generation} out of bounds [0, ${GENERATION_MASK}]`,
      );
    }
  }
  return (((index << GENERATION_BITS) | generation) >>> 0) as Entity;
}

export function getIndex(entity: Entity): number {
  return entity >>> GENERATION_BITS;
}

export function getGeneration(entity: Entity): number {
  return entity & GENERATION_MASK;
}

/**
 * Orders entities by index, then generation. This is the "id ascending"
 * order the turn scheduler resolves actions in.
 */
export function compareEntities(a: Entity, b: Entity): number {
  return getIndex(a) - getIndex(b) || getGeneration(a) - getGeneration(b);
}

export function entityToString(entity: Entity): string {
  if (entity === NULL_ENTITY) return "Entity(NULL)";
  return `Entity(idx=${getIndex(entity)}, gen=${getGeneration(entity)})`;
}
