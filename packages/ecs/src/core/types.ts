/**
 * ECS Core Types
 *
 * Shared type definitions for the Entity Component System.
 */

// Development flag for validation checks
export const __DEV__ = process.env.NODE_ENV !== "production";

/**
 * Entity configuration constants.
 *
 * 16/16 bit allocation for index/generation:
 * - 65,535 usable slots (index 0xFFFF is reserved for NULL_ENTITY)
 * - 65,536 generations before a slot's ids wrap around
 */
export const ENTITY_CONFIG = {
  INDEX_BITS: 16,
  GENERATION_BITS: 16,
  MAX_ENTITIES: (1 << 16) - 1,
  INDEX_MASK: (1 << 16) - 1,
  GENERATION_MASK: (1 << 16) - 1,
  INVALID_ENTITY: 0xffffffff,
} as const;

/**
 * Branded Entity type for type safety.
 * Internally an unsigned 32-bit integer: [index:16][generation:16]
 */
export type Entity = number & { readonly __brand: unique symbol };

/**
 * Sentinel value for "no entity".
 */
export const NULL_ENTITY = ENTITY_CONFIG.INVALID_ENTITY as Entity;

/**
 * Sentinel for sparse arrays (entity not present in a store).
 */
export const INVALID_INDEX = 0xffffffff;

/**
 * Upper bound on component kinds per world; kinds are tracked as bits of a
 * 32-bit mask per entity.
 */
export const MAX_COMPONENT_KINDS = 32;
