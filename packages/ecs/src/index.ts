/**
 * @delve/ecs
 *
 * Entity registry, sparse-set component stores and the spatial index.
 */

// Core
export {
  __DEV__,
  ENTITY_CONFIG,
  type Entity,
  INVALID_INDEX,
  MAX_COMPONENT_KINDS,
  NULL_ENTITY,
} from "./core/types";
export {
  compareEntities,
  createEntity,
  entityToString,
  getGeneration,
  getIndex,
} from "./core/entity";
export { type EntityDropListener, EntityRegistry } from "./core/entity-registry";
export { type ComponentData, ComponentSchema, type TagData } from "./core/component";
export { ComponentStore } from "./core/component-store";
export { entitiesWith, join, joinAll } from "./core/query";
export { World, type WorldOptions, type WorldStats } from "./core/world";

// Spatial
export {
  OccupancySnapshot,
  type OccupancyView,
  type PlaceOptions,
  SpatialIndex,
} from "./spatial/spatial-index";
