/**
 * Game Components
 *
 * All component schemas for the game.
 */

import type { World } from "@delve/ecs";
import {
  ActorSchema,
  AISchema,
  NameSchema,
  PlayerSchema,
} from "./actor";
import { ConsumableSchema, InventorySchema } from "./items";
import { BlockingSchema, PositionSchema } from "./spatial";
import { CombatStatsSchema, HealthSchema } from "./stats";

// Actor
export {
  type AIBehavior,
  type AIBehaviorKind,
  type AIData,
  AISchema,
  ActorSchema,
  type NameData,
  NameSchema,
  PlayerSchema,
} from "./actor";
// Items
export {
  type ConsumableData,
  ConsumableSchema,
  type InventoryData,
  InventorySchema,
} from "./items";
// Spatial
export { BlockingSchema, type PositionData, PositionSchema } from "./spatial";
// Stats
export {
  type CombatStatsData,
  CombatStatsSchema,
  type HealthData,
  HealthSchema,
} from "./stats";

/**
 * Registers every game component kind with a world.
 */
export function registerGameComponents(world: World): void {
  world.register(PositionSchema);
  world.register(BlockingSchema);
  world.register(HealthSchema);
  world.register(CombatStatsSchema);
  world.register(ActorSchema);
  world.register(PlayerSchema);
  world.register(AISchema);
  world.register(NameSchema);
  world.register(InventorySchema);
  world.register(ConsumableSchema);
}
