/**
 * Item Components
 *
 * Components for carried items and their effects.
 */

import { ComponentSchema, type Entity } from "@delve/ecs";

/**
 * Inventory component. Holds item entities, in pickup order.
 */
export interface InventoryData {
  items: Entity[];
  capacity: number;
}

export const InventorySchema = ComponentSchema.define<InventoryData>("Inventory");

/**
 * Consumable effect - restores health when used.
 */
export interface ConsumableData {
  heal: number;
}

export const ConsumableSchema =
  ComponentSchema.define<ConsumableData>("Consumable");
