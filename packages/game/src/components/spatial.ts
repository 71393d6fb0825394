/**
 * Spatial Components
 *
 * Grid position and blocking. The spatial index mirrors `Position` for every
 * placed entity; the turn scheduler keeps the two in step.
 */

import { ComponentSchema, type TagData } from "@delve/ecs";

/**
 * Position component - grid cell the entity stands on.
 */
export interface PositionData {
  x: number;
  y: number;
}

export const PositionSchema = ComponentSchema.define<PositionData>("Position");

/**
 * Blocking tag - at most one blocking entity per cell.
 */
export const BlockingSchema = ComponentSchema.define<TagData>("Blocking");
