/**
 * Stats Components
 *
 * Components for combat stats and health.
 */

import { ComponentSchema } from "@delve/ecs";

/**
 * Health component.
 */
export interface HealthData {
  current: number;
  max: number;
}

export const HealthSchema = ComponentSchema.define<HealthData>("Health");

/**
 * Combat stats component.
 *
 * `attack` weighs on the hit roll, `defense` on both the roll and the damage
 * taken, `power` on the damage dealt.
 */
export interface CombatStatsData {
  attack: number;
  defense: number;
  power: number;
}

export const CombatStatsSchema =
  ComponentSchema.define<CombatStatsData>("CombatStats");
