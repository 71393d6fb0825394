/**
 * Combat Policies
 *
 * Balance lives here, not in the scheduler. A policy decides whether an
 * attack lands and how much it deals; the resolver only applies it.
 */

import {
  type CombatConfig,
  probability,
  type RandomSource,
} from "@delve/contracts";
import type { CombatStatsData } from "../components/stats";

export interface CombatPolicy {
  rollHit(attacker: Readonly<CombatStatsData>, defender: Readonly<CombatStatsData>): boolean;
  damage(attacker: Readonly<CombatStatsData>, defender: Readonly<CombatStatsData>): number;
}

export type CombatTuning = Omit<CombatConfig, "attackRange">;

export const DEFAULT_COMBAT_TUNING: CombatTuning = {
  baseHitChance: 0.6,
  hitChancePerPoint: 0.02,
  minHitChance: 0.1,
  maxHitChance: 0.95,
  minimumDamage: 1,
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function hitChance(
  attacker: Readonly<CombatStatsData>,
  defender: Readonly<CombatStatsData>,
  tuning: CombatTuning = DEFAULT_COMBAT_TUNING,
): number {
  return clamp(
    tuning.baseHitChance +
      (attacker.attack - defender.defense) * tuning.hitChancePerPoint,
    tuning.minHitChance,
    tuning.maxHitChance,
  );
}

/**
 * Damage = power - floor(defense / 2), never below the minimum.
 */
export function standardDamage(
  attacker: Readonly<CombatStatsData>,
  defender: Readonly<CombatStatsData>,
  minimumDamage: number = DEFAULT_COMBAT_TUNING.minimumDamage,
): number {
  return Math.max(minimumDamage, attacker.power - Math.floor(defender.defense / 2));
}

/**
 * Hit roll on `rng`, damage from power against halved defense.
 */
export function standardCombatPolicy(
  rng: RandomSource,
  tuning: CombatTuning = DEFAULT_COMBAT_TUNING,
): CombatPolicy {
  return {
    rollHit: (attacker, defender) =>
      probability(rng, hitChance(attacker, defender, tuning)),
    damage: (attacker, defender) =>
      standardDamage(attacker, defender, tuning.minimumDamage),
  };
}

/**
 * Always hits for the same amount. Handy in tests and scripted encounters.
 */
export function fixedDamagePolicy(amount: number): CombatPolicy {
  return {
    rollHit: () => true,
    damage: () => amount,
  };
}
