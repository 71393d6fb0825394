/**
 * Combat Resolver
 *
 * Computes the outcome of one attack from component views. Pure: the inputs
 * are never mutated, the caller applies the outcome.
 */

import { CoreError, Err, Ok, type Result } from "@delve/contracts";
import type { CombatStatsData, HealthData } from "../components/stats";
import type { CombatPolicy } from "./combat-policy";

/**
 * The components combat reads from one side of an attack.
 */
export interface CombatantView {
  readonly stats?: Readonly<CombatStatsData>;
  readonly health?: Readonly<HealthData>;
}

export interface CombatOutcome {
  readonly hit: boolean;
  readonly damage: number;
  readonly defenderDied: boolean;
}

/** Used when the defender has health but no combat stats. */
const UNARMED: Readonly<CombatStatsData> = { attack: 0, defense: 0, power: 0 };

export class CombatResolver {
  constructor(private readonly policy: CombatPolicy) {}

  resolve(
    attacker: CombatantView,
    defender: CombatantView,
  ): Result<CombatOutcome, CoreError> {
    if (attacker.stats === undefined) {
      return Err(
        CoreError.missingCapability("Attacker has no CombatStats", {
          missing: "CombatStats",
        }),
      );
    }
    if (defender.health === undefined) {
      return Err(
        CoreError.missingCapability("Defender has no Health", {
          missing: "Health",
        }),
      );
    }

    const defenderStats = defender.stats ?? UNARMED;

    if (!this.policy.rollHit(attacker.stats, defenderStats)) {
      return Ok({ hit: false, damage: 0, defenderDied: false });
    }

    const damage = Math.max(0, Math.floor(this.policy.damage(attacker.stats, defenderStats)));
    return Ok({
      hit: true,
      damage,
      defenderDied: defender.health.current - damage <= 0,
    });
  }
}
