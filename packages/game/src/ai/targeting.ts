/**
 * Target Selection
 *
 * Which entity an AI reacts to. Injected into the AI action source so the
 * heuristic can change without touching the behaviours.
 */

import { chebyshevDistance } from "@delve/contracts";
import type { EntityView, WorldSnapshot } from "../turn/snapshot";

export type TargetSelector = (
  self: EntityView,
  snapshot: WorldSnapshot,
) => EntityView | undefined;

/**
 * Nearest standing player by Chebyshev distance; ties go to the lower id.
 */
export const nearestPlayer: TargetSelector = (self, snapshot) => {
  let best: EntityView | undefined;
  let bestDistance = Number.POSITIVE_INFINITY;

  for (const player of snapshot.players()) {
    if (player === self.entity || !snapshot.isStanding(player)) continue;
    const view = snapshot.view(player);
    if (view === undefined) continue;

    const distance = chebyshevDistance(self.position, view.position);
    if (distance < bestDistance) {
      best = view;
      bestDistance = distance;
    }
  }

  return best;
};
