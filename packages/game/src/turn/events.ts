/**
 * Turn Events
 *
 * Effects produced while resolving a turn, in the order they happened.
 * Presentation layers render them; nothing in the core reads them back.
 */

import type { Point } from "@delve/contracts";
import type { Entity } from "@delve/ecs";

export type BlockedReason = "impassable" | "occupied";

export type TurnEvent =
  | {
      readonly type: "moved";
      readonly entity: Entity;
      readonly from: Point;
      readonly to: Point;
    }
  | {
      readonly type: "damaged";
      readonly entity: Entity;
      readonly amount: number;
      readonly source: Entity;
    }
  | { readonly type: "died"; readonly entity: Entity }
  | {
      readonly type: "blocked";
      readonly entity: Entity;
      readonly at: Point;
      readonly reason: BlockedReason;
    }
  | { readonly type: "missed"; readonly entity: Entity; readonly target: Entity }
  | { readonly type: "healed"; readonly entity: Entity; readonly amount: number }
  | { readonly type: "item_used"; readonly entity: Entity; readonly item: Entity };

export type TurnEventType = TurnEvent["type"];

/**
 * Read-only record of one committed turn.
 */
export interface TurnResult {
  readonly turn: number;
  readonly events: readonly TurnEvent[];
}

export type TurnListener = (result: TurnResult) => void;

/**
 * Freezes a result and every event in it.
 */
export function freezeTurnResult(turn: number, events: readonly TurnEvent[]): TurnResult {
  for (const event of events) {
    if (event.type === "moved") {
      Object.freeze(event.from);
      Object.freeze(event.to);
    } else if (event.type === "blocked") {
      Object.freeze(event.at);
    }
    Object.freeze(event);
  }
  return Object.freeze({ turn, events: Object.freeze([...events]) });
}
