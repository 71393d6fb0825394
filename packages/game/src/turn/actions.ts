/**
 * Actions
 *
 * What an actor does with its turn. Each actor submits exactly one per turn.
 */

import type { Direction } from "@delve/contracts";
import type { Entity } from "@delve/ecs";

export type Action =
  | { readonly type: "move"; readonly direction: Direction }
  | { readonly type: "attack"; readonly target: Entity }
  | { readonly type: "wait" }
  | { readonly type: "use_item"; readonly item: Entity };

export type ActionType = Action["type"];

export const WAIT: Action = Object.freeze({ type: "wait" });

export function move(direction: Direction): Action {
  return { type: "move", direction };
}

export function attack(target: Entity): Action {
  return { type: "attack", target };
}

export function useItem(item: Entity): Action {
  return { type: "use_item", item };
}
