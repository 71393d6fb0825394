/**
 * Actor Components
 *
 * Components for turn takers, the player and AI behaviour.
 */

import type { Point } from "@delve/contracts";
import { ComponentSchema, type TagData } from "@delve/ecs";

/**
 * Actor tag - the entity submits one action per turn.
 */
export const ActorSchema = ComponentSchema.define<TagData>("Actor");

/**
 * Player tag - marks player-controlled entities.
 */
export const PlayerSchema = ComponentSchema.define<TagData>("Player");

/**
 * AI behaviour variants. New behaviours extend this union and the decision
 * table in `ai/behaviors.ts`.
 */
export type AIBehavior =
  | { readonly kind: "aggressive" }
  | { readonly kind: "fleeing" }
  | { readonly kind: "idle" }
  | { readonly kind: "patrol"; readonly route: readonly Point[] };

export type AIBehaviorKind = AIBehavior["kind"];

export interface AIData {
  behavior: AIBehavior;
  /** Chebyshev radius within which a target is noticed. */
  detectionRange: number;
}

export const AISchema = ComponentSchema.define<AIData>("AI");

/**
 * Display name, used in log lines.
 */
export interface NameData {
  value: string;
}

export const NameSchema = ComponentSchema.define<NameData>("Name");
