/**
 * AI Behaviours
 *
 * One decision function per behaviour kind, looked up in a table. Decisions
 * read the turn's snapshot only and draw randomness from the per-decision
 * generator in the context.
 */

import {
  ALL_DIRECTIONS,
  CARDINAL_DIRECTIONS,
  chebyshevDistance,
  type Direction,
  directionBetween,
  type Point,
  samePoint,
  type SeededRandom,
  step,
} from "@delve/contracts";
import type { Entity } from "@delve/ecs";
import type { AIBehavior, AIBehaviorKind } from "../components/actor";
import type { Pathfinder } from "../pathfinding/pathfinder";
import { type Action, attack, move, WAIT } from "../turn/actions";
import type { EntityView, WorldSnapshot } from "../turn/snapshot";

export interface BehaviorTuning {
  readonly attackRange: number;
  readonly allowDiagonal: boolean;
  readonly fleeHealthThreshold: number;
  readonly wanderChance: number;
}

export interface DecisionContext {
  readonly entity: Entity;
  readonly self: EntityView;
  readonly target: EntityView | undefined;
  readonly detectionRange: number;
  readonly snapshot: WorldSnapshot;
  readonly pathfinder: Pathfinder;
  readonly rng: SeededRandom;
  readonly tuning: BehaviorTuning;
}

type Decide<K extends AIBehaviorKind> = (
  ctx: DecisionContext,
  behavior: Extract<AIBehavior, { kind: K }>,
) => Action;

export type BehaviorTable = { readonly [K in AIBehaviorKind]: Decide<K> };

// ============================================================================
// Shared moves
// ============================================================================

function directions(ctx: DecisionContext): readonly Direction[] {
  return ctx.tuning.allowDiagonal ? ALL_DIRECTIONS : CARDINAL_DIRECTIONS;
}

/**
 * Neighbouring cells the entity could enter this turn, in direction order.
 */
function openSteps(ctx: DecisionContext): { direction: Direction; to: Point }[] {
  const { map, occupancy } = ctx.snapshot;
  return directions(ctx)
    .map((direction) => ({ direction, to: step(ctx.self.position, direction) }))
    .filter(({ to }) => map.isPassable(to) && !occupancy.isBlocked(to));
}

function inReach(ctx: DecisionContext, target: EntityView): boolean {
  return chebyshevDistance(ctx.self.position, target.position) <= ctx.tuning.attackRange;
}

function inSight(ctx: DecisionContext, target: EntityView): boolean {
  return chebyshevDistance(ctx.self.position, target.position) <= ctx.detectionRange;
}

/**
 * First step of the cheapest route to `goal`; wait when there is none.
 */
export function stepToward(ctx: DecisionContext, goal: Point): Action {
  const path = ctx.pathfinder.findPath(ctx.self.position, goal, {
    occupancy: ctx.snapshot.occupancy,
    allowDiagonal: ctx.tuning.allowDiagonal,
  });
  if (path.isErr()) return WAIT;

  const next = path.value.steps[0];
  if (next === undefined) return WAIT;
  const direction = directionBetween(ctx.self.position, next);
  return direction === null ? WAIT : move(direction);
}

/**
 * Step that most increases the Chebyshev distance to `threat`.
 */
export function stepAway(ctx: DecisionContext, threat: Point): Action {
  let best: Direction | undefined;
  let bestDistance = chebyshevDistance(ctx.self.position, threat);

  for (const { direction, to } of openSteps(ctx)) {
    const distance = chebyshevDistance(to, threat);
    if (distance > bestDistance) {
      best = direction;
      bestDistance = distance;
    }
  }

  return best === undefined ? WAIT : move(best);
}

export function wander(ctx: DecisionContext): Action {
  const choice = ctx.rng.choice(openSteps(ctx));
  return choice === undefined ? WAIT : move(choice.direction);
}

function isHurt(ctx: DecisionContext): boolean {
  const health = ctx.self.health;
  if (health === undefined || health.max <= 0) return false;
  return health.current / health.max < ctx.tuning.fleeHealthThreshold;
}

// ============================================================================
// Decisions
// ============================================================================

const aggressive: Decide<"aggressive"> = (ctx) => {
  const target = ctx.target;
  if (target === undefined) return wander(ctx);

  if (isHurt(ctx) && inSight(ctx, target)) {
    return stepAway(ctx, target.position);
  }
  if (inReach(ctx, target)) {
    return attack(target.entity);
  }
  if (inSight(ctx, target)) {
    return stepToward(ctx, target.position);
  }
  return wander(ctx);
};

const fleeing: Decide<"fleeing"> = (ctx) => {
  const target = ctx.target;
  if (target === undefined || !inSight(ctx, target)) return WAIT;
  return stepAway(ctx, target.position);
};

const idle: Decide<"idle"> = (ctx) => {
  return ctx.rng.probability(ctx.tuning.wanderChance) ? wander(ctx) : WAIT;
};

/**
 * Walks the route in order and loops. Off the route, heads back to the
 * nearest waypoint (lowest index on ties).
 */
const patrol: Decide<"patrol"> = (ctx, behavior) => {
  const target = ctx.target;
  if (target !== undefined && inReach(ctx, target)) {
    return attack(target.entity);
  }

  const route = behavior.route;
  if (route.length === 0) return WAIT;

  const here = ctx.self.position;
  const onWaypoint = route.findIndex((p) => samePoint(p, here));

  let goal: Point;
  if (onWaypoint !== -1) {
    goal = route[(onWaypoint + 1) % route.length];
  } else {
    goal = route[0];
    let bestDistance = chebyshevDistance(here, goal);
    for (let i = 1; i < route.length; i++) {
      const distance = chebyshevDistance(here, route[i]);
      if (distance < bestDistance) {
        goal = route[i];
        bestDistance = distance;
      }
    }
  }

  return stepToward(ctx, goal);
};

export const BEHAVIORS: BehaviorTable = {
  aggressive,
  fleeing,
  idle,
  patrol,
};

/**
 * Runs the decision function for the behaviour's kind.
 */
export function decideFor(
  behavior: AIBehavior,
  ctx: DecisionContext,
  table: BehaviorTable = BEHAVIORS,
): Action {
  switch (behavior.kind) {
    case "aggressive":
      return table.aggressive(ctx, behavior);
    case "fleeing":
      return table.fleeing(ctx, behavior);
    case "idle":
      return table.idle(ctx, behavior);
    case "patrol":
      return table.patrol(ctx, behavior);
  }
}
