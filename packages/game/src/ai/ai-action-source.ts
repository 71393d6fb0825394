/**
 * AI Action Source
 *
 * Turns an entity's AI component into an action for the current turn.
 * Every decision gets its own generator seeded from (seed, turn, entity
 * index), so the order in which concurrent decisions finish never changes
 * what they choose.
 */

import {
  type AIConfig,
  createLogger,
  deriveSeed,
  type Logger,
  SeededRandom,
} from "@delve/contracts";
import { type Entity, entityToString, getIndex } from "@delve/ecs";
import type { Pathfinder } from "../pathfinding/pathfinder";
import { type Action, WAIT } from "../turn/actions";
import type { WorldSnapshot } from "../turn/snapshot";
import type { ActionSource } from "../turn/turn-scheduler";
import { BEHAVIORS, type BehaviorTable, decideFor } from "./behaviors";
import { nearestPlayer, type TargetSelector } from "./targeting";

export interface AIActionSourceOptions {
  readonly pathfinder: Pathfinder;
  readonly seed: number;
  readonly ai: AIConfig;
  readonly attackRange?: number;
  readonly allowDiagonal?: boolean;
  readonly selectTarget?: TargetSelector;
  readonly behaviors?: BehaviorTable;
  readonly logger?: Logger;
}

export class AIActionSource implements ActionSource {
  private readonly logger: Logger;
  private readonly selectTarget: TargetSelector;
  private readonly behaviors: BehaviorTable;

  constructor(private readonly options: AIActionSourceOptions) {
    this.logger = options.logger ?? createLogger("AI");
    this.selectTarget = options.selectTarget ?? nearestPlayer;
    this.behaviors = options.behaviors ?? BEHAVIORS;
  }

  decide(entity: Entity, snapshot: WorldSnapshot): Action {
    const self = snapshot.view(entity);
    const ai = self?.ai;
    if (self === undefined || ai === undefined) {
      this.logger.debug(`${entityToString(entity)} has no AI or position, waiting`);
      return WAIT;
    }

    const { options } = this;
    const rng = new SeededRandom(deriveSeed(options.seed, snapshot.turn, getIndex(entity)));

    return decideFor(
      ai.behavior,
      {
        entity,
        self,
        target: this.selectTarget(self, snapshot),
        detectionRange: ai.detectionRange,
        snapshot,
        pathfinder: options.pathfinder,
        rng,
        tuning: {
          attackRange: options.attackRange ?? 1,
          allowDiagonal: options.allowDiagonal ?? false,
          fleeHealthThreshold: options.ai.fleeHealthThreshold,
          wanderChance: options.ai.wanderChance,
        },
      },
      this.behaviors,
    );
  }
}
