/**
 * Turn Scheduler
 *
 * Collects one action from every actor, then resolves them in a fixed order:
 * moves by entity id ascending, then attacks, then item uses. Given the same
 * starting state and the same actions, two runs produce the same events.
 *
 * Phases: collecting -> resolving -> committed -> collecting (next turn).
 * World mutation happens only inside `resolve()`.
 */

import {
  chebyshevDistance,
  CoreError,
  createLogger,
  DIRECTION_DELTAS,
  Err,
  type Logger,
  Ok,
  type Point,
  type Result,
  step,
} from "@delve/contracts";
import {
  compareEntities,
  type Entity,
  entityToString,
  type World,
} from "@delve/ecs";
import { ActorSchema } from "../components/actor";
import { ConsumableSchema, InventorySchema } from "../components/items";
import { PositionSchema } from "../components/spatial";
import { CombatStatsSchema, HealthSchema } from "../components/stats";
import type { CombatResolver } from "../combat/combat-resolver";
import type { GameMap } from "../map/game-map";
import { type Action, WAIT } from "./actions";
import {
  type BlockedReason,
  freezeTurnResult,
  type TurnEvent,
  type TurnListener,
  type TurnResult,
} from "./events";
import { WorldSnapshot } from "./snapshot";

export type TurnPhase = "collecting" | "resolving" | "committed";

/**
 * Anything that picks actions: player input, AI behaviours, replays.
 */
export interface ActionSource {
  decide(entity: Entity, snapshot: WorldSnapshot): Action | Promise<Action>;
}

/**
 * Picks the source responsible for an actor; actors without one wait.
 */
export type ActionSourceRouter = (entity: Entity) => ActionSource | undefined;

export interface TurnSchedulerOptions {
  readonly world: World;
  readonly map: GameMap;
  readonly combat: CombatResolver;
  /** Chebyshev reach of an attack. Default 1. */
  readonly attackRange?: number;
  /** Whether diagonal moves are legal. Default false. */
  readonly allowDiagonal?: boolean;
  readonly logger?: Logger;
}

type Submitted<T extends Action["type"]> = {
  readonly entity: Entity;
  readonly action: Extract<Action, { type: T }>;
};

export class TurnScheduler {
  private readonly world: World;
  private readonly map: GameMap;
  private readonly combat: CombatResolver;
  private readonly attackRange: number;
  private readonly allowDiagonal: boolean;
  private readonly logger: Logger;

  private readonly submitted = new Map<Entity, Action>();
  private readonly listeners = new Set<TurnListener>();
  private currentPhase: TurnPhase = "collecting";
  private currentTurn = 1;

  constructor(options: TurnSchedulerOptions) {
    this.world = options.world;
    this.map = options.map;
    this.combat = options.combat;
    this.attackRange = options.attackRange ?? 1;
    this.allowDiagonal = options.allowDiagonal ?? false;
    this.logger = options.logger ?? createLogger("TurnScheduler");
  }

  get phase(): TurnPhase {
    return this.currentPhase;
  }

  /** Number of the turn being collected or resolved; starts at 1. */
  get turn(): number {
    return this.currentTurn;
  }

  // ==========================================================================
  // Collecting
  // ==========================================================================

  /**
   * Living actors, ascending.
   */
  actors(): Entity[] {
    return this.world
      .store(ActorSchema)
      .entities()
      .filter((e) => this.world.isAlive(e))
      .sort(compareEntities);
  }

  pendingActors(): Entity[] {
    return this.actors().filter((e) => !this.submitted.has(e));
  }

  isReady(): boolean {
    return this.pendingActors().length === 0;
  }

  submit(entity: Entity, action: Action): Result<void, CoreError> {
    if (this.currentPhase !== "collecting") {
      return Err(
        new CoreError("WRONG_PHASE", `Cannot submit while ${this.currentPhase}`, {
          phase: this.currentPhase,
        }),
      );
    }
    if (!this.world.isAlive(entity) || !this.world.has(entity, ActorSchema)) {
      return Err(
        new CoreError("NOT_AN_ACTOR", `${entityToString(entity)} is not a living actor`, {
          entity,
        }),
      );
    }
    if (this.submitted.has(entity)) {
      return Err(
        new CoreError(
          "ACTION_ALREADY_SUBMITTED",
          `${entityToString(entity)} already acted this turn`,
          { entity, turn: this.currentTurn },
        ),
      );
    }

    this.submitted.set(entity, action);
    return Ok(undefined);
  }

  /**
   * Asks every pending actor's source for an action. Sources see one snapshot
   * taken up front and run concurrently; results are submitted in entity
   * order once all of them settled.
   */
  async collect(route: ActionSourceRouter): Promise<void> {
    this.assertPhase("collecting");

    const snapshot = WorldSnapshot.capture(this.world, this.map, this.currentTurn);
    const pending = this.pendingActors();

    const decisions = await Promise.all(
      pending.map(async (entity) => {
        const source = route(entity);
        if (source === undefined) {
          this.logger.debug(`No action source for ${entityToString(entity)}, waiting`);
          return WAIT;
        }
        return source.decide(entity, snapshot);
      }),
    );

    pending.forEach((entity, i) => {
      this.submit(entity, decisions[i]).tapErr((error) => {
        this.logger.warn(`Dropped action for ${entityToString(entity)}: ${error.message}`);
      });
    });
  }

  /**
   * Collects and resolves one full turn.
   */
  async runTurn(route: ActionSourceRouter): Promise<TurnResult> {
    await this.collect(route);
    return this.resolve();
  }

  /**
   * Subscribes to committed turns. Returns an unsubscribe function.
   */
  onCommit(listener: TurnListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ==========================================================================
  // Resolving
  // ==========================================================================

  /**
   * Applies every submitted action and commits the turn.
   * Throws TURN_NOT_READY while any actor is still pending.
   */
  resolve(): TurnResult {
    this.assertPhase("collecting");

    const pending = this.pendingActors();
    if (pending.length > 0) {
      throw new CoreError(
        "TURN_NOT_READY",
        `${pending.length} actor(s) have not submitted an action`,
        { pending },
      );
    }

    this.currentPhase = "resolving";
    const run = new TurnRun();

    const moves: Submitted<"move">[] = [];
    const attacks: Submitted<"attack">[] = [];
    const itemUses: Submitted<"use_item">[] = [];

    const ordered = [...this.submitted.keys()]
      .filter((e) => this.world.isAlive(e))
      .sort(compareEntities);
    for (const entity of ordered) {
      const action = this.submitted.get(entity);
      if (action === undefined) continue;
      switch (action.type) {
        case "move":
          moves.push({ entity, action });
          break;
        case "attack":
          attacks.push({ entity, action });
          break;
        case "use_item":
          itemUses.push({ entity, action });
          break;
        case "wait":
          break;
      }
    }

    for (const { entity, action } of moves) this.applyMove(run, entity, action);
    for (const { entity, action } of attacks) this.applyAttack(run, entity, action);
    for (const { entity, action } of itemUses) this.applyItemUse(run, entity, action);

    return this.commit(run);
  }

  private applyMove(
    run: TurnRun,
    entity: Entity,
    action: Extract<Action, { type: "move" }>,
  ): void {
    if (!this.canAct(entity)) return;

    const position = this.world.getMut(entity, PositionSchema);
    if (position === undefined) {
      this.logger.debug(`${entityToString(entity)} cannot move without a Position`);
      return;
    }

    const from: Point = { x: position.x, y: position.y };
    const to = step(from, action.direction);
    const delta = DIRECTION_DELTAS[action.direction];
    const diagonal = delta.x !== 0 && delta.y !== 0;

    if ((diagonal && !this.allowDiagonal) || !this.map.isPassable(to)) {
      run.blocked(entity, to, "impassable");
      return;
    }

    const moved = this.world.spatial.moveEntity(entity, from, to);
    if (moved.isErr()) {
      if (moved.error.code === "CELL_OCCUPIED") {
        run.blocked(entity, to, "occupied");
      } else {
        this.logger.warn(`Move of ${entityToString(entity)} rejected: ${moved.error.message}`);
      }
      return;
    }

    position.x = to.x;
    position.y = to.y;
    run.emit({ type: "moved", entity, from, to: { x: to.x, y: to.y } });
  }

  private applyAttack(
    run: TurnRun,
    entity: Entity,
    action: Extract<Action, { type: "attack" }>,
  ): void {
    if (!this.canAct(entity)) return;

    const target = action.target;
    if (!this.world.isAlive(target)) {
      this.logger.warn(`${entityToString(entity)} attacked a stale target ${entityToString(target)}`);
      return;
    }
    if (!this.canAct(target)) {
      this.logger.debug(`${entityToString(target)} is already down`);
      return;
    }

    const from = this.world.get(entity, PositionSchema);
    const at = this.world.get(target, PositionSchema);
    if (from === undefined || at === undefined || chebyshevDistance(from, at) > this.attackRange) {
      this.logger.debug(`${entityToString(target)} is out of reach of ${entityToString(entity)}`);
      return;
    }

    const health = this.world.getMut(target, HealthSchema);
    const outcome = this.combat.resolve(
      { stats: this.world.get(entity, CombatStatsSchema), health: this.world.get(entity, HealthSchema) },
      { stats: this.world.get(target, CombatStatsSchema), health },
    );

    if (outcome.isErr()) {
      this.logger.debug(`Attack by ${entityToString(entity)} ignored: ${outcome.error.message}`);
      return;
    }
    if (health === undefined) return;

    const { hit, damage } = outcome.value;
    if (!hit) {
      run.emit({ type: "missed", entity, target });
      return;
    }

    health.current = Math.max(0, health.current - damage);
    run.emit({ type: "damaged", entity: target, amount: damage, source: entity });
    if (health.current <= 0) {
      run.died(target);
    }
  }

  private applyItemUse(
    run: TurnRun,
    entity: Entity,
    action: Extract<Action, { type: "use_item" }>,
  ): void {
    if (!this.canAct(entity)) return;

    const item = action.item;
    const inventory = this.world.getMut(entity, InventorySchema);
    const slot = inventory?.items.indexOf(item) ?? -1;
    if (inventory === undefined || slot === -1) {
      this.logger.debug(`${entityToString(entity)} does not carry ${entityToString(item)}`);
      return;
    }

    const consumable = this.world.isAlive(item)
      ? this.world.get(item, ConsumableSchema)
      : undefined;
    const health = this.world.getMut(entity, HealthSchema);
    if (consumable === undefined || health === undefined) {
      this.logger.debug(`${entityToString(item)} has no effect on ${entityToString(entity)}`);
      return;
    }

    const healed = Math.max(0, Math.min(consumable.heal, health.max - health.current));
    health.current += healed;
    inventory.items.splice(slot, 1);

    run.emit({ type: "healed", entity, amount: healed });
    run.emit({ type: "item_used", entity, item });
    run.consumed.push(item);
  }

  // ==========================================================================
  // Commit
  // ==========================================================================

  private commit(run: TurnRun): TurnResult {
    const dead = this.world
      .store(HealthSchema)
      .entities()
      .filter((e) => (this.world.get(e, HealthSchema)?.current ?? 1) <= 0)
      .sort(compareEntities);

    const destroyed: Entity[] = [];
    for (const entity of dead) {
      run.died(entity);
      const carried = this.world.get(entity, InventorySchema)?.items ?? [];
      destroyed.push(entity, ...carried);
    }
    destroyed.push(...run.consumed);

    for (const entity of destroyed) {
      if (this.world.isAlive(entity)) this.world.destroy(entity);
    }

    const result = freezeTurnResult(this.currentTurn, run.events);
    this.currentPhase = "committed";

    try {
      for (const listener of this.listeners) listener(result);
    } finally {
      this.submitted.clear();
      this.currentTurn++;
      this.currentPhase = "collecting";
    }

    if (dead.length > 0) {
      this.logger.info(`Turn ${result.turn}: ${dead.length} entit(ies) died`);
    }
    return result;
  }

  /**
   * Actors at 0 HP do nothing for the rest of the turn.
   */
  private canAct(entity: Entity): boolean {
    const health = this.world.get(entity, HealthSchema);
    return health === undefined || health.current > 0;
  }

  private assertPhase(expected: TurnPhase): void {
    if (this.currentPhase !== expected) {
      throw new CoreError(
        "WRONG_PHASE",
        `Expected phase ${expected}, scheduler is ${this.currentPhase}`,
        { phase: this.currentPhase },
      );
    }
  }
}

/**
 * Mutable event log of the turn being resolved.
 */
class TurnRun {
  readonly events: TurnEvent[] = [];
  readonly consumed: Entity[] = [];
  private readonly announcedDeaths = new Set<Entity>();

  emit(event: TurnEvent): void {
    this.events.push(event);
  }

  blocked(entity: Entity, at: Point, reason: BlockedReason): void {
    this.emit({ type: "blocked", entity, at: { x: at.x, y: at.y }, reason });
  }

  /**
   * Emits `died` at most once per entity.
   */
  died(entity: Entity): void {
    if (this.announcedDeaths.has(entity)) return;
    this.announcedDeaths.add(entity);
    this.emit({ type: "died", entity });
  }
}
