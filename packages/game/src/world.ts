import {
  type CoreConfig,
  type CoreError,
  createLogger,
  deriveSeed,
  type Logger,
  type LogSink,
  parseCoreConfig,
  type Result,
  SeededRandom,
} from "@delve/contracts";
import { type Entity, World } from "@delve/ecs";
import { AIActionSource } from "./ai/ai-action-source";
import type { TargetSelector } from "./ai/targeting";
import { type CombatPolicy, standardCombatPolicy } from "./combat/combat-policy";
import { CombatResolver } from "./combat/combat-resolver";
import { AISchema, PlayerSchema, registerGameComponents } from "./components";
import { PlayerActionSource } from "./input/player-action-source";
import { GameMap, type MapProvider } from "./map/game-map";
import { Pathfinder } from "./pathfinding/pathfinder";
import type { TurnResult } from "./turn/events";
import {
  type ActionSource,
  type ActionSourceRouter,
  TurnScheduler,
} from "./turn/turn-scheduler";

/** Salt separating the combat stream from the map and AI streams. */
const COMBAT_STREAM = 0x636f6d62;

export interface GameWorldOptions {
  readonly provider: MapProvider;
  /** Raw configuration; validated and completed with defaults. */
  readonly config?: unknown;
  readonly combatPolicy?: CombatPolicy;
  readonly selectTarget?: TargetSelector;
  readonly logSink?: LogSink;
}

/**
 * Everything one game needs, wired together.
 */
export class GameSession {
  readonly players = new PlayerActionSource();
  readonly ai: AIActionSource;
  readonly route: ActionSourceRouter;

  constructor(
    readonly config: CoreConfig,
    readonly map: GameMap,
    readonly world: World,
    readonly pathfinder: Pathfinder,
    readonly combat: CombatResolver,
    readonly scheduler: TurnScheduler,
    readonly logger: Logger,
    selectTarget?: TargetSelector,
  ) {
    this.ai = new AIActionSource({
      pathfinder,
      seed: config.seed,
      ai: config.ai,
      attackRange: config.combat.attackRange,
      allowDiagonal: config.movement.allowDiagonal,
      selectTarget,
      logger: logger.child("AI"),
    });
    this.route = (entity) => this.sourceFor(entity);
    // Input queued for players who died is never drained
    scheduler.onCommit(() => this.players.retain((e) => world.isAlive(e)));
  }

  /**
   * Players act from their input queue, AI entities from their behaviour.
   */
  sourceFor(entity: Entity): ActionSource | undefined {
    if (this.world.has(entity, PlayerSchema)) return this.players;
    if (this.world.has(entity, AISchema)) return this.ai;
    return undefined;
  }

  runTurn(): Promise<TurnResult> {
    return this.scheduler.runTurn(this.route);
  }
}

/**
 * Create and configure a new game from a map provider.
 *
 * @example
 * ```typescript
 * const session = createGameWorld({
 *   provider: new TextMapProvider(["#####", "#@.S#", "#####"]),
 *   config: { seed: 42 },
 * }).getOrThrow();
 *
 * const [start] = session.map.spawnPoints;
 * const player = spawnPlayer(session.world, start).getOrThrow();
 * session.players.enqueue(player, move("east"));
 * const result = await session.runTurn();
 * ```
 */
export function createGameWorld(
  options: GameWorldOptions,
): Result<GameSession, CoreError> {
  return parseCoreConfig(options.config ?? {}).andThen((config) => {
    const logger = createLogger("Game", config.logLevel, options.logSink);

    return GameMap.fromDescriptor(options.provider.generate(config.seed)).map((map) => {
      const world = new World({
        maxEntities: config.maxEntities,
        bounds: { width: map.width, height: map.height },
      });
      registerGameComponents(world);

      const pathfinder = new Pathfinder(map, {
        allowDiagonal: config.movement.allowDiagonal,
      });
      const { attackRange, ...tuning } = config.combat;
      const combat = new CombatResolver(
        options.combatPolicy ??
          standardCombatPolicy(new SeededRandom(deriveSeed(config.seed, COMBAT_STREAM)), tuning),
      );
      const scheduler = new TurnScheduler({
        world,
        map,
        combat,
        attackRange,
        allowDiagonal: config.movement.allowDiagonal,
        logger: logger.child("TurnScheduler"),
      });

      logger.info(`Map ${map.width}x${map.height} ready with ${map.spawnPoints.length} spawn point(s)`);
      return new GameSession(
        config,
        map,
        world,
        pathfinder,
        combat,
        scheduler,
        logger,
        options.selectTarget,
      );
    });
  });
}
