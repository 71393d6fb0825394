/**
 * @delve/game
 *
 * Game rules on top of the ECS: components, map, pathfinding, combat, the
 * turn scheduler and AI.
 */

export * from "./components";
export { GameMap, type MapProvider } from "./map/game-map";
export {
  DEFAULT_LEGEND,
  type LegendEntry,
  TextMapProvider,
} from "./map/text-map-provider";
export { MinHeap, type MinHeapCompare } from "./pathfinding/min-heap";
export {
  pathCost,
  Pathfinder,
  type PathOptions,
  type PathResult,
} from "./pathfinding/pathfinder";
export {
  type CombatPolicy,
  type CombatTuning,
  DEFAULT_COMBAT_TUNING,
  fixedDamagePolicy,
  hitChance,
  standardCombatPolicy,
  standardDamage,
} from "./combat/combat-policy";
export {
  type CombatantView,
  type CombatOutcome,
  CombatResolver,
} from "./combat/combat-resolver";
export {
  type Action,
  type ActionType,
  attack,
  move,
  useItem,
  WAIT,
} from "./turn/actions";
export {
  type BlockedReason,
  freezeTurnResult,
  type TurnEvent,
  type TurnEventType,
  type TurnListener,
  type TurnResult,
} from "./turn/events";
export { type EntityView, WorldSnapshot } from "./turn/snapshot";
export {
  type ActionSource,
  type ActionSourceRouter,
  type TurnPhase,
  TurnScheduler,
  type TurnSchedulerOptions,
} from "./turn/turn-scheduler";
export {
  BEHAVIORS,
  type BehaviorTable,
  type BehaviorTuning,
  type DecisionContext,
  decideFor,
  stepAway,
  stepToward,
  wander,
} from "./ai/behaviors";
export { nearestPlayer, type TargetSelector } from "./ai/targeting";
export { AIActionSource, type AIActionSourceOptions } from "./ai/ai-action-source";
export { PlayerActionSource } from "./input/player-action-source";
export {
  type ItemOptions,
  MONSTER_TEMPLATES,
  type MonsterKind,
  type MonsterOverrides,
  type MonsterTemplate,
  type PlayerOptions,
  spawnItem,
  spawnMonster,
  spawnPlayer,
} from "./prefabs";
export { createGameWorld, GameSession, type GameWorldOptions } from "./world";
