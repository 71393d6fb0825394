/**
 * Prefabs
 *
 * Spawn helpers for players, monsters and items. Each one either fully
 * creates the entity (components plus spatial placement) or leaves the world
 * untouched and returns the reason.
 */

import {
  CoreError,
  Err,
  Ok,
  type Point,
  type Result,
} from "@delve/contracts";
import { type Entity, entityToString, type World } from "@delve/ecs";
import {
  type AIBehavior,
  ActorSchema,
  AISchema,
  NameSchema,
  PlayerSchema,
} from "../components/actor";
import { ConsumableSchema, InventorySchema } from "../components/items";
import { BlockingSchema, PositionSchema } from "../components/spatial";
import {
  type CombatStatsData,
  CombatStatsSchema,
  HealthSchema,
} from "../components/stats";

// ============================================================================
// Templates
// ============================================================================

export interface MonsterTemplate {
  readonly name: string;
  readonly hp: number;
  readonly stats: Readonly<CombatStatsData>;
  readonly behavior: AIBehavior;
  readonly detectionRange: number;
}

export const MONSTER_TEMPLATES = {
  rat: {
    name: "Rat",
    hp: 4,
    stats: { attack: 1, defense: 0, power: 1 },
    behavior: { kind: "idle" },
    detectionRange: 4,
  },
  goblin: {
    name: "Goblin",
    hp: 10,
    stats: { attack: 4, defense: 2, power: 3 },
    behavior: { kind: "aggressive" },
    detectionRange: 8,
  },
  orc: {
    name: "Orc",
    hp: 16,
    stats: { attack: 6, defense: 4, power: 5 },
    behavior: { kind: "aggressive" },
    detectionRange: 6,
  },
  kobold: {
    name: "Kobold",
    hp: 6,
    stats: { attack: 3, defense: 1, power: 2 },
    behavior: { kind: "fleeing" },
    detectionRange: 6,
  },
} as const satisfies Record<string, MonsterTemplate>;

export type MonsterKind = keyof typeof MONSTER_TEMPLATES;

export interface PlayerOptions {
  readonly name?: string;
  readonly hp?: number;
  readonly stats?: Readonly<CombatStatsData>;
  readonly inventoryCapacity?: number;
}

export interface MonsterOverrides {
  readonly behavior?: AIBehavior;
  readonly detectionRange?: number;
  readonly hp?: number;
  readonly stats?: Readonly<CombatStatsData>;
}

export interface ItemOptions {
  readonly name?: string;
  readonly heal: number;
}

// ============================================================================
// Spawning
// ============================================================================

export function spawnPlayer(
  world: World,
  at: Point,
  options: PlayerOptions = {},
): Result<Entity, CoreError> {
  const hp = options.hp ?? 30;
  return spawnActor(world, at, (entity) => {
    world.insert(entity, PlayerSchema, {});
    world.insert(entity, NameSchema, { value: options.name ?? "Hero" });
    world.insert(entity, HealthSchema, { current: hp, max: hp });
    world.insert(entity, CombatStatsSchema, {
      ...(options.stats ?? { attack: 5, defense: 3, power: 4 }),
    });
    world.insert(entity, InventorySchema, {
      items: [],
      capacity: options.inventoryCapacity ?? 10,
    });
  });
}

export function spawnMonster(
  world: World,
  kind: MonsterKind | MonsterTemplate,
  at: Point,
  overrides: MonsterOverrides = {},
): Result<Entity, CoreError> {
  const template: MonsterTemplate =
    typeof kind === "string" ? MONSTER_TEMPLATES[kind] : kind;
  const hp = overrides.hp ?? template.hp;

  return spawnActor(world, at, (entity) => {
    world.insert(entity, NameSchema, { value: template.name });
    world.insert(entity, HealthSchema, { current: hp, max: hp });
    world.insert(entity, CombatStatsSchema, { ...(overrides.stats ?? template.stats) });
    world.insert(entity, AISchema, {
      behavior: overrides.behavior ?? template.behavior,
      detectionRange: overrides.detectionRange ?? template.detectionRange,
    });
  });
}

/**
 * Creates a consumable straight into `owner`'s inventory.
 */
export function spawnItem(
  world: World,
  owner: Entity,
  options: ItemOptions,
): Result<Entity, CoreError> {
  const inventory = world.isAlive(owner)
    ? world.getMut(owner, InventorySchema)
    : undefined;
  if (inventory === undefined) {
    return Err(
      CoreError.missingCapability(`${entityToString(owner)} has no Inventory`, {
        owner,
        missing: "Inventory",
      }),
    );
  }
  if (inventory.items.length >= inventory.capacity) {
    return Err(
      new CoreError("CAPACITY_EXCEEDED", `${entityToString(owner)}'s inventory is full`, {
        owner,
        capacity: inventory.capacity,
      }),
    );
  }

  const item = world.spawn();
  world.insert(item, NameSchema, { value: options.name ?? "Potion" });
  world.insert(item, ConsumableSchema, { heal: options.heal });
  inventory.items.push(item);
  return Ok(item);
}

/**
 * Spawns a blocking actor on `at`, or nothing if the cell cannot take it.
 */
function spawnActor(
  world: World,
  at: Point,
  build: (entity: Entity) => void,
): Result<Entity, CoreError> {
  const entity = world.spawn();
  const placed = world.spatial.place(entity, at, { blocking: true });
  if (placed.isErr()) {
    world.destroy(entity);
    return Err(placed.error);
  }

  world.insert(entity, PositionSchema, { x: at.x, y: at.y });
  world.insert(entity, BlockingSchema, {});
  world.insert(entity, ActorSchema, {});
  build(entity);
  return Ok(entity);
}
