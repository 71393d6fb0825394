/**
 * World Snapshot
 *
 * Frozen view of the world taken when a turn's decision phase starts.
 * Action sources read only from it, so decisions may run concurrently and
 * in any order without seeing each other's effects.
 */

import type { Point } from "@delve/contracts";
import {
  compareEntities,
  type Entity,
  type OccupancySnapshot,
  type World,
} from "@delve/ecs";
import type { AIData } from "../components/actor";
import { AISchema, PlayerSchema } from "../components/actor";
import { PositionSchema } from "../components/spatial";
import { CombatStatsSchema, HealthSchema } from "../components/stats";
import type { CombatStatsData, HealthData } from "../components/stats";
import type { GameMap } from "../map/game-map";

export interface EntityView {
  readonly entity: Entity;
  readonly position: Point;
  readonly health?: Readonly<HealthData>;
  readonly stats?: Readonly<CombatStatsData>;
  readonly ai?: Readonly<AIData>;
  readonly isPlayer: boolean;
}

export class WorldSnapshot {
  private constructor(
    readonly turn: number,
    readonly map: GameMap,
    readonly occupancy: OccupancySnapshot,
    private readonly views: ReadonlyMap<Entity, EntityView>,
    private readonly playerList: readonly Entity[],
  ) {}

  /**
   * Copies every positioned entity's combat-relevant state.
   */
  static capture(world: World, map: GameMap, turn: number): WorldSnapshot {
    const views = new Map<Entity, EntityView>();
    const players: Entity[] = [];

    for (const [entity, position] of world.store(PositionSchema).iterate()) {
      const health = world.get(entity, HealthSchema);
      const stats = world.get(entity, CombatStatsSchema);
      const ai = world.get(entity, AISchema);
      const isPlayer = world.has(entity, PlayerSchema);

      views.set(
        entity,
        Object.freeze({
          entity,
          position: Object.freeze({ x: position.x, y: position.y }),
          health: health && Object.freeze({ ...health }),
          stats: stats && Object.freeze({ ...stats }),
          ai: ai && Object.freeze({ ...ai }),
          isPlayer,
        }),
      );
      if (isPlayer) players.push(entity);
    }

    players.sort(compareEntities);
    return new WorldSnapshot(turn, map, world.spatial.snapshot(), views, Object.freeze(players));
  }

  view(entity: Entity): EntityView | undefined {
    return this.views.get(entity);
  }

  positionOf(entity: Entity): Point | undefined {
    return this.views.get(entity)?.position;
  }

  healthOf(entity: Entity): Readonly<HealthData> | undefined {
    return this.views.get(entity)?.health;
  }

  /**
   * Positioned player entities, ascending.
   */
  players(): readonly Entity[] {
    return this.playerList;
  }

  /**
   * Entities without health count as alive.
   */
  isStanding(entity: Entity): boolean {
    const view = this.views.get(entity);
    if (view === undefined) return false;
    return view.health === undefined || view.health.current > 0;
  }
}
