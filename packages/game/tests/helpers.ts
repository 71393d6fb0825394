import type { CoreConfigInput, MapCell } from "@delve/contracts";
import { type CombatPolicy, fixedDamagePolicy } from "../src/combat/combat-policy";
import { GameMap } from "../src/map/game-map";
import { TextMapProvider } from "../src/map/text-map-provider";
import { createGameWorld, type GameSession } from "../src/world";

/**
 * Builds a quiet session over a text map. Combat always hits for 1 unless
 * another policy is given.
 */
export function createSession(
  rows: string[],
  config: CoreConfigInput = {},
  combatPolicy: CombatPolicy = fixedDamagePolicy(1),
): GameSession {
  return createGameWorld({
    provider: new TextMapProvider(rows),
    config: { logLevel: "silent", ...config },
    combatPolicy,
  }).getOrThrow();
}

export function mapFromRows(rows: string[]): GameMap {
  return GameMap.fromDescriptor(new TextMapProvider(rows).generate(0)).getOrThrow();
}

export function mapFromCells(width: number, height: number, cells: MapCell[]): GameMap {
  return GameMap.fromDescriptor({ width, height, cells, spawnPoints: [] }).getOrThrow();
}

export const CORRIDOR = ["#######", "#.....#", "#######"];
