import { describe, expect, it, vi } from "vitest";
import { fixedDamagePolicy } from "../src/combat/combat-policy";
import { HealthSchema, InventorySchema, PositionSchema } from "../src/components";
import { TextMapProvider } from "../src/map/text-map-provider";
import { spawnItem, spawnMonster, spawnPlayer } from "../src/prefabs";
import { attack, move, useItem, WAIT } from "../src/turn/actions";
import type { TurnResult } from "../src/turn/events";
import type { WorldSnapshot } from "../src/turn/snapshot";
import type { ActionSource } from "../src/turn/turn-scheduler";
import { createGameWorld } from "../src/world";
import { CORRIDOR, createSession } from "./helpers";

describe("TurnScheduler", () => {
  describe("submit", () => {
    it("should reject entities that are not actors", () => {
      const session = createSession(CORRIDOR);
      const rock = session.world.spawn();

      const result = session.scheduler.submit(rock, WAIT);

      expect(result.error.code).toBe("NOT_AN_ACTOR");
    });

    it("should reject a second action in the same turn", () => {
      const session = createSession(CORRIDOR);
      const rat = spawnMonster(session.world, "rat", { x: 1, y: 1 }).getOrThrow();

      expect(session.scheduler.submit(rat, WAIT).isOk()).toBe(true);
      const second = session.scheduler.submit(rat, move("east"));

      expect(second.error.code).toBe("ACTION_ALREADY_SUBMITTED");
    });

    it("should track pending actors", () => {
      const session = createSession(CORRIDOR);
      const a = spawnMonster(session.world, "rat", { x: 1, y: 1 }).getOrThrow();
      const b = spawnMonster(session.world, "rat", { x: 3, y: 1 }).getOrThrow();

      session.scheduler.submit(b, WAIT);

      expect(session.scheduler.actors()).toEqual([a, b]);
      expect(session.scheduler.pendingActors()).toEqual([a]);
      expect(session.scheduler.isReady()).toBe(false);
    });
  });

  describe("resolve", () => {
    it("should throw TURN_NOT_READY while an actor is pending", () => {
      const session = createSession(CORRIDOR);
      spawnMonster(session.world, "rat", { x: 1, y: 1 }).getOrThrow();

      expect(() => session.scheduler.resolve()).toThrowError(
        "1 actor(s) have not submitted an action",
      );
      expect(session.scheduler.phase).toBe("collecting");
    });

    it("should give a contested cell to the lower id", () => {
      const session = createSession(CORRIDOR);
      const a = spawnMonster(session.world, "rat", { x: 1, y: 1 }).getOrThrow();
      const b = spawnMonster(session.world, "rat", { x: 3, y: 1 }).getOrThrow();

      session.scheduler.submit(b, move("west"));
      session.scheduler.submit(a, move("east"));
      const result = session.scheduler.resolve();

      expect(result.events).toEqual([
        { type: "moved", entity: a, from: { x: 1, y: 1 }, to: { x: 2, y: 1 } },
        { type: "blocked", entity: b, at: { x: 2, y: 1 }, reason: "occupied" },
      ]);
      expect(session.world.get(a, PositionSchema)).toEqual({ x: 2, y: 1 });
      expect(session.world.locate(a)).toEqual({ x: 2, y: 1 });
      expect(session.world.get(b, PositionSchema)).toEqual({ x: 3, y: 1 });
    });

    it("should let an actor follow into a cell vacated earlier in the turn", () => {
      const session = createSession(CORRIDOR);
      const a = spawnMonster(session.world, "rat", { x: 2, y: 1 }).getOrThrow();
      const b = spawnMonster(session.world, "rat", { x: 1, y: 1 }).getOrThrow();

      session.scheduler.submit(a, move("east"));
      session.scheduler.submit(b, move("east"));
      const result = session.scheduler.resolve();

      expect(result.events).toEqual([
        { type: "moved", entity: a, from: { x: 2, y: 1 }, to: { x: 3, y: 1 } },
        { type: "moved", entity: b, from: { x: 1, y: 1 }, to: { x: 2, y: 1 } },
      ]);
    });

    it("should block moves into walls and illegal diagonals", () => {
      const session = createSession(["#####", "#...#", "#...#", "#####"]);
      const a = spawnMonster(session.world, "rat", { x: 1, y: 1 }).getOrThrow();
      const b = spawnMonster(session.world, "rat", { x: 3, y: 1 }).getOrThrow();

      session.scheduler.submit(a, move("north"));
      session.scheduler.submit(b, move("southwest"));
      const result = session.scheduler.resolve();

      expect(result.events).toEqual([
        { type: "blocked", entity: a, at: { x: 1, y: 0 }, reason: "impassable" },
        { type: "blocked", entity: b, at: { x: 2, y: 2 }, reason: "impassable" },
      ]);
    });

    it("should allow diagonal moves when configured", () => {
      const session = createSession(["#####", "#...#", "#...#", "#####"], {
        movement: { allowDiagonal: true },
      });
      const a = spawnMonster(session.world, "rat", { x: 3, y: 1 }).getOrThrow();

      session.scheduler.submit(a, move("southwest"));
      const result = session.scheduler.resolve();

      expect(result.events).toEqual([
        { type: "moved", entity: a, from: { x: 3, y: 1 }, to: { x: 2, y: 2 } },
      ]);
    });

    it("should emit one damaged and one died event for a lethal hit", () => {
      const session = createSession(CORRIDOR, {}, fixedDamagePolicy(5));
      const a = spawnMonster(session.world, "goblin", { x: 1, y: 1 }).getOrThrow();
      const b = spawnMonster(session.world, "goblin", { x: 2, y: 1 }, { hp: 5 }).getOrThrow();

      session.scheduler.submit(a, attack(b));
      session.scheduler.submit(b, attack(a));
      const result = session.scheduler.resolve();

      expect(result).toEqual({
        turn: 1,
        events: [
          { type: "damaged", entity: b, amount: 5, source: a },
          { type: "died", entity: b },
        ],
      });
      expect(session.world.isAlive(b)).toBe(false);
      expect(session.world.spatial.isBlocked({ x: 2, y: 1 })).toBe(false);
      expect(session.world.get(a, HealthSchema)).toEqual({ current: 10, max: 10 });
    });

    it("should resolve moves before attacks", () => {
      const session = createSession(CORRIDOR, {}, fixedDamagePolicy(2));
      const a = spawnMonster(session.world, "goblin", { x: 1, y: 1 }).getOrThrow();
      const b = spawnMonster(session.world, "goblin", { x: 3, y: 1 }).getOrThrow();

      session.scheduler.submit(a, attack(b));
      session.scheduler.submit(b, move("west"));
      const result = session.scheduler.resolve();

      expect(result.events).toEqual([
        { type: "moved", entity: b, from: { x: 3, y: 1 }, to: { x: 2, y: 1 } },
        { type: "damaged", entity: b, amount: 2, source: a },
      ]);
      expect(session.world.get(b, HealthSchema)).toEqual({ current: 8, max: 10 });
    });

    it("should ignore attacks on targets out of reach", () => {
      const session = createSession(CORRIDOR, {}, fixedDamagePolicy(2));
      const a = spawnMonster(session.world, "goblin", { x: 1, y: 1 }).getOrThrow();
      const b = spawnMonster(session.world, "goblin", { x: 4, y: 1 }).getOrThrow();

      session.scheduler.submit(a, attack(b));
      session.scheduler.submit(b, WAIT);

      expect(session.scheduler.resolve().events).toEqual([]);
    });

    it("should ignore attacks on destroyed targets", () => {
      const session = createSession(CORRIDOR);
      const a = spawnMonster(session.world, "goblin", { x: 1, y: 1 }).getOrThrow();
      const b = spawnMonster(session.world, "goblin", { x: 2, y: 1 }).getOrThrow();

      session.scheduler.submit(a, attack(b));
      session.world.destroy(b);

      expect(session.scheduler.resolve().events).toEqual([]);
    });

    it("should emit missed when the policy misses", () => {
      const session = createSession(CORRIDOR, {}, {
        rollHit: () => false,
        damage: () => 3,
      });
      const a = spawnMonster(session.world, "goblin", { x: 1, y: 1 }).getOrThrow();
      const b = spawnMonster(session.world, "goblin", { x: 2, y: 1 }).getOrThrow();

      session.scheduler.submit(a, attack(b));
      session.scheduler.submit(b, WAIT);

      expect(session.scheduler.resolve().events).toEqual([
        { type: "missed", entity: a, target: b },
      ]);
    });

    it("should heal with a carried potion and destroy it", () => {
      const session = createSession(CORRIDOR);
      const hero = spawnPlayer(session.world, { x: 1, y: 1 }, { hp: 10 }).getOrThrow();
      const potion = spawnItem(session.world, hero, { heal: 10 }).getOrThrow();
      const health = session.world.getMut(hero, HealthSchema);
      if (health) health.current = 4;

      session.scheduler.submit(hero, useItem(potion));
      const result = session.scheduler.resolve();

      expect(result.events).toEqual([
        { type: "healed", entity: hero, amount: 6 },
        { type: "item_used", entity: hero, item: potion },
      ]);
      expect(session.world.get(hero, HealthSchema)).toEqual({ current: 10, max: 10 });
      expect(session.world.get(hero, InventorySchema)?.items).toEqual([]);
      expect(session.world.isAlive(potion)).toBe(false);
    });

    it("should ignore items the actor does not carry", () => {
      const session = createSession(CORRIDOR);
      const hero = spawnPlayer(session.world, { x: 1, y: 1 }).getOrThrow();
      const other = spawnPlayer(session.world, { x: 3, y: 1 }).getOrThrow();
      const potion = spawnItem(session.world, other, { heal: 5 }).getOrThrow();

      session.scheduler.submit(hero, useItem(potion));
      session.scheduler.submit(other, WAIT);

      expect(session.scheduler.resolve().events).toEqual([]);
      expect(session.world.isAlive(potion)).toBe(true);
    });

    it("should announce and remove entities left at zero health", () => {
      const session = createSession(CORRIDOR);
      const hero = spawnPlayer(session.world, { x: 1, y: 1 }).getOrThrow();
      const potion = spawnItem(session.world, hero, { heal: 5 }).getOrThrow();
      const health = session.world.getMut(hero, HealthSchema);
      if (health) health.current = 0;

      session.scheduler.submit(hero, move("east"));
      const result = session.scheduler.resolve();

      expect(result.events).toEqual([{ type: "died", entity: hero }]);
      expect(session.world.isAlive(hero)).toBe(false);
      expect(session.world.isAlive(potion)).toBe(false);
    });

    it("should advance the turn counter", () => {
      const session = createSession(CORRIDOR);
      const rat = spawnMonster(session.world, "rat", { x: 1, y: 1 }).getOrThrow();

      session.scheduler.submit(rat, WAIT);
      const first = session.scheduler.resolve();
      session.scheduler.submit(rat, WAIT);
      const second = session.scheduler.resolve();

      expect(first.turn).toBe(1);
      expect(second.turn).toBe(2);
      expect(session.scheduler.turn).toBe(3);
    });
  });

  describe("onCommit", () => {
    it("should hand listeners the frozen result", () => {
      const session = createSession(CORRIDOR);
      const rat = spawnMonster(session.world, "rat", { x: 1, y: 1 }).getOrThrow();
      const listener = vi.fn<(result: TurnResult) => void>();
      session.scheduler.onCommit(listener);

      session.scheduler.submit(rat, move("east"));
      const result = session.scheduler.resolve();

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith(result);
      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.events)).toBe(true);
      expect(Object.isFrozen(result.events[0])).toBe(true);
    });

    it("should refuse submissions from inside a listener", () => {
      const session = createSession(CORRIDOR);
      const rat = spawnMonster(session.world, "rat", { x: 1, y: 1 }).getOrThrow();
      const codes: string[] = [];
      session.scheduler.onCommit(() => {
        codes.push(session.scheduler.submit(rat, WAIT).error.code);
      });

      session.scheduler.submit(rat, WAIT);
      session.scheduler.resolve();

      expect(codes).toEqual(["WRONG_PHASE"]);
      expect(session.scheduler.phase).toBe("collecting");
    });

    it("should stop notifying after unsubscribing", () => {
      const session = createSession(CORRIDOR);
      const rat = spawnMonster(session.world, "rat", { x: 1, y: 1 }).getOrThrow();
      const listener = vi.fn();
      const unsubscribe = session.scheduler.onCommit(listener);

      unsubscribe();
      session.scheduler.submit(rat, WAIT);
      session.scheduler.resolve();

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe("collect", () => {
    it("should give every source the same pre-turn snapshot", async () => {
      const session = createSession(CORRIDOR);
      const a = spawnMonster(session.world, "rat", { x: 1, y: 1 }).getOrThrow();
      const b = spawnMonster(session.world, "rat", { x: 4, y: 1 }).getOrThrow();
      const seen: WorldSnapshot[] = [];

      const slow: ActionSource = {
        decide: async (_entity, snapshot) => {
          seen.push(snapshot);
          await new Promise((resolve) => setTimeout(resolve, 5));
          return move("east");
        },
      };
      const fast: ActionSource = {
        decide: (_entity, snapshot) => {
          seen.push(snapshot);
          return move("west");
        },
      };

      const result = await session.scheduler.runTurn((entity) => (entity === a ? slow : fast));

      expect(seen).toHaveLength(2);
      expect(seen[0]).toBe(seen[1]);
      expect(seen[0].positionOf(a)).toEqual({ x: 1, y: 1 });
      expect(result.events).toEqual([
        { type: "moved", entity: a, from: { x: 1, y: 1 }, to: { x: 2, y: 1 } },
        { type: "moved", entity: b, from: { x: 4, y: 1 }, to: { x: 3, y: 1 } },
      ]);
    });

    it("should make actors without a source wait", async () => {
      const session = createSession(CORRIDOR);
      const rat = spawnMonster(session.world, "rat", { x: 1, y: 1 }).getOrThrow();

      await session.scheduler.collect(() => undefined);

      expect(session.scheduler.pendingActors()).toEqual([]);
      expect(session.scheduler.resolve().events).toEqual([]);
      expect(session.world.get(rat, PositionSchema)).toEqual({ x: 1, y: 1 });
    });

    it("should keep actions submitted by hand", async () => {
      const session = createSession(CORRIDOR);
      const rat = spawnMonster(session.world, "rat", { x: 1, y: 1 }).getOrThrow();
      const decide = vi.fn(() => WAIT);

      session.scheduler.submit(rat, move("east"));
      const result = await session.scheduler.runTurn(() => ({ decide }));

      expect(decide).not.toHaveBeenCalled();
      expect(result.events).toHaveLength(1);
    });
  });

  describe("determinism", () => {
    const ROOM = ["#########", "#@......#", "#.......#", "#......S#", "#########"];

    async function play(): Promise<string> {
      const session = createGameWorld({
        provider: new TextMapProvider(ROOM),
        config: { seed: 7, logLevel: "silent" },
      }).getOrThrow();
      const hero = spawnPlayer(session.world, { x: 1, y: 1 }).getOrThrow();
      spawnMonster(session.world, "goblin", { x: 6, y: 3 }).getOrThrow();
      spawnMonster(session.world, "rat", { x: 7, y: 1 }).getOrThrow();
      session.players.enqueue(hero, move("east"), move("east"), move("south"));

      const results: TurnResult[] = [];
      for (let i = 0; i < 8; i++) {
        results.push(await session.runTurn());
      }
      return JSON.stringify(results);
    }

    it("should produce identical events from identical starts", async () => {
      const first = await play();
      const second = await play();

      expect(second).toBe(first);
    });
  });
});
