import { beforeEach, describe, expect, it } from "vitest";
import { EntityRegistry } from "../src/core/entity-registry";
import type { Entity } from "../src/core/types";
import { SpatialIndex } from "../src/spatial/spatial-index";

describe("SpatialIndex", () => {
  let registry: EntityRegistry;
  let index: SpatialIndex;
  let goblin: Entity;
  let orc: Entity;
  let potion: Entity;

  beforeEach(() => {
    registry = new EntityRegistry(16);
    index = new SpatialIndex(5, 4);
    registry.addDropListener(index);
    goblin = registry.create();
    orc = registry.create();
    potion = registry.create();
  });

  describe("place", () => {
    it("should put a blocker on a free cell", () => {
      expect(index.place(goblin, { x: 1, y: 1 }).isOk()).toBe(true);
      expect(index.blockerAt({ x: 1, y: 1 })).toBe(goblin);
      expect(index.locate(goblin)).toEqual({ x: 1, y: 1 });
    });

    it("should refuse a second blocker with CELL_OCCUPIED", () => {
      index.place(goblin, { x: 1, y: 1 });
      const result = index.place(orc, { x: 1, y: 1 });

      expect(result.isErr()).toBe(true);
      expect(result.error.code).toBe("CELL_OCCUPIED");
      expect(index.locate(orc)).toBeUndefined();
    });

    it("should let non-blocking entities share a blocked cell", () => {
      index.place(goblin, { x: 2, y: 2 });
      expect(index.place(potion, { x: 2, y: 2 }, { blocking: false }).isOk()).toBe(true);

      expect([...index.query({ x: 2, y: 2 })]).toEqual([goblin, potion]);
    });

    it("should let a blocker join a cell that only holds items", () => {
      index.place(potion, { x: 0, y: 0 }, { blocking: false });

      expect(index.place(goblin, { x: 0, y: 0 }).isOk()).toBe(true);
    });

    it("should reject coordinates outside the grid", () => {
      expect(index.place(goblin, { x: 5, y: 0 }).error.code).toBe("OUT_OF_BOUNDS");
      expect(index.place(goblin, { x: 0, y: -1 }).error.code).toBe("OUT_OF_BOUNDS");
    });

    it("should reject placing the same entity twice", () => {
      index.place(goblin, { x: 0, y: 0 });

      expect(index.place(goblin, { x: 1, y: 0 }).error.code).toBe("ALREADY_PLACED");
    });
  });

  describe("moveEntity", () => {
    it("should vacate the old cell and occupy the new one", () => {
      index.place(goblin, { x: 0, y: 0 });

      expect(index.moveEntity(goblin, { x: 0, y: 0 }, { x: 1, y: 0 }).isOk()).toBe(true);
      expect(index.isBlocked({ x: 0, y: 0 })).toBe(false);
      expect(index.blockerAt({ x: 1, y: 0 })).toBe(goblin);
    });

    it("should change nothing when the target is occupied", () => {
      index.place(goblin, { x: 0, y: 0 });
      index.place(orc, { x: 1, y: 0 });

      const result = index.moveEntity(goblin, { x: 0, y: 0 }, { x: 1, y: 0 });

      expect(result.error.code).toBe("CELL_OCCUPIED");
      expect(index.blockerAt({ x: 0, y: 0 })).toBe(goblin);
      expect(index.blockerAt({ x: 1, y: 0 })).toBe(orc);
      expect(index.locate(goblin)).toEqual({ x: 0, y: 0 });
    });

    it("should change nothing when the target is out of bounds", () => {
      index.place(goblin, { x: 4, y: 3 });

      expect(index.moveEntity(goblin, { x: 4, y: 3 }, { x: 5, y: 3 }).error.code).toBe(
        "OUT_OF_BOUNDS",
      );
      expect(index.locate(goblin)).toEqual({ x: 4, y: 3 });
    });

    it("should fail with NOT_PLACED when the entity is elsewhere", () => {
      index.place(goblin, { x: 0, y: 0 });

      expect(index.moveEntity(goblin, { x: 2, y: 2 }, { x: 3, y: 2 }).error.code).toBe(
        "NOT_PLACED",
      );
      expect(index.moveEntity(orc, { x: 0, y: 0 }, { x: 0, y: 1 }).error.code).toBe(
        "NOT_PLACED",
      );
    });

    it("should move items onto blocked cells", () => {
      index.place(goblin, { x: 1, y: 1 });
      index.place(potion, { x: 0, y: 1 }, { blocking: false });

      expect(index.moveEntity(potion, { x: 0, y: 1 }, { x: 1, y: 1 }).isOk()).toBe(true);
      expect(index.query({ x: 0, y: 1 }).size).toBe(0);
      expect(index.query({ x: 1, y: 1 }).has(potion)).toBe(true);
    });
  });

  it("should forget destroyed entities", () => {
    index.place(goblin, { x: 3, y: 3 });
    registry.destroy(goblin);

    expect(index.isBlocked({ x: 3, y: 3 })).toBe(false);
    expect(index.size).toBe(0);
  });

  it("should freeze blockers in a snapshot", () => {
    index.place(goblin, { x: 0, y: 0 });
    const snapshot = index.snapshot();
    index.moveEntity(goblin, { x: 0, y: 0 }, { x: 0, y: 1 });

    expect(snapshot.blockerAt({ x: 0, y: 0 })).toBe(goblin);
    expect(snapshot.isBlocked({ x: 0, y: 1 })).toBe(false);
    expect(index.blockerAt({ x: 0, y: 1 })).toBe(goblin);
  });

  it("should return an empty set for empty or out-of-bounds cells", () => {
    expect(index.query({ x: 0, y: 0 }).size).toBe(0);
    expect(index.query({ x: 99, y: 99 }).size).toBe(0);
  });
});
