import { beforeAll, describe, expect, it, vi } from "vitest";
import { RapierObjectSource, initPhysics } from "./world.js";
import { resolveCollisions } from "./collider.js";
import { rect } from "./rect.js";
import { vec2 } from "./math.js";
import type { MapObject } from "./types.js";

// Initialize Rapier WASM once before all tests
beforeAll(async () => {
  await initPhysics();
});

const floor: MapObject = { id: "floor", rect: rect(-50, -10, 100, 10), tag: "ground" };
const wall: MapObject = { id: "wall", rect: rect(20, 0, 10, 40) };
const ledge: MapObject = { id: "ledge", rect: rect(-40, 20, 20, 2), oneWay: true };

const ids = (objects: MapObject[]): string[] => objects.map((object) => object.id).sort();

describe("RapierObjectSource", () => {
  describe("create", () => {
    it("indexes the given objects", () => {
      const source = RapierObjectSource.create([floor, wall, ledge]);
      expect(source.size).toBe(3);
    });

    it("rejects duplicate IDs", () => {
      expect(() => RapierObjectSource.create([wall, wall])).toThrow("[RapierObjectSource] Duplicate object ID: wall");
    });
  });

  describe("query", () => {
    it("returns the objects overlapping the region", () => {
      const source = RapierObjectSource.create([floor, wall, ledge]);

      expect(ids(source.query(rect(15, 5, 10, 10)))).toEqual(["wall"]);
      expect(ids(source.query(rect(-30, -5, 60, 10)))).toEqual(["floor", "wall"]);
      expect(source.query(rect(60, 60, 5, 5))).toEqual([]);
    });

    it("returns the stored objects themselves", () => {
      const source = RapierObjectSource.create([wall]);
      const [found] = source.query(rect(21, 1, 2, 2));
      expect(found).toBe(wall);
      expect(found && source.bounds(found)).toEqual(rect(20, 0, 10, 40));
    });
  });

  describe("blocks", () => {
    it("blocks one-way objects only from the top", () => {
      const source = RapierObjectSource.create([ledge]);
      expect(source.blocks(ledge, "top")).toBe(true);
      expect(source.blocks(ledge, "bottom")).toBe(false);
      expect(source.blocks(wall, "left")).toBe(true);
    });
  });

  describe("add, remove and move", () => {
    it("updates query results immediately", () => {
      const source = RapierObjectSource.create([floor]);

      source.add(wall);
      expect(ids(source.query(rect(21, 1, 2, 2)))).toEqual(["wall"]);

      expect(source.remove("wall")).toBe(true);
      expect(source.remove("wall")).toBe(false);
      expect(source.query(rect(21, 1, 2, 2))).toEqual([]);
    });

    it("moves an object to new bounds", () => {
      const source = RapierObjectSource.create([wall]);

      const moved = source.move("wall", rect(100, 0, 10, 40));
      expect(moved.rect).toEqual(rect(100, 0, 10, 40));
      expect(source.query(rect(21, 1, 2, 2))).toEqual([]);
      expect(ids(source.query(rect(101, 1, 2, 2)))).toEqual(["wall"]);
      expect(() => source.move("gone", rect(0, 0, 1, 1))).toThrow("[RapierObjectSource] Unknown object ID: gone");
    });
  });

  describe("with resolveCollisions", () => {
    it("stops an actor flush against a wall", () => {
      const source = RapierObjectSource.create([floor, wall]);
      const onBumpRight = vi.fn();

      const result = resolveCollisions(
        rect(0, 0, 10, 10),
        rect(15, 0, 10, 10),
        vec2(15, 0),
        source,
        { kind: "stop" },
        { handlers: { onBumpRight } },
      );

      expect(result.rect).toEqual(rect(10, 0, 10, 10));
      expect(onBumpRight).toHaveBeenCalledWith(wall, { obstacle: wall, side: "right" });
    });

    it("lands on a one-way ledge from above", () => {
      const source = RapierObjectSource.create([floor, ledge]);

      const result = resolveCollisions(rect(-35, 30, 8, 8), rect(-35, 18, 8, 8), vec2(0, -12), source);

      expect(result.rect).toEqual(rect(-35, 22, 8, 8));
      expect(result.bumpedY).toBe(true);
    });
  });
});
