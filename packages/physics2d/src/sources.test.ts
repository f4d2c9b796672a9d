import { describe, expect, it, vi } from "vitest";
import { CompositeObstacleSource, createObstacleSource } from "./sources.js";
import { FreeObjectSource, objectBlocks } from "./objects.js";
import { PropertyTileSource, TileGrid, UniformTileSource, ownSides } from "./tiles.js";
import type { TileCell } from "./tiles.js";
import { resolveCollisions } from "./collider.js";
import { rect } from "./rect.js";
import { vec2 } from "./math.js";
import type { BlockingSides, MapObject } from "./types.js";

const crate: MapObject = { id: "crate", rect: rect(0, 0, 10, 10), tag: "crate" };
const ledge: MapObject = { id: "ledge", rect: rect(20, 0, 10, 2), oneWay: true };

describe("FreeObjectSource", () => {
  it("returns objects overlapping or touching the region", () => {
    const source = new FreeObjectSource([crate, ledge]);

    expect(source.query(rect(5, 5, 2, 2))).toEqual([crate]);
    expect(source.query(rect(10, 0, 10, 5))).toEqual([crate, ledge]);
    expect(source.query(rect(40, 40, 5, 5))).toEqual([]);
  });

  it("blocks every face unless the object is one-way", () => {
    expect(objectBlocks(crate, "left")).toBe(true);
    expect(objectBlocks(crate, "bottom")).toBe(true);
    expect(objectBlocks(ledge, "top")).toBe(true);
    expect(objectBlocks(ledge, "left")).toBe(false);
    expect(objectBlocks(ledge, "bottom")).toBe(false);
  });

  it("rejects duplicate IDs", () => {
    expect(() => new FreeObjectSource([crate, crate])).toThrow("[FreeObjectSource] Duplicate object ID: crate");
  });

  it("moves and removes objects between frames", () => {
    const source = new FreeObjectSource([crate]);

    const moved = source.move("crate", rect(100, 0, 10, 10));
    expect(moved).toEqual({ ...crate, rect: rect(100, 0, 10, 10) });
    expect(source.query(rect(0, 0, 10, 10))).toEqual([]);
    expect(source.get("crate")).toEqual(moved);

    expect(source.remove("crate")).toBe(true);
    expect(source.remove("crate")).toBe(false);
    expect(source.size).toBe(0);
    expect(() => source.move("crate", rect(0, 0, 1, 1))).toThrow("[FreeObjectSource] Unknown object ID: crate");
  });

  it("carries an actor along a moving platform's new position", () => {
    const platform: MapObject = { id: "lift", rect: rect(0, 0, 40, 4) };
    const source = new FreeObjectSource([platform]);
    source.move("lift", rect(0, 6, 40, 4));

    // The lift rose; its top is now at y=10
    const result = resolveCollisions(rect(10, 12, 8, 8), rect(10, 8, 8, 8), vec2(0, -4), source);
    expect(result.rect).toEqual(rect(10, 10, 8, 8));
  });
});

describe("createObstacleSource", () => {
  const grid = new TileGrid<Partial<BlockingSides>>({
    columns: 2,
    rows: 1,
    cellWidth: 16,
    cellHeight: 16,
    cells: [{ top: true }, null],
  });

  it("builds a uniform tile source", () => {
    const source = createObstacleSource({ variant: "uniform", grid });
    expect(source).toBeInstanceOf(UniformTileSource);
    expect(source.query(rect(0, 0, 32, 16))).toHaveLength(1);
  });

  it("builds a per-side property source", () => {
    const source = createObstacleSource({ variant: "perSideProps", grid, sidesOf: ownSides });
    expect(source).toBeInstanceOf(PropertyTileSource);

    const [cell] = source.query(rect(0, 0, 8, 8));
    expect(cell && source.blocks(cell, "left")).toBe(false);
  });

  it("builds a free object source", () => {
    const source = createObstacleSource({ variant: "freeObjects", objects: [crate] });
    expect(source).toBeInstanceOf(FreeObjectSource);
    expect(source.size).toBe(1);
  });
});

describe("CompositeObstacleSource", () => {
  function createComposite() {
    const grid = new TileGrid<string>({ columns: 4, rows: 1, cellWidth: 16, cellHeight: 16, cells: ["#", "#", "#", "#"] });
    return new CompositeObstacleSource<TileCell<string> | MapObject>()
      .add("tiles", new UniformTileSource(grid))
      .add("objects", new FreeObjectSource([{ id: "wall", rect: rect(40, 16, 8, 40) }]));
  }

  it("queries every layer", () => {
    const source = createComposite();
    const found = source.query(rect(30, 16, 12, 8));

    expect(found.map((hit) => hit.layer)).toEqual(["tiles", "tiles", "objects"]);
    expect(source.layerNames).toEqual(["tiles", "objects"]);
  });

  it("resolves against tiles and objects in one call", () => {
    const onBumpRight = vi.fn();
    const onBumpBottom = vi.fn();

    const result = resolveCollisions(
      rect(20, 20, 8, 8),
      rect(30, 14, 8, 8),
      vec2(10, -6),
      createComposite(),
      { kind: "stop" },
      { handlers: { onBumpRight, onBumpBottom } },
    );

    expect(result.rect).toEqual(rect(30, 16, 8, 8));
    expect(result.bumpedX).toBe(false);
    expect(result.bumpedY).toBe(true);
    expect(onBumpBottom).toHaveBeenCalledTimes(2);
    expect(onBumpRight).not.toHaveBeenCalled();
  });

  it("stops at an object layered over the tiles", () => {
    const onBumpRight = vi.fn();

    const result = resolveCollisions(
      rect(20, 16, 8, 8),
      rect(36, 16, 8, 8),
      vec2(16, 0),
      createComposite(),
      { kind: "stop" },
      { handlers: { onBumpRight } },
    );

    expect(result.rect).toEqual(rect(32, 16, 8, 8));
    expect(onBumpRight).toHaveBeenCalledTimes(1);
    expect(onBumpRight.mock.calls[0]?.[0]).toMatchObject({ layer: "objects", obstacle: { id: "wall" } });
  });

  it("rejects duplicate layer names", () => {
    expect(() => createComposite().add("tiles", new FreeObjectSource())).toThrow(
      "[CompositeObstacleSource] Duplicate layer: tiles",
    );
  });
});
