import { describe, expect, it } from "vitest";
import { PropertyTileSource, TileGrid, UniformTileSource, ownSides } from "./tiles.js";
import { resolveCollisions } from "./collider.js";
import { rect } from "./rect.js";
import { vec2 } from "./math.js";
import type { BlockingSides } from "./types.js";

/**
 * 4x4 grid of 16-unit cells with a solid floor row and a single tile at (2, 2).
 */
function createTestGrid(): TileGrid<string> {
  const grid = new TileGrid<string>({ columns: 4, rows: 4, cellWidth: 16, cellHeight: 16 });
  for (let column = 0; column < 4; column++) {
    grid.set(column, 0, "floor");
  }
  grid.set(2, 2, "block");
  return grid;
}

describe("TileGrid", () => {
  describe("creation", () => {
    it("starts empty when no cells are given", () => {
      const grid = new TileGrid<string>({ columns: 2, rows: 2, cellWidth: 8, cellHeight: 8 });
      expect(grid.get(0, 0)).toBeNull();
      expect(grid.bounds).toEqual(rect(0, 0, 16, 16));
    });

    it("places the grid at its origin", () => {
      const grid = new TileGrid<string>({
        columns: 2,
        rows: 3,
        cellWidth: 8,
        cellHeight: 4,
        origin: vec2(100, -20),
      });
      expect(grid.bounds).toEqual(rect(100, -20, 16, 12));
      expect(grid.cellRect(1, 2)).toEqual(rect(108, -12, 8, 4));
    });

    it("rejects a cell count that does not match the size", () => {
      expect(
        () => new TileGrid({ columns: 2, rows: 2, cellWidth: 8, cellHeight: 8, cells: ["a", null, "b"] }),
      ).toThrow("[TileGrid] Expected 4 cells for a 2x2 grid, got 3");
    });

    it("rejects non-positive cell sizes", () => {
      expect(() => new TileGrid({ columns: 2, rows: 2, cellWidth: 0, cellHeight: 8 })).toThrow(
        "[TileGrid] Cell size must be positive. Got: 0x8",
      );
    });
  });

  describe("get and set", () => {
    it("reads row-major cells with row 0 at the bottom", () => {
      const grid = new TileGrid({ columns: 2, rows: 2, cellWidth: 8, cellHeight: 8, cells: ["a", "b", null, "d"] });
      expect(grid.get(0, 0)).toBe("a");
      expect(grid.get(1, 0)).toBe("b");
      expect(grid.get(0, 1)).toBeNull();
      expect(grid.get(1, 1)).toBe("d");
    });

    it("returns null outside the grid and refuses to write there", () => {
      const grid = createTestGrid();
      expect(grid.get(-1, 0)).toBeNull();
      expect(grid.get(4, 0)).toBeNull();
      expect(() => grid.set(4, 0, "x")).toThrow("[TileGrid] Cell (4, 0) is outside the 4x4 grid");
    });
  });

  describe("cellsInRegion", () => {
    it("returns the non-empty cells overlapping the region", () => {
      const grid = createTestGrid();
      const cells = grid.cellsInRegion(rect(20, 4, 8, 8));

      expect(cells.map((cell) => [cell.column, cell.row, cell.tile])).toEqual([[1, 0, "floor"]]);
      expect(cells[0]?.rect).toEqual(rect(16, 0, 16, 16));
    });

    it("includes cells that only touch the region", () => {
      const grid = createTestGrid();
      // Region sits on the floor row and meets the block at a corner
      const cells = grid.cellsInRegion(rect(20, 16, 12, 16));

      expect(cells.map((cell) => [cell.column, cell.row])).toEqual([
        [1, 0],
        [2, 0],
        [2, 2],
      ]);
    });

    it("clips regions reaching outside the grid", () => {
      const grid = createTestGrid();
      const cells = grid.cellsInRegion(rect(-40, -40, 60, 50));

      expect(cells.map((cell) => [cell.column, cell.row])).toEqual([
        [0, 0],
        [1, 0],
      ]);
    });

    it("throws for regions outside the grid when configured to", () => {
      const grid = new TileGrid<string>({ columns: 4, rows: 4, cellWidth: 16, cellHeight: 16, outOfBounds: "throw" });
      expect(() => grid.cellsInRegion(rect(-1, 0, 8, 8))).toThrow(
        "[TileGrid] Region (-1, 0, 8x8) is outside the grid",
      );
      expect(grid.cellsInRegion(rect(0, 0, 64, 64))).toEqual([]);
    });
  });
});

describe("UniformTileSource", () => {
  it("blocks every face of every tile", () => {
    const source = new UniformTileSource(createTestGrid());
    const [cell] = source.query(rect(0, 0, 8, 8));

    expect(cell).toBeDefined();
    if (cell) {
      expect(source.bounds(cell)).toEqual(rect(0, 0, 16, 16));
      expect(source.blocks()).toBe(true);
    }
  });

  it("lands an actor on the floor row", () => {
    const result = resolveCollisions(
      rect(4, 20, 8, 8),
      rect(4, 12, 8, 8),
      vec2(0, -8),
      new UniformTileSource(createTestGrid()),
    );

    expect(result.rect).toEqual(rect(4, 16, 8, 8));
    expect(result.bumpedY).toBe(true);
  });
});

describe("PropertyTileSource", () => {
  const platform: Partial<BlockingSides> = { top: true };
  const solid: BlockingSides = { left: true, right: true, top: true, bottom: true };

  function createPropertyGrid(): TileGrid<Partial<BlockingSides>> {
    const grid = new TileGrid<Partial<BlockingSides>>({ columns: 4, rows: 4, cellWidth: 16, cellHeight: 16 });
    grid.set(1, 1, platform);
    grid.set(3, 1, solid);
    return grid;
  }

  it("reads each face from the tile's flags", () => {
    const source = new PropertyTileSource(createPropertyGrid(), ownSides);
    const [cell] = source.query(rect(16, 16, 8, 8));

    expect(cell?.tile).toBe(platform);
    if (cell) {
      expect(source.blocks(cell, "top")).toBe(true);
      expect(source.blocks(cell, "bottom")).toBe(false);
      expect(source.blocks(cell, "left")).toBe(false);
      expect(source.blocks(cell, "right")).toBe(false);
    }
  });

  it("uses a custom accessor for the flags", () => {
    const grid = new TileGrid<string>({ columns: 1, rows: 1, cellWidth: 16, cellHeight: 16, cells: ["ladder-top"] });
    const source = new PropertyTileSource(grid, (tile) => (tile === "ladder-top" ? { top: true } : {}));
    const [cell] = source.query(rect(0, 0, 4, 4));

    expect(cell && source.blocks(cell, "top")).toBe(true);
    expect(cell && source.blocks(cell, "left")).toBe(false);
  });

  it("passes through a one-way tile from below and lands on it from above", () => {
    const source = new PropertyTileSource(createPropertyGrid(), ownSides);

    const up = resolveCollisions(rect(20, 6, 8, 8), rect(20, 20, 8, 8), vec2(0, 14), source);
    expect(up.rect).toEqual(rect(20, 20, 8, 8));
    expect(up.bumpedY).toBe(false);

    const down = resolveCollisions(rect(20, 36, 8, 8), rect(20, 28, 8, 8), vec2(0, -8), source);
    expect(down.rect).toEqual(rect(20, 32, 8, 8));
    expect(down.bumpedY).toBe(true);
  });

  it("opens a secret passage through an override", () => {
    const source = new PropertyTileSource(createPropertyGrid(), ownSides);
    const walk = () => resolveCollisions(rect(36, 20, 8, 8), rect(44, 20, 8, 8), vec2(8, 0), source);

    expect(walk().rect).toEqual(rect(40, 20, 8, 8));

    source.setOverride(3, 1, { left: false });
    expect(walk().rect).toEqual(rect(44, 20, 8, 8));

    source.clearOverride(3, 1);
    expect(walk().rect).toEqual(rect(40, 20, 8, 8));
  });

  it("merges overrides for the same cell", () => {
    const source = new PropertyTileSource(createPropertyGrid(), ownSides);
    source.setOverride(1, 1, { top: false });
    source.setOverride(1, 1, { bottom: true });

    const [cell] = source.query(rect(16, 16, 8, 8));
    expect(cell && source.blocks(cell, "top")).toBe(false);
    expect(cell && source.blocks(cell, "bottom")).toBe(true);
  });
});
