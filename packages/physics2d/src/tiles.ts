/**
 * Tile grids and the obstacle sources backed by them.
 *
 * Rows count upward from the grid origin (Y-up): row 0 is the bottom row.
 */

import type { BlockingSides, ObstacleSource, Rect, Side, Vector2 } from "./types.js";
import { rect, rectBottom, rectLeft, rectRight, rectTop } from "./rect.js";
import { vec2Zero } from "./math.js";

/**
 * A non-empty cell returned from a grid query.
 */
export interface TileCell<T> {
  readonly column: number;
  readonly row: number;
  readonly tile: T;
  /** World-space bounds of the cell */
  readonly rect: Rect;
}

export interface TileGridOptions<T> {
  columns: number;
  rows: number;
  cellWidth: number;
  cellHeight: number;
  /** World position of the bottom-left corner of cell (0, 0). Default: (0, 0) */
  origin?: Vector2;
  /** Row-major cells, bottom row first. Default: all empty */
  cells?: readonly (T | null)[];
  /**
   * How to treat a query region reaching outside the grid.
   * "clip" returns the cells inside, "throw" rejects the query.
   * Default: "clip"
   */
  outOfBounds?: "clip" | "throw";
}

// =============================================================================
// TileGrid
// =============================================================================

export class TileGrid<T> {
  readonly columns: number;
  readonly rows: number;
  readonly cellWidth: number;
  readonly cellHeight: number;
  readonly origin: Vector2;
  private readonly outOfBounds: "clip" | "throw";
  private readonly cells: (T | null)[];

  constructor(options: TileGridOptions<T>) {
    const { columns, rows, cellWidth, cellHeight } = options;

    if (!Number.isInteger(columns) || !Number.isInteger(rows) || columns <= 0 || rows <= 0) {
      throw new Error(`[TileGrid] columns and rows must be positive integers. Got: ${columns}x${rows}`);
    }
    if (!(cellWidth > 0) || !(cellHeight > 0)) {
      throw new Error(`[TileGrid] Cell size must be positive. Got: ${cellWidth}x${cellHeight}`);
    }
    if (options.cells && options.cells.length !== columns * rows) {
      throw new Error(
        `[TileGrid] Expected ${columns * rows} cells for a ${columns}x${rows} grid, got ${options.cells.length}`,
      );
    }

    this.columns = columns;
    this.rows = rows;
    this.cellWidth = cellWidth;
    this.cellHeight = cellHeight;
    this.origin = options.origin ?? vec2Zero;
    this.outOfBounds = options.outOfBounds ?? "clip";
    this.cells = options.cells ? [...options.cells] : new Array<T | null>(columns * rows).fill(null);
  }

  /** World-space bounds of the whole grid */
  get bounds(): Rect {
    return rect(this.origin.x, this.origin.y, this.columns * this.cellWidth, this.rows * this.cellHeight);
  }

  inBounds(column: number, row: number): boolean {
    return column >= 0 && column < this.columns && row >= 0 && row < this.rows;
  }

  get(column: number, row: number): T | null {
    if (!this.inBounds(column, row)) {
      return null;
    }
    return this.cells[row * this.columns + column] ?? null;
  }

  set(column: number, row: number, tile: T | null): void {
    if (!this.inBounds(column, row)) {
      throw new Error(`[TileGrid] Cell (${column}, ${row}) is outside the ${this.columns}x${this.rows} grid`);
    }
    this.cells[row * this.columns + column] = tile;
  }

  cellRect(column: number, row: number): Rect {
    return rect(
      this.origin.x + column * this.cellWidth,
      this.origin.y + row * this.cellHeight,
      this.cellWidth,
      this.cellHeight,
    );
  }

  /**
   * Every non-empty cell overlapping or touching `region`.
   */
  cellsInRegion(region: Rect): TileCell<T>[] {
    const gridBounds = this.bounds;
    if (
      this.outOfBounds === "throw" &&
      (rectLeft(region) < rectLeft(gridBounds) ||
        rectBottom(region) < rectBottom(gridBounds) ||
        rectRight(region) > rectRight(gridBounds) ||
        rectTop(region) > rectTop(gridBounds))
    ) {
      throw new Error(
        `[TileGrid] Region (${region.x}, ${region.y}, ${region.width}x${region.height}) is outside the grid`,
      );
    }

    // Cells sharing an edge with the region are included
    const firstColumn = Math.max(0, Math.ceil((rectLeft(region) - this.origin.x) / this.cellWidth) - 1);
    const lastColumn = Math.min(this.columns - 1, Math.floor((rectRight(region) - this.origin.x) / this.cellWidth));
    const firstRow = Math.max(0, Math.ceil((rectBottom(region) - this.origin.y) / this.cellHeight) - 1);
    const lastRow = Math.min(this.rows - 1, Math.floor((rectTop(region) - this.origin.y) / this.cellHeight));

    const found: TileCell<T>[] = [];
    for (let row = firstRow; row <= lastRow; row++) {
      for (let column = firstColumn; column <= lastColumn; column++) {
        const tile = this.get(column, row);
        if (tile !== null) {
          found.push({ column, row, tile, rect: this.cellRect(column, row) });
        }
      }
    }
    return found;
  }
}

// =============================================================================
// Sources
// =============================================================================

/**
 * Every non-empty tile is solid on all four faces.
 */
export class UniformTileSource<T> implements ObstacleSource<TileCell<T>> {
  constructor(readonly grid: TileGrid<T>) {}

  query(region: Rect): TileCell<T>[] {
    return this.grid.cellsInRegion(region);
  }

  bounds(cell: TileCell<T>): Rect {
    return cell.rect;
  }

  blocks(): boolean {
    return true;
  }
}

/**
 * Accessor for the blocking flags a tile carries. Missing flags do not block.
 */
export type TileSidesAccessor<T> = (tile: T) => Partial<BlockingSides>;

/** Accessor for tiles that are flag records themselves */
export const ownSides: TileSidesAccessor<Partial<BlockingSides>> = (tile) => tile;

const cellKey = (column: number, row: number): string => `${column},${row}`;

/**
 * Tiles block per face according to their own flags.
 *
 * A tile with only `top` set is a one-way platform. Overrides change a cell's
 * flags without touching the map data (e.g. open a secret passage).
 */
export class PropertyTileSource<T> implements ObstacleSource<TileCell<T>> {
  private readonly overrides = new Map<string, Partial<BlockingSides>>();

  constructor(
    readonly grid: TileGrid<T>,
    private readonly sidesOf: TileSidesAccessor<T>,
  ) {}

  query(region: Rect): TileCell<T>[] {
    return this.grid.cellsInRegion(region);
  }

  bounds(cell: TileCell<T>): Rect {
    return cell.rect;
  }

  blocks(cell: TileCell<T>, face: Side): boolean {
    const override = this.overrides.get(cellKey(cell.column, cell.row))?.[face];
    if (override !== undefined) {
      return override;
    }
    return this.sidesOf(cell.tile)[face] ?? false;
  }

  setOverride(column: number, row: number, sides: Partial<BlockingSides>): void {
    this.overrides.set(cellKey(column, row), { ...this.overrides.get(cellKey(column, row)), ...sides });
  }

  clearOverride(column: number, row: number): void {
    this.overrides.delete(cellKey(column, row));
  }
}
