/**
 * Level loading for the platformer.
 *
 * Levels are JSON files: an ASCII tile map (top row first), a legend mapping
 * characters to blocking faces, free-form objects and a spawn point.
 *
 * @example
 * ```typescript
 * const level = await loadBundledLevel("tutorial");
 * const { combined } = buildLevelSources(level);
 * const actor = createActor(combined, level.spawn);
 * ```
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  CompositeObstacleSource,
  FreeObjectSource,
  PropertyTileSource,
  TileGrid,
  rect,
} from "@tilebump/physics2d";
import type { BlockingSides, MapObject, TileCell, Vector2 } from "@tilebump/physics2d";
import type {
  LegendEntry,
  LevelConfig,
  LevelObject,
  LevelTile,
  LevelValidationResult,
} from "./types.js";

/** Character for empty space in level rows */
export const EMPTY_TILE = ".";

/** Directory holding the bundled level files */
export const LEVELS_DIR = fileURLToPath(new URL("../levels/", import.meta.url));

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const optionalBoolean = (value: unknown): boolean | undefined =>
  typeof value === "boolean" ? value : undefined;

const optionalString = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

// =============================================================================
// Level Validation
// =============================================================================

/**
 * Validate a level configuration.
 * Errors make the level unusable; warnings flag likely mistakes.
 *
 * @param level - The level config to validate
 * @returns Validation result with errors and warnings
 */
export function validateLevel(level: LevelConfig): LevelValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  // Check required fields
  if (level.id.trim() === "") {
    errors.push("Level must have an id");
  }
  if (level.name.trim() === "") {
    errors.push("Level must have a name");
  }
  if (!(level.tileSize > 0)) {
    errors.push(`Tile size must be positive, got ${level.tileSize}`);
  }

  // Check the tile map
  const width = level.rows[0]?.length ?? 0;
  if (level.rows.length === 0 || width === 0) {
    errors.push("Level must have at least one non-empty row");
  }

  for (const char of Object.keys(level.legend)) {
    if (char.length !== 1) {
      errors.push(`Legend key must be a single character: "${char}"`);
    } else if (char === EMPTY_TILE) {
      errors.push(`Legend must not redefine "${EMPTY_TILE}"`);
    }
  }

  const usedChars = new Set<string>();
  level.rows.forEach((row, index) => {
    if (row.length !== width) {
      errors.push(`Row ${index} has length ${row.length}, expected ${width}`);
    }
    for (const char of row) {
      if (char === EMPTY_TILE) continue;
      usedChars.add(char);
      if (!(char in level.legend)) {
        errors.push(`Row ${index} uses unknown tile "${char}"`);
      }
    }
  });

  for (const [char, entry] of Object.entries(level.legend)) {
    if (!usedChars.has(char)) {
      warnings.push(`Legend tile "${char}" is never used`);
    }
    const sides = legendSides(entry);
    if (!sides.left && !sides.right && !sides.top && !sides.bottom) {
      warnings.push(`Legend tile "${char}" blocks no side`);
    }
  }

  // Check for duplicate object IDs
  const objectIds = new Set<string>();
  for (const object of level.objects) {
    if (objectIds.has(object.id)) {
      errors.push(`Duplicate object ID: ${object.id}`);
    }
    objectIds.add(object.id);

    if (!(object.width > 0) || !(object.height > 0)) {
      errors.push(`Object ${object.id} has invalid dimensions`);
    }
    if (!Number.isFinite(object.x) || !Number.isFinite(object.y)) {
      errors.push(`Object ${object.id} must have finite coordinates`);
    }
  }

  // Check the spawn point
  if (!Number.isFinite(level.spawn.x) || !Number.isFinite(level.spawn.y)) {
    errors.push("Spawn point must have finite coordinates");
  } else if (errors.length === 0) {
    const mapBounds = rect(0, 0, width * level.tileSize, level.rows.length * level.tileSize);
    const { x, y } = level.spawn;
    if (x < mapBounds.x || x >= mapBounds.width || y < mapBounds.y || y >= mapBounds.height) {
      warnings.push("Spawn point is outside the tile map");
    }

    // A spawn inside a solid tile starts the actor embedded in it
    const grid = buildLevelGrid(level);
    const spawnCell = grid.get(Math.floor(x / level.tileSize), Math.floor(y / level.tileSize));
    if (spawnCell && spawnCell.sides.left && spawnCell.sides.right && spawnCell.sides.top && spawnCell.sides.bottom) {
      warnings.push(`Spawn point is inside solid tile "${spawnCell.char}"`);
    }
    for (const object of level.objects) {
      if (
        !object.oneWay &&
        x > object.x &&
        x < object.x + object.width &&
        y > object.y &&
        y < object.y + object.height
      ) {
        warnings.push(`Spawn point is inside object ${object.id}`);
      }
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse and validate a level from JSON.
 *
 * @param json - The JSON string or already-parsed value
 * @returns The validated level config
 * @throws Error if the JSON is invalid or the level fails validation
 */
export function parseLevelFromJson(json: string | object): LevelConfig {
  let data: unknown;

  if (typeof json === "string") {
    try {
      data = JSON.parse(json);
    } catch (error) {
      throw new Error(`[Level] Invalid JSON format: ${error instanceof Error ? error.message : String(error)}`);
    }
  } else {
    data = json;
  }

  if (!isRecord(data)) {
    throw new Error("[Level] Level must be an object");
  }

  const level = data;

  // Required fields
  if (typeof level.id !== "string") {
    throw new Error("[Level] Level must have a string 'id' field");
  }
  if (typeof level.name !== "string") {
    throw new Error("[Level] Level must have a string 'name' field");
  }
  if (typeof level.tileSize !== "number") {
    throw new Error("[Level] Level must have a numeric 'tileSize' field");
  }
  const rows = level.rows;
  if (!Array.isArray(rows) || !rows.every((row): row is string => typeof row === "string")) {
    throw new Error("[Level] Level must have a 'rows' array of strings");
  }

  // Parse legend
  const legend: Record<string, LegendEntry> = {};
  if (level.legend !== undefined) {
    if (!isRecord(level.legend)) {
      throw new Error("[Level] 'legend' must be an object");
    }
    for (const [char, entry] of Object.entries(level.legend)) {
      if (!isRecord(entry)) {
        throw new Error(`[Level] Legend entry "${char}" must be an object`);
      }
      legend[char] = {
        solid: optionalBoolean(entry.solid),
        left: optionalBoolean(entry.left),
        right: optionalBoolean(entry.right),
        top: optionalBoolean(entry.top),
        bottom: optionalBoolean(entry.bottom),
        tag: optionalString(entry.tag),
      };
    }
  }

  // Parse objects
  const objects: LevelObject[] = [];
  if (Array.isArray(level.objects)) {
    for (const o of level.objects) {
      if (!isRecord(o)) continue;
      objects.push({
        id: String(o.id ?? `object-${objects.length}`),
        x: Number(o.x ?? 0),
        y: Number(o.y ?? 0),
        width: Number(o.width ?? level.tileSize),
        height: Number(o.height ?? level.tileSize),
        oneWay: optionalBoolean(o.oneWay),
        tag: optionalString(o.tag),
      });
    }
  }

  const config: LevelConfig = {
    id: level.id,
    name: level.name,
    description: optionalString(level.description),
    tileSize: level.tileSize,
    rows,
    legend,
    objects,
    spawn: parseVector2(level.spawn),
  };

  const validation = validateLevel(config);
  if (!validation.valid) {
    throw new Error(`[Level] Level validation failed: ${validation.errors.join(", ")}`);
  }
  for (const warning of validation.warnings) {
    console.warn(`[Level] ${config.id}: ${warning}`);
  }

  return config;
}

/**
 * Helper to parse a Vector2 from unknown data
 */
function parseVector2(data: unknown): Vector2 {
  if (!isRecord(data)) {
    return { x: 0, y: 0 };
  }
  return {
    x: Number(data.x ?? 0),
    y: Number(data.y ?? 0),
  };
}

/**
 * Read and parse a level file.
 */
export async function loadLevel(path: string): Promise<LevelConfig> {
  const json = await readFile(path, "utf8");
  return parseLevelFromJson(json);
}

/**
 * Load one of the levels shipped with this package by ID.
 */
export async function loadBundledLevel(levelId: string): Promise<LevelConfig> {
  if (!/^[\w-]+$/.test(levelId)) {
    throw new Error(`[Level] Invalid level ID: ${levelId}`);
  }
  return loadLevel(join(LEVELS_DIR, `${levelId}.json`));
}

// =============================================================================
// Obstacle Sources
// =============================================================================

/**
 * Blocking faces of a legend entry. `solid` sets all four; explicit flags
 * override it.
 */
export function legendSides(entry: LegendEntry): BlockingSides {
  const solid = entry.solid ?? false;
  return {
    left: entry.left ?? solid,
    right: entry.right ?? solid,
    top: entry.top ?? solid,
    bottom: entry.bottom ?? solid,
  };
}

const objectRect = (object: LevelObject) => rect(object.x, object.y, object.width, object.height);

/**
 * Build the tile grid of a level. Row 0 of the grid is the last row of the
 * file.
 */
export function buildLevelGrid(level: LevelConfig): TileGrid<LevelTile> {
  const columns = level.rows[0]?.length ?? 0;
  const tiles = new Map<string, LevelTile>();
  for (const [char, entry] of Object.entries(level.legend)) {
    tiles.set(char, { char, sides: legendSides(entry), tag: entry.tag });
  }

  const cells: (LevelTile | null)[] = [];
  for (let row = level.rows.length - 1; row >= 0; row--) {
    for (const char of level.rows[row] ?? "") {
      cells.push(tiles.get(char) ?? null);
    }
  }

  return new TileGrid({
    columns,
    rows: level.rows.length,
    cellWidth: level.tileSize,
    cellHeight: level.tileSize,
    cells,
  });
}

export function buildLevelObjects(level: LevelConfig): MapObject[] {
  return level.objects.map((object) => ({
    id: object.id,
    rect: objectRect(object),
    oneWay: object.oneWay,
    tag: object.tag,
  }));
}

export interface LevelSources {
  grid: TileGrid<LevelTile>;
  tiles: PropertyTileSource<LevelTile>;
  objects: FreeObjectSource;
  /** Tiles and objects queried as one source */
  combined: CompositeObstacleSource<TileCell<LevelTile> | MapObject>;
}

/**
 * Build the obstacle sources a MapCollider needs for a level.
 */
export function buildLevelSources(level: LevelConfig): LevelSources {
  const grid = buildLevelGrid(level);
  const tiles = new PropertyTileSource(grid, (tile: LevelTile) => tile.sides);
  const objects = new FreeObjectSource(buildLevelObjects(level));
  const combined = new CompositeObstacleSource<TileCell<LevelTile> | MapObject>()
    .add("tiles", tiles)
    .add("objects", objects);

  return { grid, tiles, objects, combined };
}
