/**
 * Obstacle source construction and composition.
 */

import type { MapObject, ObstacleSource, Rect, Side } from "./types.js";
import { FreeObjectSource } from "./objects.js";
import type { TileGrid, TileSidesAccessor } from "./tiles.js";
import { PropertyTileSource, UniformTileSource } from "./tiles.js";

// =============================================================================
// Configuration
// =============================================================================

export interface UniformSourceConfig<T> {
  readonly variant: "uniform";
  readonly grid: TileGrid<T>;
}

export interface PerSidePropsSourceConfig<T> {
  readonly variant: "perSideProps";
  readonly grid: TileGrid<T>;
  readonly sidesOf: TileSidesAccessor<T>;
}

export interface FreeObjectsSourceConfig {
  readonly variant: "freeObjects";
  readonly objects: readonly MapObject[];
}

export type ObstacleSourceConfig<T> =
  | UniformSourceConfig<T>
  | PerSidePropsSourceConfig<T>
  | FreeObjectsSourceConfig;

/**
 * Build one of the stock obstacle sources from its configuration.
 */
export function createObstacleSource<T>(config: UniformSourceConfig<T>): UniformTileSource<T>;
export function createObstacleSource<T>(config: PerSidePropsSourceConfig<T>): PropertyTileSource<T>;
export function createObstacleSource(config: FreeObjectsSourceConfig): FreeObjectSource;
export function createObstacleSource<T>(
  config: ObstacleSourceConfig<T>,
): UniformTileSource<T> | PropertyTileSource<T> | FreeObjectSource {
  switch (config.variant) {
    case "uniform":
      return new UniformTileSource(config.grid);
    case "perSideProps":
      return new PropertyTileSource(config.grid, config.sidesOf);
    case "freeObjects":
      return new FreeObjectSource(config.objects);
  }
}

// =============================================================================
// Composite
// =============================================================================

/**
 * An obstacle from one layer of a composite source.
 */
export interface LayeredObstacle<T> {
  readonly layer: string;
  readonly obstacle: T;
  readonly rect: Rect;
  blocks(face: Side): boolean;
}

interface Layer<T> {
  readonly name: string;
  query(region: Rect): LayeredObstacle<T>[];
}

/**
 * Query several sources as one, e.g. a tile layer plus an object layer.
 *
 * @example
 * ```typescript
 * const map = new CompositeObstacleSource<TileCell<LevelTile> | MapObject>()
 *   .add("tiles", tiles)
 *   .add("objects", platforms);
 * ```
 */
export class CompositeObstacleSource<T> implements ObstacleSource<LayeredObstacle<T>> {
  private readonly layers: Layer<T>[] = [];

  add<U extends T>(name: string, source: ObstacleSource<U>): this {
    if (this.layers.some((layer) => layer.name === name)) {
      throw new Error(`[CompositeObstacleSource] Duplicate layer: ${name}`);
    }
    this.layers.push({
      name,
      query: (region) =>
        Array.from(source.query(region), (obstacle) => ({
          layer: name,
          obstacle,
          rect: source.bounds(obstacle),
          blocks: (face: Side) => source.blocks(obstacle, face),
        })),
    });
    return this;
  }

  query(region: Rect): LayeredObstacle<T>[] {
    return this.layers.flatMap((layer) => layer.query(region));
  }

  bounds(obstacle: LayeredObstacle<T>): Rect {
    return obstacle.rect;
  }

  blocks(obstacle: LayeredObstacle<T>, face: Side): boolean {
    return obstacle.blocks(face);
  }

  get layerNames(): string[] {
    return this.layers.map((layer) => layer.name);
  }
}
