/**
 * @tilebump/physics2d
 *
 * Collision resolution for axis-aligned actors against tile maps and
 * free-form map objects.
 *
 * Key design: resolution is stateless. The obstacle source is only queried,
 * never mutated, and the bump flags of a move are returned with its result
 * instead of being stored on the collider.
 */

// Core types
export type {
  Vector2,
  Rect,
  Side,
  Axis,
  BlockingSides,
  ObstacleSource,
  MapObject,
  BumpEvent,
  BumpHandlers,
  CollisionResult,
  BumpResponsePolicy,
  BumpPolicyConfig,
  InvalidInputMode,
  MapColliderConfig,
} from "./types.js";

export { DEFAULT_MAP_COLLIDER_CONFIG } from "./types.js";

// Math utilities
export {
  vec2,
  vec2Zero,
  add,
  sub,
  scale,
  withComponent,
  isFiniteVector,
  lerp,
  smoothDamp,
} from "./math.js";

// Rects
export {
  rect,
  rectFromEdges,
  rectFromCenter,
  rectLeft,
  rectRight,
  rectBottom,
  rectTop,
  rectCenter,
  sideEdge,
  oppositeSide,
  translateRect,
  withX,
  withY,
  unionRect,
  rectsOverlap,
  rectsTouch,
  rectEquals,
} from "./rect.js";

// Bump policies
export { stopPolicy, stopAllPolicy, bouncePolicy, createBumpPolicy } from "./policies.js";

// Obstacle sources
export type { TileCell, TileGridOptions, TileSidesAccessor } from "./tiles.js";
export { TileGrid, UniformTileSource, PropertyTileSource, ownSides } from "./tiles.js";
export { FreeObjectSource, objectBlocks } from "./objects.js";
export { RapierObjectSource, initPhysics } from "./world.js";
export type {
  ObstacleSourceConfig,
  UniformSourceConfig,
  PerSidePropsSourceConfig,
  FreeObjectsSourceConfig,
  LayeredObstacle,
} from "./sources.js";
export { createObstacleSource, CompositeObstacleSource } from "./sources.js";

// Collider
export type { ResolveOptions } from "./collider.js";
export { MapCollider, createMapCollider, resolveCollisions } from "./collider.js";
