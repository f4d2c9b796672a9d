/**
 * @tilebump/platformer
 *
 * A platformer actor driven by the MapCollider, and JSON levels that build
 * the obstacle sources it moves through.
 */

// Types
export type {
  ActorConfig,
  ActorHooks,
  DerivedPhysics,
  MovementState,
  CollisionState,
  MovementInput,
  LegendEntry,
  LevelTile,
  LevelObject,
  LevelConfig,
  LevelValidationResult,
} from "./types.js";

// Movement system
export {
  DEFAULT_ACTOR_CONFIG,
  derivePhysics,
  createMovementState,
  createCollisionState,
  updateMovement,
} from "./movement.js";

// Actor
export type { ActorOptions } from "./actor.js";
export { Actor, createActor } from "./actor.js";

// Levels
export type { LevelSources } from "./levels.js";
export {
  EMPTY_TILE,
  LEVELS_DIR,
  validateLevel,
  parseLevelFromJson,
  loadLevel,
  loadBundledLevel,
  legendSides,
  buildLevelGrid,
  buildLevelObjects,
  buildLevelSources,
} from "./levels.js";
