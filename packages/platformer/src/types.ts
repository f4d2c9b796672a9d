import type { BlockingSides, BumpHandlers, Vector2 } from "@tilebump/physics2d";

/**
 * Actor physics configuration.
 *
 * These values define the "game feel" - how the character moves and responds.
 * They are derived from desired behavior, not arbitrary constants.
 */
export interface ActorConfig {
  // --- Jump ---
  /** Maximum jump height when holding jump (units) */
  maxJumpHeight: number;
  /** Minimum jump height when tapping jump (units) */
  minJumpHeight: number;
  /** Time to reach jump apex (seconds) */
  timeToJumpApex: number;

  // --- Movement ---
  /** Horizontal movement speed (units/second) */
  moveSpeed: number;
  /** Time to reach full speed on ground (seconds) */
  accelerationTimeGrounded: number;
  /** Time to reach full speed in air (seconds) */
  accelerationTimeAirborne: number;

  // --- Walls ---
  /** Maximum fall speed when sliding on wall (units/second) */
  wallSlideSpeedMax: number;
}

/**
 * Physics values derived from actor config.
 *
 * These are calculated once from the config using physics formulas.
 * This ensures the jump arc is physically correct - the actor will
 * reach exactly maxJumpHeight in exactly timeToJumpApex seconds.
 */
export interface DerivedPhysics {
  /** Gravity acceleration (negative in Y-up) */
  gravity: number;
  /** Initial velocity for max height jump */
  maxJumpVelocity: number;
  /** Initial velocity for min height jump (tap) */
  minJumpVelocity: number;
}

/**
 * Movement state that persists across frames.
 */
export interface MovementState {
  /** Current velocity */
  velocity: Vector2;
  /** Smoothing value for horizontal velocity (for smoothDamp) */
  velocityXSmoothing: number;
  /** Whether jump was pressed last frame (for detecting press edge) */
  jumpWasPressedLastFrame: boolean;
}

/**
 * Which of the actor's faces touched something during the last step.
 */
export interface CollisionState {
  /** Touching ceiling */
  above: boolean;
  /** Touching ground */
  below: boolean;
  /** Touching wall on left */
  left: boolean;
  /** Touching wall on right */
  right: boolean;
}

/**
 * Input for platformer movement.
 *
 * This is a minimal interface - games should extend this with their own
 * input types (shooting, abilities, etc.)
 */
export interface MovementInput {
  /** Horizontal movement direction (-1 to 1) */
  moveX: number;
  /** Whether jump is held */
  jump: boolean;
}

/**
 * Game hooks an actor forwards its bumps to (damage, sounds, animations).
 */
export type ActorHooks<T> = BumpHandlers<T>;

// =============================================================================
// Levels
// =============================================================================

/**
 * What a legend character in a level's rows stands for.
 */
export interface LegendEntry {
  /** Shorthand for all four faces */
  readonly solid?: boolean;
  readonly left?: boolean;
  readonly right?: boolean;
  readonly top?: boolean;
  readonly bottom?: boolean;
  readonly tag?: string;
}

/**
 * A tile placed in a level grid.
 */
export interface LevelTile {
  readonly char: string;
  readonly sides: BlockingSides;
  readonly tag?: string;
}

/**
 * A free-form object in a level, in world units.
 */
export interface LevelObject {
  readonly id: string;
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
  readonly oneWay?: boolean;
  readonly tag?: string;
}

/**
 * Level definition as stored in JSON.
 *
 * Rows are written top row first; the bottom row sits at y=0.
 * "." is always empty space.
 */
export interface LevelConfig {
  readonly id: string;
  readonly name: string;
  readonly description?: string;
  /** Width and height of a tile (units) */
  readonly tileSize: number;
  readonly rows: readonly string[];
  readonly legend: Readonly<Record<string, LegendEntry>>;
  readonly objects: readonly LevelObject[];
  /** Bottom-left corner of the actor at spawn */
  readonly spawn: Vector2;
}

export interface LevelValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}
