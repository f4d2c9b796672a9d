/**
 * Core types for @tilebump/physics2d
 *
 * Uses Y-up coordinate system (0,0 at bottom-left, positive Y is up).
 * A rect's `top` is its larger y edge.
 */

/**
 * 2D vector for positions, velocities, directions.
 * Immutable by convention - all operations return new vectors.
 */
export interface Vector2 {
  readonly x: number;
  readonly y: number;
}

/**
 * Axis-aligned rectangle in world units.
 * (x, y) is the bottom-left corner.
 */
export interface Rect {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/**
 * A face of a rectangle.
 *
 * For bump events this is the actor's face that made contact.
 * For `ObstacleSource.blocks` it is the obstacle's face being approached.
 */
export type Side = "left" | "right" | "top" | "bottom";

export type Axis = "x" | "y";

/**
 * Per-face blocking flags for a tile or object.
 */
export interface BlockingSides {
  readonly left: boolean;
  readonly right: boolean;
  readonly top: boolean;
  readonly bottom: boolean;
}

/**
 * Read-only view of the obstacles in a map.
 *
 * Sources are queried up to twice per resolve call (once per axis) and must
 * not change state while answering.
 */
export interface ObstacleSource<T> {
  /**
   * Obstacles overlapping or touching `region`.
   * Order is unspecified. The result may be iterated more than once.
   */
  query(region: Rect): Iterable<T>;
  /** World-space bounds of an obstacle returned by `query`. */
  bounds(obstacle: T): Rect;
  /** Whether the obstacle's `face` stops an actor approaching it. */
  blocks(obstacle: T, face: Side): boolean;
}

/**
 * A free-form rectangular object (moving platform, crate, door).
 */
export interface MapObject {
  readonly id: string;
  readonly rect: Rect;
  /** If true, only the top face blocks (can pass through from below and the sides) */
  readonly oneWay?: boolean;
  /** User-defined tag for game-specific logic */
  readonly tag?: string;
}

/**
 * A blocking contact between the actor and one obstacle.
 */
export interface BumpEvent<T> {
  readonly obstacle: T;
  /** The actor's face that touched the obstacle */
  readonly side: Side;
}

/**
 * Per-side notification hooks, named after the actor's face.
 *
 * May be called several times within one resolve call.
 */
export interface BumpHandlers<T> {
  onBumpLeft?(obstacle: T, event: BumpEvent<T>): void;
  onBumpRight?(obstacle: T, event: BumpEvent<T>): void;
  onBumpTop?(obstacle: T, event: BumpEvent<T>): void;
  onBumpBottom?(obstacle: T, event: BumpEvent<T>): void;
}

/**
 * Outcome of one resolve call.
 * Flags are scoped to the call that produced them.
 */
export interface CollisionResult<T> {
  readonly rect: Rect;
  readonly velocity: Vector2;
  readonly bumpedX: boolean;
  readonly bumpedY: boolean;
  /** Every bump of the call, in dispatch order */
  readonly bumps: readonly BumpEvent<T>[];
}

/**
 * Maps the pre-resolution velocity and the bump flags to a new velocity.
 */
export type BumpResponsePolicy = (velocity: Vector2, bumpedX: boolean, bumpedY: boolean) => Vector2;

/**
 * Configuration form of a bump response.
 */
export type BumpPolicyConfig =
  | { readonly kind: "stop" }
  | { readonly kind: "stopAll" }
  | { readonly kind: "bounce"; readonly damping?: number }
  | { readonly kind: "custom"; readonly respond: BumpResponsePolicy };

/**
 * What to do when the caller's input breaks a precondition
 * (e.g. the last rect already overlaps a blocking obstacle).
 */
export type InvalidInputMode = "warn" | "throw" | "ignore";

/**
 * Configuration for a MapCollider.
 */
export interface MapColliderConfig<T> {
  /**
   * Velocity response applied after clipping.
   * Default: { kind: "stop" } (slide along walls)
   */
  readonly bumpPolicy: BumpPolicyConfig;

  /**
   * Default bump hooks. A resolve call may pass its own.
   * Default: none
   */
  readonly handlers: BumpHandlers<T>;

  /**
   * Precondition violations are logged and resolved best-effort by default.
   * Default: "warn"
   */
  readonly invalidInput: InvalidInputMode;
}

/**
 * Default configuration for a MapCollider.
 */
export const DEFAULT_MAP_COLLIDER_CONFIG: MapColliderConfig<never> = {
  bumpPolicy: { kind: "stop" },
  handlers: {},
  invalidInput: "warn",
};
