/**
 * MapCollider - axis-separated collision resolution against map obstacles.
 *
 * Each resolve call takes the actor's rect before the move, the rect after the
 * caller integrated its velocity, and that velocity:
 * - Clip the X movement against the obstacles the sweep penetrates
 * - Clip the Y movement, starting from the X-corrected rect
 * - Notify the actor of every blocking contact, per side
 * - Map the velocity through the configured bump policy
 *
 * X is always resolved before Y. An actor running along a floor into a wall
 * stops on X and keeps its Y; one falling along a wall keeps falling.
 *
 * The collider does not integrate physics and keeps no per-call state: the
 * bump flags live in the returned CollisionResult, so one collider can be
 * shared by several actors.
 */

import type {
  Axis,
  BumpEvent,
  BumpHandlers,
  BumpPolicyConfig,
  BumpResponsePolicy,
  CollisionResult,
  InvalidInputMode,
  MapColliderConfig,
  ObstacleSource,
  Rect,
  Side,
  Vector2,
} from "./types.js";
import { DEFAULT_MAP_COLLIDER_CONFIG } from "./types.js";
import { isFiniteVector } from "./math.js";
import { applyBumpPolicy, createBumpPolicy } from "./policies.js";
import {
  axisMax,
  axisMin,
  isFiniteRect,
  oppositeSide,
  rect,
  unionRect,
  withAxisPosition,
} from "./rect.js";

const ALL_SIDES: readonly Side[] = ["left", "right", "top", "bottom"];

// =============================================================================
// Options
// =============================================================================

/**
 * Per-call options for the stateless resolver.
 */
export interface ResolveOptions<T> {
  handlers?: BumpHandlers<T>;
  invalidInput?: InvalidInputMode;
}

function reportInvalidInput(mode: InvalidInputMode, message: string): void {
  if (mode === "throw") {
    throw new Error(`[MapCollider] ${message}`);
  }
  if (mode === "warn") {
    console.warn(`[MapCollider] ${message}`);
  }
}

// =============================================================================
// Axis Pass
// =============================================================================

interface AxisHit<T> {
  obstacle: T;
  /** Position on the axis that puts the actor flush against the obstacle */
  stop: number;
  distance: number;
  order: number;
}

interface AxisPass<T> {
  rect: Rect;
  bumps: BumpEvent<T>[];
}

const perpendicular = (axis: Axis): Axis => (axis === "x" ? "y" : "x");

const leadingSide = (axis: Axis, direction: 1 | -1): Side => {
  if (axis === "x") {
    return direction === 1 ? "right" : "left";
  }
  return direction === 1 ? "top" : "bottom";
};

const blocksEverySide = <T>(source: ObstacleSource<T>, obstacle: T): boolean =>
  ALL_SIDES.every((face) => source.blocks(obstacle, face));

/**
 * Overlap below this counts as contact. A flush clip computes `face - size`,
 * and adding the size back can land one ulp past the face.
 */
const CONTACT_EPSILON = 1e-9;

const overlapOn = (a: Rect, b: Rect, axis: Axis): number =>
  Math.min(axisMax(a, axis), axisMax(b, axis)) - Math.max(axisMin(a, axis), axisMin(b, axis));

const penetrates = (a: Rect, b: Rect): boolean =>
  overlapOn(a, b, "x") > CONTACT_EPSILON && overlapOn(a, b, "y") > CONTACT_EPSILON;

/**
 * Move `moving` along one axis to `target`, stopping flush against the
 * nearest obstacle face the move would cross.
 *
 * `moving` is the rect at its pre-move position on this axis (and already
 * corrected on the other axis).
 */
function resolveAxis<T>(
  axis: Axis,
  moving: Rect,
  target: number,
  velocity: number,
  source: ObstacleSource<T>,
  invalidInput: InvalidInputMode,
): AxisPass<T> {
  const start = axisMin(moving, axis);
  const delta = target - start;

  // No velocity on this axis: nothing to collide with, keep the caller's position
  if (velocity === 0) {
    if (delta !== 0) {
      reportInvalidInput(invalidInput, `Moved ${delta} on ${axis} with zero ${axis} velocity`);
    }
    return { rect: withAxisPosition(moving, axis, target), bumps: [] };
  }

  if (delta === 0) {
    return { rect: moving, bumps: [] };
  }

  const direction: 1 | -1 = delta > 0 ? 1 : -1;
  if (Math.sign(velocity) !== direction) {
    reportInvalidInput(
      invalidInput,
      `Displacement ${delta} on ${axis} contradicts velocity ${velocity}; clipping along the displacement`,
    );
  }

  const moved = withAxisPosition(moving, axis, target);
  const side = leadingSide(axis, direction);
  const approachedFace = oppositeSide(side);
  const size = axis === "x" ? moving.width : moving.height;
  const other = perpendicular(axis);

  const hits: AxisHit<T>[] = [];
  let order = 0;

  for (const obstacle of source.query(unionRect(moving, moved))) {
    const bounds = source.bounds(obstacle);
    order++;

    // Grazing contact (sharing only an edge across the motion) never blocks
    if (overlapOn(moving, bounds, other) <= CONTACT_EPSILON) {
      continue;
    }

    // Compared in position space, with the same arithmetic as the clip, so a
    // flush actor finds the face ahead of it again on the next move
    const face = direction === 1 ? axisMin(bounds, axis) : axisMax(bounds, axis);
    const stop = direction === 1 ? face - size : face;
    const ahead = direction === 1 ? stop >= start : stop <= start;
    if (!ahead) {
      if (invalidInput !== "ignore" && penetrates(moving, bounds) && blocksEverySide(source, obstacle)) {
        reportInvalidInput(invalidInput, `Actor starts inside a solid obstacle at ${axis}=${face}`);
      }
      continue;
    }

    const crossed = direction === 1 ? target > stop : target < stop;
    if (!crossed || !source.blocks(obstacle, approachedFace)) {
      continue;
    }

    hits.push({ obstacle, stop, distance: Math.abs(stop - start), order });
  }

  hits.sort((a, b) => a.distance - b.distance || a.order - b.order);

  // Nearest first: stop against the first hit, notify all of them
  const nearest = hits[0];
  if (!nearest) {
    return { rect: moved, bumps: [] };
  }
  return {
    rect: withAxisPosition(moving, axis, nearest.stop),
    bumps: hits.map((hit) => ({ obstacle: hit.obstacle, side })),
  };
}

// =============================================================================
// Dispatch
// =============================================================================

function dispatchBumps<T>(handlers: BumpHandlers<T>, bumps: readonly BumpEvent<T>[]): void {
  for (const event of bumps) {
    switch (event.side) {
      case "left":
        handlers.onBumpLeft?.(event.obstacle, event);
        break;
      case "right":
        handlers.onBumpRight?.(event.obstacle, event);
        break;
      case "top":
        handlers.onBumpTop?.(event.obstacle, event);
        break;
      case "bottom":
        handlers.onBumpBottom?.(event.obstacle, event);
        break;
    }
  }
}

// =============================================================================
// Resolve
// =============================================================================

function resolveWithPolicy<T>(
  lastRect: Rect,
  tentativeRect: Rect,
  velocity: Vector2,
  source: ObstacleSource<T>,
  policy: BumpResponsePolicy,
  handlers: BumpHandlers<T>,
  invalidInput: InvalidInputMode,
): CollisionResult<T> {
  if (!isFiniteRect(lastRect) || !isFiniteRect(tentativeRect) || !isFiniteVector(velocity)) {
    throw new Error("[MapCollider] Rects and velocity must be finite numbers");
  }

  if (lastRect.width !== tentativeRect.width || lastRect.height !== tentativeRect.height) {
    reportInvalidInput(invalidInput, "Tentative rect size differs from last rect; using the tentative size");
  }

  const start = rect(lastRect.x, lastRect.y, tentativeRect.width, tentativeRect.height);

  // X first, from the last position
  const xPass = resolveAxis("x", start, tentativeRect.x, velocity.x, source, invalidInput);
  dispatchBumps(handlers, xPass.bumps);

  // Then Y, from the X-corrected rect
  const yPass = resolveAxis("y", xPass.rect, tentativeRect.y, velocity.y, source, invalidInput);
  dispatchBumps(handlers, yPass.bumps);

  const bumpedX = xPass.bumps.length > 0;
  const bumpedY = yPass.bumps.length > 0;

  return {
    rect: yPass.rect,
    velocity: applyBumpPolicy(policy, velocity, bumpedX, bumpedY),
    bumpedX,
    bumpedY,
    bumps: [...xPass.bumps, ...yPass.bumps],
  };
}

/**
 * Resolve one move without creating a MapCollider.
 *
 * @param lastRect Actor rect before the move (must not overlap a solid obstacle)
 * @param tentativeRect Actor rect after the caller applied velocity * deltaTime
 * @param velocity Velocity used for the move
 * @param source Obstacles to collide with
 * @param policy Bump policy function or configuration (default: slide)
 * @param options Bump hooks and invalid input handling
 *
 * @example
 * ```typescript
 * const result = resolveCollisions(last, next, velocity, tiles, { kind: "bounce", damping: 0.5 });
 * if (result.bumpedY && velocity.y < 0) {
 *   grounded = true;
 * }
 * ```
 */
export function resolveCollisions<T>(
  lastRect: Rect,
  tentativeRect: Rect,
  velocity: Vector2,
  source: ObstacleSource<T>,
  policy: BumpResponsePolicy | BumpPolicyConfig = { kind: "stop" },
  options: ResolveOptions<T> = {},
): CollisionResult<T> {
  const respond = typeof policy === "function" ? policy : createBumpPolicy(policy);
  return resolveWithPolicy(
    lastRect,
    tentativeRect,
    velocity,
    source,
    respond,
    options.handlers ?? {},
    options.invalidInput ?? DEFAULT_MAP_COLLIDER_CONFIG.invalidInput,
  );
}

// =============================================================================
// MapCollider
// =============================================================================

/**
 * A collider bound to one obstacle source and one bump policy.
 *
 * The policy is resolved once at construction and cannot be swapped later;
 * create another collider for a different response.
 */
export class MapCollider<T> {
  private readonly source: ObstacleSource<T>;
  private readonly config: MapColliderConfig<T>;
  private readonly policy: BumpResponsePolicy;

  constructor(source: ObstacleSource<T>, config: Partial<MapColliderConfig<T>> = {}) {
    this.source = source;
    this.config = {
      bumpPolicy: config.bumpPolicy ?? DEFAULT_MAP_COLLIDER_CONFIG.bumpPolicy,
      handlers: config.handlers ?? {},
      invalidInput: config.invalidInput ?? DEFAULT_MAP_COLLIDER_CONFIG.invalidInput,
    };
    this.policy = createBumpPolicy(this.config.bumpPolicy);
  }

  /**
   * Resolve one move.
   *
   * @param handlers Bump hooks for this call only (defaults to the configured ones)
   */
  resolve(
    lastRect: Rect,
    tentativeRect: Rect,
    velocity: Vector2,
    handlers: BumpHandlers<T> = this.config.handlers,
  ): CollisionResult<T> {
    return resolveWithPolicy(
      lastRect,
      tentativeRect,
      velocity,
      this.source,
      this.policy,
      handlers,
      this.config.invalidInput,
    );
  }

  get obstacles(): ObstacleSource<T> {
    return this.source;
  }
}

/**
 * Create a MapCollider with defaults filled in.
 */
export function createMapCollider<T>(
  source: ObstacleSource<T>,
  config: Partial<MapColliderConfig<T>> = {},
): MapCollider<T> {
  return new MapCollider(source, config);
}
