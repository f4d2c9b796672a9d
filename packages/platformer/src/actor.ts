/**
 * Actor - a platformer character moving through a map.
 *
 * The actor integrates its own velocity (see movement.ts), hands the move to
 * a MapCollider and records which of its faces touched something. It is the
 * collider's bump handler for its own moves, so a collider can be shared by
 * several actors.
 */

import {
  MapCollider,
  scale,
  translateRect,
  vec2,
  withX,
  withY,
} from "@tilebump/physics2d";
import type {
  BumpEvent,
  BumpHandlers,
  BumpPolicyConfig,
  CollisionResult,
  InvalidInputMode,
  ObstacleSource,
  Rect,
  Vector2,
} from "@tilebump/physics2d";
import {
  DEFAULT_ACTOR_CONFIG,
  createCollisionState,
  createMovementState,
  derivePhysics,
  updateMovement,
} from "./movement.js";
import type {
  ActorConfig,
  ActorHooks,
  CollisionState,
  DerivedPhysics,
  MovementInput,
  MovementState,
} from "./types.js";

export interface ActorOptions<T> {
  /** Obstacles the actor collides with */
  source: ObstacleSource<T>;
  /** Initial bounds */
  rect: Rect;
  config?: Partial<ActorConfig>;
  /** Default: stop (slide along surfaces) */
  bumpPolicy?: BumpPolicyConfig;
  invalidInput?: InvalidInputMode;
  hooks?: ActorHooks<T>;
}

export class Actor<T> implements BumpHandlers<T> {
  readonly config: ActorConfig;
  readonly physics: DerivedPhysics;
  private readonly collider: MapCollider<T>;
  private readonly hooks: ActorHooks<T>;
  private currentRect: Rect;
  private movement: MovementState = createMovementState();
  private contacts: CollisionState = createCollisionState();
  private bumps: readonly BumpEvent<T>[] = [];

  constructor(options: ActorOptions<T>) {
    this.config = { ...DEFAULT_ACTOR_CONFIG, ...options.config };
    this.physics = derivePhysics(this.config);
    this.collider = new MapCollider(options.source, {
      ...(options.bumpPolicy && { bumpPolicy: options.bumpPolicy }),
      ...(options.invalidInput && { invalidInput: options.invalidInput }),
    });
    this.hooks = options.hooks ?? {};
    this.currentRect = options.rect;
  }

  // ===========================================================================
  // Simulation
  // ===========================================================================

  /**
   * Advance the actor by one frame.
   *
   * @param input This frame's input
   * @param deltaTime Frame time (seconds)
   * @returns The collider's result for this frame's move
   */
  step(input: MovementInput, deltaTime: number): CollisionResult<T> {
    if (!(deltaTime > 0)) {
      throw new Error(`[Actor] deltaTime must be positive. Got: ${deltaTime}`);
    }

    this.movement = updateMovement(
      this.movement,
      input,
      this.config,
      this.physics,
      deltaTime,
      this.contacts,
    );

    const tentative = translateRect(this.currentRect, scale(this.movement.velocity, deltaTime));

    this.contacts = createCollisionState();
    const result = this.collider.resolve(this.currentRect, tentative, this.movement.velocity, this);

    this.currentRect = result.rect;
    this.movement = { ...this.movement, velocity: result.velocity };
    this.bumps = result.bumps;
    return result;
  }

  /**
   * Place the actor's bottom-left corner at `position`, dropping its velocity.
   */
  teleport(position: Vector2): void {
    this.currentRect = withY(withX(this.currentRect, position.x), position.y);
    this.movement = createMovementState();
    this.contacts = createCollisionState();
    this.bumps = [];
  }

  // ===========================================================================
  // Bump Handlers
  // ===========================================================================

  onBumpLeft(obstacle: T, event: BumpEvent<T>): void {
    this.contacts.left = true;
    this.hooks.onBumpLeft?.(obstacle, event);
  }

  onBumpRight(obstacle: T, event: BumpEvent<T>): void {
    this.contacts.right = true;
    this.hooks.onBumpRight?.(obstacle, event);
  }

  onBumpTop(obstacle: T, event: BumpEvent<T>): void {
    this.contacts.above = true;
    this.hooks.onBumpTop?.(obstacle, event);
  }

  onBumpBottom(obstacle: T, event: BumpEvent<T>): void {
    this.contacts.below = true;
    this.hooks.onBumpBottom?.(obstacle, event);
  }

  // ===========================================================================
  // State
  // ===========================================================================

  get rect(): Rect {
    return this.currentRect;
  }

  get velocity(): Vector2 {
    return this.movement.velocity;
  }

  /** Contacts made during the last step */
  get collisions(): Readonly<CollisionState> {
    return this.contacts;
  }

  /** Bump events of the last step, in dispatch order */
  get lastBumps(): readonly BumpEvent<T>[] {
    return this.bumps;
  }

  get grounded(): boolean {
    return this.contacts.below;
  }

  /** Touching a wall while airborne and falling */
  get wallSliding(): boolean {
    return (this.contacts.left || this.contacts.right) && !this.contacts.below && this.movement.velocity.y < 0;
  }

  /**
   * -1 facing left, 1 facing right, 0 when not moving horizontally.
   */
  get facing(): -1 | 0 | 1 {
    const { x } = this.movement.velocity;
    if (x > 0) return 1;
    if (x < 0) return -1;
    return 0;
  }

  get movementState(): Readonly<MovementState> {
    return this.movement;
  }
}

/**
 * Create an actor standing at `position` with the given size.
 */
export function createActor<T>(
  source: ObstacleSource<T>,
  position: Vector2,
  size: Vector2 = vec2(16, 24),
  options: Omit<ActorOptions<T>, "source" | "rect"> = {},
): Actor<T> {
  return new Actor({
    ...options,
    source,
    rect: { x: position.x, y: position.y, width: size.x, height: size.y },
  });
}
