/**
 * Platformer velocity integration.
 *
 * Turns input into the velocity the actor tries to move with this frame:
 * - Variable jump height (tap vs hold)
 * - Wall slide fall cap
 * - Movement smoothing (acceleration/deceleration)
 *
 * The MapCollider handles collision resolution. This module handles the
 * "game feel" - how inputs translate to movement.
 */

import { smoothDamp, vec2 } from "@tilebump/physics2d";
import type {
  ActorConfig,
  CollisionState,
  DerivedPhysics,
  MovementInput,
  MovementState,
} from "./types.js";

/**
 * Default actor configuration.
 *
 * With maxJumpHeight=64 and timeToJumpApex=0.4:
 *   gravity = -(2 * 64) / (0.4)^2 = -800 units/sec^2
 *   maxJumpVelocity = 800 * 0.4 = 320 units/sec
 */
export const DEFAULT_ACTOR_CONFIG: ActorConfig = {
  // Jump - 64 units height, 0.4s to apex (derives gravity=-800, jumpVel=320)
  maxJumpHeight: 64,
  minJumpHeight: 16,
  timeToJumpApex: 0.4,

  // Movement - 200 units/sec, smooth acceleration
  moveSpeed: 200,
  accelerationTimeGrounded: 0.1,
  accelerationTimeAirborne: 0.2,

  wallSlideSpeedMax: 100,
};

/**
 * Calculate gravity and jump velocities from actor config.
 *
 * At the apex velocity is zero, so from v = v0 + a*t and
 * d = v0*t + 0.5*a*t²:
 *   gravity = -2 * maxJumpHeight / timeToJumpApex²
 *   maxJumpVelocity = |gravity| * timeToJumpApex
 *   minJumpVelocity = sqrt(2 * |gravity| * minJumpHeight)
 */
export function derivePhysics(config: ActorConfig): DerivedPhysics {
  const gravity = -(2 * config.maxJumpHeight) / config.timeToJumpApex ** 2;
  const maxJumpVelocity = Math.abs(gravity) * config.timeToJumpApex;
  const minJumpVelocity = Math.sqrt(2 * Math.abs(gravity) * config.minJumpHeight);

  return { gravity, maxJumpVelocity, minJumpVelocity };
}

/**
 * Create initial movement state.
 */
export function createMovementState(): MovementState {
  return {
    velocity: vec2(0, 0),
    velocityXSmoothing: 0,
    jumpWasPressedLastFrame: false,
  };
}

export function createCollisionState(): CollisionState {
  return { above: false, below: false, left: false, right: false };
}

/**
 * Compute this frame's velocity from input.
 *
 * @param state Movement state from the previous frame
 * @param input Current frame's input
 * @param config Actor configuration
 * @param physics Derived physics values
 * @param deltaTime Time since last frame (seconds)
 * @param prevCollisions Contacts from the previous frame's resolve
 * @returns Movement state holding the velocity to move with
 */
export function updateMovement(
  state: MovementState,
  input: MovementInput,
  config: ActorConfig,
  physics: DerivedPhysics,
  deltaTime: number,
  prevCollisions: CollisionState,
): MovementState {
  let velocityX = state.velocity.x;
  let velocityY = state.velocity.y;

  // Detect jump press edge
  const jumpPressed = input.jump && !state.jumpWasPressedLastFrame;
  const jumpReleased = !input.jump && state.jumpWasPressedLastFrame;

  // Horizontal: smooth toward target
  const smoothTime = prevCollisions.below
    ? config.accelerationTimeGrounded
    : config.accelerationTimeAirborne;
  const [newVelocityX, velocityXSmoothing] = smoothDamp(
    velocityX,
    input.moveX * config.moveSpeed,
    state.velocityXSmoothing,
    smoothTime,
    deltaTime,
  );
  velocityX = newVelocityX;

  // Vertical: apply gravity
  velocityY += physics.gravity * deltaTime;

  // Cap fall speed while sliding down a wall
  const touchingWall = prevCollisions.left || prevCollisions.right;
  if (touchingWall && !prevCollisions.below && velocityY < -config.wallSlideSpeedMax) {
    velocityY = -config.wallSlideSpeedMax;
  }

  if (jumpPressed && prevCollisions.below) {
    velocityY = physics.maxJumpVelocity;
  }

  // Variable jump: releasing early cuts the jump short
  if (jumpReleased && velocityY > physics.minJumpVelocity) {
    velocityY = physics.minJumpVelocity;
  }

  return {
    velocity: vec2(velocityX, velocityY),
    velocityXSmoothing,
    jumpWasPressedLastFrame: input.jump,
  };
}
