/**
 * Vector math utilities for 2D physics.
 *
 * All functions are pure - they return new values without mutating inputs.
 * Uses Y-up coordinate system.
 */

import type { Axis, Vector2 } from "./types.js";

// =============================================================================
// Vector Construction
// =============================================================================

/**
 * Create a new Vector2.
 */
export const vec2 = (x: number, y: number): Vector2 => ({ x, y });

/** Zero vector (0, 0) */
export const vec2Zero: Vector2 = { x: 0, y: 0 };

// =============================================================================
// Vector Operations
// =============================================================================

/**
 * Add two vectors.
 */
export const add = (a: Vector2, b: Vector2): Vector2 => ({
  x: a.x + b.x,
  y: a.y + b.y,
});

/**
 * Subtract vector b from vector a.
 */
export const sub = (a: Vector2, b: Vector2): Vector2 => ({
  x: a.x - b.x,
  y: a.y - b.y,
});

/**
 * Scale a vector by a scalar.
 */
export const scale = (v: Vector2, s: number): Vector2 => ({
  x: v.x * s,
  y: v.y * s,
});

/**
 * Replace one component of a vector.
 */
export const withComponent = (v: Vector2, axis: Axis, value: number): Vector2 =>
  axis === "x" ? { x: value, y: v.y } : { x: v.x, y: value };

export const isFiniteVector = (v: Vector2): boolean => Number.isFinite(v.x) && Number.isFinite(v.y);

// =============================================================================
// Interpolation
// =============================================================================

/**
 * Linear interpolation between two values.
 * @param a Start value
 * @param b End value
 * @param t Interpolation factor (0 = a, 1 = b)
 */
export const lerp = (a: number, b: number, t: number): number => a + (b - a) * t;

/**
 * Critically-damped smoothing toward a target value, for acceleration and
 * deceleration of horizontal movement.
 *
 * Based on Game Programming Gems 4, Chapter 1.10
 *
 * @param current Current value
 * @param target Target value
 * @param currentVelocity Rate of change carried over from the previous call
 * @param smoothTime Approximate time to reach target
 * @param deltaTime Time since last frame
 * @returns Tuple of [newValue, newVelocity]
 */
export const smoothDamp = (
  current: number,
  target: number,
  currentVelocity: number,
  smoothTime: number,
  deltaTime: number,
): [number, number] => {
  // Prevent division by zero
  const time = Math.max(0.0001, smoothTime);
  const omega = 2 / time;
  const x = omega * deltaTime;
  // Approximation of exp(-omega * deltaTime)
  const exp = 1 / (1 + x + 0.48 * x * x + 0.235 * x * x * x);

  const change = current - target;
  const temp = (currentVelocity + omega * change) * deltaTime;
  const newVelocity = (currentVelocity - omega * temp) * exp;
  const newValue = target + (change + temp) * exp;

  return [newValue, newVelocity];
};
