/**
 * Bump response policies.
 *
 * A policy turns the velocity the actor had before collision resolution into
 * the velocity it keeps afterwards. Policies are pure and are chosen once,
 * when a MapCollider is created.
 */

import type { BumpPolicyConfig, BumpResponsePolicy, Vector2 } from "./types.js";
import { vec2 } from "./math.js";

/**
 * Slide: zero only the component of the bumped axis.
 * A player running into a wall keeps falling; landing keeps horizontal speed.
 */
export const stopPolicy: BumpResponsePolicy = (velocity, bumpedX, bumpedY) =>
  vec2(bumpedX ? 0 : velocity.x, bumpedY ? 0 : velocity.y);

/**
 * Any bump zeroes both components.
 */
export const stopAllPolicy: BumpResponsePolicy = (velocity, bumpedX, bumpedY) =>
  bumpedX || bumpedY ? vec2(0, 0) : vec2(velocity.x, velocity.y);

/**
 * Negate the bumped component, scaled by `damping`.
 * 1 is perfectly elastic, 0 behaves like `stopPolicy`.
 */
export function bouncePolicy(damping = 1): BumpResponsePolicy {
  if (!Number.isFinite(damping) || damping < 0 || damping > 1) {
    throw new Error(`[BumpPolicy] bounce damping must be within [0, 1]. Got: ${damping}`);
  }
  return (velocity, bumpedX, bumpedY) =>
    vec2(bumpedX ? -velocity.x * damping : velocity.x, bumpedY ? -velocity.y * damping : velocity.y);
}

/**
 * Resolve a policy configuration into the function the collider calls.
 */
export function createBumpPolicy(config: BumpPolicyConfig): BumpResponsePolicy {
  switch (config.kind) {
    case "stop":
      return stopPolicy;
    case "stopAll":
      return stopAllPolicy;
    case "bounce":
      return bouncePolicy(config.damping);
    case "custom":
      return config.respond;
  }
}

/**
 * Apply a policy and normalise `-0` to `0` so results compare cleanly.
 */
export function applyBumpPolicy(
  policy: BumpResponsePolicy,
  velocity: Vector2,
  bumpedX: boolean,
  bumpedY: boolean,
): Vector2 {
  const next = policy(vec2(velocity.x, velocity.y), bumpedX, bumpedY);
  return vec2(next.x + 0, next.y + 0);
}
