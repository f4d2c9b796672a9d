/**
 * RapierObjectSource - free-form obstacles indexed in a Rapier world.
 *
 * Rapier is used only as a broad-phase: its query pipeline finds the objects
 * whose bounds intersect a region, and the collider does the rest. Behaves
 * like FreeObjectSource but scales to maps with many objects.
 */

import RAPIER from "@dimforge/rapier2d-compat";
import type { MapObject, ObstacleSource, Rect, Side } from "./types.js";
import { objectBlocks } from "./objects.js";
import { rectCenter, rectsTouch } from "./rect.js";

/** Whether Rapier WASM has been initialized */
let rapierInitialized = false;

/**
 * Initialize Rapier WASM module.
 * Must be called once before creating any RapierObjectSource.
 * Safe to call multiple times.
 */
export async function initPhysics(): Promise<void> {
  if (!rapierInitialized) {
    await RAPIER.init();
    rapierInitialized = true;
  }
}

/**
 * Obstacle source backed by Rapier's broad-phase.
 *
 * Must call `initPhysics()` once before creating one.
 */
export class RapierObjectSource implements ObstacleSource<MapObject> {
  private world: RAPIER.World;
  private objectsByHandle: Map<number, MapObject>;
  private handlesById: Map<string, number>;

  private constructor(world: RAPIER.World) {
    this.world = world;
    this.objectsByHandle = new Map();
    this.handlesById = new Map();
  }

  /**
   * Create a source holding `objects`.
   *
   * @throws Error if initPhysics() was not called first
   *
   * @example
   * ```typescript
   * await initPhysics(); // Call once at app startup
   * const platforms = RapierObjectSource.create(level.objects);
   * const collider = createMapCollider(platforms);
   * ```
   */
  static create(objects: readonly MapObject[] = []): RapierObjectSource {
    if (!rapierInitialized) {
      throw new Error("[RapierObjectSource] Rapier not initialized. Call initPhysics() first.");
    }
    // Static geometry only, gravity is never applied
    const source = new RapierObjectSource(new RAPIER.World({ x: 0, y: 0 }));
    for (const object of objects) {
      source.insert(object);
    }
    source.updateBroadphase();
    return source;
  }

  query(region: Rect): MapObject[] {
    const center = rectCenter(region);
    const found: MapObject[] = [];

    this.world.collidersWithAabbIntersectingAabb(
      { x: center.x, y: center.y },
      { x: region.width / 2, y: region.height / 2 },
      (collider) => {
        const object = this.objectsByHandle.get(collider.handle);
        // The broad-phase is conservative; keep only exact overlaps
        if (object && rectsTouch(object.rect, region)) {
          found.push(object);
        }
        return true; // Continue searching
      },
    );

    return found;
  }

  bounds(object: MapObject): Rect {
    return object.rect;
  }

  blocks(object: MapObject, face: Side): boolean {
    return objectBlocks(object, face);
  }

  /**
   * Add an object and refresh the broad-phase.
   */
  add(object: MapObject): void {
    this.insert(object);
    this.updateBroadphase();
  }

  /**
   * Remove an object by ID.
   *
   * @returns False if no object had that ID
   */
  remove(id: string): boolean {
    const handle = this.handlesById.get(id);
    if (handle === undefined) {
      return false;
    }

    const collider = this.world.getCollider(handle);
    const rigidBody = collider?.parent();
    if (rigidBody) {
      // Removing the parent body also removes the collider
      this.world.removeRigidBody(rigidBody);
    }
    this.objectsByHandle.delete(handle);
    this.handlesById.delete(id);
    this.updateBroadphase();
    return true;
  }

  /**
   * Replace an object's bounds between frames (moving platforms).
   */
  move(id: string, rect: Rect): MapObject {
    const handle = this.handlesById.get(id);
    const object = handle === undefined ? undefined : this.objectsByHandle.get(handle);
    if (!object) {
      throw new Error(`[RapierObjectSource] Unknown object ID: ${id}`);
    }
    this.remove(id);
    const moved = { ...object, rect };
    this.add(moved);
    return moved;
  }

  get size(): number {
    return this.objectsByHandle.size;
  }

  private insert(object: MapObject): void {
    if (this.handlesById.has(object.id)) {
      throw new Error(`[RapierObjectSource] Duplicate object ID: ${object.id}`);
    }

    const center = rectCenter(object.rect);
    const rigidBodyDesc = RAPIER.RigidBodyDesc.fixed().setTranslation(center.x, center.y);
    const rigidBody = this.world.createRigidBody(rigidBodyDesc);
    const colliderDesc = RAPIER.ColliderDesc.cuboid(object.rect.width / 2, object.rect.height / 2);
    const collider = this.world.createCollider(colliderDesc, rigidBody);

    this.objectsByHandle.set(collider.handle, object);
    this.handlesById.set(object.id, collider.handle);
  }

  /**
   * Rapier only rebuilds its query structures during step(). Nothing here
   * is dynamic, so stepping moves nothing.
   */
  private updateBroadphase(): void {
    this.world.step();
  }
}
