/**
 * Free-form rectangular obstacles that are not bound to a grid
 * (moving platforms, crates, doors).
 */

import type { MapObject, ObstacleSource, Rect, Side } from "./types.js";
import { rectsTouch } from "./rect.js";

/**
 * Objects block on every face, one-way objects only on their top face.
 */
export const objectBlocks = (object: MapObject, face: Side): boolean =>
  !object.oneWay || face === "top";

export class FreeObjectSource implements ObstacleSource<MapObject> {
  private readonly objects = new Map<string, MapObject>();

  constructor(objects: readonly MapObject[] = []) {
    for (const object of objects) {
      this.add(object);
    }
  }

  query(region: Rect): MapObject[] {
    const found: MapObject[] = [];
    for (const object of this.objects.values()) {
      if (rectsTouch(object.rect, region)) {
        found.push(object);
      }
    }
    return found;
  }

  bounds(object: MapObject): Rect {
    return object.rect;
  }

  blocks(object: MapObject, face: Side): boolean {
    return objectBlocks(object, face);
  }

  add(object: MapObject): void {
    if (this.objects.has(object.id)) {
      throw new Error(`[FreeObjectSource] Duplicate object ID: ${object.id}`);
    }
    this.objects.set(object.id, object);
  }

  remove(id: string): boolean {
    return this.objects.delete(id);
  }

  /**
   * Replace an object's bounds between frames (moving platforms).
   */
  move(id: string, rect: Rect): MapObject {
    const object = this.objects.get(id);
    if (!object) {
      throw new Error(`[FreeObjectSource] Unknown object ID: ${id}`);
    }
    const moved = { ...object, rect };
    this.objects.set(id, moved);
    return moved;
  }

  get(id: string): MapObject | undefined {
    return this.objects.get(id);
  }

  get size(): number {
    return this.objects.size;
  }
}
