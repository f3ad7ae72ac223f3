/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * In-process stand-ins for the scene spawner and the render host
 */

import type { Resolution, SceneId } from '@scene-preview/data';
import type { PreviewRenderHost, SceneSpawner, SlotViewRequest } from '../src/types.js';

export interface FakeObject {
  name: string;
  layer: number | null;
  tagCount: number;
}

export interface FakeInstance {
  id: number;
  sceneId: SceneId;
  spawnFrame: number;
  objects: FakeObject[];
  despawned: boolean;
}

export interface FakeTarget {
  id: number;
  width: number;
  height: number;
  disposed: boolean;
}

export interface FakeView {
  index: number;
  layer: number;
  target: FakeTarget;
  destroyed: boolean;
}

/**
 * Spawner whose instances become ready `readyDelay` frames after spawning.
 * Frames advance only through {@link FakeSpawner.advance}.
 */
export class FakeSpawner implements SceneSpawner<FakeInstance, FakeObject> {
  frame = 0;
  readonly instances: FakeInstance[] = [];
  private readonly stalled = new Set<SceneId>();
  private nextId = 1;

  constructor(
    private readonly readyDelay = 0,
    private readonly objectsPerScene = 3,
  ) {}

  advance(frames = 1): void {
    this.frame += frames;
  }

  /** Make instances of a scene report not ready until resumed */
  stall(sceneId: SceneId): void {
    this.stalled.add(sceneId);
  }

  resume(sceneId: SceneId): void {
    this.stalled.delete(sceneId);
  }

  spawnCount(sceneId: SceneId): number {
    return this.instances.filter((instance) => instance.sceneId === sceneId).length;
  }

  get live(): FakeInstance[] {
    return this.instances.filter((instance) => !instance.despawned);
  }

  spawn(sceneId: SceneId): FakeInstance {
    const objects: FakeObject[] = [];
    for (let i = 0; i < this.objectsPerScene; i++) {
      objects.push({ name: `${sceneId}#${i}`, layer: null, tagCount: 0 });
    }
    const instance: FakeInstance = {
      id: this.nextId++,
      sceneId,
      spawnFrame: this.frame,
      objects,
      despawned: false,
    };
    this.instances.push(instance);
    return instance;
  }

  isReady(handle: FakeInstance): boolean {
    return !handle.despawned
      && !this.stalled.has(handle.sceneId)
      && this.frame >= handle.spawnFrame + this.readyDelay;
  }

  despawn(handle: FakeInstance): void {
    handle.despawned = true;
  }

  forEachObject(handle: FakeInstance): Iterable<FakeObject> {
    return handle.objects;
  }
}

export class FakeHost implements PreviewRenderHost<FakeTarget, FakeObject, FakeView> {
  readonly layerLimit?: number;
  readonly reservedLayers?: readonly number[];
  readonly preferredBaseLayer?: number;
  readonly targets: FakeTarget[] = [];
  readonly views: FakeView[] = [];
  private nextTarget = 1;

  constructor(limits: { layerLimit?: number; reservedLayers?: readonly number[]; preferredBaseLayer?: number } = {}) {
    this.layerLimit = limits.layerLimit;
    this.reservedLayers = limits.reservedLayers;
    this.preferredBaseLayer = limits.preferredBaseLayer;
  }

  get liveViews(): FakeView[] {
    return this.views.filter((view) => !view.destroyed);
  }

  createTarget(resolution: Resolution): FakeTarget {
    const target: FakeTarget = { id: this.nextTarget++, ...resolution, disposed: false };
    this.targets.push(target);
    return target;
  }

  disposeTarget(target: FakeTarget): void {
    target.disposed = true;
  }

  createView(request: SlotViewRequest<FakeTarget>): FakeView {
    const view: FakeView = { ...request, destroyed: false };
    this.views.push(view);
    return view;
  }

  destroyView(view: FakeView): void {
    view.destroyed = true;
  }

  applyLayer(object: FakeObject, layer: number): void {
    object.layer = layer;
    object.tagCount++;
  }
}

/** Strict pool config with the given slot count */
export function poolConfig(slotCount: number, baseLayer = 128) {
  return { slotCount, baseLayer, strictInvariants: true };
}
