/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * ThreeSceneSpawner - instantiates scenes from an async source into the
 * preview scene
 */

import * as THREE from 'three';
import { createLogger, type SceneId } from '@scene-preview/data';
import type { SceneSpawner } from '@scene-preview/preview';

const log = createLogger('ThreeSceneSpawner');

/** Loads a fresh object graph for a scene id */
export type SceneSource = (sceneId: SceneId) => Promise<THREE.Object3D>;

export interface ThreeSceneInstance {
  readonly sceneId: SceneId;
  /** Set once the load resolves and the graph is attached */
  root: THREE.Object3D | null;
  error: unknown;
  despawned: boolean;
  /** Settles when the load has been handled, successfully or not */
  loaded: Promise<void>;
}

export class ThreeSceneSpawner implements SceneSpawner<ThreeSceneInstance, THREE.Object3D> {
  constructor(
    private readonly source: SceneSource,
    private readonly parent: THREE.Object3D,
  ) {}

  spawn(sceneId: SceneId): ThreeSceneInstance {
    const instance: ThreeSceneInstance = {
      sceneId,
      root: null,
      error: undefined,
      despawned: false,
      loaded: Promise.resolve(),
    };
    instance.loaded = this.load(instance);
    return instance;
  }

  isReady(instance: ThreeSceneInstance): boolean {
    return !instance.despawned && instance.root !== null;
  }

  despawn(instance: ThreeSceneInstance): void {
    instance.despawned = true;
    if (instance.root) {
      this.parent.remove(instance.root);
      disposeObject(instance.root);
      instance.root = null;
    }
  }

  forEachObject(instance: ThreeSceneInstance): Iterable<THREE.Object3D> {
    const objects: THREE.Object3D[] = [];
    instance.root?.traverse((object) => {
      objects.push(object);
    });
    return objects;
  }

  private async load(instance: ThreeSceneInstance): Promise<void> {
    try {
      const root = await this.source(instance.sceneId);
      if (instance.despawned) {
        // Despawned while loading
        disposeObject(root);
        return;
      }
      instance.root = root;
      this.parent.add(root);
    } catch (error) {
      instance.error = error;
      log.error('Failed to load scene', error, { operation: 'spawn', sceneId: instance.sceneId });
    }
  }
}

/** Release GPU resources held by meshes under `root` */
export function disposeObject(root: THREE.Object3D): void {
  root.traverse((child) => {
    if (child instanceof THREE.Mesh) {
      child.geometry.dispose();
      const materials: THREE.Material[] = Array.isArray(child.material) ? child.material : [child.material];
      for (const material of materials) material.dispose();
    }
  });
}
