/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type * as THREE from 'three';
import type { SceneId } from '@scene-preview/data';
import type { SceneSource } from './scene-spawner.js';

/** What the source needs from `GLTFLoader` (three/addons/loaders/GLTFLoader.js) */
export interface GltfLoaderLike {
  loadAsync(url: string): Promise<{ scene: THREE.Object3D }>;
}

/**
 * Scene source loading each scene id as a glTF asset.
 *
 * @param resolveUrl - maps a scene id to the asset URL (identity by default)
 */
export function createGltfSceneSource(
  loader: GltfLoaderLike,
  resolveUrl: (sceneId: SceneId) => string = (sceneId) => sceneId,
): SceneSource {
  return async (sceneId) => {
    const gltf = await loader.loadAsync(resolveUrl(sceneId));
    return gltf.scene;
  };
}
