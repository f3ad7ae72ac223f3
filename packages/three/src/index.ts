/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @scene-preview/three - three.js host for scene previews
 *
 * @example
 * ```ts
 * import { GLTFLoader } from 'three/addons/loaders/GLTFLoader.js';
 * import { createGltfSceneSource, createThreePreviews } from '@scene-preview/three';
 *
 * const previews = createThreePreviews(createGltfSceneSource(new GLTFLoader(), (id) => `/assets/${id}.glb`));
 * renderer.setAnimationLoop(() => {
 *   previews.frame(renderer);
 *   renderer.render(scene, camera);
 * });
 *
 * const target = previews.service.requestPreview('chair');  // WebGLRenderTarget once ready
 * ```
 */

// ============================================================================
// Host
// ============================================================================

export { ThreePreviewHost } from './render-host.js';
export type { ThreeSlotView, PreviewRenderer } from './render-host.js';
export {
  THREE_LAYER_LIMIT,
  THREE_RESERVED_LAYERS,
  THREE_PREVIEW_BASE_LAYER,
  PREVIEW_CAMERA,
  PREVIEW_LIGHT,
} from './constants.js';

// ============================================================================
// Scene instantiation
// ============================================================================

export { ThreeSceneSpawner, disposeObject } from './scene-spawner.js';
export type { SceneSource, ThreeSceneInstance } from './scene-spawner.js';
export { createGltfSceneSource } from './gltf-source.js';
export type { GltfLoaderLike } from './gltf-source.js';

// ============================================================================
// Service
// ============================================================================

export { createThreePreviews } from './three-previews.js';
export type { ThreePreviews, ThreePreviewService } from './three-previews.js';
