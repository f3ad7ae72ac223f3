/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type * as THREE from 'three';
import { createPreviewService, type PreviewOptions, type PreviewService } from '@scene-preview/preview';
import { ThreePreviewHost, type PreviewRenderer, type ThreeSlotView } from './render-host.js';
import { ThreeSceneSpawner, type SceneSource, type ThreeSceneInstance } from './scene-spawner.js';

export type ThreePreviewService = PreviewService<
  ThreeSceneInstance,
  THREE.Object3D,
  THREE.WebGLRenderTarget,
  ThreeSlotView
>;

export interface ThreePreviews {
  service: ThreePreviewService;
  host: ThreePreviewHost;
  spawner: ThreeSceneSpawner;
  /** Tick the scheduler, then draw every occupied slot */
  frame(renderer: PreviewRenderer): void;
}

/**
 * Wire a preview service to a three.js host whose instances come from
 * `source`.
 */
export function createThreePreviews(source: SceneSource, options?: PreviewOptions): ThreePreviews {
  const host = new ThreePreviewHost();
  const spawner = new ThreeSceneSpawner(source, host.scene);
  const service: ThreePreviewService = createPreviewService({ spawner, host, options });

  return {
    service,
    host,
    spawner,
    frame(renderer) {
      service.tick();
      host.render(renderer);
    },
  };
}
