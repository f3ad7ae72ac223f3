/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * ThreePreviewHost - render targets, slot cameras and lights for three.js
 *
 * Every slot owns a camera and a directional light, both restricted to the
 * slot's layer, so a slot only sees (and only lights) the instance tagged with
 * that layer even though all instances share one preview scene.
 */

import * as THREE from 'three';
import type { Resolution } from '@scene-preview/data';
import type { PreviewRenderHost, SlotViewRequest } from '@scene-preview/preview';
import {
  PREVIEW_CAMERA,
  PREVIEW_LIGHT,
  THREE_LAYER_LIMIT,
  THREE_PREVIEW_BASE_LAYER,
  THREE_RESERVED_LAYERS,
} from './constants.js';

export interface ThreeSlotView {
  readonly index: number;
  readonly layer: number;
  readonly target: THREE.WebGLRenderTarget;
  readonly camera: THREE.PerspectiveCamera;
  readonly light: THREE.DirectionalLight;
}

/** The slice of `WebGLRenderer` the render pass uses */
export type PreviewRenderer = Pick<
  THREE.WebGLRenderer,
  'getRenderTarget' | 'setRenderTarget' | 'render' | 'getClearColor' | 'getClearAlpha' | 'setClearColor'
>;

export class ThreePreviewHost implements PreviewRenderHost<THREE.WebGLRenderTarget, THREE.Object3D, ThreeSlotView> {
  readonly layerLimit = THREE_LAYER_LIMIT;
  readonly reservedLayers = THREE_RESERVED_LAYERS;
  readonly preferredBaseLayer = THREE_PREVIEW_BASE_LAYER;

  /** Scene holding every spawned instance and every slot's camera and light */
  readonly scene = new THREE.Scene();
  private readonly views = new Set<ThreeSlotView>();

  constructor() {
    this.scene.name = 'scene-preview';
    // Targets are cleared to transparent, not to a background
    this.scene.background = null;
  }

  get liveViews(): readonly ThreeSlotView[] {
    return [...this.views];
  }

  createTarget(resolution: Resolution): THREE.WebGLRenderTarget {
    return new THREE.WebGLRenderTarget(resolution.width, resolution.height, {
      colorSpace: THREE.SRGBColorSpace,
    });
  }

  disposeTarget(target: THREE.WebGLRenderTarget): void {
    target.dispose();
  }

  createView({ index, layer, target }: SlotViewRequest<THREE.WebGLRenderTarget>): ThreeSlotView {
    const camera = new THREE.PerspectiveCamera(
      PREVIEW_CAMERA.FOV,
      target.width / target.height,
      PREVIEW_CAMERA.NEAR,
      PREVIEW_CAMERA.FAR,
    );
    camera.name = `preview-camera-${index}`;
    camera.position.set(...PREVIEW_CAMERA.POSITION);
    camera.lookAt(0, 0, 0);
    camera.layers.set(layer);

    const light = new THREE.DirectionalLight(PREVIEW_LIGHT.COLOR, PREVIEW_LIGHT.INTENSITY);
    light.name = `preview-light-${index}`;
    const [dx, dy, dz] = PREVIEW_LIGHT.DIRECTION;
    light.position.set(-dx, -dy, -dz);
    light.target.position.set(0, 0, 0);
    light.layers.set(layer);

    this.scene.add(camera, light, light.target);

    const view: ThreeSlotView = { index, layer, target, camera, light };
    this.views.add(view);
    return view;
  }

  destroyView(view: ThreeSlotView): void {
    this.scene.remove(view.camera, view.light, view.light.target);
    view.light.dispose();
    this.views.delete(view);
  }

  applyLayer(object: THREE.Object3D, layer: number): void {
    object.layers.set(layer);
  }

  /**
   * Draw every occupied slot into its target. Call once per frame after
   * `PreviewService.tick()`; the renderer's target and clear color are
   * restored afterwards.
   *
   * @returns number of slots drawn
   */
  render(renderer: PreviewRenderer): number {
    const previousTarget = renderer.getRenderTarget();
    const previousColor = renderer.getClearColor(new THREE.Color());
    const previousAlpha = renderer.getClearAlpha();

    renderer.setClearColor(0x000000, 0);
    for (const view of this.views) {
      renderer.setRenderTarget(view.target);
      renderer.render(this.scene, view.camera);
    }

    renderer.setRenderTarget(previousTarget);
    renderer.setClearColor(previousColor, previousAlpha);
    return this.views.size;
  }
}
