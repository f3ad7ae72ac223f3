/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Identifiers shared by the preview core and its hosts
 */

/**
 * Stable identifier of a scene asset definition (not of a live instance).
 * Two handles naming the same asset compare equal through their id.
 */
export type SceneId = string;

/** Something that carries a scene id, e.g. an asset handle from a browser UI */
export interface SceneRef {
  readonly id: SceneId;
}

/** Pixel size of a generated preview image */
export interface Resolution {
  width: number;
  height: number;
}

export function toSceneId(scene: SceneId | SceneRef): SceneId {
  return typeof scene === 'string' ? scene : scene.id;
}
