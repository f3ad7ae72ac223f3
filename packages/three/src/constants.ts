/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * three.js host constants
 */

/** `THREE.Layers` holds 32 layers */
export const THREE_LAYER_LIMIT = 32;

/** Layer 0 is where every new object starts; preview slots stay off it */
export const THREE_RESERVED_LAYERS: readonly number[] = [0];

/** Slots 24..31 by default, leaving the low layers to the application */
export const THREE_PREVIEW_BASE_LAYER = 24;

export const PREVIEW_CAMERA = {
  FOV: 45,
  NEAR: 0.1,
  FAR: 1000,
  POSITION: [-5, 2, -5],
} as const;

export const PREVIEW_LIGHT = {
  COLOR: 0xffffff,
  INTENSITY: 2,
  /** Direction the light shines along; it sits opposite this, aimed at the origin */
  DIRECTION: [1, -1, 1],
} as const;
