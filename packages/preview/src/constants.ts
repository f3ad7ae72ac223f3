/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Preview scheduling defaults
 */

export const PREVIEW_DEFAULTS = {
  /** Edge length of generated preview images, in pixels */
  RESOLUTION: 256,
  /** Number of concurrently rendering slots */
  SLOT_COUNT: 8,
  /** First visibility layer reserved for preview slots */
  BASE_LAYER: 128,
  /** Consecutive ready ticks before a render counts as visually final */
  SETTLE_FRAMES: 8,
} as const;

export const PREVIEW_LIMITS = {
  /** Slot occupancy is tracked in a 32-bit free mask */
  MAX_SLOT_COUNT: 32,
} as const;
