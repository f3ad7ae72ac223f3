/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { PREVIEW_DEFAULTS, PREVIEW_LIMITS } from './constants.js';
import { PreviewConfigError } from './errors.js';
import type { PreviewConfig, PreviewOptions, PreviewRenderHost } from './types.js';

/** The parts of a render host that constrain layer assignment */
export type LayerConstraints = Pick<
  PreviewRenderHost<unknown, unknown, unknown>,
  'layerLimit' | 'reservedLayers' | 'preferredBaseLayer'
>;

function requireInteger(value: number, option: string, min: number, max = Number.MAX_SAFE_INTEGER): number {
  if (!Number.isInteger(value) || value < min || value > max) {
    const range = max === Number.MAX_SAFE_INTEGER ? `>= ${min}` : `in [${min}, ${max}]`;
    throw new PreviewConfigError(`${option} must be an integer ${range}, got ${value}`, option);
  }
  return value;
}

/**
 * Merge options with defaults and validate them against the host's layers.
 *
 * The slot layer range `[baseLayer, baseLayer + slotCount)` must lie below
 * `layerLimit` and must not contain any reserved layer, otherwise slot cameras
 * would pick up objects that belong to the host's own views.
 */
export function resolvePreviewConfig(
  options: PreviewOptions = {},
  constraints: LayerConstraints = {},
): PreviewConfig {
  const width = options.resolution?.width ?? PREVIEW_DEFAULTS.RESOLUTION;
  const height = options.resolution?.height ?? PREVIEW_DEFAULTS.RESOLUTION;

  const config: PreviewConfig = {
    resolution: {
      width: requireInteger(width, 'resolution.width', 1),
      height: requireInteger(height, 'resolution.height', 1),
    },
    slotCount: requireInteger(
      options.slotCount ?? PREVIEW_DEFAULTS.SLOT_COUNT,
      'slotCount',
      1,
      PREVIEW_LIMITS.MAX_SLOT_COUNT,
    ),
    baseLayer: requireInteger(
      options.baseLayer ?? constraints.preferredBaseLayer ?? PREVIEW_DEFAULTS.BASE_LAYER,
      'baseLayer',
      0,
    ),
    settleFrames: requireInteger(options.settleFrames ?? PREVIEW_DEFAULTS.SETTLE_FRAMES, 'settleFrames', 1),
    strictInvariants: options.strictInvariants ?? true,
  };

  const lastLayer = config.baseLayer + config.slotCount - 1;
  if (constraints.layerLimit !== undefined && lastLayer >= constraints.layerLimit) {
    throw new PreviewConfigError(
      `Slot layers ${config.baseLayer}..${lastLayer} exceed the host layer limit of ${constraints.layerLimit}`,
      'baseLayer',
    );
  }

  const collision = constraints.reservedLayers?.find(
    (layer) => layer >= config.baseLayer && layer <= lastLayer,
  );
  if (collision !== undefined) {
    throw new PreviewConfigError(
      `Slot layers ${config.baseLayer}..${lastLayer} collide with reserved layer ${collision}`,
      'baseLayer',
    );
  }

  return config;
}

/** Visibility layer drawn by the slot at `index` */
export function slotLayer(config: Pick<PreviewConfig, 'baseLayer'>, index: number): number {
  return config.baseLayer + index;
}
