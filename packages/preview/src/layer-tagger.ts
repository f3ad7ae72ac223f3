/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { SlotPool } from './slot-pool.js';
import type { PreviewRenderHost, SceneSpawner } from './types.js';

/**
 * Move every object of each newly ready instance onto its slot's layer.
 *
 * Slot cameras only see their own layer, so this is what keeps slot i's
 * instance out of every other slot's image. Instances keep reporting ready
 * until their slot is released; `layerApplied` makes the pass run once per
 * occupation.
 *
 * @returns number of instances tagged on this pass
 */
export function applySlotLayers<THandle, TObject, TTarget, TView>(
  pool: SlotPool<THandle, TTarget, TView>,
  spawner: Pick<SceneSpawner<THandle, TObject>, 'isReady' | 'forEachObject'>,
  host: Pick<PreviewRenderHost<unknown, TObject, unknown>, 'applyLayer'>,
): number {
  let tagged = 0;

  for (const slot of pool.occupied()) {
    const occupant = slot.occupant;
    if (occupant.layerApplied || !spawner.isReady(occupant.instance)) continue;

    for (const object of spawner.forEachObject(occupant.instance)) {
      host.applyLayer(object, slot.layer);
    }
    // Only after every object is tagged; a throw above retries next tick
    occupant.layerApplied = true;
    tagged++;
  }

  return tagged;
}
