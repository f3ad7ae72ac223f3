/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { SlotPool } from './slot-pool.js';
import type { CompletionSignal, SceneSpawner } from './types.js';

/**
 * Advance settle counters of occupied slots by one tick.
 *
 * Structural readiness does not mean the image is final: shadow maps,
 * temporal effects and streamed textures trail it by a few frames. A slot
 * therefore completes only after its instance has been ready for
 * `settleFrames` consecutive ticks. A tick where the instance is not ready
 * resets the count. Once the signal fires the counter is removed, so a slot
 * signals at most once per occupation.
 *
 * @returns completion signals for slots that settled on this tick
 */
export function detectSettled<THandle, TTarget, TView>(
  pool: SlotPool<THandle, TTarget, TView>,
  spawner: Pick<SceneSpawner<THandle, unknown>, 'isReady'>,
  settleFrames: number,
): CompletionSignal[] {
  const signals: CompletionSignal[] = [];

  for (const slot of pool.occupied()) {
    const occupant = slot.occupant;
    if (occupant.settleFrames === undefined) continue;

    if (!spawner.isReady(occupant.instance)) {
      // Reset rather than hold: the count is of consecutive ready ticks, so an
      // instance that drops out of readiness starts over
      occupant.settleFrames = 0;
      continue;
    }

    occupant.settleFrames += 1;
    if (occupant.settleFrames >= settleFrames) {
      occupant.settleFrames = undefined;
      signals.push({ kind: 'settled', slot: slot.index, generation: occupant.generation });
    }
  }

  return signals;
}
