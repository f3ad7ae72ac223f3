/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * SlotPool - fixed arena of render slots addressed by index
 *
 * Each slot owns one visibility layer (`baseLayer + index`). Occupancy is a
 * 32-bit free mask, so acquiring the lowest free index and releasing are O(1)
 * and the layer a scene renders on is reproducible from its admission order.
 */

import { createLogger, type SceneId } from '@scene-preview/data';
import { slotLayer } from './config.js';
import { PreviewInvariantError } from './errors.js';
import type { OccupiedSlot, PreviewConfig, PreviewRenderHost, PreviewSlot, SlotOccupant } from './types.js';

const log = createLogger('SlotPool');

type ViewHost<TTarget, TView> = Pick<PreviewRenderHost<TTarget, unknown, TView>, 'createView' | 'destroyView'>;

export function isOccupied<THandle, TTarget, TView>(
  slot: PreviewSlot<THandle, TTarget, TView>,
): slot is OccupiedSlot<THandle, TTarget, TView> {
  return slot.occupant !== null;
}

/** Index of the lowest set bit, or -1 for an empty mask */
function lowestSetBit(mask: number): number {
  if (mask === 0) return -1;
  return 31 - Math.clz32(mask & -mask);
}

export class SlotPool<THandle, TTarget, TView> {
  private readonly slots: PreviewSlot<THandle, TTarget, TView>[] = [];
  private freeMask: number;
  private nextGeneration = 1;

  constructor(
    private readonly host: ViewHost<TTarget, TView>,
    private readonly config: Pick<PreviewConfig, 'slotCount' | 'baseLayer' | 'strictInvariants'>,
  ) {
    for (let index = 0; index < config.slotCount; index++) {
      this.slots.push({ index, layer: slotLayer(config, index), occupant: null });
    }
    this.freeMask = config.slotCount === 32 ? ~0 : (1 << config.slotCount) - 1;
  }

  get capacity(): number {
    return this.slots.length;
  }

  get freeCount(): number {
    let count = 0;
    for (let mask = this.freeMask; mask !== 0; mask &= mask - 1) count++;
    return count;
  }

  isFull(): boolean {
    return this.freeMask === 0;
  }

  /**
   * Bind a scene instance and its target to the lowest free slot, creating the
   * slot's camera and light on its layer.
   *
   * @returns the occupied slot, or undefined when every slot is taken
   */
  occupy(sceneId: SceneId, instance: THandle, target: TTarget): OccupiedSlot<THandle, TTarget, TView> | undefined {
    const index = lowestSetBit(this.freeMask);
    if (index === -1) return undefined;

    const slot = this.slots[index];
    const view = this.host.createView({ index, layer: slot.layer, target });

    this.freeMask &= ~(1 << index);
    const occupant: SlotOccupant<THandle, TTarget, TView> = {
      sceneId,
      instance,
      target,
      view,
      generation: this.nextGeneration++,
      layerApplied: false,
      settleFrames: 0,
    };
    return Object.assign(slot, { occupant });
  }

  /**
   * Destroy the slot's camera and light and mark it free.
   *
   * Releasing a slot that is already free is a bookkeeping bug. Under
   * `strictInvariants` it throws; otherwise it is logged and ignored.
   */
  release(index: number): void {
    const slot = this.slots[index];
    if (!slot) {
      this.violation(`Slot index ${index} is outside the pool of ${this.slots.length}`, index);
      return;
    }
    if (!slot.occupant) {
      this.violation(`Slot ${index} released while already free`, index);
      return;
    }

    this.host.destroyView(slot.occupant.view);
    slot.occupant = null;
    this.freeMask |= 1 << index;
  }

  get(index: number): PreviewSlot<THandle, TTarget, TView> | undefined {
    return this.slots[index];
  }

  findByScene(sceneId: SceneId): OccupiedSlot<THandle, TTarget, TView> | undefined {
    for (const slot of this.occupied()) {
      if (slot.occupant.sceneId === sceneId) return slot;
    }
    return undefined;
  }

  /** Occupied slots in index order */
  *occupied(): Generator<OccupiedSlot<THandle, TTarget, TView>> {
    for (const slot of this.slots) {
      if (isOccupied(slot)) yield slot;
    }
  }

  private violation(message: string, slot: number): void {
    if (this.config.strictInvariants) {
      throw new PreviewInvariantError(message);
    }
    log.warn(`${message}; ignoring`, { operation: 'release', slot });
  }
}
