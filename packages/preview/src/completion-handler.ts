/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { createLogger } from '@scene-preview/data';
import type { PreviewCache } from './preview-cache.js';
import type { RenderTargetFactory } from './render-target-factory.js';
import { isOccupied, type SlotPool } from './slot-pool.js';
import type { PreviewEvents } from './events.js';
import type { CompletionSignal, OccupiedSlot, SceneSpawner } from './types.js';

const log = createLogger('CompletionHandler');

export interface CompletionDeps<THandle, TTarget, TView> {
  cache: PreviewCache<TTarget>;
  pool: SlotPool<THandle, TTarget, TView>;
  spawner: Pick<SceneSpawner<THandle, unknown>, 'despawn'>;
  targets: RenderTargetFactory<TTarget>;
  events: PreviewEvents<TTarget>;
}

/**
 * Turns completion signals into cache entries and free slots.
 *
 * Signals name a slot and the occupation generation they were raised for; a
 * signal outliving its occupation (the slot was released or re-occupied) is
 * dropped.
 */
export class CompletionHandler<THandle, TTarget, TView> {
  constructor(private readonly deps: CompletionDeps<THandle, TTarget, TView>) {}

  /** @returns number of previews cached */
  drain(signals: readonly CompletionSignal[]): number {
    let cached = 0;
    for (const signal of signals) {
      const slot = this.resolve(signal);
      if (!slot) continue;

      const { sceneId } = slot.occupant;
      if (this.deps.cache.isRevoking(sceneId)) {
        this.revoke(slot);
      } else if (signal.kind === 'settled') {
        this.complete(slot);
        cached++;
      }
      // A revoked signal for a resumed scene leaves the render running
    }
    return cached;
  }

  private resolve(signal: CompletionSignal): OccupiedSlot<THandle, TTarget, TView> | undefined {
    const slot = this.deps.pool.get(signal.slot);
    if (!slot || !isOccupied(slot) || slot.occupant.generation !== signal.generation) {
      log.debug(`Dropping stale ${signal.kind} signal`, undefined, { slot: signal.slot });
      return undefined;
    }
    return slot;
  }

  private complete(slot: OccupiedSlot<THandle, TTarget, TView>): void {
    const { sceneId, instance, target } = slot.occupant;
    const { cache, pool, spawner, events } = this.deps;

    const stored = cache.complete(sceneId, target);
    spawner.despawn(instance);
    pool.release(slot.index);
    log.info('Preview image generated', { sceneId, slot: slot.index });

    events.emit('settled', { sceneId, slot: slot.index });
    events.emit('cached', { sceneId, target: stored });
  }

  private revoke(slot: OccupiedSlot<THandle, TTarget, TView>): void {
    const { sceneId, instance, target } = slot.occupant;
    const { cache, pool, spawner, targets, events } = this.deps;

    cache.revoke(sceneId);
    spawner.despawn(instance);
    pool.release(slot.index);
    targets.dispose(target);
    log.info('Preview render cancelled', { sceneId, slot: slot.index });

    events.emit('cancelled', { sceneId });
  }
}
