/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * PreviewScheduler - one scheduling cycle per host frame
 *
 * A tick runs four phases in a fixed order:
 *
 * 1. admission: pending scenes fill free slots until the pool is full
 * 2. completion: signals raised before this tick cache results and free slots
 * 3. settling: ready instances advance their settle counters
 * 4. layering: newly ready instances move onto their slot's layer
 *
 * Slots freed in phase 2 are only seen by admission on the next tick, and
 * signals raised in phase 3 are only drained on the next tick.
 */

import { createLogger, type SceneId } from '@scene-preview/data';
import { CompletionHandler } from './completion-handler.js';
import { PreviewInvariantError } from './errors.js';
import { applySlotLayers } from './layer-tagger.js';
import { detectSettled } from './settle-detector.js';
import type { PreviewCache } from './preview-cache.js';
import type { PreviewEvents } from './events.js';
import type { RenderTargetFactory } from './render-target-factory.js';
import type { SlotPool } from './slot-pool.js';
import type {
  CompletionSignal,
  OccupiedSlot,
  PreviewConfig,
  PreviewRenderHost,
  SceneSpawner,
} from './types.js';

const log = createLogger('Scheduler');

export interface SchedulerDeps<THandle, TObject, TTarget, TView> {
  config: Pick<PreviewConfig, 'settleFrames' | 'strictInvariants'>;
  cache: PreviewCache<TTarget>;
  pool: SlotPool<THandle, TTarget, TView>;
  spawner: SceneSpawner<THandle, TObject>;
  host: Pick<PreviewRenderHost<TTarget, TObject, TView>, 'applyLayer'>;
  targets: RenderTargetFactory<TTarget>;
  events: PreviewEvents<TTarget>;
}

export class PreviewScheduler<THandle, TObject, TTarget, TView> {
  private readonly completion: CompletionHandler<THandle, TTarget, TView>;
  /** Signals waiting for the next completion phase */
  private signals: CompletionSignal[] = [];
  private spawnCount = 0;
  private tickCount = 0;

  constructor(private readonly deps: SchedulerDeps<THandle, TObject, TTarget, TView>) {
    this.completion = new CompletionHandler(deps);
  }

  /** Instantiations requested from the spawner so far */
  get spawned(): number {
    return this.spawnCount;
  }

  get ticks(): number {
    return this.tickCount;
  }

  tick(): void {
    const { cache, pool, spawner, host, config } = this.deps;
    this.tickCount++;

    const raised = this.signals;
    this.signals = [];

    const admitted = this.admit();
    const cached = this.completion.drain(raised);
    const settled = detectSettled(pool, spawner, config.settleFrames);
    this.signals.push(...settled);
    const tagged = applySlotLayers(pool, spawner, host);

    if (admitted + cached + settled.length + tagged > 0) {
      log.debug(`Tick ${this.tickCount}`, {
        admitted,
        cached,
        settled: settled.length,
        tagged,
        queued: cache.pendingCount,
        freeSlots: pool.freeCount,
      });
    }
  }

  /**
   * Queue a revoke for the slot rendering `sceneId`; it is applied on the next
   * completion phase.
   *
   * @returns false when no slot is rendering the scene
   */
  revoke(sceneId: SceneId): boolean {
    const slot = this.deps.pool.findByScene(sceneId);
    if (!slot) return false;
    this.signals.push({ kind: 'revoked', slot: slot.index, generation: slot.occupant.generation });
    return true;
  }

  /**
   * Despawn and release every occupied slot, disposing their targets.
   *
   * @returns scenes whose renders were abandoned
   */
  releaseAll(): SceneId[] {
    const { pool, spawner, targets } = this.deps;
    const abandoned: SceneId[] = [];
    for (const slot of [...pool.occupied()]) {
      const { sceneId, instance, target } = slot.occupant;
      spawner.despawn(instance);
      pool.release(slot.index);
      targets.dispose(target);
      abandoned.push(sceneId);
    }
    this.signals = [];
    return abandoned;
  }

  /** Fill free slots from the pending queue. @returns number admitted */
  private admit(): number {
    const { cache, pool } = this.deps;
    let admitted = 0;
    while (!pool.isFull()) {
      const sceneId = cache.takeNext();
      if (sceneId === undefined) break;
      if (this.admitOne(sceneId)) admitted++;
    }
    return admitted;
  }

  /**
   * Spawn, allocate and occupy a slot for one scene. A collaborator that
   * throws part way rolls back what was created and drops the scene's claim,
   * so the id can be requested again.
   */
  private admitOne(sceneId: SceneId): boolean {
    const { cache, pool, spawner, targets, events, config } = this.deps;
    const rollback: (() => void)[] = [];

    let slot: OccupiedSlot<THandle, TTarget, TView>;
    try {
      const instance = spawner.spawn(sceneId);
      this.spawnCount++;
      rollback.push(() => spawner.despawn(instance));

      const target = targets.create();
      rollback.push(() => targets.dispose(target));

      const occupied = pool.occupy(sceneId, instance, target);
      if (!occupied) {
        throw new PreviewInvariantError(`Admitted ${sceneId} into a full slot pool`);
      }
      slot = occupied;
    } catch (error) {
      for (const undo of rollback.reverse()) undo();
      cache.revoke(sceneId);

      if (error instanceof PreviewInvariantError) {
        if (config.strictInvariants) throw error;
        log.warn(`${error.message}; dropping the render`, { operation: 'admit', sceneId });
      } else {
        log.error('Failed to admit scene', error, { operation: 'admit', sceneId });
      }
      events.emit('cancelled', { sceneId });
      return false;
    }

    log.info('Generating preview image', { sceneId, slot: slot.index });
    events.emit('admitted', { sceneId, slot: slot.index });
    return true;
  }
}
