/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * PreviewService - the object an asset browser talks to
 *
 * Owns the cache, the slot pool and the scheduler; the host's frame loop owns
 * the service and calls {@link PreviewService.tick} once per frame.
 *
 * Usage:
 *   const previews = createPreviewService({ spawner, host, options: { slotCount: 4 } })
 *   // every frame
 *   previews.tick()
 *   const image = previews.requestPreview('assets/chair.glb')  // undefined until ready
 */

import { createLogger, toSceneId, type SceneId, type SceneRef } from '@scene-preview/data';
import { resolvePreviewConfig } from './config.js';
import { PreviewCancelledError, PreviewDisposedError, PreviewInvariantError } from './errors.js';
import { PreviewEvents } from './events.js';
import { PreviewCache } from './preview-cache.js';
import { RenderTargetFactory } from './render-target-factory.js';
import { PreviewScheduler } from './scheduler.js';
import { SlotPool } from './slot-pool.js';
import type {
  PreviewConfig,
  PreviewEventHandler,
  PreviewEventType,
  PreviewOptions,
  PreviewRenderHost,
  PreviewState,
  PreviewStats,
  SceneSpawner,
} from './types.js';

const log = createLogger('PreviewService');

export interface PreviewServiceInit<THandle, TObject, TTarget, TView> {
  spawner: SceneSpawner<THandle, TObject>;
  host: PreviewRenderHost<TTarget, TObject, TView>;
  options?: PreviewOptions;
}

interface Waiter<TTarget> {
  resolve(target: TTarget): void;
  reject(error: Error): void;
}

export class PreviewService<THandle, TObject, TTarget, TView> {
  readonly config: PreviewConfig;
  private readonly cache = new PreviewCache<TTarget>();
  private readonly pool: SlotPool<THandle, TTarget, TView>;
  private readonly scheduler: PreviewScheduler<THandle, TObject, TTarget, TView>;
  private readonly events = new PreviewEvents<TTarget>();
  private readonly waiters = new Map<SceneId, Waiter<TTarget>[]>();
  private disposed = false;

  constructor(init: PreviewServiceInit<THandle, TObject, TTarget, TView>) {
    const { spawner, host } = init;
    this.config = resolvePreviewConfig(init.options, host);
    this.pool = new SlotPool<THandle, TTarget, TView>(host, this.config);
    this.scheduler = new PreviewScheduler({
      config: this.config,
      cache: this.cache,
      pool: this.pool,
      spawner,
      host,
      targets: new RenderTargetFactory(host, this.config.resolution),
      events: this.events,
    });

    this.events.on('cached', ({ sceneId, target }) => {
      this.settleWaiters(sceneId, (waiter) => waiter.resolve(target));
    });
    this.events.on('cancelled', ({ sceneId }) => {
      this.settleWaiters(sceneId, (waiter) => waiter.reject(new PreviewCancelledError(sceneId)));
    });
  }

  /**
   * Non-blocking, pollable preview lookup.
   *
   * @returns the rendered target once cached; undefined while it is queued or
   * rendering (the first call schedules it)
   */
  requestPreview(scene: SceneId | SceneRef): TTarget | undefined {
    this.assertLive();
    return this.cache.request(toSceneId(scene));
  }

  /** Request a preview and resolve once it is cached */
  whenReady(scene: SceneId | SceneRef): Promise<TTarget> {
    if (this.disposed) {
      return Promise.reject(new PreviewDisposedError());
    }
    const sceneId = toSceneId(scene);
    const target = this.cache.request(sceneId);
    if (target !== undefined) {
      return Promise.resolve(target);
    }
    return new Promise<TTarget>((resolve, reject) => {
      const waiting = this.waiters.get(sceneId) ?? [];
      waiting.push({ resolve, reject });
      this.waiters.set(sceneId, waiting);
    });
  }

  /**
   * Cancel a queued or rendering preview. Queued scenes leave the queue at
   * once; a rendering scene releases its slot on the next tick unless it is
   * requested again first.
   *
   * @returns false for unknown, cached or already-cancelling scenes
   */
  cancel(scene: SceneId | SceneRef): boolean {
    this.assertLive();
    const sceneId = toSceneId(scene);

    if (this.cache.stateOf(sceneId) === 'in-flight' && !this.pool.findByScene(sceneId)) {
      const message = `Scene ${sceneId} is in flight but occupies no slot`;
      if (this.config.strictInvariants) throw new PreviewInvariantError(message);
      log.warn(`${message}; ignoring`, { operation: 'cancel', sceneId });
      return false;
    }

    switch (this.cache.cancel(sceneId)) {
      case 'dequeued':
        this.events.emit('cancelled', { sceneId });
        return true;
      case 'revoking':
        this.scheduler.revoke(sceneId);
        return true;
      case 'none':
        return false;
    }
  }

  /** Run one scheduling cycle */
  tick(): void {
    this.assertLive();
    this.scheduler.tick();
  }

  stateOf(scene: SceneId | SceneRef): PreviewState {
    return this.cache.stateOf(toSceneId(scene));
  }

  stats(): PreviewStats {
    return {
      cached: this.cache.size,
      queued: this.cache.pendingCount,
      inFlight: this.cache.inFlightCount,
      occupiedSlots: this.pool.capacity - this.pool.freeCount,
      freeSlots: this.pool.freeCount,
      spawned: this.scheduler.spawned,
      ticks: this.scheduler.ticks,
    };
  }

  /** Subscribe to an event. Returns unsubscribe function. */
  on<T extends PreviewEventType>(event: T, handler: PreviewEventHandler<TTarget, T>): () => void {
    return this.events.on(event, handler);
  }

  /**
   * Tear down every running render and reject pending waiters. Cached targets
   * stay with whoever holds them.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;

    const abandoned = this.scheduler.releaseAll();
    this.cache.abandonAll();
    for (const waiting of this.waiters.values()) {
      for (const waiter of waiting) waiter.reject(new PreviewDisposedError());
    }
    this.waiters.clear();
    this.events.removeAll();

    if (abandoned.length > 0) {
      log.info(`Disposed with ${abandoned.length} render(s) in flight`);
    }
  }

  private settleWaiters(sceneId: SceneId, settle: (waiter: Waiter<TTarget>) => void): void {
    const waiting = this.waiters.get(sceneId);
    if (!waiting) return;
    this.waiters.delete(sceneId);
    for (const waiter of waiting) settle(waiter);
  }

  private assertLive(): void {
    if (this.disposed) throw new PreviewDisposedError();
  }
}

export function createPreviewService<THandle, TObject, TTarget, TView>(
  init: PreviewServiceInit<THandle, TObject, TTarget, TView>,
): PreviewService<THandle, TObject, TTarget, TView> {
  return new PreviewService(init);
}
