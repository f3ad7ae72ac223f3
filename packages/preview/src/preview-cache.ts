/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * PreviewCache - request-facing memo of rendered previews
 *
 * Tracks, per scene id, whether a preview is cached, queued or in flight.
 * A scene id is claimed on its first request and stays claimed until it is
 * cached or cancelled, so at most one render job per id is ever queued or
 * running no matter how many callers ask for it.
 */

import { createLogger, type SceneId } from '@scene-preview/data';
import type { PreviewState } from './types.js';

const log = createLogger('PreviewCache');

export type CancelOutcome =
  /** Removed from the pending queue; nothing was running */
  | 'dequeued'
  /** Running in a slot; the slot must be revoked on the next drain */
  | 'revoking'
  /** Unknown, cached, or already being cancelled */
  | 'none';

export class PreviewCache<TTarget> {
  private readonly rendered = new Map<SceneId, TTarget>();
  /** Claimed ids: queued or in flight */
  private readonly rendering = new Set<SceneId>();
  /** Pending ids in request order (Set iteration follows insertion) */
  private readonly queue = new Set<SceneId>();
  /** In-flight ids whose revoke has not been drained yet */
  private readonly revoking = new Set<SceneId>();

  /**
   * Return the cached preview, or schedule one and return undefined.
   *
   * Undefined is not an error: the caller polls again later. Requesting an id
   * that is being cancelled withdraws the cancellation.
   */
  request(sceneId: SceneId): TTarget | undefined {
    if (this.rendered.has(sceneId)) {
      return this.rendered.get(sceneId);
    }

    if (this.revoking.delete(sceneId)) {
      log.debug('Cancellation withdrawn by a new request', undefined, { sceneId });
      return undefined;
    }

    if (!this.rendering.has(sceneId)) {
      this.queue.add(sceneId);
      this.rendering.add(sceneId);
    }
    return undefined;
  }

  /** Remove and return the oldest pending id */
  takeNext(): SceneId | undefined {
    for (const sceneId of this.queue) {
      this.queue.delete(sceneId);
      return sceneId;
    }
    return undefined;
  }

  /**
   * Move an in-flight id to cached. Completing an id that is already cached
   * keeps (and returns) the first target.
   */
  complete(sceneId: SceneId, target: TTarget): TTarget {
    this.rendering.delete(sceneId);
    this.revoking.delete(sceneId);
    if (this.rendered.has(sceneId)) {
      log.warn('Preview completed twice; keeping the first image', { operation: 'complete', sceneId });
      return this.rendered.get(sceneId) ?? target;
    }
    this.rendered.set(sceneId, target);
    return target;
  }

  cancel(sceneId: SceneId): CancelOutcome {
    if (this.queue.delete(sceneId)) {
      this.rendering.delete(sceneId);
      return 'dequeued';
    }
    if (this.rendering.has(sceneId) && !this.revoking.has(sceneId)) {
      this.revoking.add(sceneId);
      return 'revoking';
    }
    return 'none';
  }

  isRevoking(sceneId: SceneId): boolean {
    return this.revoking.has(sceneId);
  }

  /** Drop the claim on a revoked id so a later request can re-admit it */
  revoke(sceneId: SceneId): void {
    this.revoking.delete(sceneId);
    this.rendering.delete(sceneId);
  }

  /** Drop every claim (queued and in flight) and return the ids dropped */
  abandonAll(): SceneId[] {
    const dropped = [...this.rendering];
    this.rendering.clear();
    this.queue.clear();
    this.revoking.clear();
    return dropped;
  }

  get(sceneId: SceneId): TTarget | undefined {
    return this.rendered.get(sceneId);
  }

  stateOf(sceneId: SceneId): PreviewState {
    if (this.rendered.has(sceneId)) return 'cached';
    if (this.queue.has(sceneId)) return 'queued';
    if (this.revoking.has(sceneId)) return 'cancelling';
    if (this.rendering.has(sceneId)) return 'in-flight';
    return 'unknown';
  }

  /** Number of cached previews */
  get size(): number {
    return this.rendered.size;
  }

  get pendingCount(): number {
    return this.queue.size;
  }

  get inFlightCount(): number {
    return this.rendering.size - this.queue.size;
  }
}
