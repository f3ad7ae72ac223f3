/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @scene-preview/preview - bounded, cached off-screen preview rendering
 *
 * Turns an unbounded stream of "render a preview of scene S" requests into at
 * most `slotCount` concurrent off-screen renders, waits for each render to
 * settle, and memoizes the result per scene id.
 *
 * @example
 * ```ts
 * import { createPreviewService } from '@scene-preview/preview';
 *
 * const previews = createPreviewService({ spawner, host });
 * hostLoop.onFrame(() => previews.tick());
 *
 * const image = previews.requestPreview('props/barrel');  // undefined until ready
 * const later = await previews.whenReady('props/crate');
 * ```
 */

// ============================================================================
// Types
// ============================================================================

export type {
  SceneSpawner,
  PreviewRenderHost,
  SlotViewRequest,
  PreviewOptions,
  PreviewConfig,
  PreviewSlot,
  OccupiedSlot,
  SlotOccupant,
  CompletionSignal,
  PreviewState,
  PreviewStats,
  PreviewEventMap,
  PreviewEventType,
  PreviewEventHandler,
} from './types.js';

export { PREVIEW_DEFAULTS, PREVIEW_LIMITS } from './constants.js';

// ============================================================================
// Errors
// ============================================================================

export {
  PreviewConfigError,
  PreviewInvariantError,
  PreviewCancelledError,
  PreviewDisposedError,
} from './errors.js';

// ============================================================================
// Components
// ============================================================================

export { resolvePreviewConfig, slotLayer } from './config.js';
export type { LayerConstraints } from './config.js';
export { RenderTargetFactory } from './render-target-factory.js';
export { SlotPool, isOccupied } from './slot-pool.js';
export { PreviewCache } from './preview-cache.js';
export type { CancelOutcome } from './preview-cache.js';
export { detectSettled } from './settle-detector.js';
export { applySlotLayers } from './layer-tagger.js';
export { CompletionHandler } from './completion-handler.js';
export type { CompletionDeps } from './completion-handler.js';
export { PreviewScheduler } from './scheduler.js';
export type { SchedulerDeps } from './scheduler.js';
export { PreviewEvents } from './events.js';

// ============================================================================
// Service
// ============================================================================

export { PreviewService, createPreviewService } from './service.js';
export type { PreviewServiceInit } from './service.js';
