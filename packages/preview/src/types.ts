/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @scene-preview/preview - collaborator interfaces and scheduling state
 *
 * The core never touches a GPU or a scene graph directly. It drives two
 * host-provided services:
 *
 * - a {@link SceneSpawner} that turns a scene id into a live, traversable
 *   instance and reports when that instance is fully built
 * - a {@link PreviewRenderHost} that allocates render targets, creates the
 *   per-slot camera/light pair and tags objects with visibility layers
 *
 * Type parameters name the host's own types so that callers get their
 * render targets back without casts.
 */

import type { Resolution, SceneId } from '@scene-preview/data';

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Scene instantiation service.
 *
 * `THandle` identifies one live instantiation; `TObject` is a node of the
 * instance's object graph.
 */
export interface SceneSpawner<THandle, TObject> {
  /** Start building a new instance of the scene */
  spawn(sceneId: SceneId): THandle;
  /** True once the instance's object graph is fully built */
  isReady(handle: THandle): boolean;
  /** Tear down the instance and everything it spawned */
  despawn(handle: THandle): void;
  /** Every object of the instance's graph, root included */
  forEachObject(handle: THandle): Iterable<TObject>;
}

/** What the host needs to build a slot's camera and light */
export interface SlotViewRequest<TTarget> {
  index: number;
  layer: number;
  target: TTarget;
}

/**
 * Rendering pipeline boundary.
 *
 * `TView` is whatever the host creates per occupied slot (typically a camera
 * rendering into the slot's target plus a light, both restricted to the
 * slot's layer).
 */
export interface PreviewRenderHost<TTarget, TObject, TView> {
  /** Exclusive upper bound of usable layer numbers, if the host has one */
  readonly layerLimit?: number;
  /** Layers the host already uses for other purposes */
  readonly reservedLayers?: readonly number[];
  /** Base layer used when the options do not set one */
  readonly preferredBaseLayer?: number;

  createTarget(resolution: Resolution): TTarget;
  disposeTarget(target: TTarget): void;
  createView(request: SlotViewRequest<TTarget>): TView;
  destroyView(view: TView): void;
  /** Restrict an object to the given visibility layer */
  applyLayer(object: TObject, layer: number): void;
}

// ============================================================================
// Configuration
// ============================================================================

export interface PreviewOptions {
  /** Size of generated images (default 256×256) */
  resolution?: Resolution;
  /** Concurrent render slots, fixed for the service's lifetime (default 8) */
  slotCount?: number;
  /** First slot layer; slot i draws on `baseLayer + i` (default 128) */
  baseLayer?: number;
  /** Consecutive ready ticks before a preview is final (default 8) */
  settleFrames?: number;
  /**
   * Throw {@link PreviewInvariantError} on bookkeeping violations. When false
   * the violation is logged and the offending call becomes a no-op.
   * Default: true.
   */
  strictInvariants?: boolean;
}

export interface PreviewConfig {
  resolution: Resolution;
  slotCount: number;
  baseLayer: number;
  settleFrames: number;
  strictInvariants: boolean;
}

// ============================================================================
// Slots
// ============================================================================

export interface SlotOccupant<THandle, TTarget, TView> {
  readonly sceneId: SceneId;
  readonly instance: THandle;
  readonly target: TTarget;
  readonly view: TView;
  /** Bumped on every occupation; completion signals carry it */
  readonly generation: number;
  /** Layer tags have been applied to the instance */
  layerApplied: boolean;
  /** Consecutive ready ticks so far; undefined once the signal has fired */
  settleFrames: number | undefined;
}

export interface PreviewSlot<THandle, TTarget, TView> {
  readonly index: number;
  readonly layer: number;
  /** Null while the slot is free */
  occupant: SlotOccupant<THandle, TTarget, TView> | null;
}

/** A slot together with its (non-null) occupant */
export interface OccupiedSlot<THandle, TTarget, TView> extends PreviewSlot<THandle, TTarget, TView> {
  occupant: SlotOccupant<THandle, TTarget, TView>;
}

// ============================================================================
// Completion signals
// ============================================================================

export type CompletionSignal =
  /** The slot's render has settled and can be cached */
  | { kind: 'settled'; slot: number; generation: number }
  /** The slot's render was cancelled; release without caching */
  | { kind: 'revoked'; slot: number; generation: number };

// ============================================================================
// Cache state
// ============================================================================

export type PreviewState = 'unknown' | 'queued' | 'in-flight' | 'cancelling' | 'cached';

export interface PreviewStats {
  cached: number;
  queued: number;
  inFlight: number;
  occupiedSlots: number;
  freeSlots: number;
  /** Instantiations requested from the spawner since construction */
  spawned: number;
  ticks: number;
}

// ============================================================================
// Events
// ============================================================================

export interface PreviewEventMap<TTarget> {
  admitted: { sceneId: SceneId; slot: number };
  settled: { sceneId: SceneId; slot: number };
  cached: { sceneId: SceneId; target: TTarget };
  cancelled: { sceneId: SceneId };
}

export type PreviewEventType = keyof PreviewEventMap<unknown>;

export type PreviewEventHandler<TTarget, T extends PreviewEventType> =
  (data: PreviewEventMap<TTarget>[T]) => void;
