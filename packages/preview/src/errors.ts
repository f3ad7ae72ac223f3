/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { SceneId } from '@scene-preview/data';

/** Thrown at construction when preview options cannot be honoured */
export class PreviewConfigError extends Error {
  constructor(
    message: string,
    public readonly option: string,
  ) {
    super(message);
    this.name = 'PreviewConfigError';
  }
}

/**
 * Thrown when the scheduler is driven into a state its bookkeeping forbids,
 * e.g. releasing a free slot or admitting into a full pool.
 */
export class PreviewInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PreviewInvariantError';
  }
}

/** Rejects {@link PreviewService.whenReady} when the preview is cancelled */
export class PreviewCancelledError extends Error {
  constructor(public readonly sceneId: SceneId) {
    super(`Preview for ${sceneId} was cancelled`);
    this.name = 'PreviewCancelledError';
  }
}

/** Thrown or rejected once the service has been disposed */
export class PreviewDisposedError extends Error {
  constructor() {
    super('Preview service has been disposed');
    this.name = 'PreviewDisposedError';
  }
}
