/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import type { Resolution } from '@scene-preview/data';
import type { PreviewRenderHost } from './types.js';

/** Allocates preview-sized render targets through the host */
export class RenderTargetFactory<TTarget> {
  constructor(
    private readonly host: Pick<PreviewRenderHost<TTarget, unknown, unknown>, 'createTarget' | 'disposeTarget'>,
    private readonly resolution: Resolution,
  ) {}

  create(): TTarget {
    return this.host.createTarget({ ...this.resolution });
  }

  /** Hand back a target that never made it into the cache */
  dispose(target: TTarget): void {
    this.host.disposeTarget(target);
  }
}
