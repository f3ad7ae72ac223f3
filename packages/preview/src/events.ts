/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { createLogger } from '@scene-preview/data';
import type { PreviewEventHandler, PreviewEventMap, PreviewEventType } from './types.js';

const log = createLogger('PreviewEvents');

type HandlerSets<TTarget> = { [K in PreviewEventType]: Set<PreviewEventHandler<TTarget, K>> };

/** Typed listener registry for scheduler lifecycle events */
export class PreviewEvents<TTarget> {
  private readonly handlers: HandlerSets<TTarget> = {
    admitted: new Set(),
    settled: new Set(),
    cached: new Set(),
    cancelled: new Set(),
  };

  /** Subscribe to an event. Returns unsubscribe function. */
  on<T extends PreviewEventType>(event: T, handler: PreviewEventHandler<TTarget, T>): () => void {
    const handlers: Set<PreviewEventHandler<TTarget, T>> = this.handlers[event];
    handlers.add(handler);
    return () => {
      handlers.delete(handler);
    };
  }

  /**
   * Notify listeners. A throwing listener is logged and does not stop the
   * others or the tick that emitted the event.
   */
  emit<T extends PreviewEventType>(event: T, data: PreviewEventMap<TTarget>[T]): void {
    const handlers: Set<PreviewEventHandler<TTarget, T>> = this.handlers[event];
    for (const handler of handlers) {
      try {
        handler(data);
      } catch (error) {
        log.error(`Listener for "${event}" threw`, error);
      }
    }
  }

  removeAll(): void {
    for (const handlers of Object.values(this.handlers)) {
      handlers.clear();
    }
  }
}
