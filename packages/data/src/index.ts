/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @scene-preview/data - Shared identifiers and logging
 */

export { toSceneId } from './types.js';
export type { SceneId, SceneRef, Resolution } from './types.js';
export { createLogger, isDebugEnabled, formatContext, formatError } from './logger.js';
export type { Logger, LogLevel, LogContext } from './logger.js';
