/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, formatContext, formatError } from './logger.js';
import { toSceneId } from './types.js';

afterEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

describe('formatContext', () => {
  it('prefixes component, operation, scene and slot', () => {
    expect(formatContext({ component: 'SlotPool', operation: 'release', sceneId: 'chair', slot: 3 }))
      .toBe('[SlotPool] release scene=chair slot=3');
  });

  it('keeps slot 0', () => {
    expect(formatContext({ component: 'SlotPool', slot: 0 })).toBe('[SlotPool] slot=0');
  });
});

describe('formatError', () => {
  it('stringifies non-errors', () => {
    expect(formatError('plain')).toBe('plain');
  });

  it('includes name and message of errors', () => {
    const err = new TypeError('bad');
    expect(formatError(err).startsWith('TypeError: bad')).toBe(true);
  });
});

describe('createLogger', () => {
  it('always prints warnings', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('Scheduler').warn('pool full', { operation: 'admit' });
    expect(warn).toHaveBeenCalledWith('[Scheduler] admit pool full');
  });

  it('prints errors with the formatted cause', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createLogger('Spawner').error('load failed', 'missing file', { sceneId: 'lamp' });
    expect(error).toHaveBeenCalledWith('[Spawner] scene=lamp load failed:', 'missing file');
  });

  it('suppresses info unless PREVIEW_DEBUG is set', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.stubEnv('PREVIEW_DEBUG', '');
    createLogger('Scheduler').info('quiet');
    expect(log).not.toHaveBeenCalled();

    vi.stubEnv('PREVIEW_DEBUG', 'true');
    createLogger('Scheduler').info('loud', { slot: 1 });
    expect(log).toHaveBeenCalledWith('[Scheduler] slot=1 loud');
  });
});

describe('toSceneId', () => {
  it('accepts ids and refs', () => {
    expect(toSceneId('a')).toBe('a');
    expect(toSceneId({ id: 'b' })).toBe('b');
  });
});
