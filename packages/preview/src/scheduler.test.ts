/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { PreviewScheduler } from './scheduler.js';
import { PreviewCache } from './preview-cache.js';
import { SlotPool } from './slot-pool.js';
import { RenderTargetFactory } from './render-target-factory.js';
import { PreviewEvents } from './events.js';
import { FakeHost, FakeSpawner } from '../test/fakes.js';
import type { FakeInstance, FakeTarget, FakeView } from '../test/fakes.js';

function createHarness(slotCount: number, settleFrames: number, readyDelay = 0) {
  const host = new FakeHost();
  const spawner = new FakeSpawner(readyDelay);
  const cache = new PreviewCache<FakeTarget>();
  const pool = new SlotPool<FakeInstance, FakeTarget, FakeView>(host, { slotCount, baseLayer: 128, strictInvariants: true });
  const events = new PreviewEvents<FakeTarget>();
  const scheduler = new PreviewScheduler({
    config: { settleFrames, strictInvariants: true },
    cache,
    pool,
    spawner,
    host,
    targets: new RenderTargetFactory(host, { width: 16, height: 16 }),
    events,
  });
  const tick = () => {
    spawner.advance();
    scheduler.tick();
  };
  return { host, spawner, cache, pool, events, scheduler, tick };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('PreviewScheduler', () => {
  it('renders three scenes through two slots', () => {
    const { cache, spawner, tick } = createHarness(2, 3);
    cache.request('A');
    cache.request('B');
    cache.request('C');

    const sizes: number[] = [];
    for (let i = 0; i < 8; i++) {
      tick();
      sizes.push(cache.size);
    }

    expect(sizes).toEqual([0, 0, 0, 2, 2, 2, 2, 3]);
    expect(spawner.instances.map((i) => i.sceneId)).toEqual(['A', 'B', 'C']);
    expect(spawner.live).toEqual([]);
  });

  it('admits as many scenes as there are free slots in one tick', () => {
    const { cache, pool, tick } = createHarness(4, 2);
    for (const id of ['a', 'b', 'c', 'd', 'e', 'f']) cache.request(id);

    tick();
    expect(pool.isFull()).toBe(true);
    expect(cache.pendingCount).toBe(2);
    expect(cache.stateOf('d')).toBe('in-flight');
    expect(cache.stateOf('e')).toBe('queued');
  });

  it('never occupies more than K slots', () => {
    const { cache, host, tick } = createHarness(3, 2, 1);
    for (let i = 0; i < 20; i++) cache.request(`scene-${i}`);

    let maxLive = 0;
    for (let i = 0; i < 60; i++) {
      tick();
      maxLive = Math.max(maxLive, host.liveViews.length);
    }

    expect(maxLive).toBe(3);
    expect(cache.size).toBe(20);
  });

  it('spawns once for a scene requested many times', () => {
    const { cache, spawner, tick } = createHarness(2, 2);
    cache.request('a');
    tick();
    cache.request('a');
    cache.request('a');
    tick();
    cache.request('a');
    tick();
    tick();

    expect(cache.stateOf('a')).toBe('cached');
    expect(spawner.spawnCount('a')).toBe(1);
  });

  it('does not hand a slot freed by completion to admission in the same tick', () => {
    const { cache, pool, host, tick } = createHarness(1, 1);
    cache.request('a');
    cache.request('b');

    tick(); // a admitted and settles
    tick(); // a drained; b still waits
    expect(cache.stateOf('a')).toBe('cached');
    expect(cache.stateOf('b')).toBe('queued');
    expect(pool.freeCount).toBe(1);

    tick(); // b admitted into slot 0
    expect(pool.get(0)?.occupant?.sceneId).toBe('b');
    expect(host.views).toHaveLength(2);
  });

  it('caches the slot target and despawns the instance on completion', () => {
    const { cache, spawner, host, tick } = createHarness(1, 1);
    cache.request('a');
    tick();
    tick();

    expect(cache.get('a')).toBe(host.targets[0]);
    expect(host.targets[0].disposed).toBe(false);
    expect(host.targets[0]).toMatchObject({ width: 16, height: 16 });
    expect(spawner.instances[0].despawned).toBe(true);
    expect(host.views[0].destroyed).toBe(true);
  });

  it('tags the instance before it settles', () => {
    const { cache, spawner, tick } = createHarness(1, 3, 1);
    cache.request('a');
    tick();
    expect(spawner.instances[0].objects[0].layer).toBeNull();
    tick();
    expect(spawner.instances[0].objects.map((o) => o.layer)).toEqual([128, 128, 128]);
  });

  it('leaves scenes that never become ready in flight', () => {
    const { cache, spawner, tick } = createHarness(1, 2);
    cache.request('broken');
    spawner.stall('broken');
    for (let i = 0; i < 10; i++) tick();

    expect(cache.stateOf('broken')).toBe('in-flight');
    expect(spawner.spawnCount('broken')).toBe(1);
  });

  it('emits admitted, settled and cached events', () => {
    const { cache, events, tick } = createHarness(1, 1);
    const seen: string[] = [];
    events.on('admitted', ({ sceneId, slot }) => seen.push(`admitted ${sceneId}@${slot}`));
    events.on('settled', ({ sceneId }) => seen.push(`settled ${sceneId}`));
    events.on('cached', ({ sceneId }) => seen.push(`cached ${sceneId}`));

    cache.request('a');
    tick();
    tick();

    expect(seen).toEqual(['admitted a@0', 'settled a', 'cached a']);
  });

  describe('revoke', () => {
    it('releases the slot on the next tick without caching', () => {
      const { cache, scheduler, spawner, host, pool, tick } = createHarness(1, 5);
      cache.request('a');
      tick();
      cache.cancel('a');

      expect(scheduler.revoke('a')).toBe(true);
      expect(pool.isFull()).toBe(true);

      tick();
      expect(cache.stateOf('a')).toBe('unknown');
      expect(pool.isFull()).toBe(false);
      expect(spawner.instances[0].despawned).toBe(true);
      expect(host.targets[0].disposed).toBe(true);
    });

    it('drops the render when the settle signal is still pending', () => {
      const { cache, scheduler, host, tick } = createHarness(1, 1);
      cache.request('a');
      tick(); // settle signal raised
      cache.cancel('a');
      scheduler.revoke('a');

      tick();
      expect(cache.size).toBe(0);
      expect(cache.stateOf('a')).toBe('unknown');
      expect(host.targets[0].disposed).toBe(true);
    });

    it('keeps rendering when the scene is requested again before the drain', () => {
      const { cache, scheduler, spawner, tick } = createHarness(1, 2);
      cache.request('a');
      tick();
      cache.cancel('a');
      scheduler.revoke('a');
      cache.request('a');

      tick();
      tick();
      expect(cache.stateOf('a')).toBe('cached');
      expect(spawner.spawnCount('a')).toBe(1);
    });

    it('returns false for scenes not in a slot', () => {
      const { scheduler } = createHarness(1, 1);
      expect(scheduler.revoke('missing')).toBe(false);
    });
  });

  describe('admission failures', () => {
    it('drops a scene whose spawn throws and admits the next one', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      const { cache, pool, spawner, scheduler, events, tick } = createHarness(1, 1);
      const spawn = spawner.spawn.bind(spawner);
      vi.spyOn(spawner, 'spawn').mockImplementation((sceneId) => {
        if (sceneId === 'bad') throw new Error('spawn failed');
        return spawn(sceneId);
      });
      const cancelled: string[] = [];
      events.on('cancelled', ({ sceneId }) => cancelled.push(sceneId));

      cache.request('bad');
      cache.request('good');
      tick();

      expect(cache.stateOf('bad')).toBe('unknown');
      expect(cancelled).toEqual(['bad']);
      expect(pool.get(0)?.occupant?.sceneId).toBe('good');
      expect(scheduler.spawned).toBe(1);
      expect(error).toHaveBeenCalledTimes(1);
      expect(error.mock.calls[0][0]).toBe('[Scheduler] admit scene=bad Failed to admit scene:');

      tick();
      expect(cache.stateOf('good')).toBe('cached');
      cache.request('bad');
      expect(cache.stateOf('bad')).toBe('queued');
    });

    it('rolls back the instance and target when the slot view cannot be built', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});
      const { cache, pool, spawner, host, scheduler, tick } = createHarness(2, 5);
      vi.spyOn(host, 'createView').mockImplementationOnce(() => {
        throw new Error('no camera');
      });

      cache.request('a');
      cache.request('b');
      tick();

      expect(spawner.instances[0].despawned).toBe(true);
      expect(host.targets[0].disposed).toBe(true);
      expect(cache.stateOf('a')).toBe('unknown');
      expect(cache.stateOf('b')).toBe('in-flight');
      expect(pool.get(0)?.occupant?.sceneId).toBe('b');
      expect(pool.freeCount).toBe(1);
      expect(scheduler.spawned).toBe(2);
    });
  });

  it('releaseAll despawns every running render', () => {
    const { cache, scheduler, spawner, host, pool, tick } = createHarness(2, 10);
    cache.request('a');
    cache.request('b');
    tick();

    expect(scheduler.releaseAll()).toEqual(['a', 'b']);
    expect(spawner.live).toEqual([]);
    expect(host.liveViews).toEqual([]);
    expect(host.targets.every((t) => t.disposed)).toBe(true);
    expect(pool.freeCount).toBe(2);
  });
});
