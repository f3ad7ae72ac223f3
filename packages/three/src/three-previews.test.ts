/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, vi } from 'vitest';
import * as THREE from 'three';
import { createThreePreviews } from './three-previews.js';
import type { PreviewRenderer } from './render-host.js';

function fakeRenderer() {
  return {
    getRenderTarget: vi.fn((): THREE.WebGLRenderTarget | null => null),
    setRenderTarget: vi.fn(),
    render: vi.fn(),
    getClearColor: vi.fn((target: THREE.Color) => target),
    getClearAlpha: vi.fn(() => 1),
    setClearColor: vi.fn(),
  } satisfies PreviewRenderer;
}

/** Let pending scene loads finish */
function flushLoads(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('createThreePreviews', () => {
  it('renders a loaded scene into a cached target', async () => {
    const meshes = new Map<string, THREE.Mesh>();
    const previews = createThreePreviews(
      async (sceneId) => {
        const mesh = new THREE.Mesh(new THREE.BoxGeometry(1, 1, 1), new THREE.MeshStandardMaterial());
        meshes.set(sceneId, mesh);
        return mesh;
      },
      { slotCount: 2, settleFrames: 2, resolution: { width: 16, height: 16 } },
    );
    const renderer = fakeRenderer();

    expect(previews.service.requestPreview('crate')).toBeUndefined();
    previews.frame(renderer); // admitted, still loading
    await flushLoads();

    previews.frame(renderer); // ready, tagged onto slot 0's layer
    expect(meshes.get('crate')?.layers.mask).toBe(1 << 24);
    previews.frame(renderer); // settled
    previews.frame(renderer); // cached and released

    const target = previews.service.requestPreview('crate');
    expect(target).toBeInstanceOf(THREE.WebGLRenderTarget);
    expect(target?.width).toBe(16);
    expect(renderer.render).toHaveBeenCalledTimes(3);
    expect(previews.host.scene.children).toEqual([]);
    expect(previews.service.stats()).toMatchObject({ cached: 1, spawned: 1, occupiedSlots: 0 });
  });

  it('keeps a scene that fails to load in flight', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const previews = createThreePreviews(
      () => Promise.reject(new Error('not found')),
      { slotCount: 1, settleFrames: 1 },
    );
    const renderer = fakeRenderer();

    previews.service.requestPreview('missing');
    previews.frame(renderer);
    await flushLoads();
    for (let i = 0; i < 5; i++) previews.frame(renderer);

    expect(previews.service.stateOf('missing')).toBe('in-flight');
    expect(previews.service.stats().spawned).toBe(1);
    vi.restoreAllMocks();
  });

  it('rejects a base layer outside the three.js layer range', () => {
    expect(() => createThreePreviews(async () => new THREE.Group(), { baseLayer: 30, slotCount: 4 }))
      .toThrow('Slot layers 30..33 exceed the host layer limit of 32');
  });
});
