import { describe, it, expect } from 'vitest';
import * as tilestash from '../src/index.js';

describe('public API', () => {
  it('should export the manager, the tiers and the geometry helpers', () => {
    expect(typeof tilestash.TileManager).toBe('function');
    expect(typeof tilestash.DiskTileStore).toBe('function');
    expect(typeof tilestash.HttpTileSource).toBe('function');
    expect(typeof tilestash.project).toBe('function');
    expect(typeof tilestash.freezeAddress).toBe('function');
  });

  it('should project route coordinates in place', () => {
    const route = new Float64Array([0, 0, -90, 0]);
    tilestash.projectToMercator(route);
    expect([...route]).toEqual([0.5, 0.5, 0.25, 0.5]);
  });
});
