import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { TileManager, type TileManagerOptions } from '../src/manager.js';
import { tileAddress } from '../src/address.js';
import { ConfigError } from '../src/errors.js';
import { silentLogger } from '../src/logger.js';
import type { Viewport } from '../src/tiles.js';
import { FakeTileSource } from './helpers/fake-source.js';
import { solidPng } from './helpers/images.js';

const address = tileAddress(3, 2, 1);
const centered: Viewport = { center: { x: 0.5, y: 0.5 }, width: 256, height: 256 };

describe('TileManager', () => {
  let cacheDir: string;
  let source: FakeTileSource;
  let png: Uint8Array;
  let now: number;
  let manager: TileManager | undefined;

  function createManager(options?: TileManagerOptions): TileManager {
    manager = new TileManager({
      cacheDir,
      source,
      logger: silentLogger,
      clock: () => now,
      failureCooldown: 1000,
      ...options,
    });
    return manager;
  }

  beforeEach(async () => {
    cacheDir = await mkdtemp(join(tmpdir(), 'tilestash-manager-'));
    source = new FakeTileSource();
    png = await solidPng(4, 4, { r: 0, g: 128, b: 255 });
    now = 0;
    manager = undefined;
  });

  afterEach(async () => {
    source.release();
    await manager?.shutdown();
    await rm(cacheDir, { recursive: true, force: true });
  });

  // ─── Request path ────────────────────────────────────────────────────

  it('should return null on a miss, then the decoded tile once resolved', async () => {
    source.set('3/2/1', png);
    const tiles = createManager();

    expect(tiles.request(address)).toBeNull();
    expect(tiles.status(address)).toBe('fetching');

    await tiles.idle();
    const image = tiles.request(address);

    expect(image?.width).toBe(4);
    expect(image?.height).toBe(4);
    expect([...(image?.data.subarray(0, 4) ?? [])]).toEqual([0, 128, 255, 255]);
    expect(tiles.status(address)).toBe('cached');
    expect([...(await readFile(join(cacheDir, '3', '2', '1.png')))]).toEqual([...png]);
  });

  it('should fetch a tile once however often it is requested', async () => {
    source.set('3/2/1', png);
    const tiles = createManager();

    for (let i = 0; i < 10; i++) expect(tiles.request(address)).toBeNull();
    await tiles.idle();

    expect(source.fetchCount('3/2/1')).toBe(1);
    expect(tiles.stats().misses).toBe(10);
  });

  it('should answer from RAM without touching disk or network again', async () => {
    source.set('3/2/1', png);
    const tiles = createManager();

    tiles.request(address);
    await tiles.idle();
    const first = tiles.request(address);
    await rm(join(cacheDir, '3'), { recursive: true });

    expect(tiles.request(address)).toBe(first);
    expect(tiles.stats().queued).toBe(0);
    expect(source.fetchCount('3/2/1')).toBe(1);
  });

  it('should serve a tile cached on disk by an earlier session', async () => {
    await mkdir(join(cacheDir, '3', '2'), { recursive: true });
    await writeFile(join(cacheDir, '3', '2', '1.png'), png);
    const tiles = createManager();

    tiles.request(address);
    await tiles.idle();

    expect(tiles.request(address)?.width).toBe(4);
    expect(source.calls).toEqual([]);
    expect(tiles.stats().diskHits).toBe(1);
  });

  it('should replace a corrupt file in the disk cache', async () => {
    await mkdir(join(cacheDir, '3', '2'), { recursive: true });
    await writeFile(join(cacheDir, '3', '2', '1.png'), 'truncated');
    source.set('3/2/1', png);
    const tiles = createManager();

    tiles.request(address);
    await tiles.idle();

    expect(tiles.request(address)?.width).toBe(4);
    expect([...(await readFile(join(cacheDir, '3', '2', '1.png')))]).toEqual([...png]);
  });

  it('should not be confused by a caller reusing one address object', async () => {
    source.set('3/7/7', png).set('3/0/0', png).set('3/1/0', png);
    const tiles = createManager({ workers: 1 });

    tiles.request(tileAddress(3, 7, 7));
    const reused = { zoom: 3, col: 0, row: 0 };
    tiles.request(reused);
    reused.col = 1;
    tiles.request(reused);

    expect(tiles.status(tileAddress(3, 0, 0))).toBe('queued');
    expect(tiles.status(tileAddress(3, 1, 0))).toBe('queued');

    await tiles.idle();

    expect(source.calls).toEqual(['3/7/7', '3/1/0', '3/0/0']);
    expect(tiles.status(tileAddress(3, 0, 0))).toBe('cached');
    expect(tiles.status(tileAddress(3, 1, 0))).toBe('cached');
  });

  it('should reject malformed addresses', () => {
    const tiles = createManager();
    expect(() => tiles.request({ zoom: 3, col: 8, row: 0 })).toThrow(RangeError);
    expect(() => tiles.request({ zoom: -1, col: 0, row: 0 })).toThrow(RangeError);
  });

  // ─── Failures ────────────────────────────────────────────────────────

  it('should leave a failed tile alone until its cooldown passes', async () => {
    const tiles = createManager();

    tiles.request(address);
    await tiles.idle();
    expect(tiles.status(address)).toBe('failed');
    expect(tiles.peek(address)).toMatchObject({ state: 'failed', retryAt: 1000 });

    now = 999;
    expect(tiles.request(address)).toBeNull();
    expect(tiles.status(address)).toBe('failed');
    expect(source.fetchCount('3/2/1')).toBe(1);

    now = 1000;
    source.set('3/2/1', png);
    tiles.request(address);
    await tiles.idle();

    expect(source.fetchCount('3/2/1')).toBe(2);
    expect(tiles.request(address)).not.toBeNull();
  });

  it('should isolate failures to their own tile', async () => {
    source.set('3/2/2', png);
    const tiles = createManager();

    tiles.request(address);
    tiles.request(tileAddress(3, 2, 2));
    await tiles.idle();

    expect(tiles.status(address)).toBe('failed');
    expect(tiles.status(tileAddress(3, 2, 2))).toBe('cached');
    expect(tiles.stats()).toMatchObject({ cached: 1, failed: 1, failures: 1 });
  });

  // ─── Preloading ──────────────────────────────────────────────────────

  it('should preload only tiles that are not cached or pending', async () => {
    source.set('3/2/1', png);
    const tiles = createManager();

    tiles.request(address);
    await tiles.idle();

    expect(tiles.preload([address, tileAddress(3, 2, 2), tileAddress(3, 2, 2)])).toBe(1);
  });

  it('should validate the whole batch before queuing any of it', () => {
    source.hold();
    const tiles = createManager();

    expect(() => tiles.preload([address, { zoom: 1, col: 2, row: 0 }])).toThrow(RangeError);
    expect(tiles.status(address)).toBe('unrequested');
  });

  it('should preload the ring around the viewport', async () => {
    const tiles = createManager({ preloadMargin: 2 });

    expect(tiles.preloadAround(centered, 4)).toBe(32);
    await tiles.idle();

    expect(source.calls).toHaveLength(32);
    expect(source.calls).not.toContain('4/7/7');
    // all failed and cooling down
    expect(tiles.preloadAround(centered, 4)).toBe(0);
  });

  it('should enumerate visible tiles with the configured tile size', () => {
    const tiles = createManager({ tileSize: 512 });
    const viewport: Viewport = { center: { x: 0.5, y: 0.5 }, width: 512, height: 512 };

    expect([...tiles.visibleTiles(viewport, 2)]).toEqual([
      tileAddress(2, 1, 1),
      tileAddress(2, 2, 1),
      tileAddress(2, 1, 2),
      tileAddress(2, 2, 2),
    ]);
  });

  // ─── Cancellation ────────────────────────────────────────────────────

  it('should cancel queued tiles that left the preload area', () => {
    source.hold();
    const tiles = createManager({ workers: 1, preloadMargin: 2 });

    const active = tileAddress(4, 7, 7);
    tiles.request(active);
    tiles.preload([tileAddress(4, 0, 0), tileAddress(4, 8, 8), tileAddress(5, 0, 0)]);

    const dropped = tiles.cancelStale(centered, 4);

    expect(dropped).toEqual([tileAddress(4, 0, 0), tileAddress(5, 0, 0)]);
    expect(tiles.status(tileAddress(4, 8, 8))).toBe('queued');
    expect(tiles.status(tileAddress(4, 0, 0))).toBe('unrequested');
    expect(tiles.status(active)).toBe('fetching');
  });

  it('should keep columns that wrap around the antimeridian', () => {
    source.hold();
    const tiles = createManager({ workers: 1, preloadMargin: 0 });
    const viewport: Viewport = { center: { x: 0, y: 0.5 }, width: 256, height: 256 };

    tiles.request(tileAddress(2, 0, 2));
    tiles.preload([0, 1, 2, 3].map(col => tileAddress(2, col, 1)));

    const dropped = tiles.cancelStale(viewport, 2);

    expect(dropped).toEqual([tileAddress(2, 1, 1), tileAddress(2, 2, 1)]);
    expect(tiles.stats().queued).toBe(2);
  });

  // ─── Introspection ───────────────────────────────────────────────────

  it('should peek without queuing', () => {
    const tiles = createManager();
    expect(tiles.peek(address)).toEqual({ address, state: 'pending' });
    expect(tiles.status(address)).toBe('unrequested');
  });

  it('should report stats', async () => {
    source.set('3/2/1', png);
    const tiles = createManager();

    tiles.request(address);
    await tiles.idle();
    tiles.request(address);

    expect(tiles.stats()).toEqual({
      fetched: 1,
      diskHits: 0,
      failures: 0,
      cached: 1,
      failed: 0,
      queued: 0,
      active: 0,
      hits: 1,
      misses: 1,
    });
  });

  // ─── Configuration & lifecycle ───────────────────────────────────────

  it('should reject invalid configuration', () => {
    expect(() => createManager({ workers: 0 })).toThrow(ConfigError);
  });

  it('should expose the resolved configuration', () => {
    const tiles = createManager({ workers: 2 });
    expect(tiles.config.workers).toBe(2);
    expect(tiles.config.cacheDir).toBe(cacheDir);
    expect(tiles.config.extension).toBe('png');
  });

  it('should stop queuing after shutdown but keep serving RAM', async () => {
    source.set('3/2/1', png);
    const tiles = createManager();

    tiles.request(address);
    await tiles.idle();

    const first = tiles.shutdown();
    expect(tiles.shutdown()).toBe(first);
    await first;

    expect(source.closed).toBe(true);
    expect(tiles.request(address)).not.toBeNull();
    expect(tiles.request(tileAddress(3, 0, 0))).toBeNull();
    expect(tiles.status(tileAddress(3, 0, 0))).toBe('unrequested');
  });
});
