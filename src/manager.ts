/**
 * @module manager
 *
 * The facade the rendering side talks to.
 *
 * A {@link TileManager} owns one instance of every tier (RAM tier, fetch
 * queue, disk store, tile source, worker pool) and injects them into its
 * workers by reference; there is no process-wide state, so independent
 * managers can run side by side. Workers start in the constructor and stop
 * in {@link TileManager.shutdown}.
 *
 * Every foreground method is synchronous and non-blocking. A frame asks for
 * the tiles it needs; misses are queued and come back as `null` until a
 * worker has filled the RAM tier, and the next frame asks again. There is no
 * cancellation of started work: tiles that scroll away are simply not asked
 * for, and {@link TileManager.cancelStale} trims queued work that has not
 * started yet.
 *
 * @example
 * ```typescript
 * import { TileManager, placedTiles, project } from 'tilestash';
 *
 * const manager = new TileManager({ workers: 4 });
 * const viewport = { center: project(47.6386, 6.8631), width: 1000, height: 800 };
 *
 * // every frame
 * for (const { address, x, y } of placedTiles(viewport, 13)) {
 *   const image = manager.request(address);
 *   if (image) draw(image, x, y);
 * }
 * manager.preloadAround(viewport, 13);
 *
 * // on exit
 * await manager.shutdown();
 * ```
 */

import { assertTileAddress, tileKey, type TileAddress } from './address.js';
import { RamTier } from './cache/ram.js';
import { decodeTile, type TileDecoder } from './decode.js';
import { consoleLogger, type Logger } from './logger.js';
import { resolveConfig, type ResolvedConfig, type TileManagerConfig } from './options.js';
import { FetchQueue } from './queue.js';
import { HttpTileSource } from './source/http.js';
import type { TileSource } from './source/source.js';
import { DiskTileStore } from './store/disk.js';
import type { TileStore } from './store/store.js';
import { marginTiles, tileRange, visibleTiles, type Viewport } from './tiles.js';
import type { Clock, TileImage, TileRecord, TileState } from './types.js';
import { WorkerPool, type WorkerPoolStats } from './worker-pool.js';

/**
 * Configuration plus optional collaborators. Each collaborator defaults to
 * the built-in implementation configured from the other fields.
 */
export interface TileManagerOptions extends TileManagerConfig {
  /** Network tier. @defaultValue an {@link HttpTileSource} for `url` */
  source?: TileSource;
  /** Disk tier. @defaultValue a {@link DiskTileStore} under `cacheDir` */
  store?: TileStore;
  /** @defaultValue {@link decodeTile} */
  decoder?: TileDecoder;
  /** @defaultValue `consoleLogger('TileManager')` */
  logger?: Logger;
  /** Time source for failure cooldowns. @defaultValue `Date.now` */
  clock?: Clock;
}

/** Snapshot of cache and queue state plus worker counters. */
export interface TileManagerStats extends WorkerPoolStats {
  /** Tiles held decoded in RAM. */
  cached: number;
  /** Addresses whose last resolution failed. */
  failed: number;
  /** Addresses waiting in the queue. */
  queued: number;
  /** Addresses being resolved by a worker. */
  active: number;
  /** `request` calls answered from RAM. */
  hits: number;
  /** `request` calls that returned `null`. */
  misses: number;
}

export class TileManager {
  /** The effective, validated configuration. */
  readonly config: ResolvedConfig;
  private readonly ram = new RamTier();
  private readonly queue = new FetchQueue();
  private readonly pool: WorkerPool;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private hits = 0;
  private misses = 0;
  private shutdownPromise: Promise<void> | null = null;

  /**
   * Validate the configuration, build the tiers and start the workers.
   *
   * @throws {ConfigError} If a configuration value is invalid.
   */
  constructor(options?: TileManagerOptions) {
    this.config = resolveConfig(options);
    this.clock = options?.clock ?? Date.now;
    this.logger = options?.logger ?? consoleLogger('TileManager');

    const source = options?.source ?? new HttpTileSource(this.config.url, {
      headers: this.config.headers,
      timeout: this.config.timeout,
      retry: this.config.retry,
      subdomains: this.config.subdomains,
      logger: this.logger,
    });
    const store = options?.store ?? new DiskTileStore({
      root: this.config.cacheDir,
      extension: this.config.extension,
    });

    this.pool = new WorkerPool({
      size: this.config.workers,
      queue: this.queue,
      ram: this.ram,
      store,
      source,
      decode: options?.decoder ?? decodeTile,
      failureCooldown: this.config.failureCooldown,
      clock: this.clock,
      logger: this.logger,
    });
    this.pool.start();
  }

  /**
   * The decoded tile if it is in RAM; otherwise queue it (once) and return
   * `null`. Never waits.
   *
   * A tile whose last attempt failed is not queued again until its cooldown
   * has passed.
   *
   * @throws {RangeError} If `address` is malformed.
   */
  request(address: TileAddress): TileImage | null {
    assertTileAddress(address);

    const image = this.ram.image(address);
    if (image) {
      this.hits++;
      return image;
    }

    this.misses++;
    this.enqueue(address);
    return null;
  }

  /**
   * Queue a batch of tiles that are about to become visible. Cached tiles,
   * tiles already queued or in flight, and failed tiles still cooling down
   * are skipped.
   *
   * @returns How many addresses were newly queued.
   * @throws {RangeError} If any address is malformed; nothing is queued.
   */
  preload(addresses: Iterable<TileAddress>): number {
    const batch = [...addresses];
    batch.forEach(assertTileAddress);

    let queued = 0;
    for (const address of batch) {
      if (this.ram.image(address)) continue;
      if (this.enqueue(address)) queued++;
    }
    return queued;
  }

  /**
   * Preload the ring of `config.preloadMargin` tiles around the viewport.
   *
   * @returns How many addresses were newly queued.
   */
  preloadAround(viewport: Viewport, zoom: number): number {
    return this.preload(marginTiles(viewport, zoom, {
      tileSize: this.config.tileSize,
      margin: this.config.preloadMargin,
    }));
  }

  /**
   * Distinct addresses intersecting the viewport plus `margin` rings
   * (default 0), using the configured tile size. Recomputed on every call.
   */
  visibleTiles(viewport: Viewport, zoom: number, margin = 0): Generator<TileAddress> {
    return visibleTiles(viewport, zoom, { tileSize: this.config.tileSize, margin });
  }

  /**
   * Drop queued work that has not started and lies outside the viewport
   * plus the preload margin, or at another zoom level.
   *
   * @returns The dropped addresses.
   */
  cancelStale(viewport: Viewport, zoom: number): TileAddress[] {
    const range = tileRange(viewport, zoom, {
      tileSize: this.config.tileSize,
      margin: this.config.preloadMargin,
    });
    const n = 2 ** zoom;
    const spansWorld = range.maxCol - range.minCol + 1 >= n;

    const dropped = this.queue.cancelStale(address => {
      if (address.zoom !== zoom) return true;
      if (address.row < range.minRow || address.row > range.maxRow) return true;
      if (spansWorld) return false;
      // Shift the column into the range's window before comparing.
      const offset = address.col - range.minCol;
      return ((offset % n) + n) % n > range.maxCol - range.minCol;
    });

    if (dropped.length > 0) {
      this.logger.debug(`Cancelled ${dropped.length} stale tile request(s)`);
    }
    return dropped;
  }

  /** Lifecycle state of one address. */
  status(address: TileAddress): TileState {
    assertTileAddress(address);

    const record = this.ram.get(address);
    if (record?.state === 'cached') return 'cached';
    if (this.queue.isActive(address)) return 'fetching';
    if (this.queue.isQueued(address)) return 'queued';
    if (record?.state === 'failed') return 'failed';
    return 'unrequested';
  }

  /** The cache record for an address, without queuing anything. */
  peek(address: TileAddress): TileRecord {
    assertTileAddress(address);
    return this.ram.get(address) ?? { address, state: 'pending' };
  }

  stats(): TileManagerStats {
    return {
      ...this.pool.stats(),
      ...this.ram.counts(),
      queued: this.queue.size,
      active: this.queue.activeCount,
      hits: this.hits,
      misses: this.misses,
    };
  }

  /**
   * Resolves once nothing is queued or in flight.
   */
  idle(): Promise<void> {
    return this.pool.idle();
  }

  /**
   * Stop the workers: queued work is dropped, running fetches finish and
   * populate the cache, then the source and the store are closed. Later
   * requests still read the RAM tier but queue nothing. Safe to call more
   * than once.
   */
  shutdown(): Promise<void> {
    this.shutdownPromise ??= this.pool.shutdown();
    return this.shutdownPromise;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  /**
   * Queue an address unless a recent failure suppresses it.
   *
   * @returns Whether the address was newly queued.
   */
  private enqueue(address: TileAddress): boolean {
    if (this.ram.isSuppressed(address, this.clock())) return false;

    const queued = this.queue.push(address);
    if (queued) this.logger.debug(`Queued tile ${tileKey(address)}`);
    return queued;
  }
}
