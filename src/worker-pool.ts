/**
 * @module worker-pool
 *
 * A fixed number of long-lived async workers draining one
 * {@link FetchQueue}.
 *
 * Each worker repeats one cycle: take the most recent address (waiting while
 * the queue is empty), resolve it through the disk tier and then the
 * network, publish the result to the RAM tier, and release the address's
 * in-flight slot. Workers share the pool's {@link TileSource}, and with it
 * one keep-alive connection pool, and only ever write to the RAM and disk
 * tiers.
 *
 * Failure handling per cycle:
 *
 * | Failure | Effect |
 * |---------|--------|
 * | {@link NetworkFailure} | address marked failed until `now + failureCooldown` |
 * | {@link DecodeFailure} of network bytes | same; the bytes are never written to disk |
 * | {@link DecodeFailure} of a cached file | file deleted, tile fetched again in the same cycle |
 * | {@link DiskIOFailure} on read/delete | address marked failed for the rest of the session |
 * | {@link DiskIOFailure} on write | logged; the decoded image is still cached in RAM |
 *
 * Nothing thrown while resolving a tile escapes the worker loop; a worker
 * whose loop fails anyway (a throwing logger, say) is logged and restarted.
 */

import { tileKey, type TileAddress } from './address.js';
import type { RamTier } from './cache/ram.js';
import type { TileDecoder } from './decode.js';
import { DecodeFailure, DiskIOFailure, toTileError } from './errors.js';
import type { Logger } from './logger.js';
import type { FetchQueue } from './queue.js';
import type { TileSource } from './source/source.js';
import type { TileStore } from './store/store.js';
import type { Clock, TileImage } from './types.js';

/**
 * Everything a pool needs, injected by reference by its owner.
 */
export interface WorkerPoolOptions {
  /** Number of workers. */
  size: number;
  queue: FetchQueue;
  ram: RamTier;
  store: TileStore;
  source: TileSource;
  decode: TileDecoder;
  /** Milliseconds a failed tile is left alone. */
  failureCooldown: number;
  clock: Clock;
  logger: Logger;
}

/** Cumulative counters since the pool was created. */
export interface WorkerPoolStats {
  /** Tiles downloaded and decoded successfully. */
  fetched: number;
  /** Tiles served from the disk tier. */
  diskHits: number;
  /** Resolutions that ended with the address marked failed. */
  failures: number;
}

export class WorkerPool {
  private readonly options: WorkerPoolOptions;
  private readonly counters: WorkerPoolStats = { fetched: 0, diskHits: 0, failures: 0 };
  private loops: Promise<void>[] = [];
  private readonly idleWaiters: Array<() => void> = [];

  constructor(options: WorkerPoolOptions) {
    this.options = options;
  }

  /** Whether the workers have been started and not yet shut down. */
  get running(): boolean {
    return this.loops.length > 0;
  }

  /** Spawn the workers. Calling `start()` on a running pool is a no-op. */
  start(): void {
    if (this.running || this.options.queue.isClosed) return;
    this.loops = Array.from({ length: this.options.size }, (_, i) => this.spawn(i));
  }

  /**
   * Resolves once no address is queued or in flight.
   */
  idle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }

  stats(): WorkerPoolStats {
    return { ...this.counters };
  }

  /**
   * Stop the pool: close the queue, drop work that has not started, wait
   * for running cycles to finish, then close the source and the store.
   */
  async shutdown(): Promise<void> {
    const { queue, source, store, logger } = this.options;

    queue.close();
    const dropped = queue.clear();
    if (dropped.length > 0) {
      logger.debug(`Dropped ${dropped.length} queued tile(s) on shutdown`);
    }

    await Promise.all(this.loops);
    this.loops = [];
    this.settleIdle();

    await Promise.all([source.close(), store.close()]);
  }

  // ─── Worker loop ───────────────────────────────────────────────────────

  /**
   * Run one worker, restarting it if its loop throws while the queue is
   * open. The promise settles when the worker has stopped for good.
   */
  private spawn(worker: number): Promise<void> {
    return this.run(worker).catch((err: unknown) => {
      this.options.logger.error(`Worker ${worker} crashed`, err);
      if (this.options.queue.isClosed) return;
      return this.spawn(worker);
    });
  }

  private async run(worker: number): Promise<void> {
    const { queue, logger } = this.options;
    logger.debug(`Worker ${worker} started`);

    for (;;) {
      const address = await queue.pop();
      if (!address) break;

      try {
        await this.resolve(address);
      } finally {
        queue.complete(address);
        this.settleIdle();
      }
    }

    logger.debug(`Worker ${worker} stopped`);
  }

  /**
   * Disk first, then network; publish to RAM or record the failure.
   */
  private async resolve(address: TileAddress): Promise<void> {
    const { ram, clock, failureCooldown, logger } = this.options;

    try {
      const image = (await this.fromDisk(address)) ?? (await this.fromNetwork(address));
      ram.setImage(address, image);
    } catch (err) {
      const failure = toTileError(err, address);
      const permanent = failure instanceof DiskIOFailure;
      ram.markFailed(address, failure, permanent ? Infinity : clock() + failureCooldown);
      this.counters.failures++;
      logger.warn(
        `Tile ${tileKey(address)} failed (${failure.kind})` +
        `${permanent ? ', giving up for this session' : ''}: ${failure.message}`,
      );
    }
  }

  /**
   * @returns The decoded cached tile, or `null` on a miss or a corrupt
   *   file (which is deleted).
   */
  private async fromDisk(address: TileAddress): Promise<TileImage | null> {
    const { store, logger } = this.options;

    const bytes = await store.get(address);
    if (!bytes) return null;

    try {
      const image = await this.decode(bytes, address);
      this.counters.diskHits++;
      return image;
    } catch (err) {
      if (!(err instanceof DecodeFailure)) throw err;
      logger.warn(`Discarding corrupt cached tile ${tileKey(address)}: ${err.message}`);
      await store.delete(address);
      return null;
    }
  }

  /**
   * Download, decode, then persist. Bytes that do not decode never reach
   * the disk tier.
   */
  private async fromNetwork(address: TileAddress): Promise<TileImage> {
    const { source, store, logger } = this.options;

    const bytes = await source.fetch(address);
    const image = await this.decode(bytes, address);
    this.counters.fetched++;

    try {
      await store.put(address, bytes);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.warn(`Could not persist tile ${tileKey(address)}: ${reason}`);
    }

    return image;
  }

  /** Run the decoder, reporting anything it throws as a {@link DecodeFailure}. */
  private async decode(bytes: Uint8Array, address: TileAddress): Promise<TileImage> {
    try {
      return await this.options.decode(bytes, address);
    } catch (err) {
      if (err instanceof DecodeFailure) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new DecodeFailure(`Cannot decode tile image: ${reason}`, address, { cause: err });
    }
  }

  // ─── Idle tracking ─────────────────────────────────────────────────────

  private isIdle(): boolean {
    const { queue } = this.options;
    return queue.size === 0 && queue.activeCount === 0;
  }

  private settleIdle(): void {
    if (!this.isIdle() || this.idleWaiters.length === 0) return;
    for (const resolve of this.idleWaiters.splice(0)) resolve();
  }
}
