/**
 * @module store
 *
 * Persistent tile storage interface (the disk tier).
 *
 * A {@link TileStore} maps a {@link TileAddress} to the raw bytes the
 * network returned for it. Workers consult it before the network and
 * populate it after a successful fetch; the RAM tier and the manager never
 * see it directly. Keeping the contract to get/put/exists/delete leaves room
 * for stores with their own eviction policy without touching the worker
 * pool or the manager.
 *
 * Built-in implementations:
 *
 * - {@link DiskTileStore} -- one file per tile under a cache root
 * - {@link MemoryTileStore} -- in-process map, for tests and ephemeral sessions
 */

import type { TileAddress } from '../address.js';

export interface TileStore {
  /**
   * Read the stored bytes for an address.
   *
   * @returns The bytes, or `null` if nothing is stored for `address`.
   * @throws {DiskIOFailure} If the store exists but cannot be read.
   */
  get(address: TileAddress): Promise<Uint8Array | null>;

  /**
   * Store bytes for an address, replacing any previous entry.
   *
   * Readers must observe either the previous entry or the complete new one,
   * never a partial write.
   *
   * @throws {DiskIOFailure} If the bytes cannot be persisted.
   */
  put(address: TileAddress, bytes: Uint8Array): Promise<void>;

  /** Whether an entry is stored for `address`. */
  exists(address: TileAddress): Promise<boolean>;

  /**
   * Remove the entry for `address`. Removing a missing entry is a no-op.
   *
   * @throws {DiskIOFailure} If the entry exists but cannot be removed.
   */
  delete(address: TileAddress): Promise<void>;

  /**
   * Release held resources. Calling `close()` twice is a safe no-op.
   */
  close(): Promise<void>;
}
