/**
 * @module store/memory
 *
 * In-process {@link TileStore}: a map from tile id to a private copy of the
 * stored bytes. Nothing survives the process; useful for tests and for
 * sessions that should not touch the filesystem.
 */

import { tileId, type TileAddress } from '../address.js';
import type { TileStore } from './store.js';

export class MemoryTileStore implements TileStore {
  private readonly entries = new Map<number, Uint8Array>();

  /** Number of stored tiles. */
  get size(): number {
    return this.entries.size;
  }

  async get(address: TileAddress): Promise<Uint8Array | null> {
    const bytes = this.entries.get(tileId(address));
    return bytes ? bytes.slice() : null;
  }

  async put(address: TileAddress, bytes: Uint8Array): Promise<void> {
    this.entries.set(tileId(address), bytes.slice());
  }

  async exists(address: TileAddress): Promise<boolean> {
    return this.entries.has(tileId(address));
  }

  async delete(address: TileAddress): Promise<void> {
    this.entries.delete(tileId(address));
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}
