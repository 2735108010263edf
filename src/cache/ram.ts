/**
 * @module cache/ram
 *
 * The RAM tier: decoded tiles and failure markers, keyed by tile id.
 *
 * Workers are the only writers; the foreground reads on every frame. Each
 * write replaces the whole {@link ResolvedRecord} for an address, so a
 * reader sees either the previous record or the new one, never a partially
 * filled image. Records hold a frozen copy of the address.
 *
 * Entries are never evicted: with a bounded viewport and zoom range a
 * session touches a bounded set of tiles.
 */

import { freezeAddress, tileId, type TileAddress } from '../address.js';
import type { TileError } from '../errors.js';
import type { ResolvedRecord, TileImage } from '../types.js';

export class RamTier {
  private readonly records = new Map<number, ResolvedRecord>();

  /** Number of addresses with a record (cached or failed). */
  get size(): number {
    return this.records.size;
  }

  get(address: TileAddress): ResolvedRecord | undefined {
    return this.records.get(tileId(address));
  }

  /** The decoded image, or `null` if the tile is not cached. */
  image(address: TileAddress): TileImage | null {
    const record = this.records.get(tileId(address));
    return record?.state === 'cached' ? record.image : null;
  }

  setImage(address: TileAddress, image: TileImage): void {
    this.records.set(tileId(address), {
      address: freezeAddress(address),
      state: 'cached',
      image,
    });
  }

  /**
   * Record a failure. Requests for `address` are ignored until `retryAt`;
   * pass `Infinity` to give up on the tile for the rest of the session.
   */
  markFailed(address: TileAddress, error: TileError, retryAt: number): void {
    this.records.set(tileId(address), {
      address: freezeAddress(address),
      state: 'failed',
      error,
      retryAt,
    });
  }

  /** Whether a recorded failure still blocks re-queuing at time `now`. */
  isSuppressed(address: TileAddress, now: number): boolean {
    const record = this.records.get(tileId(address));
    return record?.state === 'failed' && now < record.retryAt;
  }

  counts(): { cached: number; failed: number } {
    let cached = 0;
    for (const record of this.records.values()) {
      if (record.state === 'cached') cached++;
    }
    return { cached, failed: this.records.size - cached };
  }
}
