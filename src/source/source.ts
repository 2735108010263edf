/**
 * @module source
 *
 * Network tier interface.
 *
 * A {@link TileSource} turns a {@link TileAddress} into the raw bytes of a
 * tile image. It owns its transport (connection pool, headers, timeouts)
 * and is shared by every worker of a pool, which treat it as read-only.
 *
 * The only built-in implementation is {@link HttpTileSource}, which fills a
 * fixed URL template; tests substitute in-process fakes.
 */

import type { TileAddress } from '../address.js';

export interface TileSource {
  /** The URL (or other locator) fetched for `address`, for logging. */
  url(address: TileAddress): string;

  /**
   * Fetch the encoded image bytes for one tile.
   *
   * @throws {NetworkFailure} On timeout, transport error, or a non-success
   *   response once retries are exhausted.
   */
  fetch(address: TileAddress): Promise<Uint8Array>;

  /**
   * Stop accepting new fetches. Fetches already in flight run to
   * completion. Calling `close()` twice is a safe no-op.
   */
  close(): Promise<void>;
}
