/**
 * @module types
 *
 * Shared type definitions for tilestash.
 *
 * This module defines the data structures that flow between the cache tiers
 * and the rendering side:
 *
 * - **WorldPoint / LatLon** -- the two coordinate spaces of the projection
 * - **TilePosition** -- a world point expressed as tile indices plus an
 *   in-tile pixel offset
 * - **BBox** -- axis-aligned bounding box used for tile extents
 * - **TileImage** -- decoded raster tile handed to the renderer
 * - **TileRecord / TileState** -- per-address cache state
 */

import type { TileAddress } from './address.js';
import type { TileError } from './errors.js';

// ─── Coordinates ────────────────────────────────────────────────────────────

/**
 * Normalized world coordinate, independent of zoom.
 *
 * X runs from 0 (antimeridian, west) to 1 (antimeridian, east); Y runs from
 * 0 (north clamp) to 1 (south clamp), matching the slippy-map row order.
 */
export interface WorldPoint {
  x: number;
  y: number;
}

/** Geographic coordinate in decimal degrees. */
export interface LatLon {
  lat: number;
  lon: number;
}

/**
 * A world point located inside the tile grid of one zoom level.
 *
 * `offsetX` / `offsetY` are in pixels from the tile's north-west corner,
 * in `[0, tileSize]`.
 */
export interface TilePosition {
  zoom: number;
  col: number;
  row: number;
  offsetX: number;
  offsetY: number;
}

// ─── Bounding Box ───────────────────────────────────────────────────────────

/**
 * Axis-aligned bounding box.
 *
 * Used for WGS84 tile extents (longitude/latitude) when culling route
 * geometry against the visible tiles.
 */
export interface BBox {
  /** Minimum X (western longitude). */
  minX: number;
  /** Minimum Y (southern latitude). */
  minY: number;
  /** Maximum X (eastern longitude). */
  maxX: number;
  /** Maximum Y (northern latitude). */
  maxY: number;
}

// ─── Images ─────────────────────────────────────────────────────────────────

/**
 * A decoded raster tile.
 *
 * Pixels are stored row-major as interleaved RGBA bytes, so
 * `data.length === width * height * 4`.
 */
export interface TileImage {
  width: number;
  height: number;
  channels: 4;
  data: Uint8Array;
}

// ─── Cache State ────────────────────────────────────────────────────────────

/**
 * The cache state of one address. Exactly one variant holds at a time.
 *
 * `pending` covers both "never requested" and "queued or being fetched";
 * {@link TileState} distinguishes those for diagnostics.
 */
export type TileRecord =
  | { address: TileAddress; state: 'cached'; image: TileImage }
  | { address: TileAddress; state: 'failed'; error: TileError; retryAt: number }
  | { address: TileAddress; state: 'pending' };

/** The records the RAM tier stores. */
export type ResolvedRecord = Exclude<TileRecord, { state: 'pending' }>;

/**
 * Lifecycle of an address:
 * `unrequested → queued → fetching → cached | failed`, and
 * `failed → queued` when re-requested after the cooldown.
 */
export type TileState = 'unrequested' | 'queued' | 'fetching' | 'cached' | 'failed';

/** Clock used for failure cooldowns, in milliseconds. */
export type Clock = () => number;
