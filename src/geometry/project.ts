/**
 * @module geometry/project
 *
 * Web Mercator projection between WGS84 coordinates, normalized world
 * coordinates, tile coordinates and world pixels.
 *
 * All world coordinates live in a **unit square**. This decouples projection
 * from any zoom level or tile size; moving to pixels at zoom `z` is a single
 * multiplication by `2^z * tileSize`.
 *
 * **Coordinate conventions:**
 * - **X**: 0 = antimeridian (180 W), 0.5 = prime meridian, approaching 1 at
 *   the antimeridian again. Longitude is wrapped modulo 360 first, so X is
 *   always in [0, 1).
 * - **Y**: 0 = north, 1 = south (slippy-map row order). Latitude is clamped
 *   to ±{@link MAX_LATITUDE} first, so the poles never project to infinity.
 *
 * Every function here is pure and total over finite and non-finite inputs:
 * none of them throws except {@link tileToWorld}, which rejects malformed
 * tile addresses.
 */

import { assertTileAddress, type TileAddress } from '../address.js';
import type { LatLon, TilePosition, WorldPoint } from '../types.js';

const PI = Math.PI;

/** Latitude at which the Mercator square closes: `atan(sinh(π))` in degrees. */
export const MAX_LATITUDE = 85.0511287798066;

/** Default raster tile edge length in pixels. */
export const TILE_SIZE = 256;

// ─── Input normalization ────────────────────────────────────────────────────

/**
 * Clamp a latitude to the valid Mercator range. NaN becomes the equator.
 *
 * @param lat - Latitude in degrees.
 * @returns Latitude in `[-MAX_LATITUDE, MAX_LATITUDE]`.
 */
export function clampLatitude(lat: number): number {
  if (Number.isNaN(lat)) return 0;
  return lat < -MAX_LATITUDE ? -MAX_LATITUDE : lat > MAX_LATITUDE ? MAX_LATITUDE : lat;
}

/**
 * Wrap a longitude into [-180, 180). Non-finite values become the prime
 * meridian.
 *
 * @param lon - Longitude in degrees, any range.
 * @returns Equivalent longitude in `[-180, 180)`.
 *
 * @example
 * ```ts
 * wrapLongitude(190);  // => -170
 * wrapLongitude(180);  // => -180
 * wrapLongitude(-540); // => -180
 * ```
 */
export function wrapLongitude(lon: number): number {
  if (!Number.isFinite(lon)) return 0;
  return ((((lon + 180) % 360) + 360) % 360) - 180;
}

// ─── Geographic → world ─────────────────────────────────────────────────────

/**
 * Project a longitude to world X in [0, 1).
 *
 * @param lon - Longitude in degrees.
 * @returns Normalized X, 0 at 180 W and 0.5 at the prime meridian.
 *
 * @example
 * ```ts
 * projectX(0);    // => 0.5
 * projectX(-180); // => 0
 * projectX(90);   // => 0.75
 * ```
 */
export function projectX(lon: number): number {
  return wrapLongitude(lon) / 360 + 0.5;
}

/**
 * Project a latitude to world Y in [0, 1].
 *
 * Uses the spherical Mercator formula on the clamped latitude; the result
 * is clamped again to absorb rounding at the edges.
 *
 * @param lat - Latitude in degrees.
 * @returns Normalized Y, 0 at the north clamp and 1 at the south clamp.
 */
export function projectY(lat: number): number {
  const sin = Math.sin(clampLatitude(lat) * PI / 180);
  const y = 0.5 - 0.25 * Math.log((1 + sin) / (1 - sin)) / PI;
  return y < 0 ? 0 : y > 1 ? 1 : y;
}

/**
 * Project a geographic position to a normalized world coordinate.
 *
 * @param lat - Latitude in degrees.
 * @param lon - Longitude in degrees.
 *
 * @example
 * ```ts
 * project(0, 0);            // => { x: 0.5, y: 0.5 }
 * project(47.6386, 6.8631); // => { x: ~0.51906, y: ~0.34911 }
 * ```
 */
export function project(lat: number, lon: number): WorldPoint {
  return { x: projectX(lon), y: projectY(lat) };
}

/**
 * Inverse of {@link project} for points inside the unit square.
 *
 * @param point - Normalized world coordinate.
 * @returns Latitude and longitude in degrees.
 */
export function unproject(point: WorldPoint): LatLon {
  const lon = (point.x - 0.5) * 360;
  const lat = Math.atan(Math.sinh(PI * (1 - 2 * point.y))) * 180 / PI;
  return { lat, lon };
}

/**
 * Project a flat coordinate array from WGS84 to world space **in-place**.
 *
 * Route and stop loaders use this to project whole polylines without
 * allocating.
 *
 * @param coords - Interleaved `[lon0, lat0, lon1, lat1, ...]` pairs; each
 *   longitude is replaced with world X and each latitude with world Y. A
 *   trailing unpaired value is left as is.
 */
export function projectToMercator(coords: Float64Array): void {
  const end = coords.length - (coords.length % 2);
  for (let i = 0; i < end; i += 2) {
    const { x, y } = project(coords[i + 1], coords[i]);
    coords[i] = x;
    coords[i + 1] = y;
  }
}

// ─── World ↔ tiles / pixels ─────────────────────────────────────────────────

/**
 * Edge length of the whole world in pixels.
 *
 * @param zoom - Zoom level.
 * @param tileSize - Tile edge length in pixels.
 * @returns `2^zoom * tileSize`.
 */
export function worldSize(zoom: number, tileSize: number = TILE_SIZE): number {
  return 2 ** zoom * tileSize;
}

/**
 * Absolute world-pixel position of a world point.
 *
 * @param point - Normalized world coordinate.
 * @param zoom - Zoom level.
 * @param tileSize - Tile edge length in pixels.
 * @returns Pixel position from the world's north-west corner.
 */
export function worldToPixel(
  point: WorldPoint,
  zoom: number,
  tileSize: number = TILE_SIZE,
): WorldPoint {
  const size = worldSize(zoom, tileSize);
  return { x: point.x * size, y: point.y * size };
}

/**
 * Locate a world point in the tile grid of `zoom`.
 *
 * @param point - Normalized world coordinate.
 * @param zoom - Zoom level.
 * @param tileSize - Tile edge length in pixels.
 * @returns The tile indices and the pixel offset inside that tile.
 *
 * The column wraps modulo `2^zoom` (the world repeats horizontally); the
 * row is clamped into the grid so that the south edge (`y = 1`) resolves to
 * the last row with a full-tile offset.
 *
 * @example
 * ```ts
 * worldToTile({ x: 0.3, y: 0.2 }, 3);
 * // => { zoom: 3, col: 2, row: 1, offsetX: ~102.4, offsetY: ~153.6 }
 * ```
 */
export function worldToTile(
  point: WorldPoint,
  zoom: number,
  tileSize: number = TILE_SIZE,
): TilePosition {
  const n = 2 ** zoom;
  const tx = point.x * n;
  const ty = point.y * n;

  const fx = Math.floor(tx);
  const col = ((fx % n) + n) % n;
  const row = Math.min(n - 1, Math.max(0, Math.floor(ty)));

  return {
    zoom,
    col,
    row,
    offsetX: (tx - fx) * tileSize,
    offsetY: (ty - row) * tileSize,
  };
}

/**
 * Inverse of {@link worldToTile}.
 *
 * @param position - A tile position, or a bare {@link TileAddress} for the
 *   tile's north-west corner.
 * @param tileSize - Tile edge length in pixels the offsets are measured in.
 * @returns Normalized world coordinate.
 *
 * @throws {RangeError} If the column, row or zoom are out of range.
 */
export function tileToWorld(
  position: TilePosition | TileAddress,
  tileSize: number = TILE_SIZE,
): WorldPoint {
  assertTileAddress(position);
  const n = 2 ** position.zoom;
  const offsetX = 'offsetX' in position ? position.offsetX : 0;
  const offsetY = 'offsetY' in position ? position.offsetY : 0;
  return {
    x: (position.col + offsetX / tileSize) / n,
    y: (position.row + offsetY / tileSize) / n,
  };
}
