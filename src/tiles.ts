/**
 * @module tiles
 *
 * Tile grid utilities: which tiles a viewport covers, where each one lands
 * on screen, and the geographic extent of a tile.
 *
 * A {@link Viewport} is a screen rectangle centered on a world point. At
 * zoom `z` the world is `2^z * tileSize` pixels wide; the viewport's
 * top-left corner in world pixels is its {@link viewportOrigin}, and a tile
 * at grid cell `(col, row)` is drawn at
 * `(col * tileSize - origin.x, row * tileSize - origin.y)`.
 *
 * The enumerators below are generators so that the rendering side can
 * recompute the visible set every frame without keeping iterator state
 * between frames. The world wraps horizontally: columns outside
 * `[0, 2^z)` map back into the grid, while rows outside it are skipped.
 *
 * All functions in this module are deterministic and side-effect-free.
 */

import { tileAddress, tileId, type TileAddress } from './address.js';
import { TILE_SIZE, worldSize } from './geometry/project.js';
import type { BBox, WorldPoint } from './types.js';

const PI = Math.PI;

// ─── Viewport ───────────────────────────────────────────────────────────────

/**
 * The visible screen rectangle.
 *
 * `center` is a normalized world coordinate; `width` and `height` are in
 * screen pixels.
 */
export interface Viewport {
  center: WorldPoint;
  width: number;
  height: number;
}

/** Options shared by the viewport enumerators. */
export interface GridOptions {
  /** Tile edge length in pixels. @defaultValue 256 */
  tileSize?: number;
  /** Extra rings of tiles around the viewport. @defaultValue 0 */
  margin?: number;
}

/**
 * Inclusive range of grid indices. Columns may extend past the world edges
 * (they wrap); rows may too (those cells are skipped).
 */
export interface TileRange {
  minCol: number;
  maxCol: number;
  minRow: number;
  maxRow: number;
}

/** A tile to draw and its screen position. */
export interface PlacedTile {
  address: TileAddress;
  x: number;
  y: number;
}

/**
 * World-pixel position of the viewport's top-left corner.
 *
 * @param viewport - Visible screen rectangle.
 * @param zoom - Zoom level.
 * @param tileSize - Tile edge length in pixels.
 * @returns Top-left corner in absolute world pixels.
 */
export function viewportOrigin(
  viewport: Viewport,
  zoom: number,
  tileSize: number = TILE_SIZE,
): WorldPoint {
  const size = worldSize(zoom, tileSize);
  return {
    x: viewport.center.x * size - viewport.width / 2,
    y: viewport.center.y * size - viewport.height / 2,
  };
}

/**
 * Move the viewport by a screen-space drag.
 *
 * The map follows the pointer, so the center moves the opposite way. X
 * wraps into [0, 1); Y is clamped to the world.
 *
 * @param viewport - Viewport before the drag.
 * @param dx - Horizontal drag in screen pixels (positive = right).
 * @param dy - Vertical drag in screen pixels (positive = down).
 * @param zoom - Zoom level the drag happens at.
 * @param tileSize - Tile edge length in pixels.
 * @returns A new viewport; the input is not modified.
 */
export function panViewport(
  viewport: Viewport,
  dx: number,
  dy: number,
  zoom: number,
  tileSize: number = TILE_SIZE,
): Viewport {
  const size = worldSize(zoom, tileSize);
  const x = viewport.center.x - dx / size;
  const y = viewport.center.y - dy / size;
  return {
    ...viewport,
    center: {
      x: x - Math.floor(x),
      y: y < 0 ? 0 : y > 1 ? 1 : y,
    },
  };
}

/**
 * Grid cells intersecting the viewport expanded by `margin` tiles per side.
 *
 * A tile that only touches the viewport's right or bottom edge is not part
 * of the range.
 *
 * @param viewport - Visible screen rectangle.
 * @param zoom - Zoom level.
 * @param options - Tile size and margin.
 * @returns Inclusive column and row bounds, not yet wrapped or clipped.
 */
export function tileRange(
  viewport: Viewport,
  zoom: number,
  options?: GridOptions,
): TileRange {
  const tileSize = options?.tileSize ?? TILE_SIZE;
  const margin = options?.margin ?? 0;
  const origin = viewportOrigin(viewport, zoom, tileSize);

  return {
    minCol: Math.floor(origin.x / tileSize) - margin,
    maxCol: Math.ceil((origin.x + viewport.width) / tileSize) - 1 + margin,
    minRow: Math.floor(origin.y / tileSize) - margin,
    maxRow: Math.ceil((origin.y + viewport.height) / tileSize) - 1 + margin,
  };
}

// ─── Enumerators ────────────────────────────────────────────────────────────

/**
 * Every grid cell of the range with its screen position, row by row.
 *
 * When the viewport is wider than the world, the same address appears at
 * several positions; each is a separate placement.
 *
 * @param viewport - Visible screen rectangle.
 * @param zoom - Zoom level.
 * @param options - Tile size and margin.
 *
 * @example
 * ```typescript
 * for (const { address, x, y } of placedTiles(viewport, zoom)) {
 *   const image = manager.request(address);
 *   if (image) draw(image, x, y);
 * }
 * ```
 */
export function* placedTiles(
  viewport: Viewport,
  zoom: number,
  options?: GridOptions,
): Generator<PlacedTile> {
  const tileSize = options?.tileSize ?? TILE_SIZE;
  const n = 2 ** zoom;
  const range = tileRange(viewport, zoom, options);
  const origin = viewportOrigin(viewport, zoom, tileSize);

  for (let row = Math.max(0, range.minRow); row <= Math.min(n - 1, range.maxRow); row++) {
    for (let col = range.minCol; col <= range.maxCol; col++) {
      yield {
        address: tileAddress(zoom, ((col % n) + n) % n, row),
        x: col * tileSize - origin.x,
        y: row * tileSize - origin.y,
      };
    }
  }
}

/**
 * Distinct addresses intersecting the viewport plus `margin`.
 *
 * Lazy and restartable: each call walks the grid afresh.
 *
 * @param viewport - Visible screen rectangle.
 * @param zoom - Zoom level.
 * @param options - Tile size and margin.
 */
export function* visibleTiles(
  viewport: Viewport,
  zoom: number,
  options?: GridOptions,
): Generator<TileAddress> {
  const seen = new Set<number>();
  for (const { address } of placedTiles(viewport, zoom, options)) {
    const id = tileId(address);
    if (seen.has(id)) continue;
    seen.add(id);
    yield address;
  }
}

/**
 * The preload ring: addresses within `margin` tiles of the viewport that
 * are not themselves visible.
 *
 * @param viewport - Visible screen rectangle.
 * @param zoom - Zoom level.
 * @param options - Tile size and the ring width in tiles.
 */
export function* marginTiles(
  viewport: Viewport,
  zoom: number,
  options?: GridOptions,
): Generator<TileAddress> {
  const core = new Set<number>();
  for (const address of visibleTiles(viewport, zoom, { ...options, margin: 0 })) {
    core.add(tileId(address));
  }
  for (const address of visibleTiles(viewport, zoom, options)) {
    if (!core.has(tileId(address))) yield address;
  }
}

// ─── Tile → WGS84 BBox ─────────────────────────────────────────────────────

/**
 * WGS84 bounding box of a tile.
 *
 * Route loaders use this to cull geometry against the visible tiles.
 *
 * @param address - The tile.
 * @returns Longitudes in `[-180, 180]`, latitudes within the Mercator
 *   limits.
 *
 * @example
 * ```typescript
 * const bbox = tileBBox(tileAddress(1, 0, 0));
 * // bbox.minX === -180, bbox.maxX === 0
 * // bbox.minY ≈ 0,     bbox.maxY ≈ 85.051
 * ```
 */
export function tileBBox(address: TileAddress): BBox {
  const n = 2 ** address.zoom;
  return {
    minX: (address.col / n) * 360 - 180,
    minY: tileLatDeg(address.row + 1, n),
    maxX: ((address.col + 1) / n) * 360 - 180,
    maxY: tileLatDeg(address.row, n),
  };
}

/**
 * Convert a fractional tile row to latitude in degrees.
 *
 * @param y - Fractional tile row position.
 * @param n - Grid size (`2^z`).
 */
function tileLatDeg(y: number, n: number): number {
  const latRad = Math.atan(Math.sinh(PI - (2 * PI * y) / n));
  return (latRad * 180) / PI;
}
