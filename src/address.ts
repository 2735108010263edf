/**
 * @module address
 *
 * Tile addresses: the (zoom, column, row) triple naming one tile of the
 * standard quad-tree tiling scheme, and the keys derived from it.
 *
 * Addresses are plain frozen objects compared structurally. Every map in the
 * cache tiers is keyed by the packed numeric {@link tileId}; the string
 * {@link tileKey} is used for log lines and file paths.
 */

/**
 * Highest supported zoom level.
 *
 * {@link tileId} packs row, column and zoom into one double; at zoom 24 the
 * largest id is `2^53 - 8`, the last level that stays exact.
 */
export const MAX_ZOOM = 24;

/**
 * Identifier of one tile. Invariant: `0 ≤ col, row < 2^zoom`.
 */
export interface TileAddress {
  readonly zoom: number;
  readonly col: number;
  readonly row: number;
}

/**
 * Create a validated, frozen tile address.
 *
 * @param zoom - Zoom level.
 * @param col - Tile column, 0 at the antimeridian.
 * @param row - Tile row, 0 at the north edge.
 *
 * @throws {RangeError} If `zoom` is not an integer in `[0, MAX_ZOOM]` or
 *   `col` / `row` fall outside `[0, 2^zoom)`.
 *
 * @example
 * ```typescript
 * const address = tileAddress(13, 4250, 2861);
 * ```
 */
export function tileAddress(zoom: number, col: number, row: number): TileAddress {
  const address = { zoom, col, row };
  assertTileAddress(address);
  return Object.freeze(address);
}

/**
 * Frozen copy of an address, or the address itself when it is already
 * frozen. Containers that key by {@link tileId} store these, so a caller
 * mutating its own object cannot change an entry under them.
 *
 * @param address - A valid tile address.
 * @returns An immutable address equal to `address`.
 */
export function freezeAddress(address: TileAddress): TileAddress {
  if (Object.isFrozen(address)) return address;
  return Object.freeze({ zoom: address.zoom, col: address.col, row: address.row });
}

/**
 * Check the tile address invariant without throwing.
 *
 * @returns Whether `value` names a tile of its zoom level.
 */
export function isTileAddress(value: TileAddress): boolean {
  const { zoom, col, row } = value;
  if (!Number.isInteger(zoom) || zoom < 0 || zoom > MAX_ZOOM) return false;
  const n = 2 ** zoom;
  return Number.isInteger(col) && Number.isInteger(row)
    && col >= 0 && col < n
    && row >= 0 && row < n;
}

/**
 * @throws {RangeError} If the address breaks the tile address invariant.
 */
export function assertTileAddress(value: TileAddress): void {
  if (!isTileAddress(value)) {
    throw new RangeError(
      `Invalid tile address ${value.zoom}/${value.col}/${value.row}: ` +
      `expected integer zoom in [0, ${MAX_ZOOM}] and col/row in [0, 2^zoom)`,
    );
  }
}

/**
 * Encode an address into a unique numeric identifier.
 *
 * @param address - A valid tile address.
 * @returns An integer, exact for every zoom up to {@link MAX_ZOOM}.
 *
 * The tile's position within its zoom level is packed alongside the zoom
 * value, as geojson-vt does. Unlike a bit shift, `2 ** zoom` stays exact
 * up to {@link MAX_ZOOM}.
 *
 * @example
 * ```typescript
 * tileId(tileAddress(0, 0, 0)); // => 0
 * tileId(tileAddress(2, 3, 1)); // => 226
 * ```
 */
export function tileId(address: TileAddress): number {
  return ((2 ** address.zoom) * address.row + address.col) * 32 + address.zoom;
}

/** `"zoom/col/row"`, the order used by slippy-map URLs and the disk tier. */
export function tileKey(address: TileAddress): string {
  return `${address.zoom}/${address.col}/${address.row}`;
}

/**
 * Parse a `"zoom/col/row"` key back into a validated address.
 *
 * @param key - Key as produced by {@link tileKey}.
 *
 * @throws {RangeError} If the key is malformed or out of range.
 */
export function parseTileKey(key: string): TileAddress {
  const parts = key.split('/');
  if (parts.length !== 3 || parts.some(p => !/^\d+$/.test(p))) {
    throw new RangeError(`Invalid tile key: ${key}`);
  }
  const [zoom, col, row] = parts.map(Number);
  return tileAddress(zoom, col, row);
}

export function sameTile(a: TileAddress, b: TileAddress): boolean {
  return a.zoom === b.zoom && a.col === b.col && a.row === b.row;
}
