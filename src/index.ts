/**
 * @module tilestash
 *
 * Public API surface for the tilestash library.
 *
 * tilestash keeps the raster tiles of a slippy map flowing to a render loop
 * that must never wait on I/O. Tiles are resolved through three tiers and
 * handed to the foreground as decoded RGBA pixels:
 *
 * ---
 *
 * ### Tiers
 *
 * | Tier | Export | Latency | Contents |
 * |------|--------|---------|----------|
 * | **RAM** | {@link TileManager} (internal) | none | Decoded images and failure markers for the session |
 * | **Disk** | {@link DiskTileStore} | milliseconds | Encoded tile files under `<cacheDir>/<z>/<x>/<y>.<ext>` |
 * | **Network** | {@link HttpTileSource} | up to the request timeout | Tiles from a `{z}/{x}/{y}` URL template |
 *
 * A {@link TileManager} answers {@link TileManager.request | request} from
 * RAM or returns `null` and queues the address. A fixed pool of async
 * workers drains the LIFO queue (most recent request first), reading the
 * disk tier before the network and populating RAM.
 *
 * ---
 *
 * ### Geometry
 *
 * Pure functions convert between latitude/longitude, normalized Web
 * Mercator world coordinates and tile addresses
 * ({@link project}, {@link worldToTile}, {@link tileToWorld}), and compute
 * the tiles a viewport covers ({@link visibleTiles}, {@link placedTiles},
 * {@link marginTiles}).
 *
 * ---
 *
 * ### Pluggable tiers
 *
 * {@link TileStore} and {@link TileSource} are interfaces; pass your own to
 * the manager, or use {@link MemoryTileStore} where nothing should touch the
 * filesystem.
 */

// ─── Manager ────────────────────────────────────────────────────────────────

export { TileManager } from './manager.js';
export { resolveConfig, configFromEnv, DEFAULT_CONFIG, DEFAULT_USER_AGENT } from './options.js';

// ─── Addresses & geometry ───────────────────────────────────────────────────

export {
  MAX_ZOOM,
  tileAddress,
  isTileAddress,
  assertTileAddress,
  tileId,
  tileKey,
  parseTileKey,
  sameTile,
  freezeAddress,
} from './address.js';
export {
  MAX_LATITUDE,
  TILE_SIZE,
  clampLatitude,
  wrapLongitude,
  projectX,
  projectY,
  project,
  unproject,
  projectToMercator,
  worldSize,
  worldToPixel,
  worldToTile,
  tileToWorld,
} from './geometry/project.js';
export {
  viewportOrigin,
  panViewport,
  tileRange,
  placedTiles,
  visibleTiles,
  marginTiles,
  tileBBox,
} from './tiles.js';

// ─── Tiers ──────────────────────────────────────────────────────────────────

export { DiskTileStore } from './store/disk.js';
export { MemoryTileStore } from './store/memory.js';
export { HttpTileSource } from './source/http.js';
export { decodeTile } from './decode.js';

// ─── Errors & logging ───────────────────────────────────────────────────────

export { TileError, NetworkFailure, DecodeFailure, DiskIOFailure, ConfigError } from './errors.js';
export { consoleLogger, silentLogger } from './logger.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export type { TileManagerOptions, TileManagerStats } from './manager.js';
export type { TileManagerConfig, ResolvedConfig } from './options.js';
export type { TileAddress } from './address.js';
export type { Viewport, GridOptions, TileRange, PlacedTile } from './tiles.js';
export type { TileStore } from './store/store.js';
export type { DiskTileStoreOptions } from './store/disk.js';
export type { TileSource } from './source/source.js';
export type { HttpTileSourceOptions } from './source/http.js';
export type { TileDecoder } from './decode.js';
export type { TileErrorKind } from './errors.js';
export type { Logger } from './logger.js';
export type {
  WorldPoint,
  LatLon,
  TilePosition,
  BBox,
  TileImage,
  TileRecord,
  TileState,
  Clock,
} from './types.js';
