/**
 * @module store/disk
 *
 * Filesystem {@link TileStore} implementation.
 *
 * Each tile is one file at `{root}/{zoom}/{col}/{row}.{extension}` holding
 * exactly the bytes the network returned. The existence of the file is
 * authoritative; there is no index or metadata. Directories are created on
 * first write.
 *
 * Writes are published atomically: bytes go to a uniquely named temp file
 * in the destination directory and are then `rename`d over the final path,
 * so a concurrent reader sees either no file or the whole file.
 */

import { mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { TileAddress } from '../address.js';
import { tileKey } from '../address.js';
import { DiskIOFailure, errorCode } from '../errors.js';
import type { TileStore } from './store.js';

/** Error codes meaning "nothing stored here". */
const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);

let tmpCounter = 0;

/**
 * Configuration options for {@link DiskTileStore}.
 */
export interface DiskTileStoreOptions {
  /** Cache root directory. @defaultValue "cache_tiles" */
  root?: string;
  /** File extension without the dot. @defaultValue "png" */
  extension?: string;
}

/**
 * Disk tier storing one file per tile.
 *
 * @example
 * ```typescript
 * const store = new DiskTileStore({ root: './cache_tiles', extension: 'png' });
 *
 * await store.put(tileAddress(3, 2, 1), bytes);
 * store.pathFor(tileAddress(3, 2, 1)); // => 'cache_tiles/3/2/1.png'
 * ```
 */
export class DiskTileStore implements TileStore {
  readonly root: string;
  readonly extension: string;

  constructor(options?: DiskTileStoreOptions) {
    this.root = options?.root ?? 'cache_tiles';
    this.extension = options?.extension ?? 'png';
  }

  /** File path holding the bytes for `address`. */
  pathFor(address: TileAddress): string {
    return join(
      this.root,
      String(address.zoom),
      String(address.col),
      `${address.row}.${this.extension}`,
    );
  }

  async get(address: TileAddress): Promise<Uint8Array | null> {
    const file = this.pathFor(address);
    try {
      const buf = await readFile(file);
      return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
    } catch (err) {
      if (isMissing(err)) return null;
      throw new DiskIOFailure(`Failed to read ${file}`, address, {
        code: errorCode(err),
        cause: err,
      });
    }
  }

  /**
   * Write to a temp file beside the target, then rename it into place.
   *
   * The temp name carries the process id and a counter, so concurrent
   * writers of the same address never share a temp file; the last rename
   * wins and both candidates are complete files.
   */
  async put(address: TileAddress, bytes: Uint8Array): Promise<void> {
    const file = this.pathFor(address);
    const tmp = `${file}.${process.pid}.${++tmpCounter}.tmp`;

    try {
      await mkdir(dirname(file), { recursive: true });
      await writeFile(tmp, bytes);
      await rename(tmp, file);
    } catch (err) {
      const cleanupError = await rm(tmp, { force: true }).then(
        () => undefined,
        (rmErr: unknown) => rmErr,
      );
      throw new DiskIOFailure(`Failed to write ${file}`, address, {
        code: errorCode(err),
        cause: cleanupError === undefined ? err : new AggregateError([err, cleanupError]),
      });
    }
  }

  async exists(address: TileAddress): Promise<boolean> {
    const file = this.pathFor(address);
    try {
      return (await stat(file)).isFile();
    } catch (err) {
      if (isMissing(err)) return false;
      throw new DiskIOFailure(`Failed to stat ${file}`, address, {
        code: errorCode(err),
        cause: err,
      });
    }
  }

  async delete(address: TileAddress): Promise<void> {
    try {
      await rm(this.pathFor(address), { force: true });
    } catch (err) {
      throw new DiskIOFailure(`Failed to delete tile ${tileKey(address)}`, address, {
        code: errorCode(err),
        cause: err,
      });
    }
  }

  /** Files are opened per operation; nothing is held between calls. */
  async close(): Promise<void> {}
}

function isMissing(err: unknown): boolean {
  const code = errorCode(err);
  return code !== undefined && MISSING_CODES.has(code);
}
