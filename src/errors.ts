/**
 * @module errors
 *
 * Failure taxonomy for tile acquisition.
 *
 * Workers catch every error a tile resolution raises and record it on the
 * address in the RAM tier; none of these ever reaches the rendering loop.
 * The only errors thrown to callers are `RangeError` for malformed tile
 * addresses and {@link ConfigError} for invalid options.
 */

import type { TileAddress } from './address.js';
import { tileKey } from './address.js';

export type TileErrorKind = 'network' | 'decode' | 'disk';

/**
 * Base class for failures attached to a single tile address.
 */
export abstract class TileError extends Error {
  abstract readonly kind: TileErrorKind;
  readonly address: TileAddress | undefined;

  constructor(message: string, address?: TileAddress, options?: ErrorOptions) {
    super(address ? `${message} (tile ${tileKey(address)})` : message, options);
    this.name = new.target.name;
    this.address = address;
  }
}

/**
 * Timeout, connection error, or non-success HTTP status.
 *
 * `status` is set when the server answered; it is `undefined` for transport
 * errors and timeouts.
 */
export class NetworkFailure extends TileError {
  readonly kind = 'network';
  readonly status: number | undefined;

  constructor(
    message: string,
    address?: TileAddress,
    options?: ErrorOptions & { status?: number },
  ) {
    super(message, address, options);
    this.status = options?.status;
  }
}

/** Bytes that are not a decodable raster image. */
export class DecodeFailure extends TileError {
  readonly kind = 'decode';
}

/** Filesystem error in the disk tier (permissions, full disk, ...). */
export class DiskIOFailure extends TileError {
  readonly kind = 'disk';
  readonly code: string | undefined;

  constructor(
    message: string,
    address?: TileAddress,
    options?: ErrorOptions & { code?: string },
  ) {
    super(message, address, options);
    this.code = options?.code;
  }
}

/** Invalid {@link TileManagerConfig} values. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid tilestash options: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Normalize anything a tile resolution threw into a {@link TileError}.
 *
 * Tile errors pass through unchanged. Anything else came from the source
 * side of the pipeline and is wrapped as a {@link NetworkFailure}.
 */
export function toTileError(err: unknown, address: TileAddress): TileError {
  if (err instanceof TileError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new NetworkFailure(message, address, { cause: err });
}

/**
 * Read the `code` property Node attaches to system errors.
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    return typeof err.code === 'string' ? err.code : undefined;
  }
  return undefined;
}
