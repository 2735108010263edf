/**
 * @module decode
 *
 * Decoding of encoded tile bytes (PNG, JPEG, WebP, ...) into raw RGBA
 * pixels with `sharp`.
 *
 * The decoded {@link TileImage} is what the RAM tier holds and the renderer
 * draws. Anything `sharp` cannot read is reported as a
 * {@link DecodeFailure} so that workers can discard it.
 */

import sharp from 'sharp';
import type { TileAddress } from './address.js';
import { DecodeFailure } from './errors.js';
import type { TileImage } from './types.js';

/**
 * Turns encoded bytes into a {@link TileImage}.
 *
 * @throws {DecodeFailure} If the bytes are not a readable image.
 */
export type TileDecoder = (bytes: Uint8Array, address?: TileAddress) => Promise<TileImage>;

/**
 * Decode an encoded raster tile into 4-channel RGBA pixels.
 *
 * Images without an alpha channel get an opaque one, so every decoded tile
 * has the same layout regardless of the source format.
 *
 * @example
 * ```typescript
 * const image = await decodeTile(pngBytes);
 * image.width;       // => 256
 * image.data.length; // => 256 * 256 * 4
 * ```
 */
export const decodeTile: TileDecoder = async (bytes, address) => {
  if (bytes.byteLength === 0) {
    throw new DecodeFailure('Empty tile payload', address);
  }

  try {
    const { data, info } = await sharp(bytes)
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    return {
      width: info.width,
      height: info.height,
      channels: 4,
      data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
    };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DecodeFailure(`Cannot decode tile image: ${reason}`, address, { cause: err });
  }
};
