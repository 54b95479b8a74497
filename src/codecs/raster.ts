import sharp from "sharp";
import type { Sharp } from "sharp";
import { DecodeError, EncodeError, errorMessage } from "../errors.js";
import type { Codec, ConversionStats } from "../types.js";
import { openHeif } from "./heif.js";
import { writeAtomic } from "./output.js";

export interface RgbRaster {
  data: Buffer;
  width: number;
  height: number;
  channels: 3;
  stride: number;
}

/**
 * Decodes the primary image to an interleaved RGB raster, then encodes the
 * raw pixels as a separate step.
 */
export class RasterCodec implements Codec {
  readonly name = "raster";

  async convert(sourcePath: string, destinationPath: string, quality: number): Promise<ConversionStats> {
    const { image, inputBytes } = await openHeif(sourcePath);
    const raster = await decodeRgb(image);
    const output = await encodeWebp(raster, quality);

    await writeAtomic(destinationPath, output);

    return {
      width: raster.width,
      height: raster.height,
      inputBytes,
      outputBytes: output.length,
    };
  }
}

export async function decodeRgb(image: Sharp): Promise<RgbRaster> {
  try {
    const { data, info } = await image
      .removeAlpha()
      .toColourspace("srgb")
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== 3) {
      throw new Error(`Expected 3 channels, decoder produced ${info.channels}`);
    }

    return {
      data,
      width: info.width,
      height: info.height,
      channels: 3,
      stride: info.width * info.channels,
    };
  } catch (err) {
    throw new DecodeError("decode", errorMessage(err));
  }
}

export async function encodeWebp(raster: RgbRaster, quality: number): Promise<Buffer> {
  if (raster.data.length !== raster.stride * raster.height) {
    throw new EncodeError(
      `Raster holds ${raster.data.length} bytes, expected ${raster.stride} x ${raster.height}`
    );
  }

  let output: Buffer;
  try {
    output = await sharp(raster.data, {
      raw: { width: raster.width, height: raster.height, channels: raster.channels },
    })
      .webp({ quality })
      .toBuffer();
  } catch (err) {
    throw new EncodeError(errorMessage(err));
  }

  if (output.length === 0) {
    throw new EncodeError("Encoder produced no output");
  }
  return output;
}
