import type { Sharp } from "sharp";
import { DecodeError, EncodeError, errorMessage } from "../errors.js";
import type { Codec, ConversionStats } from "../types.js";
import { openHeif } from "./heif.js";
import { writeAtomic } from "./output.js";

/**
 * Decodes and encodes in a single sharp pipeline, HEIF buffer to WebP buffer.
 * When the pipeline fails, the primary image is decoded on its own to tell a
 * decoder fault from an encoder one.
 */
export class PipelineCodec implements Codec {
  readonly name = "pipeline";

  async convert(sourcePath: string, destinationPath: string, quality: number): Promise<ConversionStats> {
    const { image, width, height, inputBytes } = await openHeif(sourcePath);

    let output: Buffer;
    try {
      output = await image.webp({ quality }).toBuffer();
    } catch (err) {
      await assertDecodable(image);
      throw new EncodeError(errorMessage(err));
    }

    if (output.length === 0) {
      throw new EncodeError("Encoder produced no output");
    }

    await writeAtomic(destinationPath, output);

    return { width, height, inputBytes, outputBytes: output.length };
  }
}

async function assertDecodable(image: Sharp): Promise<void> {
  try {
    await image.clone().raw().toBuffer();
  } catch (err) {
    throw new DecodeError("decode", errorMessage(err));
  }
}
