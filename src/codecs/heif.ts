import fs from "node:fs/promises";
import sharp from "sharp";
import type { Metadata, Sharp } from "sharp";
import { DecodeError, errorMessage } from "../errors.js";

// 16384 x 16384
const MAX_INPUT_PIXELS = 268402689;

export interface HeifSource {
  image: Sharp;
  width: number;
  height: number;
  inputBytes: number;
}

/**
 * Reads `sourcePath` and checks that it holds a HEIF container with a
 * primary image. The returned pipeline decodes that primary image.
 */
export async function openHeif(sourcePath: string): Promise<HeifSource> {
  let input: Buffer;
  try {
    input = await fs.readFile(sourcePath);
  } catch (err) {
    throw new DecodeError("read", errorMessage(err));
  }

  if (input.length === 0) {
    throw new DecodeError("read", "File is empty");
  }

  let image: Sharp;
  let metadata: Metadata;
  try {
    image = sharp(input, {
      failOn: "error",
      limitInputPixels: MAX_INPUT_PIXELS,
    });
    metadata = await image.metadata();
  } catch (err) {
    throw new DecodeError("read", errorMessage(err));
  }

  if (metadata.format !== "heif") {
    throw new DecodeError("read", `Not a HEIF container (detected ${metadata.format ?? "unknown"})`);
  }

  const { width, height } = metadata;
  if (width === undefined || height === undefined) {
    throw new DecodeError("primary-image", "Container has no primary image");
  }

  return { image, width, height, inputBytes: input.length };
}
