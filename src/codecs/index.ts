import type { Codec, CodecName } from "../types.js";
import { PipelineCodec } from "./pipeline.js";
import { RasterCodec } from "./raster.js";

export function createCodec(name: CodecName): Codec {
  switch (name) {
    case "pipeline":
      return new PipelineCodec();
    case "raster":
      return new RasterCodec();
  }
}

export { PipelineCodec, RasterCodec };
