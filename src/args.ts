import { InvalidArgumentError } from "./errors.js";
import { CODEC_NAMES } from "./types.js";
import type { CodecName, ParsedArgs } from "./types.js";

export const DEFAULT_QUALITY = 85;

export function helpText(version: string): string {
  return `
heic2webp v${version} - Convert HEIC/HEIF images to WebP

Usage:
  heic2webp <file>                    Convert a file, output next to source
  heic2webp <dir>                     Convert all HEIC/HEIF files in dir
  heic2webp -o <outputDir> <input>    Write to a separate output directory
  heic2webp -r -v <dir>               Recurse into subdirectories, verbose

Options:
  -o, --output <dir>    Output directory (default: next to source)
  -q, --quality <n>     WebP quality 1-100 (default: ${DEFAULT_QUALITY})
  -r, --recursive       Process subdirectories recursively
  -v, --verbose         Show dimensions and size reduction per file
  -c, --codec <name>    Backend: ${CODEC_NAMES.join(" | ")} (default: pipeline)
  -j, --jobs <n>        Files converted at once (default: 1)
  -h, --help            Show this help message
      --version         Show version number

Supported formats: heic, heif
`.trim();
}

function isCodecName(value: string): value is CodecName {
  return CODEC_NAMES.some((name) => name === value);
}

function parseInteger(value: string): number | undefined {
  return /^\d+$/.test(value) ? parseInt(value, 10) : undefined;
}

function fail(message: string): ParsedArgs {
  return { kind: "error", error: new InvalidArgumentError(message) };
}

/**
 * Parses `process.argv`-shaped input. Never exits: help, version and
 * malformed input come back as tagged results for the caller to act on.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  let inputPath: string | undefined;
  let outputDir: string | undefined;
  let quality = DEFAULT_QUALITY;
  let recursive = false;
  let verbose = false;
  let codec: CodecName = "pipeline";
  let jobs = 1;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    }

    if (arg === "--version") {
      return { kind: "version" };
    }

    if (arg === "-r" || arg === "--recursive") {
      recursive = true;
      continue;
    }

    if (arg === "-v" || arg === "--verbose") {
      verbose = true;
      continue;
    }

    if (arg === "-q" || arg === "--quality") {
      const next = args[++i];
      if (next === undefined) {
        return fail("--quality requires a numeric argument");
      }
      const val = parseInteger(next);
      if (val === undefined) {
        return fail(`invalid quality value: ${next}`);
      }
      if (val < 1 || val > 100) {
        return fail(`quality must be between 1 and 100, got ${val}`);
      }
      quality = val;
      continue;
    }

    if (arg === "-o" || arg === "--output") {
      const next = args[++i];
      if (next === undefined) {
        return fail("--output requires a directory argument");
      }
      outputDir = next;
      continue;
    }

    if (arg === "-c" || arg === "--codec") {
      const next = args[++i];
      if (next === undefined) {
        return fail("--codec requires a backend name");
      }
      if (!isCodecName(next)) {
        return fail(`unknown codec: ${next} (expected ${CODEC_NAMES.join(" or ")})`);
      }
      codec = next;
      continue;
    }

    if (arg === "-j" || arg === "--jobs") {
      const next = args[++i];
      if (next === undefined) {
        return fail("--jobs requires a numeric argument");
      }
      const val = parseInteger(next);
      if (val === undefined || val < 1) {
        return fail(`invalid jobs value: ${next}`);
      }
      jobs = val;
      continue;
    }

    if (arg.startsWith("-")) {
      return fail(`unknown option: ${arg}`);
    }

    if (inputPath !== undefined) {
      return fail(`unexpected argument: ${arg}`);
    }
    inputPath = arg;
  }

  if (inputPath === undefined || inputPath === "") {
    return fail("no input file or directory specified");
  }

  return {
    kind: "run",
    config: { inputPath, outputDir, quality, recursive, verbose, codec, jobs },
  };
}
