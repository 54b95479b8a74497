import { describe, it, expect } from "vitest";
import { DEFAULT_QUALITY, helpText, parseArgs } from "../args.js";
import { InvalidArgumentError } from "../errors.js";
import type { ParsedArgs } from "../types.js";

function argv(...args: string[]): string[] {
  return ["node", "heic2webp", ...args];
}

function errorOf(parsed: ParsedArgs): string {
  if (parsed.kind !== "error") {
    throw new Error(`expected an error, got ${parsed.kind}`);
  }
  expect(parsed.error).toBeInstanceOf(InvalidArgumentError);
  return parsed.error.message;
}

describe("parseArgs", () => {
  it("applies defaults for a bare input", () => {
    expect(parseArgs(argv("photos"))).toEqual({
      kind: "run",
      config: {
        inputPath: "photos",
        outputDir: undefined,
        quality: DEFAULT_QUALITY,
        recursive: false,
        verbose: false,
        codec: "pipeline",
        jobs: 1,
      },
    });
  });

  it("reads every option in short and long form", () => {
    expect(parseArgs(argv("-o", "out", "-q", "90", "-r", "-v", "-c", "raster", "-j", "3", "img.heic"))).toEqual({
      kind: "run",
      config: {
        inputPath: "img.heic",
        outputDir: "out",
        quality: 90,
        recursive: true,
        verbose: true,
        codec: "raster",
        jobs: 3,
      },
    });

    const parsed = parseArgs(argv("dir", "--output", "webp", "--quality", "1", "--recursive", "--verbose"));
    expect(parsed).toMatchObject({
      kind: "run",
      config: { inputPath: "dir", outputDir: "webp", quality: 1, recursive: true, verbose: true },
    });
  });

  it("accepts both ends of the quality range", () => {
    expect(parseArgs(argv("-q", "1", "a.heic"))).toMatchObject({ config: { quality: 1 } });
    expect(parseArgs(argv("-q", "100", "a.heic"))).toMatchObject({ config: { quality: 100 } });
  });

  it("rejects quality outside 1-100", () => {
    expect(errorOf(parseArgs(argv("-q", "0", "a.heic")))).toBe("quality must be between 1 and 100, got 0");
    expect(errorOf(parseArgs(argv("-q", "101", "a.heic")))).toBe("quality must be between 1 and 100, got 101");
  });

  it("rejects non-integer quality", () => {
    expect(errorOf(parseArgs(argv("-q", "8.5", "a.heic")))).toBe("invalid quality value: 8.5");
    expect(errorOf(parseArgs(argv("-q", "-5", "a.heic")))).toBe("invalid quality value: -5");
    expect(errorOf(parseArgs(argv("-q", "high", "a.heic")))).toBe("invalid quality value: high");
  });

  it("reports a flag missing its argument", () => {
    expect(errorOf(parseArgs(argv("a.heic", "-q")))).toBe("--quality requires a numeric argument");
    expect(errorOf(parseArgs(argv("a.heic", "--output")))).toBe("--output requires a directory argument");
    expect(errorOf(parseArgs(argv("a.heic", "-c")))).toBe("--codec requires a backend name");
    expect(errorOf(parseArgs(argv("a.heic", "-j")))).toBe("--jobs requires a numeric argument");
  });

  it("rejects unknown codecs and job counts below one", () => {
    expect(errorOf(parseArgs(argv("-c", "magick", "a.heic")))).toBe(
      "unknown codec: magick (expected pipeline or raster)"
    );
    expect(errorOf(parseArgs(argv("-j", "0", "a.heic")))).toBe("invalid jobs value: 0");
  });

  it("rejects unknown flags", () => {
    expect(errorOf(parseArgs(argv("--badopt", "a.heic")))).toBe("unknown option: --badopt");
  });

  it("rejects a missing or empty input", () => {
    expect(errorOf(parseArgs(argv()))).toBe("no input file or directory specified");
    expect(errorOf(parseArgs(argv("-r")))).toBe("no input file or directory specified");
    expect(errorOf(parseArgs(argv("")))).toBe("no input file or directory specified");
  });

  it("rejects a second input", () => {
    expect(errorOf(parseArgs(argv("a.heic", "b.heic")))).toBe("unexpected argument: b.heic");
  });

  it("returns help and version without a run", () => {
    expect(parseArgs(argv("-h"))).toEqual({ kind: "help" });
    expect(parseArgs(argv("photos", "--help"))).toEqual({ kind: "help" });
    expect(parseArgs(argv("--version"))).toEqual({ kind: "version" });
  });

  it("stops at help before validating later arguments", () => {
    expect(parseArgs(argv("--help", "-q", "0"))).toEqual({ kind: "help" });
  });
});

describe("helpText", () => {
  it("lists the options and the default quality", () => {
    const text = helpText("1.2.3");
    expect(text.split("\n")[0]).toBe("heic2webp v1.2.3 - Convert HEIC/HEIF images to WebP");
    expect(text).toContain("-q, --quality <n>     WebP quality 1-100 (default: 85)");
    expect(text).toContain("-c, --codec <name>    Backend: pipeline | raster (default: pipeline)");
  });
});
