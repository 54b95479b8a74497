import type { ConversionError, InvalidArgumentError } from "./errors.js";

export const CODEC_NAMES = ["pipeline", "raster"] as const;

export type CodecName = (typeof CODEC_NAMES)[number];

export interface Configuration {
  readonly inputPath: string;
  readonly outputDir?: string;
  readonly quality: number;
  readonly recursive: boolean;
  readonly verbose: boolean;
  readonly codec: CodecName;
  readonly jobs: number;
}

export interface ConversionTask {
  sourcePath: string;
  destinationPath: string;
}

export interface ConversionStats {
  width: number;
  height: number;
  inputBytes: number;
  outputBytes: number;
}

export type ConversionOutcome =
  | { status: "success"; stats: ConversionStats }
  | { status: "failure"; error: ConversionError };

export interface ConversionResult {
  task: ConversionTask;
  outcome: ConversionOutcome;
}

export interface RunSummary {
  successCount: number;
  failureCount: number;
  total: number;
  inputBytes: number;
  outputBytes: number;
  durationMs: number;
}

/**
 * A HEIF-to-WebP backend. Resolves with the stats of the written file, or
 * rejects with a ConversionError subclass; never leaves a partial output.
 */
export interface Codec {
  readonly name: CodecName;
  convert(sourcePath: string, destinationPath: string, quality: number): Promise<ConversionStats>;
}

export interface RunReporter {
  discovered(root: string, files: readonly string[]): void;
  noFiles(root: string): void;
  progress(result: ConversionResult): void;
  finished(summary: RunSummary): void;
}

export type ParsedArgs =
  | { kind: "run"; config: Configuration }
  | { kind: "help" }
  | { kind: "version" }
  | { kind: "error"; error: InvalidArgumentError };
