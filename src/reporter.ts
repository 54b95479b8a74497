import path from "node:path";
import { formatBytes, formatDuration, formatReduction } from "./utils.js";
import type { ConversionResult, RunReporter, RunSummary } from "./types.js";

export interface Logger {
  log(message: string): void;
  error(message: string): void;
}

/** Prints progress to stdout and failures to stderr, one line per event. */
export class ConsoleReporter implements RunReporter {
  constructor(
    private readonly verbose: boolean,
    private readonly logger: Logger = console
  ) {}

  discovered(root: string, files: readonly string[]): void {
    if (files.length === 1 && files[0] === root) return;
    this.logger.log(`Found ${files.length} HEIC file(s) in ${root}`);
  }

  noFiles(root: string): void {
    this.logger.log(`No HEIC files found in ${root}`);
  }

  progress(result: ConversionResult): void {
    const input = path.basename(result.task.sourcePath);
    const { outcome } = result;

    if (outcome.status === "failure") {
      this.logger.error(`Failed: ${input}`);
      this.logger.error(`  ${outcome.error.label}: ${outcome.error.message}`);
      return;
    }

    this.logger.log(`${input} -> ${path.basename(result.task.destinationPath)}`);

    if (this.verbose) {
      const { width, height, inputBytes, outputBytes } = outcome.stats;
      this.logger.log(`  Dimensions: ${width}x${height}`);
      this.logger.log(
        `  Size: ${formatBytes(inputBytes)} -> ${formatBytes(outputBytes)} (${formatReduction(inputBytes, outputBytes)}% smaller)`
      );
    }
  }

  finished(summary: RunSummary): void {
    this.logger.log(`Converted: ${summary.successCount}/${summary.total} files`);

    if (this.verbose) {
      this.logger.log(`  Total size: ${formatBytes(summary.inputBytes)}`);
      this.logger.log(`  Saved:      ${formatBytes(summary.inputBytes - summary.outputBytes)}`);
      this.logger.log(`  Duration:   ${formatDuration(summary.durationMs)}`);
    }
  }
}
