import path from "node:path";
import fs from "node:fs/promises";
import { discover } from "./discover.js";
import { ConversionError } from "./errors.js";
import type { Codec, Configuration, ConversionResult, ConversionTask, RunReporter, RunSummary } from "./types.js";

export function createTask(sourcePath: string, outputDir?: string): ConversionTask {
  const dir = outputDir ? path.resolve(outputDir) : path.dirname(sourcePath);
  return {
    sourcePath,
    destinationPath: path.join(dir, `${path.parse(sourcePath).name}.webp`),
  };
}

export class BatchConverter {
  private summary: RunSummary = emptySummary();

  constructor(
    private readonly codec: Codec,
    private readonly reporter: RunReporter
  ) {}

  /**
   * Converts every HEIC/HEIF file under `config.inputPath`. Discovery errors
   * reject; per-file failures are counted and the batch carries on.
   */
  async run(config: Configuration): Promise<RunSummary> {
    this.summary = emptySummary();
    const startTime = Date.now();

    const root = path.resolve(config.inputPath);
    const files = await discover(root, config.recursive);

    if (config.outputDir) {
      await fs.mkdir(config.outputDir, { recursive: true });
    }

    if (files.length === 0) {
      this.reporter.noFiles(root);
      return this.summary;
    }

    this.reporter.discovered(root, files);

    const tasks = files.map((file) => createTask(file, config.outputDir));
    await this.processInBatches(tasks, config.quality, config.jobs);

    this.summary.durationMs = Date.now() - startTime;
    this.reporter.finished(this.summary);
    return this.summary;
  }

  async convertTask(task: ConversionTask, quality: number): Promise<ConversionResult> {
    try {
      const stats = await this.codec.convert(task.sourcePath, task.destinationPath, quality);
      return { task, outcome: { status: "success", stats } };
    } catch (err) {
      if (err instanceof ConversionError) {
        return { task, outcome: { status: "failure", error: err } };
      }
      throw err;
    }
  }

  private async processInBatches(tasks: ConversionTask[], quality: number, jobs: number): Promise<void> {
    for (let i = 0; i < tasks.length; i += jobs) {
      const batch = tasks.slice(i, i + jobs);
      const batchResults = await Promise.all(batch.map((task) => this.convertTask(task, quality)));

      for (const result of batchResults) {
        this.record(result);
        this.reporter.progress(result);
      }
    }
  }

  private record(result: ConversionResult): void {
    this.summary.total++;
    if (result.outcome.status === "success") {
      this.summary.successCount++;
      this.summary.inputBytes += result.outcome.stats.inputBytes;
      this.summary.outputBytes += result.outcome.stats.outputBytes;
    } else {
      this.summary.failureCount++;
    }
  }
}

function emptySummary(): RunSummary {
  return {
    successCount: 0,
    failureCount: 0,
    total: 0,
    inputBytes: 0,
    outputBytes: 0,
    durationMs: 0,
  };
}
