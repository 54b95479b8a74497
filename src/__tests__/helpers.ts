import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import sharp from "sharp";

export function tmpDir(): string {
  return path.join(os.tmpdir(), `heic2webp-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

/** Writes an AV1-compressed HEIF file, which prebuilt sharp can both write and read. */
export async function createTestHeic(filePath: string, width = 16, height = 12): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await sharp({
    create: { width, height, channels: 3, background: { r: 255, g: 0, b: 0 } },
  })
    .heif({ compression: "av1", quality: 60 })
    .toFile(filePath);
}

export async function createCorruptHeic(filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, "not a real heic image");
}

export async function touch(filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, "");
}

export async function isWebp(filePath: string): Promise<boolean> {
  const data = await fs.readFile(filePath);
  return (
    data.subarray(0, 4).toString("ascii") === "RIFF" &&
    data.subarray(8, 12).toString("ascii") === "WEBP"
  );
}

export async function cleanup(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
