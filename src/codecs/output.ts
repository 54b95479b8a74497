import path from "node:path";
import fs from "node:fs/promises";
import crypto from "node:crypto";
import { WriteError, errorMessage, isNotFound } from "../errors.js";

/**
 * Writes `data` to a hidden temporary file beside `outputPath`, then renames
 * it into place. On failure the temporary file is removed and a WriteError
 * is thrown, so a truncated file never sits at `outputPath`.
 */
export async function writeAtomic(outputPath: string, data: Uint8Array): Promise<void> {
  const tempOutput = path.join(
    path.dirname(outputPath),
    `.heic2webp-${crypto.randomBytes(8).toString("hex")}.webp`
  );

  try {
    await fs.writeFile(tempOutput, data);
    await assertNotSymlink(outputPath);
    await fs.rename(tempOutput, outputPath);
  } catch (err) {
    await fs.rm(tempOutput, { force: true });
    throw new WriteError(outputPath, errorMessage(err));
  }
}

async function assertNotSymlink(outputPath: string): Promise<void> {
  try {
    const outputLstat = await fs.lstat(outputPath);
    if (outputLstat.isSymbolicLink()) {
      throw new Error("Output path is a symbolic link, refusing to overwrite");
    }
  } catch (err) {
    if (!isNotFound(err)) throw err;
  }
}
