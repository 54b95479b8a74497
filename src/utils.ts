import path from "node:path";

const INPUT_EXTENSIONS = ["heic", "heif"];

export function hasHeifExtension(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase().slice(1);
  return INPUT_EXTENSIONS.includes(ext);
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let size = bytes;
  let unit = 0;

  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(2)} ${units[unit]}`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  return minutes > 0 ? `${minutes}m ${seconds % 60}s` : `${seconds}s`;
}

/** Percentage saved by `outputBytes` relative to `inputBytes`, one decimal. */
export function formatReduction(inputBytes: number, outputBytes: number): string {
  if (inputBytes === 0) return "0.0";
  return ((1 - outputBytes / inputBytes) * 100).toFixed(1);
}

export function comparePaths(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
