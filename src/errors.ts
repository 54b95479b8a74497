export class Heic2WebpError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends Heic2WebpError {}

export class NotFoundError extends Heic2WebpError {
  constructor(readonly path: string) {
    super(`Input not found: ${path}`);
  }
}

export class InvalidInputError extends Heic2WebpError {
  constructor(readonly path: string, reason: string) {
    super(`${reason}: ${path}`);
  }
}

export class DiscoveryError extends Heic2WebpError {
  constructor(readonly path: string, message: string) {
    super(`Cannot list ${path}: ${message}`);
  }
}

/**
 * Per-file failure. The batch records it and moves on to the next file.
 * `message` is the codec or filesystem message, unmodified.
 */
export abstract class ConversionError extends Heic2WebpError {
  abstract readonly label: string;
}

export type DecodeStage = "read" | "primary-image" | "decode";

const DECODE_LABELS: Record<DecodeStage, string> = {
  read: "Failed to read HEIF container",
  "primary-image": "Failed to get primary image",
  decode: "Failed to decode image",
};

export class DecodeError extends ConversionError {
  readonly label: string;

  constructor(readonly stage: DecodeStage, message: string) {
    super(message);
    this.label = DECODE_LABELS[stage];
  }
}

export class EncodeError extends ConversionError {
  readonly label = "Failed to encode WebP";
}

export class WriteError extends ConversionError {
  readonly label: string;

  constructor(readonly path: string, message: string) {
    super(message);
    this.label = `Failed to write ${path}`;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function errorCode(err: unknown): unknown {
  return err instanceof Error && "code" in err ? err.code : undefined;
}

export function isNotFound(err: unknown): boolean {
  const code = errorCode(err);
  return code === "ENOENT" || code === "ENOTDIR";
}

/** The path names a chain of links that never reaches a real entry. */
export function isUnresolvable(err: unknown): boolean {
  return isNotFound(err) || errorCode(err) === "ELOOP";
}
