import path from "path";

import { Dimension, RequestedSize } from "./types.js";
import { InvalidSizeError } from "../middleware/publicErrorHandler.js";

const DIGITS = /^[0-9]+$/;

/**
 * Parses one `w`/`h` query value. Empty means unspecified; otherwise the
 * value must be a positive integer and, when an allow-list is configured,
 * one of its entries.
 */
export function parseDimension(raw: string | undefined, validSizes: readonly number[]): Dimension {
  if (raw === undefined || raw.trim() === "") {
    return null;
  }

  const trimmed = raw.trim();
  if (!DIGITS.test(trimmed)) {
    throw new InvalidSizeError(validSizes);
  }

  // "0100" and "100" name the same size
  const size = Number(trimmed);
  if (!Number.isSafeInteger(size) || size <= 0) {
    throw new InvalidSizeError(validSizes);
  }
  if (validSizes.length > 0 && !validSizes.includes(size)) {
    throw new InvalidSizeError(validSizes);
  }

  return size;
}

/** Returns null when neither dimension is requested: the original is served. */
export function parseRequestedSize(
  width: string | undefined,
  height: string | undefined,
  validSizes: readonly number[]
): RequestedSize | null {
  const size = {
    width: parseDimension(width, validSizes),
    height: parseDimension(height, validSizes)
  };

  if (size.width === null && size.height === null) {
    return null;
  }
  return size;
}

/**
 * `photo.png` at 200 wide becomes `photo_200x.png`; at 200x100,
 * `photo_200x100.png`. Any directory part of the original is kept.
 */
export function deriveDerivativeName(originalName: string, size: RequestedSize): string {
  if (size.width === null && size.height === null) {
    throw new Error("derivative requested without dimensions");
  }

  const { dir, name, ext } = path.posix.parse(originalName);
  const dimensions = `${size.width ?? ""}x${size.height ?? ""}`;
  const base = `${name}_${dimensions}${ext}`;

  return dir ? path.posix.join(dir, base) : base;
}

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Whether `candidate` (a basename in the derivative directory) is a rendition
 * of `originalName`, i.e. has the shape `deriveDerivativeName` produces.
 */
export function isDerivativeOf(originalName: string, candidate: string): boolean {
  const original = path.posix.parse(originalName);
  const pattern = new RegExp(
    `^${escapeRegExp(original.name)}_(\\d*)x(\\d*)${escapeRegExp(original.ext)}$`
  );
  const match = pattern.exec(candidate);

  return match !== null && (match[1] !== "" || match[2] !== "");
}
