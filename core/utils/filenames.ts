import crypto from "crypto";

const ID_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";
const ID_LENGTH = 12;
const DEFAULT_MAX_LENGTH = 128;
const SAFE_FILENAME_REGEX = /[^a-zA-Z0-9._-]/g;
const CONTROL_CHARS_REGEX = /[\x00-\x1F\x7F]/g;

/** Random lowercase alphanumeric id used as the basename of stored assets. */
export function generateAssetId(length: number = ID_LENGTH): string {
  let id = "";
  while (id.length < length) {
    // rejection sampling keeps the distribution uniform over 36 symbols
    for (const byte of crypto.randomBytes(length)) {
      if (byte < 252 && id.length < length) {
        id += ID_ALPHABET[byte % ID_ALPHABET.length];
      }
    }
  }
  return id;
}

/**
 * Reduces a client-declared filename to its last path segment with a safe
 * character set. Only used to read the declared extension and for logs;
 * stored assets are always named by generated id.
 */
export function normalizeFilename(
  input: string | undefined | null,
  maxLength: number = DEFAULT_MAX_LENGTH
): string | null {
  if (!input) return null;

  let name = input.normalize("NFKC").replace(CONTROL_CHARS_REGEX, "");

  // last segment only
  name = name.split(/[\\/]/).pop() ?? "";

  name = name
    .replace(SAFE_FILENAME_REGEX, "_")
    .replace(/_+/g, "_")
    .replace(/^[_.]+/, "");

  if (name.length > maxLength) {
    name = name.slice(name.length - maxLength);
  }

  return name || null;
}

/** Lowercased extension of a declared filename, without the dot. */
export function declaredExtension(input: string | undefined | null): string | null {
  const name = normalizeFilename(input);
  if (!name) return null;

  const dot = name.lastIndexOf(".");
  if (dot <= 0 || dot === name.length - 1) return null;

  return name.slice(dot + 1).toLowerCase();
}

/** Last path segment of a URL, for URL uploads. */
export function filenameFromUrl(url: string): string | null {
  try {
    const segments = new URL(url).pathname.split("/").filter(Boolean);
    const last = segments.at(-1);
    return last ? decodeURIComponent(last) : null;
  } catch {
    return null;
  }
}
