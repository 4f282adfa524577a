import fetch, { FetchError } from "node-fetch";

import { ValidationError } from "../middleware/publicErrorHandler.js";

export interface RemoteFetcherOptions {
  timeoutMs: number;
  maxBytes: number;
}

/** Downloads the body of an http(s) URL for URL uploads. */
export class RemoteFetcher {
  constructor(private readonly options: RemoteFetcherOptions) {}

  async download(url: string): Promise<Buffer> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new ValidationError("Invalid url", "INVALID_URL");
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new ValidationError("Only http and https urls are supported", "INVALID_URL");
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    try {
      const response = await fetch(parsed.toString(), {
        method: "GET",
        redirect: "follow",
        signal: controller.signal,
        // node-fetch aborts the body read once this many bytes have arrived
        size: this.options.maxBytes,
      });
      if (!response.ok) {
        throw new ValidationError(
          `Could not fetch remote file (status ${response.status})`,
          "REMOTE_FETCH_FAILED",
        );
      }

      const declaredLength = Number(response.headers.get("content-length"));
      if (Number.isFinite(declaredLength) && declaredLength > this.options.maxBytes) {
        throw new ValidationError("File too large", "FILE_TOO_LARGE", 413);
      }

      const buffer = Buffer.from(await response.arrayBuffer());
      if (buffer.length === 0) {
        throw new ValidationError("File is missing!", "FILE_MISSING");
      }

      return buffer;
    } catch (error) {
      if (error instanceof ValidationError) {
        throw error;
      }
      if (error instanceof FetchError && error.type === "max-size") {
        throw new ValidationError("File too large", "FILE_TOO_LARGE", 413);
      }
      if (error instanceof Error && error.name === "AbortError") {
        throw new ValidationError("Remote fetch timed out", "REMOTE_FETCH_FAILED");
      }
      throw new ValidationError("Could not fetch remote file", "REMOTE_FETCH_FAILED");
    } finally {
      clearTimeout(timeout);
    }
  }
}
