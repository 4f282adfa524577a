import fs from "fs/promises";
import fetch from "node-fetch";
import { z } from "zod";

export interface NudityScores {
  safe: number;
  unsafe: number;
}

/** Batch classifier: one call scores every given image file, keyed by path. */
export interface NudityClassifier {
  classify(imagePaths: string[]): Promise<Record<string, NudityScores>>;
}

export interface HttpNudityClassifierSettings {
  baseUrl: string;
  timeoutMs: number;
}

const batchResponseSchema = z.object({
  results: z.array(
    z.object({
      id: z.string(),
      safe: z.number().min(0).max(1),
      unsafe: z.number().min(0).max(1),
    }),
  ),
});

/**
 * Client of a classifier service exposing `POST /classify`, which takes
 * `{ images: [{ id, content }] }` (content base64) and answers
 * `{ results: [{ id, safe, unsafe }] }`.
 */
export class HttpNudityClassifier implements NudityClassifier {
  constructor(private readonly settings: HttpNudityClassifierSettings) {}

  async classify(imagePaths: string[]): Promise<Record<string, NudityScores>> {
    if (imagePaths.length === 0) {
      return {};
    }

    const images = await Promise.all(
      imagePaths.map(async (imagePath, index) => ({
        id: String(index),
        content: (await fs.readFile(imagePath)).toString("base64"),
      })),
    );

    const json = await this.post("classify", { images });
    const parsed = batchResponseSchema.parse(json);

    const scores: Record<string, NudityScores> = {};
    for (const result of parsed.results) {
      const imagePath = imagePaths[Number(result.id)];
      if (imagePath !== undefined) {
        scores[imagePath] = { safe: result.safe, unsafe: result.unsafe };
      }
    }
    return scores;
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    const base = this.settings.baseUrl.endsWith("/")
      ? this.settings.baseUrl
      : `${this.settings.baseUrl}/`;
    const url = new URL(path, base).toString();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.settings.timeoutMs);
    try {
      const response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      if (!response.ok) {
        const text = await response.text();
        throw new Error(`Classifier error: ${response.status} ${text}`);
      }
      return await response.json();
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new Error("Classifier request timed out");
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }
}
