import { fileTypeFromFile } from "file-type";
import fs from "fs/promises";
import os from "os";
import path from "path";

import { Detection, ModerationDecision } from "../assets/types.js";
import { VideoDecoder, VideoProbe } from "../media/videoDecoder.js";
import { NudityClassifier } from "./nudityClassifier.js";
import { NudityFilterConfig } from "../../config/snapstashConfig.js";
import { SnapstashLogger, emit } from "../logging/createLogger.js";
import { declaredExtension } from "../utils/filenames.js";

export type ModerationSettings = Pick<NudityFilterConfig, "threshold" | "videoIntervalSeconds" | "maxFrames">;

export interface ClassifierDependencies {
  settings: ModerationSettings;
  decoder: VideoDecoder;
  /** called at most once, and only when moderation actually runs */
  createNudityClassifier: () => NudityClassifier;
  logger?: SnapstashLogger;
  /** parent directory for per-call frame directories */
  framesRoot?: string;
}

const SKIPPED: ModerationDecision = { passed: true, maxUnsafeScore: null, framesChecked: 0 };

/**
 * Seconds between sampled frames: the base interval, widened to
 * `duration / maxFrames` when that spreads the capped samples further.
 */
export function samplingInterval(durationSeconds: number, baseInterval: number, maxFrames: number): number {
  if (maxFrames > 0 && durationSeconds > 0) {
    return Math.max(baseInterval, durationSeconds / maxFrames);
  }
  return baseInterval;
}

/** Frame index stride for an interval at `fps`; never below 1. */
export function frameStep(fps: number, intervalSeconds: number): number {
  return Math.max(1, Math.round(fps * intervalSeconds));
}

export class Classifier {
  private nudityClassifier?: NudityClassifier;

  constructor(private deps: ClassifierDependencies) { }

  /**
   * Vector markup is recognised by its declared `.svg` name; raster images
   * and video by content.
   */
  async detect(filePath: string, declaredName?: string): Promise<Detection> {
    if (declaredExtension(declaredName) === "svg") {
      return { kind: "vector", extension: "svg", mimeType: "image/svg+xml" };
    }

    const sniffed = await fileTypeFromFile(filePath);
    if (!sniffed) {
      return { kind: "unknown" };
    }

    if (sniffed.mime.startsWith("image/")) {
      return { kind: "image", extension: sniffed.ext, mimeType: sniffed.mime };
    }
    if (sniffed.mime.startsWith("video/")) {
      return { kind: "video", extension: sniffed.ext, mimeType: sniffed.mime };
    }
    return { kind: "unknown", extension: sniffed.ext, mimeType: sniffed.mime };
  }

  private classifier(): NudityClassifier {
    if (!this.nudityClassifier) {
      this.nudityClassifier = this.deps.createNudityClassifier();
    }
    return this.nudityClassifier;
  }

  private decide(scores: number[], threshold: number): ModerationDecision {
    const maxUnsafeScore = scores.length > 0 ? Math.max(...scores) : null;
    return {
      passed: maxUnsafeScore === null || maxUnsafeScore < threshold,
      maxUnsafeScore,
      framesChecked: scores.length
    };
  }

  async moderateImage(filePath: string): Promise<ModerationDecision> {
    const { threshold } = this.deps.settings;
    if (threshold === null) {
      return SKIPPED;
    }

    const results = await this.classifier().classify([filePath]);
    return this.decide([results[filePath]?.unsafe ?? 0], threshold);
  }

  /**
   * Duration and frame rate of a video. Undecodable input reports zero for
   * both, which lets the duration check and video moderation pass.
   */
  async probeVideo(filePath: string): Promise<VideoProbe> {
    try {
      const probe = await this.deps.decoder.probe(filePath);
      if (!(probe.fps > 0)) {
        return { durationSeconds: 0, fps: 0 };
      }
      return probe;
    } catch (err) {
      emit(this.deps.logger, "warn", "Video probe failed", {
        event: "VIDEO_PROBE_FAILED",
        error: err instanceof Error ? err.message : String(err)
      });
      return { durationSeconds: 0, fps: 0 };
    }
  }

  /**
   * Samples frames across the clip and classifies them in one batch. Unsafe
   * when any frame reaches the threshold. The frame directory is removed
   * before returning, including when decoding or classification throws.
   */
  async moderateVideo(filePath: string, knownProbe?: VideoProbe): Promise<ModerationDecision> {
    const { threshold, videoIntervalSeconds, maxFrames } = this.deps.settings;
    if (threshold === null) {
      return SKIPPED;
    }

    const probe = knownProbe ?? await this.probeVideo(filePath);
    if (probe.fps <= 0) {
      return SKIPPED;
    }

    const interval = samplingInterval(probe.durationSeconds, videoIntervalSeconds, maxFrames);
    const framesRoot = this.deps.framesRoot ?? os.tmpdir();
    await fs.mkdir(framesRoot, { recursive: true });
    const outputDir = await fs.mkdtemp(path.join(framesRoot, "frames-"));

    try {
      const framePaths = await this.deps.decoder.extractFrames(filePath, {
        frameStep: frameStep(probe.fps, interval),
        maxFrames: Math.max(0, maxFrames),
        outputDir
      });
      const sampled = maxFrames > 0 ? framePaths.slice(0, maxFrames) : framePaths;

      if (sampled.length === 0) {
        return SKIPPED;
      }

      const results = await this.classifier().classify(sampled);
      const decision = this.decide(
        sampled.map((framePath) => results[framePath]?.unsafe ?? 0),
        threshold
      );

      emit(this.deps.logger, "debug", "Video moderated", {
        event: "VIDEO_MODERATED",
        frames: decision.framesChecked,
        maxUnsafeScore: decision.maxUnsafeScore,
        passed: decision.passed
      });

      return decision;
    } finally {
      await fs.rm(outputDir, { recursive: true, force: true });
    }
  }
}
