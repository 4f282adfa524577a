import fs from "fs/promises";

import { AssetStore } from "./assetStore.js";
import { AssetId, Detection, OriginalAsset, UploadSource } from "./types.js";
import { Classifier } from "../moderation/classifier.js";
import { ImageProcessor, outputFormatFor } from "../media/imageProcessor.js";
import { RemoteFetcher } from "../media/remoteFetcher.js";
import { SnapstashLogger, emit } from "../logging/createLogger.js";
import {
  PolicyRejection,
  PublicError,
  ValidationError
} from "../middleware/publicErrorHandler.js";
import { filenameFromUrl, generateAssetId, normalizeFilename } from "../utils/filenames.js";

const ALLOWED_VIDEO_EXTENSIONS = ["mp4"];

export interface IngestionSettings {
  outputType: string | null;
  allowVideo: boolean;
  maxVideoDurationSeconds: number;
  maxTmpFileAgeMs: number;
}

export interface IngestionDependencies {
  store: AssetStore;
  classifier: Classifier;
  processor: ImageProcessor;
  fetcher: RemoteFetcher;
  settings: IngestionSettings;
  logger?: SnapstashLogger;
  generateId?: () => AssetId;
}

/**
 * Accepts an upload, validates it, stores it under a fresh id, or rejects
 * it with a reason. The staged copy is removed on every path out.
 */
export class IngestionPipeline {
  private generateId: () => AssetId;

  constructor(private deps: IngestionDependencies) {
    this.generateId = deps.generateId ?? generateAssetId;
  }

  private log(
    level: "error" | "warn" | "info" | "debug",
    msg: string,
    fields?: Record<string, unknown>
  ) {
    emit(this.deps.logger, level, msg, fields);
  }

  // ===== STAGING =====
  private async stage(source: UploadSource, stagedPath: string): Promise<string | undefined> {
    if (source.type === "buffer") {
      if (source.buffer.length === 0) {
        throw new ValidationError("File is missing!", "FILE_MISSING");
      }
      await fs.writeFile(stagedPath, source.buffer);
      return source.declaredName;
    }

    const remote = await this.deps.fetcher.download(source.url);
    await fs.writeFile(stagedPath, remote);
    return filenameFromUrl(source.url) ?? undefined;
  }

  private async sweepStaging() {
    try {
      const removed = await this.deps.store.sweepStaging(this.deps.settings.maxTmpFileAgeMs);
      if (removed > 0) {
        this.log("debug", "Stale staged files removed", { event: "STAGING_SWEEP", removed });
      }
    } catch (err) {
      this.log("warn", "Staging sweep failed", {
        event: "STAGING_SWEEP_FAIL",
        error: err instanceof Error ? err.message : String(err)
      });
    }
  }

  // ===== PER-KIND STORAGE =====
  private async storeImage(id: AssetId, stagedPath: string, detection: Detection): Promise<OriginalAsset> {
    const decision = await this.deps.classifier.moderateImage(stagedPath);
    if (!decision.passed) {
      throw new PolicyRejection("Nudity not allowed", "NUDITY_DETECTED");
    }

    const extension = this.deps.settings.outputType ?? detection.extension ?? "";
    if (!outputFormatFor(extension)) {
      throw new ValidationError(`Unsupported output type: ${extension || "unknown"}`, "UNSUPPORTED_OUTPUT_TYPE");
    }

    let bytes: Buffer;
    try {
      bytes = await this.deps.processor.convert(stagedPath, extension);
    } catch (err) {
      this.log("warn", "Image conversion failed", {
        event: "IMAGE_CONVERT_FAIL",
        assetId: id,
        error: err instanceof Error ? err.message : String(err)
      });
      throw new ValidationError("Invalid image", "INVALID_IMAGE");
    }

    const filename = `${id}.${extension}`;
    await this.deps.store.put(bytes, filename);
    return { id, extension, kind: "image", filename };
  }

  private async storeVideo(id: AssetId, stagedPath: string, detection: Detection): Promise<OriginalAsset> {
    const { allowVideo, maxVideoDurationSeconds } = this.deps.settings;

    if (!allowVideo) {
      throw new PolicyRejection("Video uploads are not allowed", "VIDEO_NOT_ALLOWED");
    }

    const extension = detection.extension ?? "";
    if (!ALLOWED_VIDEO_EXTENSIONS.includes(extension)) {
      throw new PolicyRejection("Video format not allowed", "VIDEO_FORMAT_NOT_ALLOWED");
    }

    // duration is checked before any frame is classified
    const probe = await this.deps.classifier.probeVideo(stagedPath);
    if (probe.durationSeconds > maxVideoDurationSeconds) {
      throw new PolicyRejection(
        `Video exceeds maximum duration of ${maxVideoDurationSeconds} seconds`,
        "VIDEO_TOO_LONG"
      );
    }

    const decision = await this.deps.classifier.moderateVideo(stagedPath, probe);
    if (!decision.passed) {
      throw new PolicyRejection("Nudity not allowed", "NUDITY_DETECTED");
    }

    const filename = `${id}.${extension}`;
    await this.deps.store.putFile(stagedPath, filename);
    return { id, extension, kind: "video", filename };
  }

  private async storeVector(id: AssetId, stagedPath: string): Promise<OriginalAsset> {
    const filename = `${id}.svg`;
    await this.deps.store.putFile(stagedPath, filename);
    return { id, extension: "svg", kind: "vector", filename };
  }

  // ===== PUBLIC METHODS =====
  async ingest(source: UploadSource): Promise<OriginalAsset> {
    await this.sweepStaging();

    const id = this.generateId();
    const stagedPath = this.deps.store.stagingPath(id);
    const startedAt = Date.now();
    let declaredName: string | undefined;

    try {
      declaredName = await this.stage(source, stagedPath);
      const detection = await this.deps.classifier.detect(stagedPath, declaredName);

      let asset: OriginalAsset;
      switch (detection.kind) {
        case "image":
          asset = await this.storeImage(id, stagedPath, detection);
          break;
        case "video":
          asset = await this.storeVideo(id, stagedPath, detection);
          break;
        case "vector":
          asset = await this.storeVector(id, stagedPath);
          break;
        default:
          throw new ValidationError("Unsupported file type", "UNSUPPORTED_FILE_TYPE");
      }

      this.log("info", "Asset Upload Succeeded", {
        event: "UPLOAD_SUCCESS",
        assetId: id,
        filename: asset.filename,
        kind: asset.kind,
        source: source.type,
        declaredName: normalizeFilename(declaredName),
        durationMs: Date.now() - startedAt
      });

      return asset;
    } catch (err) {
      const isPublic = err instanceof PublicError;

      this.log(isPublic ? "warn" : "error", isPublic ? "Asset Upload Rejected" : "Asset Upload Failed", {
        event: isPublic ? "UPLOAD_REJECTED" : "UPLOAD_FAIL",
        assetId: id,
        source: source.type,
        declaredName: normalizeFilename(declaredName),
        code: isPublic ? err.code : undefined,
        error: err instanceof Error ? err.message : String(err)
      });

      throw err;
    } finally {
      await fs.rm(stagedPath, { force: true });
    }
  }
}
