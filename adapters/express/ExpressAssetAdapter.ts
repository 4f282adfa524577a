import type { Request, RequestHandler, Response } from "express";
import multer from "multer";
import path from "path";
import { z } from "zod";

import { AssetHttpAdapter } from "../AssetHttpAdapter.js";
import { AssetStore } from "../../core/assets/assetStore.js";
import { DerivativeCache } from "../../core/assets/derivativeCache.js";
import { IngestionPipeline } from "../../core/assets/ingestionPipeline.js";
import { parseRequestedSize } from "../../core/assets/keyCodec.js";
import { UploadSource } from "../../core/assets/types.js";
import { SnapstashLogger, emit } from "../../core/logging/createLogger.js";
import {
  InvalidSizeError,
  ValidationError
} from "../../core/middleware/publicErrorHandler.js";

// served as stored: never resized
const UNRESIZABLE_EXTENSIONS = [".mp4", ".svg"];

// other form fields (the form's submit button) are dropped
const uploadBodySchema = z.object({
  url: z.string().trim().min(1).optional()
});

export interface ExpressAssetAdapterOptions {
  ingestion: IngestionPipeline;
  store: AssetStore;
  cache: DerivativeCache;
  validSizes: readonly number[];
  maxSizeBytes: number;
  logger?: SnapstashLogger;
}

export class ExpressAssetAdapter implements AssetHttpAdapter {
  private uploadMiddleware: RequestHandler;

  constructor(private options: ExpressAssetAdapterOptions) {
    this.uploadMiddleware = multer({
      storage: multer.memoryStorage(),
      limits: {
        fileSize: options.maxSizeBytes,
        files: 1,
        fields: 1,
        fieldSize: 4096,
      },
    }).single("file");
  }

  private async runMulter(req: Request, res: Response): Promise<void> {
    return new Promise((resolve, reject) => {
      this.uploadMiddleware(req, res, (err?: unknown) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  // catch-all routes capture the asset name as the first regex group
  private assetName(req: Request): string {
    return req.params[0] ?? "";
  }

  private queryValue(value: unknown): string | undefined {
    if (value === undefined || typeof value === "string") {
      return value;
    }
    throw new InvalidSizeError(this.options.validSizes);
  }

  private sendFile(res: Response, filePath: string): Promise<void> {
    return new Promise((resolve, reject) => {
      res.sendFile(filePath, { dotfiles: "allow" }, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  // --------------------
  // UPLOAD
  // --------------------
  private uploadSource(req: Request): UploadSource {
    const body = uploadBodySchema.safeParse(req.body ?? {});
    if (!body.success) {
      throw new ValidationError("Invalid url field", "INVALID_BODY");
    }

    const { file } = req;
    const { url } = body.data;

    if (file && url) {
      throw new ValidationError("Provide either a file or a url, not both", "AMBIGUOUS_UPLOAD");
    }
    if (file && file.originalname) {
      return { type: "buffer", buffer: file.buffer, declaredName: file.originalname };
    }
    if (url) {
      return { type: "url", url };
    }
    throw new ValidationError("File is missing!", "FILE_MISSING");
  }

  async upload(req: Request, res: Response): Promise<void> {
    await this.runMulter(req, res);

    const asset = await this.options.ingestion.ingest(this.uploadSource(req));

    res.json({ filename: asset.filename });
  }

  // --------------------
  // GET FILE
  // --------------------
  async getFile(req: Request, res: Response): Promise<void> {
    const name = this.assetName(req);
    const originalPath = await this.options.store.resolve(name);

    const extension = path.extname(name).toLowerCase();
    if (UNRESIZABLE_EXTENSIONS.includes(extension)) {
      await this.sendFile(res, originalPath);
      return;
    }

    const size = parseRequestedSize(
      this.queryValue(req.query.w),
      this.queryValue(req.query.h),
      this.options.validSizes
    );

    if (!size) {
      await this.sendFile(res, originalPath);
      return;
    }

    const derivativePath = await this.options.cache.getOrCreate(name, size);
    await this.sendFile(res, derivativePath);
  }

  // --------------------
  // DELETE
  // --------------------
  async delete(req: Request, res: Response): Promise<void> {
    const name = this.assetName(req);
    const removed = await this.options.store.delete(name);

    emit(this.options.logger, "info", "Successful Delete", {
      event: "DELETE_SUCCESS",
      asset: name,
      cachedFilesRemoved: removed
    });

    res.json({ status: "deleted", cachedFilesRemoved: removed });
  }
}
