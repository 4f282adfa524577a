import express, { Express } from "express";

import { SnapstashConfig } from "../config/snapstashConfig.js";
import { AssetStore } from "../core/assets/assetStore.js";
import { DerivativeCache } from "../core/assets/derivativeCache.js";
import { IngestionPipeline } from "../core/assets/ingestionPipeline.js";
import { AssetId } from "../core/assets/types.js";
import { SnapstashLogger } from "../core/logging/createLogger.js";
import { ImageProcessor, SharpImageProcessor } from "../core/media/imageProcessor.js";
import { RemoteFetcher } from "../core/media/remoteFetcher.js";
import { FfmpegVideoDecoder, VideoDecoder } from "../core/media/videoDecoder.js";
import { createErrorHandler } from "../core/middleware/publicErrorHandler.js";
import { createUploadQuota } from "../core/middleware/rateLimitMiddleware.js";
import { Classifier } from "../core/moderation/classifier.js";
import { HttpNudityClassifier, NudityClassifier } from "../core/moderation/nudityClassifier.js";
import { Clock } from "../core/rateLimiter/rateLimiter.js";
import { AccessGuard } from "../core/security/accessGuard.js";
import { ExpressAssetAdapter } from "../adapters/express/ExpressAssetAdapter.js";
import { createAssetRouter } from "../adapters/express/assetsRouter.js";

export interface SnapstashServices {
  config: SnapstashConfig;
  store: AssetStore;
  classifier: Classifier;
  ingestion: IngestionPipeline;
  cache: DerivativeCache;
  guard: AccessGuard;
  logger?: SnapstashLogger;
  now: Clock;
}

/** Replacements for the native capabilities, mainly for tests. */
export interface ServiceOverrides {
  processor?: ImageProcessor;
  decoder?: VideoDecoder;
  createNudityClassifier?: () => NudityClassifier;
  logger?: SnapstashLogger;
  now?: Clock;
  generateId?: () => AssetId;
}

export function createServices(
  config: SnapstashConfig,
  overrides: ServiceOverrides = {}
): SnapstashServices {
  const { logger } = overrides;
  const now = overrides.now ?? Date.now;

  const store = new AssetStore({
    imagesDir: config.imagesDir,
    cacheDir: config.cacheDir,
    tmpDir: config.tmpDir
  });

  const processor = overrides.processor ?? new SharpImageProcessor({
    timeoutSeconds: config.resizeTimeoutSeconds
  });

  const classifier = new Classifier({
    settings: config.nudity,
    decoder: overrides.decoder ?? new FfmpegVideoDecoder(config.video),
    createNudityClassifier: overrides.createNudityClassifier ?? (() => new HttpNudityClassifier({
      baseUrl: config.nudity.classifierUrl,
      timeoutMs: config.nudity.classifierTimeoutMs
    })),
    logger,
    framesRoot: config.tmpDir
  });

  const ingestion = new IngestionPipeline({
    store,
    classifier,
    processor,
    fetcher: new RemoteFetcher({
      timeoutMs: config.remoteFetchTimeoutMs,
      maxBytes: config.maxSizeBytes
    }),
    settings: {
      outputType: config.outputType,
      allowVideo: config.video.allow,
      maxVideoDurationSeconds: config.video.maxDurationSeconds,
      maxTmpFileAgeMs: config.maxTmpFileAgeMs
    },
    logger,
    generateId: overrides.generateId
  });

  return {
    config,
    store,
    classifier,
    ingestion,
    cache: new DerivativeCache(store, processor, logger),
    guard: new AccessGuard(config.auth, logger, now),
    logger,
    now
  };
}

export function createApp(services: SnapstashServices): Express {
  const { config, logger } = services;

  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", config.trustProxy);

  app.use(express.json({ limit: "64kb" }));

  const adapter = new ExpressAssetAdapter({
    ingestion: services.ingestion,
    store: services.store,
    cache: services.cache,
    validSizes: config.validSizes,
    maxSizeBytes: config.maxSizeBytes,
    logger
  });

  app.use(
    createAssetRouter({
      adapter,
      guard: services.guard,
      uploadQuota: createUploadQuota({ quota: config.uploadQuota, now: services.now }),
      allowedOrigins: config.allowedOrigins,
      hideUploadForm: config.hideUploadForm
    })
  );

  app.use(createErrorHandler(logger));

  return app;
}
