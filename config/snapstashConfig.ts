import os from "os";
import path from "path";

import {
  LogLevel,
  LoggerMode,
  isLogLevel,
  isLoggerMode
} from "../core/logging/createLogger.js";

export interface UploadQuotaConfig {
  enabled: boolean;
  perMinute: number;
  perHour: number;
  perDay: number;
}

export interface VideoConfig {
  allow: boolean;
  maxDurationSeconds: number;
  ffmpegPath?: string;
  ffprobePath?: string;
}

export interface NudityFilterConfig {
  /** unsafe-score threshold; null disables moderation entirely */
  threshold: number | null;
  videoIntervalSeconds: number;
  /** 0 means no cap */
  maxFrames: number;
  classifierUrl: string;
  classifierTimeoutMs: number;
}

export interface AuthConfig {
  apiKey: string | null;
  requireForUpload: boolean;
  requireForDelete: boolean;
  maxFailedAttemptsPerMinute: number;
}

export interface SnapstashConfig {
  port: number;
  imagesDir: string;
  cacheDir: string;
  tmpDir: string;
  outputType: string | null;
  maxSizeBytes: number;
  maxTmpFileAgeMs: number;
  resizeTimeoutSeconds: number;
  remoteFetchTimeoutMs: number;
  validSizes: number[];
  allowedOrigins: string[];
  hideUploadForm: boolean;
  trustProxy: boolean;
  uploadQuota: UploadQuotaConfig;
  video: VideoConfig;
  nudity: NudityFilterConfig;
  auth: AuthConfig;
  logger: {
    mode: LoggerMode;
    level: LogLevel;
    filePath: string;
  };
}

type Env = Record<string, string | undefined>;

const NULL_LITERALS = ["", "none", "null"];

const isUnset = (value: string | undefined): value is undefined =>
  value === undefined || NULL_LITERALS.includes(value.trim().toLowerCase());

const toNumber = (value: string | undefined, fallback: number): number => {
  if (isUnset(value)) {
    return fallback;
  }

  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toOptionalNumber = (value: string | undefined): number | null => {
  if (isUnset(value)) {
    return null;
  }

  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : null;
};

const toBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (isUnset(value)) {
    return fallback;
  }

  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["0", "false", "no", "off"].includes(normalized)) {
    return false;
  }

  return fallback;
};

const toOptionalString = (value: string | undefined): string | null =>
  isUnset(value) ? null : value.trim();

// accepts "100,200" as well as "[100, 200]"
const toList = (value: string | undefined, fallback: string[]): string[] => {
  if (isUnset(value)) {
    return fallback;
  }

  return value
    .trim()
    .replace(/^\[|\]$/g, "")
    .split(",")
    .map((item) => item.trim().replace(/^["']|["']$/g, ""))
    .filter((item) => item.length > 0);
};

const toSizeList = (value: string | undefined): number[] =>
  toList(value, [])
    .map((item) => Number(item))
    .filter((size) => Number.isInteger(size) && size > 0);

export function loadConfig(env: Env = process.env): SnapstashConfig {
  const loggerMode = env.LOGGER?.trim() ?? "console";
  const logLevel = env.LOG_LEVEL?.trim() ?? "info";

  return {
    port: toNumber(env.PORT, 5000),
    imagesDir: path.resolve(toOptionalString(env.IMAGES_DIR) ?? "/images"),
    cacheDir: path.resolve(toOptionalString(env.CACHE_DIR) ?? "/cache"),
    tmpDir: path.resolve(toOptionalString(env.TMP_DIR) ?? path.join(os.tmpdir(), "snapstash")),
    outputType: toOptionalString(env.OUTPUT_TYPE)?.replace(/^\./, "").toLowerCase() ?? null,
    maxSizeBytes: toNumber(env.MAX_SIZE_MB, 16) * 1024 * 1024,
    maxTmpFileAgeMs: toNumber(env.MAX_TMP_FILE_AGE, 5 * 60) * 1000,
    resizeTimeoutSeconds: toNumber(env.RESIZE_TIMEOUT, 5),
    remoteFetchTimeoutMs: toNumber(env.REMOTE_FETCH_TIMEOUT_MS, 10_000),
    validSizes: toSizeList(env.VALID_SIZES),
    allowedOrigins: toList(env.ALLOWED_ORIGINS, ["*"]),
    hideUploadForm: toBoolean(env.HIDE_UPLOAD_FORM, false),
    trustProxy: toBoolean(env.TRUST_PROXY, false),
    uploadQuota: {
      enabled: env.UPLOAD_QUOTA?.trim().toLowerCase() !== "off",
      perMinute: toNumber(env.MAX_UPLOADS_PER_MINUTE, 20),
      perHour: toNumber(env.MAX_UPLOADS_PER_HOUR, 100),
      perDay: toNumber(env.MAX_UPLOADS_PER_DAY, 1000),
    },
    video: {
      allow: toBoolean(env.ALLOW_VIDEO, false),
      maxDurationSeconds: toNumber(env.MAX_VIDEO_DURATION, 60),
      ffmpegPath: toOptionalString(env.FFMPEG_PATH) ?? undefined,
      ffprobePath: toOptionalString(env.FFPROBE_PATH) ?? undefined,
    },
    nudity: {
      threshold: toOptionalNumber(env.NUDE_FILTER_MAX_THRESHOLD),
      videoIntervalSeconds: toNumber(env.NUDE_FILTER_VIDEO_INTERVAL, 1),
      maxFrames: toNumber(env.NUDE_FILTER_MAX_FRAMES, 10),
      classifierUrl: toOptionalString(env.NUDE_CLASSIFIER_URL) ?? "http://127.0.0.1:8081",
      classifierTimeoutMs: toNumber(env.NUDE_CLASSIFIER_TIMEOUT_MS, 10_000),
    },
    auth: {
      apiKey: toOptionalString(env.API_KEY),
      requireForUpload: toBoolean(env.REQUIRE_API_KEY_FOR_UPLOAD, false),
      requireForDelete: toBoolean(env.REQUIRE_API_KEY_FOR_DELETE, true),
      maxFailedAttemptsPerMinute: toNumber(env.MAX_API_KEY_ATTEMPTS_PER_MINUTE, 5),
    },
    logger: {
      mode: isLoggerMode(loggerMode) ? loggerMode : "console",
      level: isLogLevel(logLevel) ? logLevel : "info",
      filePath: toOptionalString(env.LOG_FILE) ?? "./logs/snapstash.log",
    },
  };
}
