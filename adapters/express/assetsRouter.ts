import express, { Request, RequestHandler, Response, Router } from "express";

import { AssetHttpAdapter } from "../AssetHttpAdapter.js";
import { AccessGuard } from "../../core/security/accessGuard.js";
import { requireApiKey } from "../../core/middleware/authMiddleware.js";

// the asset name may contain slashes; it is validated by the store
const ASSET_PATH = /^\/(.+)$/;

const UPLOAD_FORM = `
<form action="/" method="post" enctype="multipart/form-data">
    <input type="file" name="file" id="file">
    <input type="submit" value="Upload" name="submit">
</form>
`;

// --- Forward async failures to the error handler ---
function asyncHandler(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export interface AssetRouterOptions {
  adapter: AssetHttpAdapter;
  guard: AccessGuard;
  uploadQuota: RequestHandler;
  allowedOrigins: readonly string[];
  hideUploadForm: boolean;
}

export function createAssetRouter(options: AssetRouterOptions): Router {
  const router = express.Router();
  const { adapter, guard, uploadQuota, allowedOrigins } = options;

  // --- CORS ---
  router.use((req, res, next) => {
    const origin = req.header("origin");
    if (allowedOrigins.includes("*")) {
      res.setHeader("Access-Control-Allow-Origin", "*");
    } else if (origin && allowedOrigins.includes(origin)) {
      res.setHeader("Access-Control-Allow-Origin", origin);
      res.setHeader("Vary", "Origin");
    }
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    if (req.method === "OPTIONS") {
      res.sendStatus(204);
      return;
    }
    next();
  });

  // --- Liveness ---
  router.get("/liveness", (_req, res) => {
    res.status(200).send("");
  });

  // --- Upload form ---
  router.get("/", (_req, res) => {
    res.type("html").send(options.hideUploadForm ? "" : UPLOAD_FORM);
  });

  // --- Upload: quota first, then the optional token check ---
  router.post(
    "/",
    uploadQuota,
    requireApiKey(guard, "upload"),
    asyncHandler((req, res) => adapter.upload(req, res))
  );

  // --- Original or resized file ---
  router.get(ASSET_PATH, asyncHandler((req, res) => adapter.getFile(req, res)));

  // --- Delete original and its derivatives ---
  router.delete(
    ASSET_PATH,
    requireApiKey(guard, "delete"),
    asyncHandler((req, res) => adapter.delete(req, res))
  );

  return router;
}
