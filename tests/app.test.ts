import type { Express } from "express";
import fs from "fs/promises";
import nock from "nock";
import path from "path";
import sharp from "sharp";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ServiceOverrides, SnapstashServices, createApp, createServices } from "../server/createApp.js";
import {
  FakeVideoDecoder,
  MP4_BYTES,
  SVG_MARKUP,
  TestDirs,
  makeTestDirs,
  pathExists,
  pngImage,
  removeTestDirs,
  scoresFor,
  testConfig
} from "./helpers.js";

const TOKEN = "test-secret";

describe("HTTP surface", () => {
  let dirs: TestDirs;
  let now: number;

  beforeEach(async () => {
    dirs = await makeTestDirs();
    now = 1_000_000;
  });

  afterEach(async () => {
    nock.cleanAll();
    await removeTestDirs(dirs);
  });

  async function buildApp(
    env: Record<string, string> = {},
    overrides: ServiceOverrides = {}
  ): Promise<{ app: Express; services: SnapstashServices }> {
    let counter = 0;
    const config = testConfig(dirs, {
      VALID_SIZES: "10,20",
      API_KEY: TOKEN,
      MAX_API_KEY_ATTEMPTS_PER_MINUTE: "3",
      ...env
    });
    const services = createServices(config, {
      decoder: new FakeVideoDecoder({ durationSeconds: 2, fps: 10 }),
      createNudityClassifier: () => ({ classify: async (paths: string[]) => scoresFor(paths, 0.1) }),
      generateId: () => `asset${String(++counter).padStart(7, "0")}`,
      now: () => now,
      ...overrides
    });
    await services.store.init();
    return { app: createApp(services), services };
  }

  async function uploadPng(app: Express): Promise<string> {
    const res = await request(app).post("/").attach("file", await pngImage(40, 20), "cat.png");
    expect(res.status).toBe(200);
    return res.body.filename;
  }

  describe("GET /liveness", () => {
    it("answers 200 with an empty body", async () => {
      const { app } = await buildApp();
      const res = await request(app).get("/liveness");

      expect(res.status).toBe(200);
      expect(res.text).toBe("");
    });
  });

  describe("GET /", () => {
    it("serves the upload form", async () => {
      const { app } = await buildApp();
      const res = await request(app).get("/");

      expect(res.status).toBe(200);
      expect(res.text).toContain('<input type="file" name="file" id="file">');
    });

    it("serves an empty page when the form is hidden", async () => {
      const { app } = await buildApp({ HIDE_UPLOAD_FORM: "true" });
      const res = await request(app).get("/");

      expect(res.status).toBe(200);
      expect(res.text).toBe("");
    });
  });

  describe("POST /", () => {
    it("stores a multipart image and returns its name", async () => {
      const { app } = await buildApp();

      const res = await request(app).post("/").attach("file", await pngImage(), "cat.png");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ filename: "asset0000001.png" });
      expect(await pathExists(path.join(dirs.imagesDir, "asset0000001.png"))).toBe(true);
    });

    it("stores svg markup", async () => {
      const { app } = await buildApp();

      const res = await request(app).post("/").attach("file", SVG_MARKUP, "logo.svg");

      expect(res.body).toEqual({ filename: "asset0000001.svg" });
    });

    it("stores an mp4 when video is allowed", async () => {
      const { app } = await buildApp({ ALLOW_VIDEO: "true" });

      const res = await request(app).post("/").attach("file", MP4_BYTES, "clip.mp4");

      expect(res.body).toEqual({ filename: "asset0000001.mp4" });
    });

    it("fetches a url given as JSON", async () => {
      nock("http://assets.test").get("/cat.png").reply(200, await pngImage());
      const { app } = await buildApp();

      const res = await request(app).post("/").send({ url: "http://assets.test/cat.png" });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ filename: "asset0000001.png" });
    });

    it("rejects a request with neither file nor url", async () => {
      const { app } = await buildApp();

      const res = await request(app).post("/");

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "File is missing!", code: "FILE_MISSING" });
    });

    it("rejects both a file and a url", async () => {
      const { app } = await buildApp();

      const res = await request(app)
        .post("/")
        .field("url", "http://assets.test/cat.png")
        .attach("file", await pngImage(), "cat.png");

      expect(res.status).toBe(400);
      expect(res.body.code).toBe("AMBIGUOUS_UPLOAD");
    });

    it("accepts an upload from its own form, submit field included", async () => {
      const { app } = await buildApp();

      const res = await request(app)
        .post("/")
        .attach("file", await pngImage(), "cat.png")
        .field("submit", "Upload");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ filename: "asset0000001.png" });
    });

    it("ignores unknown JSON fields next to the url", async () => {
      nock("http://assets.test").get("/cat.png").reply(200, await pngImage());
      const { app } = await buildApp();

      const res = await request(app).post("/").send({ url: "http://assets.test/cat.png", owner: "x" });

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ filename: "asset0000001.png" });
    });

    it("rejects a url that is not a string", async () => {
      const { app } = await buildApp();

      const res = await request(app).post("/").send({ url: 42 });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "Invalid url field", code: "INVALID_BODY" });
    });

    it("rejects unsupported content", async () => {
      const { app } = await buildApp();

      const res = await request(app).post("/").attach("file", Buffer.from("plain text"), "notes.txt");

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "Unsupported file type", code: "UNSUPPORTED_FILE_TYPE" });
    });

    it("rejects a file over the size limit", async () => {
      const { app } = await buildApp({ MAX_SIZE_MB: "0.001" });

      const res = await request(app).post("/").attach("file", Buffer.alloc(4096, 1), "big.png");

      expect(res.status).toBe(413);
      expect(res.body).toEqual({ error: "File too large", code: "FILE_TOO_LARGE" });
    });

    it("requires the key for uploads when configured", async () => {
      const { app } = await buildApp({ REQUIRE_API_KEY_FOR_UPLOAD: "true" });

      const denied = await request(app).post("/").attach("file", await pngImage(), "cat.png");
      expect(denied.status).toBe(403);
      expect(denied.body).toEqual({ error: "Authorization required", code: "AUTH_REQUIRED" });

      const admitted = await request(app)
        .post("/")
        .set("Authorization", `Bearer ${TOKEN}`)
        .attach("file", await pngImage(), "cat.png");
      expect(admitted.status).toBe(200);
    });

    it("enforces the per-minute quota before anything else", async () => {
      const { app } = await buildApp({ MAX_UPLOADS_PER_MINUTE: "2" });

      expect((await request(app).post("/")).status).toBe(400);
      expect((await request(app).post("/")).status).toBe(400);

      const limited = await request(app).post("/");
      expect(limited.status).toBe(429);
      expect(limited.body).toEqual({ error: "Rate limit exceeded", code: "RATE_LIMIT_EXCEEDED" });

      now += 60_000;
      expect((await request(app).post("/")).status).toBe(400);
    });
  });

  describe("GET /{name}", () => {
    it("serves the original bytes", async () => {
      const { app } = await buildApp();
      const name = await uploadPng(app);

      const res = await request(app).get(`/${name}`);

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toBe("image/png");
      expect(res.body).toEqual(await fs.readFile(path.join(dirs.imagesDir, name)));
    });

    it("generates and caches a resized rendition", async () => {
      const { app } = await buildApp();
      const name = await uploadPng(app);

      const res = await request(app).get(`/${name}?w=10`);

      expect(res.status).toBe(200);
      const meta = await sharp(res.body).metadata();
      expect([meta.width, meta.height]).toEqual([10, 5]);
      expect(await fs.readdir(dirs.cacheDir)).toEqual(["asset0000001_10x.png"]);
    });

    it("crops to both requested sides", async () => {
      const { app } = await buildApp();
      const name = await uploadPng(app);

      const res = await request(app).get(`/${name}?w=20&h=20`);

      const meta = await sharp(res.body).metadata();
      expect([meta.width, meta.height]).toEqual([20, 20]);
    });

    it("rejects a size outside the allow-list without generating anything", async () => {
      const { app } = await buildApp();
      const name = await uploadPng(app);

      const res = await request(app).get(`/${name}?w=15`);

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "size value must be one of 10, 20", code: "INVALID_SIZE" });
      expect(await fs.readdir(dirs.cacheDir)).toEqual([]);
    });

    it("rejects a repeated size parameter", async () => {
      const { app } = await buildApp();
      const name = await uploadPng(app);

      const res = await request(app).get(`/${name}?w=10&w=20`);

      expect(res.status).toBe(400);
      expect(res.body.code).toBe("INVALID_SIZE");
    });

    it("serves svg unresized", async () => {
      const { app } = await buildApp();
      const upload = await request(app).post("/").attach("file", SVG_MARKUP, "logo.svg");

      const res = await request(app).get(`/${upload.body.filename}?w=10`);

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toContain("image/svg+xml");
      expect(await fs.readdir(dirs.cacheDir)).toEqual([]);
    });

    it("serves video unresized", async () => {
      const { app } = await buildApp({ ALLOW_VIDEO: "true" });
      const upload = await request(app).post("/").attach("file", MP4_BYTES, "clip.mp4");

      const res = await request(app).get(`/${upload.body.filename}?w=10`);

      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toBe("video/mp4");
      expect(await fs.readdir(dirs.cacheDir)).toEqual([]);
    });

    it("answers 404 for an unknown name", async () => {
      const { app } = await buildApp();

      const res = await request(app).get("/nothing.png");

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "File not found", code: "NOT_FOUND" });
    });

    it("refuses an encoded traversal", async () => {
      const { app } = await buildApp();

      const res = await request(app).get("/..%2F..%2Fetc%2Fpasswd");

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "Invalid filename", code: "INVALID_FILENAME" });
    });

    it("hides internal failures behind a generic body", async () => {
      const resize = vi.fn(async () => {
        throw new Error("/srv/private/path exploded");
      });
      const { app, services } = await buildApp({}, {
        processor: { convert: async () => Buffer.from(""), resize }
      });
      await services.store.put(await pngImage(), "direct.png");

      const res = await request(app).get("/direct.png?w=10");

      expect(res.status).toBe(500);
      expect(res.body).toEqual({ error: "internal server error", code: "INTERNAL_ERROR" });
    });
  });

  describe("DELETE /{name}", () => {
    it("removes the original and its cached renditions", async () => {
      const { app } = await buildApp();
      const name = await uploadPng(app);
      await request(app).get(`/${name}?w=10`);
      await request(app).get(`/${name}?w=20`);
      await request(app).get(`/${name}?w=10`);

      const res = await request(app).delete(`/${name}`).set("Authorization", `Bearer ${TOKEN}`);

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: "deleted", cachedFilesRemoved: 2 });
      expect(await fs.readdir(dirs.cacheDir)).toEqual([]);
      expect((await request(app).get(`/${name}`)).status).toBe(404);
    });

    it("requires a bearer token", async () => {
      const { app } = await buildApp();
      const name = await uploadPng(app);

      const res = await request(app).delete(`/${name}`);

      expect(res.status).toBe(403);
      expect(res.body).toEqual({ error: "Authorization required", code: "AUTH_REQUIRED" });
      expect(await pathExists(path.join(dirs.imagesDir, name))).toBe(true);
    });

    it("locks out a client after repeated wrong tokens until the window passes", async () => {
      const { app } = await buildApp();
      const name = await uploadPng(app);

      for (let i = 0; i < 3; i++) {
        const res = await request(app).delete(`/${name}`).set("Authorization", "Bearer wrong");
        expect(res.status).toBe(403);
        expect(res.body).toEqual({ error: "Invalid API key", code: "INVALID_API_KEY" });
      }

      const limited = await request(app).delete(`/${name}`).set("Authorization", "Bearer wrong");
      expect(limited.status).toBe(429);
      expect(limited.body).toEqual({ error: "Too many failed attempts", code: "TOO_MANY_FAILED_ATTEMPTS" });

      now += 60_000;
      const res = await request(app).delete(`/${name}`).set("Authorization", `Bearer ${TOKEN}`);
      expect(res.status).toBe(200);
    });

    it("is disabled without a configured key", async () => {
      const { app } = await buildApp({ API_KEY: "" });
      const name = await uploadPng(app);

      const res = await request(app).delete(`/${name}`).set("Authorization", `Bearer ${TOKEN}`);

      expect(res.status).toBe(403);
      expect(res.body).toEqual({ error: "Delete endpoint is disabled", code: "ENDPOINT_DISABLED" });
    });

    it("answers 404 for an unknown name", async () => {
      const { app } = await buildApp();

      const res = await request(app).delete("/nothing.png").set("Authorization", `Bearer ${TOKEN}`);

      expect(res.status).toBe(404);
    });

    it("refuses traversal and leaves outside files alone", async () => {
      const { app } = await buildApp();
      const outside = path.join(dirs.root, "keep.txt");
      await fs.writeFile(outside, "keep");

      const res = await request(app).delete("/..%2Fkeep.txt").set("Authorization", `Bearer ${TOKEN}`);

      expect(res.status).toBe(400);
      expect(res.body.code).toBe("INVALID_FILENAME");
      expect(await pathExists(outside)).toBe(true);
    });
  });

  describe("CORS", () => {
    it("allows any origin by default and answers preflight", async () => {
      const { app } = await buildApp();

      const res = await request(app).options("/").set("Origin", "https://site.test");

      expect(res.status).toBe(204);
      expect(res.headers["access-control-allow-origin"]).toBe("*");
    });

    it("echoes only listed origins", async () => {
      const { app } = await buildApp({ ALLOWED_ORIGINS: "https://site.test" });

      const allowed = await request(app).get("/liveness").set("Origin", "https://site.test");
      const other = await request(app).get("/liveness").set("Origin", "https://other.test");

      expect(allowed.headers["access-control-allow-origin"]).toBe("https://site.test");
      expect(other.headers["access-control-allow-origin"]).toBeUndefined();
    });
  });
});
