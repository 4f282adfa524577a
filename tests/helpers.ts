import fs from "fs/promises";
import os from "os";
import path from "path";
import sharp from "sharp";

import { SnapstashConfig, loadConfig } from "../config/snapstashConfig.js";
import { FrameExtractionOptions, VideoDecoder, VideoProbe } from "../core/media/videoDecoder.js";
import { NudityScores } from "../core/moderation/nudityClassifier.js";

export interface TestDirs {
  root: string;
  imagesDir: string;
  cacheDir: string;
  tmpDir: string;
}

export async function makeTestDirs(): Promise<TestDirs> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "snapstash-test-"));
  const dirs = {
    root,
    imagesDir: path.join(root, "images"),
    cacheDir: path.join(root, "cache"),
    tmpDir: path.join(root, "tmp")
  };
  await Promise.all([
    fs.mkdir(dirs.imagesDir),
    fs.mkdir(dirs.cacheDir),
    fs.mkdir(dirs.tmpDir)
  ]);
  return dirs;
}

export async function removeTestDirs(dirs: TestDirs): Promise<void> {
  await fs.rm(dirs.root, { recursive: true, force: true });
}

export function testConfig(dirs: TestDirs, env: Record<string, string> = {}): SnapstashConfig {
  return loadConfig({
    IMAGES_DIR: dirs.imagesDir,
    CACHE_DIR: dirs.cacheDir,
    TMP_DIR: dirs.tmpDir,
    LOGGER: "none",
    ...env
  });
}

export function pngImage(width = 40, height = 20): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 40, b: 90 } }
  })
    .png()
    .toBuffer();
}

export const SVG_MARKUP = Buffer.from(
  '<svg xmlns="http://www.w3.org/2000/svg" width="1" height="1"></svg>'
);

function isoContainer(brand: string): Buffer {
  return Buffer.concat([
    Buffer.from([0x00, 0x00, 0x00, 0x18]),
    Buffer.from(`ftyp${brand}`, "latin1"),
    Buffer.from([0x00, 0x00, 0x02, 0x00]),
    Buffer.from(`${brand}iso2`, "latin1"),
    Buffer.alloc(64)
  ]);
}

/** Bytes that sniff as video/mp4; not decodable. */
export const MP4_BYTES = isoContainer("isom");

/** Bytes that sniff as video/quicktime. */
export const MOV_BYTES = isoContainer("qt  ");

export function scoresFor(paths: string[], unsafe: number): Record<string, NudityScores> {
  return Object.fromEntries(paths.map((p) => [p, { safe: 1 - unsafe, unsafe }]));
}

/**
 * Decoder stand-in: reports a fixed probe and writes `frameCount` dummy
 * frames (capped by maxFrames) into the directory it is given.
 */
export class FakeVideoDecoder implements VideoDecoder {
  written: string[] = [];
  extractCalls: Array<{ filePath: string; options: FrameExtractionOptions }> = [];

  constructor(private probeResult: VideoProbe | Error, private frameCount = 3) { }

  async probe(_filePath: string): Promise<VideoProbe> {
    if (this.probeResult instanceof Error) {
      throw this.probeResult;
    }
    return this.probeResult;
  }

  async extractFrames(filePath: string, options: FrameExtractionOptions): Promise<string[]> {
    this.extractCalls.push({ filePath, options });

    const count = options.maxFrames > 0
      ? Math.min(this.frameCount, options.maxFrames)
      : this.frameCount;

    const paths: string[] = [];
    for (let i = 1; i <= count; i++) {
      const framePath = path.join(options.outputDir, `frame-${String(i).padStart(5, "0")}.jpg`);
      await fs.writeFile(framePath, `frame ${i}`);
      paths.push(framePath);
    }
    this.written.push(...paths);
    return paths;
  }
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
