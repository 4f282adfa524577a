import ffmpeg from "fluent-ffmpeg";
import ffprobeStatic from "ffprobe-static";
import fs from "fs/promises";
import path from "path";

export interface VideoProbe {
  durationSeconds: number;
  fps: number;
}

export interface FrameExtractionOptions {
  /** frame i is kept when i % frameStep === 0 */
  frameStep: number;
  /** 0 means no cap */
  maxFrames: number;
  outputDir: string;
}

export interface VideoDecoder {
  probe(filePath: string): Promise<VideoProbe>;
  /** Writes sampled frames as JPEG files into `outputDir`, returns their paths in order. */
  extractFrames(filePath: string, options: FrameExtractionOptions): Promise<string[]>;
}

const FRAME_PATTERN = "frame-%05d.jpg";

/** "30000/1001" → 29.97; 0 when unreadable. */
export function parseFrameRate(rate: string | undefined): number {
  if (!rate) return 0;

  const parts = rate.split("/").map(Number);
  const fps = parts.length === 2 ? parts[0] / parts[1] : parts[0];
  return Number.isFinite(fps) && fps > 0 ? fps : 0;
}

export class FfmpegVideoDecoder implements VideoDecoder {
  constructor(options: { ffmpegPath?: string; ffprobePath?: string } = {}) {
    ffmpeg.setFfprobePath(options.ffprobePath ?? ffprobeStatic.path);
    if (options.ffmpegPath) {
      ffmpeg.setFfmpegPath(options.ffmpegPath);
    }
  }

  probe(filePath: string): Promise<VideoProbe> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(filePath, (err, data) => {
        if (err) return reject(err);

        const stream = data.streams.find((candidate) => candidate.codec_type === "video");
        const fps = parseFrameRate(stream?.avg_frame_rate) || parseFrameRate(stream?.r_frame_rate);
        if (!stream || fps <= 0) {
          return resolve({ durationSeconds: 0, fps: 0 });
        }

        const frameCount = Number(stream.nb_frames);
        const durationSeconds = Number.isFinite(frameCount) && frameCount > 0
          ? frameCount / fps
          : Number(data.format.duration ?? stream.duration ?? 0) || 0;

        resolve({ durationSeconds, fps });
      });
    });
  }

  async extractFrames(filePath: string, options: FrameExtractionOptions): Promise<string[]> {
    const frameStep = Math.max(1, Math.floor(options.frameStep));
    const outputOptions = [
      "-vf", `select=not(mod(n\\,${frameStep}))`,
      "-vsync", "vfr",
      "-q:v", "3"
    ];
    if (options.maxFrames > 0) {
      outputOptions.push("-frames:v", String(options.maxFrames));
    }

    await new Promise<void>((resolve, reject) => {
      ffmpeg(filePath)
        .outputOptions(outputOptions)
        .output(path.join(options.outputDir, FRAME_PATTERN))
        .on("end", () => resolve())
        .on("error", reject)
        .run();
    });

    const entries = await fs.readdir(options.outputDir);
    return entries
      .filter((entry) => /^frame-\d+\.jpg$/.test(entry))
      .sort()
      .map((entry) => path.join(options.outputDir, entry));
  }
}
