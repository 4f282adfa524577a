import sharp from "sharp";

import { RequestedSize } from "../assets/types.js";

type OutputFormat = "jpeg" | "png" | "webp" | "gif" | "avif" | "tiff";

const OUTPUT_FORMATS: Record<string, OutputFormat> = {
  jpg: "jpeg",
  jpeg: "jpeg",
  png: "png",
  webp: "webp",
  gif: "gif",
  avif: "avif",
  tif: "tiff",
  tiff: "tiff"
};

/** sharp format for an output extension, or null when it cannot be written. */
export function outputFormatFor(extension: string): OutputFormat | null {
  return OUTPUT_FORMATS[extension.toLowerCase()] ?? null;
}

export interface ImageProcessor {
  /** Re-encodes an upload in `extension`'s format without its metadata. */
  convert(inputPath: string, extension: string): Promise<Buffer>;
  /** Renders a resized copy in the input's own format, metadata stripped. */
  resize(inputPath: string, size: RequestedSize): Promise<Buffer>;
}

export class SharpImageProcessor implements ImageProcessor {
  constructor(private options: { timeoutSeconds: number }) { }

  private open(inputPath: string) {
    // sharp drops EXIF/ICC/XMP unless withMetadata() is asked for
    return sharp(inputPath, { failOn: "error" })
      .timeout({ seconds: Math.max(0, Math.round(this.options.timeoutSeconds)) })
      .rotate();
  }

  async convert(inputPath: string, extension: string): Promise<Buffer> {
    const format = outputFormatFor(extension);
    if (!format) {
      throw new Error(`unsupported output format: ${extension}`);
    }
    return this.open(inputPath).toFormat(format).toBuffer();
  }

  async resize(inputPath: string, size: RequestedSize): Promise<Buffer> {
    // both sides given: centred cover crop; one side: keep aspect ratio
    return this.open(inputPath)
      .resize({
        width: size.width ?? undefined,
        height: size.height ?? undefined,
        fit: "cover",
        position: "centre"
      })
      .toBuffer();
  }
}
