export type AssetId = string;

export type AssetKind = "image" | "video" | "vector";

export type DetectedKind = AssetKind | "unknown";

/** A stored original: `{id}.{extension}` in the images directory. */
export interface OriginalAsset {
  readonly id: AssetId;
  readonly extension: string;
  readonly kind: AssetKind;
  readonly filename: string;
}

export type Dimension = number | null;

export interface RequestedSize {
  readonly width: Dimension;
  readonly height: Dimension;
}

export interface Detection {
  readonly kind: DetectedKind;
  /** extension without the dot, as sniffed from content (or "svg") */
  readonly extension?: string;
  readonly mimeType?: string;
}

export interface ModerationDecision {
  readonly passed: boolean;
  readonly maxUnsafeScore: number | null;
  readonly framesChecked: number;
}

export type UploadSource =
  | { type: "buffer"; buffer: Buffer; declaredName?: string }
  | { type: "url"; url: string };
