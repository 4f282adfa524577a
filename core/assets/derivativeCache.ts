import { AssetStore } from "./assetStore.js";
import { deriveDerivativeName } from "./keyCodec.js";
import { RequestedSize } from "./types.js";
import { ImageProcessor } from "../media/imageProcessor.js";
import { SnapstashLogger, emit } from "../logging/createLogger.js";

/**
 * Lazily generated resized renditions. A derivative, once written, is served
 * as-is forever; it goes away only with its original.
 */
export class DerivativeCache {
  // one generation per key at a time; later callers await the same promise
  private inflight = new Map<string, Promise<string>>();

  constructor(
    private store: AssetStore,
    private processor: ImageProcessor,
    private logger?: SnapstashLogger,
  ) { }

  /**
   * Path of the `size` rendition of the original `name`, generating it on
   * a miss. `name` must already have been resolved by the store.
   */
  async getOrCreate(name: string, size: RequestedSize): Promise<string> {
    const key = deriveDerivativeName(name, size);
    const target = this.store.derivativePath(key);

    if (await this.store.exists(target)) {
      return target;
    }

    const pending = this.inflight.get(key);
    if (pending) {
      return pending;
    }

    const generation = this.generate(name, key, size).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, generation);
    return generation;
  }

  private async generate(name: string, key: string, size: RequestedSize): Promise<string> {
    const source = await this.store.resolve(name);
    const startedAt = Date.now();

    try {
      const rendered = await this.processor.resize(source, size);
      const target = await this.store.putDerivative(rendered, key);

      emit(this.logger, "info", "Derivative created", {
        event: "DERIVATIVE_CREATED",
        original: name,
        derivative: key,
        bytes: rendered.length,
        durationMs: Date.now() - startedAt
      });

      return target;
    } catch (err) {
      emit(this.logger, "error", "Derivative generation failed", {
        event: "DERIVATIVE_FAIL",
        original: name,
        derivative: key,
        error: err instanceof Error ? err.message : String(err)
      });
      throw err;
    }
  }
}
