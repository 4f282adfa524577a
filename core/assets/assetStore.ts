import crypto from "crypto";
import fs from "fs/promises";
import path from "path";

import { isDerivativeOf } from "./keyCodec.js";
import { NotFoundError, PathTraversalError } from "../middleware/publicErrorHandler.js";

export interface AssetStoreOptions {
  imagesDir: string;
  cacheDir: string;
  tmpDir: string;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function isWithin(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  return relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative);
}

/**
 * Filesystem namespace for originals and derivatives. Every caller-supplied
 * name goes through `resolve`, which refuses anything that would land
 * outside the directory it is resolved against.
 */
export class AssetStore {
  readonly imagesDir: string;
  readonly cacheDir: string;
  readonly tmpDir: string;

  constructor(options: AssetStoreOptions) {
    this.imagesDir = path.resolve(options.imagesDir);
    this.cacheDir = path.resolve(options.cacheDir);
    this.tmpDir = path.resolve(options.tmpDir);
  }

  async init(): Promise<void> {
    await Promise.all([
      fs.mkdir(this.imagesDir, { recursive: true }),
      fs.mkdir(this.cacheDir, { recursive: true }),
      fs.mkdir(this.tmpDir, { recursive: true })
    ]);
  }

  /**
   * Lexical check of `name` against `root`. Throws PathTraversalError for
   * `..` segments, absolute names, backslashes and NUL bytes.
   */
  private lexicalPath(root: string, name: string): string {
    if (
      name.length === 0 ||
      name.includes("\0") ||
      name.includes("\\") ||
      path.posix.isAbsolute(name) ||
      name.split("/").some((segment) => segment === "..")
    ) {
      throw new PathTraversalError();
    }

    const candidate = path.resolve(root, name);
    if (!isWithin(root, candidate)) {
      throw new PathTraversalError();
    }
    return candidate;
  }

  /** Path of an original by name; symlinks leaving the root are refused. */
  async resolve(name: string): Promise<string> {
    const candidate = this.lexicalPath(this.imagesDir, name);

    let real: string;
    try {
      real = await fs.realpath(candidate);
    } catch (err) {
      if (isErrnoException(err) && (err.code === "ENOENT" || err.code === "ENOTDIR")) {
        throw new NotFoundError();
      }
      throw err;
    }

    const realRoot = await fs.realpath(this.imagesDir);
    if (!isWithin(realRoot, real)) {
      throw new PathTraversalError();
    }

    const stat = await fs.stat(real);
    if (!stat.isFile()) {
      throw new NotFoundError();
    }
    return real;
  }

  derivativePath(key: string): string {
    return this.lexicalPath(this.cacheDir, key);
  }

  originalPath(name: string): string {
    return this.lexicalPath(this.imagesDir, name);
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile();
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        return false;
      }
      throw err;
    }
  }

  /** Stores bytes as an original. */
  async put(bytes: Buffer, name: string): Promise<string> {
    const target = this.originalPath(name);
    await this.writeAtomic(target, bytes);
    return target;
  }

  /** Moves a staged file into the originals directory. */
  async putFile(sourcePath: string, name: string): Promise<string> {
    const target = this.originalPath(name);
    const temp = this.tempSibling(target);

    try {
      await fs.copyFile(sourcePath, temp);
      await fs.rename(temp, target);
    } catch (err) {
      await fs.rm(temp, { force: true });
      throw err;
    }
    return target;
  }

  async putDerivative(bytes: Buffer, key: string): Promise<string> {
    const target = this.derivativePath(key);
    await this.writeAtomic(target, bytes);
    return target;
  }

  /**
   * Removes an original and all of its derivatives. Returns the number of
   * derivatives removed.
   */
  async delete(name: string): Promise<number> {
    const original = await this.resolve(name);

    const relative = path.relative(await fs.realpath(this.imagesDir), original)
      .split(path.sep)
      .join("/");
    const derivativeDir = path.dirname(this.derivativePath(relative));
    const originalBase = path.basename(relative);

    let entries: string[] = [];
    try {
      entries = await fs.readdir(derivativeDir);
    } catch (err) {
      if (!isErrnoException(err) || err.code !== "ENOENT") {
        throw err;
      }
    }

    const derivatives = entries.filter((entry) => isDerivativeOf(originalBase, entry));

    await fs.unlink(original);
    await Promise.all(
      derivatives.map((entry) => fs.rm(path.join(derivativeDir, entry), { force: true }))
    );

    return derivatives.length;
  }

  /** Fresh path for staging an upload inside the temp directory. */
  stagingPath(id: string): string {
    return this.lexicalPath(this.tmpDir, id);
  }

  /** Deletes staged files older than `maxAgeMs`. Returns how many went. */
  async sweepStaging(maxAgeMs: number, now: number = Date.now()): Promise<number> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.tmpDir);
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return 0;
      throw err;
    }

    let removed = 0;
    for (const entry of entries) {
      const entryPath = path.join(this.tmpDir, entry);
      try {
        const stat = await fs.stat(entryPath);
        if (now - stat.mtimeMs > maxAgeMs) {
          await fs.rm(entryPath, { recursive: true, force: true });
          removed++;
        }
      } catch (err) {
        // a concurrent request may have removed it already
        if (!isErrnoException(err) || err.code !== "ENOENT") {
          throw err;
        }
      }
    }
    return removed;
  }

  // dot-prefixed so it never matches a derivative pattern while in flight
  private tempSibling(target: string): string {
    return path.join(
      path.dirname(target),
      `.${path.basename(target)}.${crypto.randomUUID()}.tmp`
    );
  }

  private async writeAtomic(target: string, bytes: Buffer): Promise<void> {
    await fs.mkdir(path.dirname(target), { recursive: true });
    const temp = this.tempSibling(target);

    try {
      await fs.writeFile(temp, bytes);
      await fs.rename(temp, target);
    } catch (err) {
      await fs.rm(temp, { force: true });
      throw err;
    }
  }
}
