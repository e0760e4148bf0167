// src/store/disk.asset.storage.ts

import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import crypto from "crypto";
import type { Readable } from "stream";

import type { StorageReference } from "../types/asset.js";
import {
  AssetNotFoundError,
  FinalizationError,
  StorageError,
  isErrnoCode,
} from "../utils/errors.js";
import type { AssetStorage, AttachInput } from "./asset.storage.js";

const SAFE_EXT = /^\.[a-z0-9]{1,10}$/;

export class DiskAssetStorage implements AssetStorage {
  readonly backend = "disk";

  constructor(private readonly baseDir: string) {}

  private resolve(ref: StorageReference): string {
    if (ref.backend !== this.backend) {
      throw new FinalizationError(
        "STORAGE_BACKEND_MISMATCH",
        `Reference belongs to ${ref.backend}, not ${this.backend}`
      );
    }

    const full = path.resolve(this.baseDir, ref.key);
    const rel = path.relative(this.baseDir, full);
    if (!ref.key || rel.startsWith("..") || path.isAbsolute(rel)) {
      throw new AssetNotFoundError(ref.key);
    }
    return full;
  }

  async attach(input: AttachInput): Promise<StorageReference> {
    const ext = path.extname(input.filename).toLowerCase();
    const id = crypto.randomUUID();
    // Two-level fan-out keeps directories small.
    const key = path.posix.join(
      id.slice(0, 2),
      SAFE_EXT.test(ext) ? `${id}${ext}` : id
    );

    const ref: StorageReference = { backend: this.backend, key };
    const dest = this.resolve(ref);
    const temp = `${dest}.tmp`;

    try {
      await fsp.mkdir(path.dirname(dest), { recursive: true });
      await fsp.copyFile(input.filePath, temp);

      const { size } = await fsp.stat(temp);
      if (size !== input.sizeBytes) {
        throw new FinalizationError(
          "ASSET_SIZE_MISMATCH",
          `Copied ${size} bytes, expected ${input.sizeBytes}`
        );
      }

      await fsp.rename(temp, dest);
      return ref;
    } catch (err) {
      await fsp.rm(temp, { force: true }).catch(() => undefined);

      if (err instanceof FinalizationError) throw err;
      if (isErrnoCode(err, "ENOENT")) {
        throw new FinalizationError(
          "ASSEMBLED_FILE_MISSING",
          `Assembled file not found: ${input.filePath}`
        );
      }
      throw new StorageError(`Failed to store asset for ${input.uploadId}`, {
        cause: err,
      });
    }
  }

  async open(ref: StorageReference): Promise<Readable> {
    const full = this.resolve(ref);

    try {
      await fsp.access(full);
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) throw new AssetNotFoundError(ref.key);
      throw new StorageError(`Failed to open asset ${ref.key}`, { cause: err });
    }

    return fs.createReadStream(full);
  }

  async remove(ref: StorageReference): Promise<void> {
    await fsp.rm(this.resolve(ref), { force: true });
  }
}
