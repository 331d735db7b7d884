import type { Readable } from "stream";
import { GridFSBucket, ObjectId, type Db } from "mongodb";
import type { ArchiveMode, AssetArchiver } from "../../ports/AssetArchiver";

export type AssetBucket = Pick<GridFSBucket, "openUploadStream" | "openDownloadStream" | "find">;

export type StoredAsset = {
  contentType: string;
  length: number;
  stream: Readable;
};

export class AssetDownloadError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "AssetDownloadError";
    this.status = status;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const archiveModes: readonly ArchiveMode[] = ["private", "public"];

export const isArchiveMode = (value: string): value is ArchiveMode =>
  archiveModes.some((mode) => mode === value);

const fileNameOf = (sourceUrl: string): string => {
  const last = new URL(sourceUrl).pathname.split("/").filter(Boolean).pop();
  return last ? decodeURIComponent(last) : "image";
};

/**
 * Copies provider-hosted images into the `assets` GridFS bucket and serves
 * them back under `<publicBaseUrl>/assets/<mode>/<fileId>`.
 */
export class GridFsAssetArchiver implements AssetArchiver {
  constructor(
    private readonly bucket: AssetBucket,
    private readonly publicBaseUrl: string,
    private readonly timeoutMs = 30000
  ) {}

  static open(db: Db, publicBaseUrl: string, timeoutMs?: number): GridFsAssetArchiver {
    return new GridFsAssetArchiver(new GridFSBucket(db, { bucketName: "assets" }), publicBaseUrl, timeoutMs);
  }

  async putImage(sourceUrl: string, mode: ArchiveMode, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) {
      throw new AssetDownloadError("Asset download aborted");
    }
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = () => controller.abort();
    signal?.addEventListener("abort", onAbort, { once: true });
    let body: Buffer;
    let contentType: string;
    try {
      const res = await fetch(sourceUrl, { signal: controller.signal });
      if (!res.ok) {
        await res.text().catch(() => "");
        throw new AssetDownloadError(`Asset download failed: ${res.status}`, res.status);
      }
      contentType = res.headers.get("content-type") ?? "application/octet-stream";
      body = Buffer.from(await res.arrayBuffer());
    } catch (err) {
      if (signal?.aborted) {
        throw new AssetDownloadError("Asset download aborted");
      }
      if (controller.signal.aborted) {
        throw new AssetDownloadError(`Asset download timeout after ${this.timeoutMs}ms`);
      }
      throw err;
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", onAbort);
    }

    const upload = this.bucket.openUploadStream(fileNameOf(sourceUrl), {
      metadata: { mode, sourceUrl, contentType }
    });
    await new Promise<void>((resolve, reject) => {
      upload.once("finish", () => resolve());
      upload.once("error", reject);
      upload.end(body);
    });

    return `${this.publicBaseUrl}/assets/${mode}/${upload.id.toString()}`;
  }

  async open(mode: ArchiveMode, fileId: string): Promise<StoredAsset | null> {
    if (!ObjectId.isValid(fileId)) return null;
    const id = new ObjectId(fileId);

    const file = await this.bucket.find({ _id: id, "metadata.mode": mode }).next();
    if (!file) return null;

    const storedType: unknown = file.metadata?.contentType;
    return {
      contentType: typeof storedType === "string" ? storedType : "application/octet-stream",
      length: file.length,
      stream: this.bucket.openDownloadStream(id)
    };
  }
}
