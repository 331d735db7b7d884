export type ArchiveMode = "private" | "public";

export interface AssetArchiver {
  /** Copies `sourceUrl` into durable storage and returns its stable URL. */
  putImage(sourceUrl: string, mode: ArchiveMode, signal?: AbortSignal): Promise<string>;
}
