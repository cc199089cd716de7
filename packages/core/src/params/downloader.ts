/**
 * Resumable download of a single parameter file from the gateway.
 *
 * Whatever is already on disk is treated as a prefix of the content: the
 * request asks for the bytes after it and the response is appended. One
 * attempt only; callers decide what a failure means.
 */

import { createWriteStream } from "node:fs";
import { open, rm } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Logger } from "pino";
import type { ManifestEntry } from "../schemas/manifest.js";
import { DownloadError } from "../errors/catalog.js";
import {
  createProgressCounter,
  noopProgressSink,
  type ProgressSinkFactory,
} from "./progress.js";

export interface DownloaderOptions {
  /** Prefix the content id is appended to, e.g. "https://host/ipfs/". */
  gatewayUrl: string;
  logger: Logger;
  /** Progress sink per transfer (default: none) */
  progress?: ProgressSinkFactory;
  /** Custom fetch implementation (for testing) */
  fetchFn?: typeof fetch;
}

export interface Downloader {
  fetch(
    signal: AbortSignal,
    localPath: string,
    entry: ManifestEntry,
  ): Promise<void>;
}

/** Request target for an entry: plain concatenation of prefix and cid. */
export function contentUrl(gatewayUrl: string, entry: ManifestEntry): URL {
  return new URL(gatewayUrl + entry.contentID);
}

/** Size of `path`, creating an empty file when it does not exist yet. */
async function currentSize(path: string): Promise<number> {
  const handle = await open(path, "a+");
  try {
    const stats = await handle.stat();
    return stats.size;
  } finally {
    await handle.close();
  }
}

export function createDownloader(options: DownloaderOptions): Downloader {
  const { gatewayUrl, logger } = options;
  const fetchFn = options.fetchFn ?? fetch;
  const progress = options.progress ?? (() => noopProgressSink);

  return {
    async fetch(signal, localPath, entry) {
      logger.info(
        { path: localPath, gateway: gatewayUrl },
        `Fetching ${localPath} from ${gatewayUrl}`,
      );

      const offset = await currentSize(localPath);
      const url = contentUrl(gatewayUrl, entry);
      logger.info({ url: url.href, offset }, `GET ${url.href}`);

      const response = await fetchFn(url, {
        headers: { Range: `bytes=${offset}-` },
        signal,
      });
      if (!response.ok) {
        // The body is not needed; release the connection.
        await response.body?.cancel();
        if (offset > 0) {
          // The local bytes cannot be continued (a full-length corrupt file
          // gets 416); drop them so the next attempt starts from zero.
          logger.warn(
            { path: localPath, status: response.status, offset },
            "Range request refused; removing partial file",
          );
          await rm(localPath, { force: true });
        }
        throw new DownloadError(url.href, response.status);
      }
      if (!response.body) {
        throw new Error("No response body received");
      }
      if (offset > 0 && response.status !== 206) {
        logger.warn(
          { path: localPath, status: response.status, offset },
          "Gateway ignored the range request; appending full content",
        );
      }

      const declared = response.headers.get("content-length");
      const remaining = declared === null ? NaN : Number(declared);
      const sink = progress(entry.name);
      sink.start(Number.isFinite(remaining) ? offset + remaining : null, offset);

      try {
        await pipeline(
          Readable.fromWeb(
            response.body as Parameters<typeof Readable.fromWeb>[0],
          ),
          createProgressCounter(sink),
          createWriteStream(localPath, { flags: "a" }),
        );
      } finally {
        sink.finish();
      }
    },
  };
}
