/**
 * Byte-level progress reporting for downloads.
 *
 * The downloader only knows about `ProgressSink`; rendering (a progress
 * bar, periodic log lines, nothing at all) is up to whoever supplies it.
 */

import { Transform, type TransformCallback } from "node:stream";
import type { Logger } from "pino";

export interface ProgressSink {
  /** `total` is null when the server did not declare a length. */
  start(total: number | null, initial: number): void;
  advance(bytes: number): void;
  finish(): void;
}

export type ProgressSinkFactory = (label: string) => ProgressSink;

export const noopProgressSink: ProgressSink = {
  start() {},
  advance() {},
  finish() {},
};

const UNKNOWN_TOTAL_STEP = 64 * 1024 * 1024;

/**
 * Progress sink that logs roughly every 10% of the transfer, or every
 * 64 MiB when the total size is unknown.
 */
export function createLogProgressSink(
  logger: Logger,
  label: string,
): ProgressSink {
  let total: number | null = null;
  let current = 0;
  let nextReport = 0;

  function step(): number {
    return total !== null && total > 0
      ? Math.max(1, Math.ceil(total / 10))
      : UNKNOWN_TOTAL_STEP;
  }

  return {
    start(t, initial) {
      total = t;
      current = initial;
      nextReport = initial + step();
      logger.info({ file: label, bytes: current, total }, "Download started");
    },
    advance(bytes) {
      current += bytes;
      if (current >= nextReport) {
        nextReport = current + step();
        logger.info(
          {
            file: label,
            bytes: current,
            total,
            ...(total !== null && total > 0 && {
              percent: Math.floor((current * 100) / total),
            }),
          },
          "Download progress",
        );
      }
    },
    finish() {
      logger.info({ file: label, bytes: current, total }, "Download finished");
    },
  };
}

/** Pass-through stream that reports every chunk's length to `sink`. */
export function createProgressCounter(sink: ProgressSink): Transform {
  return new Transform({
    transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback) {
      sink.advance(chunk.length);
      callback(null, chunk);
    },
  });
}
