/**
 * Integrity check of a local parameter file against its manifest entry.
 *
 * Results are memoised in a `VerificationCache`: a path that matched once
 * is not hashed again by the same verifier.
 */

import type { Logger } from "pino";
import type { ManifestEntry } from "../schemas/manifest.js";
import { ChecksumMismatchError } from "../errors/catalog.js";
import type { VerificationCache } from "./verification-cache.js";
import { computeDigestPrefix } from "./digest.js";

export type VerifyResult =
  | { ok: true }
  | { ok: false; reason: "mismatch"; error: ChecksumMismatchError }
  | { ok: false; reason: "io-error"; error: Error };

export interface VerifierOptions {
  cache: VerificationCache;
  logger: Logger;
  /** Accept every file without reading it. Unsafe outside development. */
  trustParams?: boolean;
  /** Custom digest implementation (for testing) */
  digestFn?: (path: string) => Promise<string>;
}

export interface Verifier {
  verify(path: string, entry: ManifestEntry): Promise<VerifyResult>;
}

export function createVerifier(options: VerifierOptions): Verifier {
  const { cache, logger } = options;
  const digestFn = options.digestFn ?? computeDigestPrefix;

  return {
    async verify(path, entry) {
      if (options.trustParams) {
        logger.warn(
          { path },
          "Assuming parameter files are ok. DO NOT USE IN PRODUCTION",
        );
        return { ok: true };
      }

      if (cache.has(path)) {
        return { ok: true };
      }

      let actual: string;
      try {
        actual = await digestFn(path);
      } catch (err) {
        return {
          ok: false,
          reason: "io-error",
          error: err instanceof Error ? err : new Error(String(err)),
        };
      }

      if (actual !== entry.digestPrefix) {
        return {
          ok: false,
          reason: "mismatch",
          error: new ChecksumMismatchError(path, actual, entry.digestPrefix),
        };
      }

      logger.info({ path }, `Parameter file ${path} is ok`);
      cache.add(path);
      return { ok: true };
    },
  };
}
