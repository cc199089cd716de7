import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";

/** BLAKE2b-512 as exposed by OpenSSL; unkeyed, which is an empty key. */
export const DIGEST_ALGORITHM = "blake2b512";

/** Bytes of the digest kept for comparison. */
export const DIGEST_PREFIX_BYTES = 16;

function truncate(digest: Buffer): string {
  return digest.subarray(0, DIGEST_PREFIX_BYTES).toString("hex");
}

/**
 * Stream a file through BLAKE2b-512 and return the hex of the
 * first 16 digest bytes.
 */
export async function computeDigestPrefix(path: string): Promise<string> {
  const hash = createHash(DIGEST_ALGORITHM);
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return truncate(hash.digest());
}

/** Digest prefix of an in-memory buffer. */
export function digestPrefixOf(data: Uint8Array): string {
  return truncate(createHash(DIGEST_ALGORITHM).update(data).digest());
}
