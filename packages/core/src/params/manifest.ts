import { ManifestParseError } from "../errors/catalog.js";
import {
  ManifestSchema,
  toManifestEntry,
  type Manifest,
} from "../schemas/manifest.js";

/** Suffix of the large per-sector-size parameter files. */
export const PARAMS_SUFFIX = ".params";

/**
 * Parse manifest JSON into immutable entries keyed by file name.
 *
 * @throws ManifestParseError on malformed JSON or an invalid entry
 */
export function parseManifest(input: string | Uint8Array): Manifest {
  const text =
    typeof input === "string" ? input : new TextDecoder().decode(input);

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ManifestParseError(err);
  }

  // JSON.parse keeps "__proto__" as an own key, but copying it into the
  // validated record would set the prototype and lose the entry.
  if (typeof raw === "object" && raw !== null && Object.hasOwn(raw, "__proto__")) {
    throw new ManifestParseError(
      new Error('entry name "__proto__" is not allowed'),
    );
  }

  const result = ManifestSchema.safeParse(raw);
  if (!result.success) {
    throw new ManifestParseError(result.error);
  }

  return new Map(
    Object.entries(result.data).map(([name, file]) => [
      name,
      toManifestEntry(name, file),
    ]),
  );
}

/**
 * Whether an entry belongs to this call. Only `.params` files are
 * filtered by sector size; keys and other small files always are.
 */
export function isInScope(
  name: string,
  entrySize: number,
  requiredSize: number,
): boolean {
  return !name.endsWith(PARAMS_SUFFIX) || entrySize === requiredSize;
}
