import { z } from "zod";

/** One manifest value as it appears on the wire. */
export const ParamFileSchema = z.object({
  cid: z.string().min(1),
  digest: z.string(),
  sector_size: z.number().int().nonnegative(),
});

/** File names map straight into the parameter directory. */
export const ParamFileNameSchema = z
  .string()
  .min(1)
  .regex(/^[^/\\]+$/, "must not contain path separators")
  .refine((name) => name !== "." && name !== "..", "must name a file");

export const ManifestSchema = z.record(ParamFileNameSchema, ParamFileSchema);

export type ParamFile = z.infer<typeof ParamFileSchema>;

export interface ManifestEntry {
  /** Local file name, relative to the parameter directory. */
  readonly name: string;
  /** Content address on the gateway. */
  readonly contentID: string;
  /** Hex of the first 16 bytes of the BLAKE2b-512 digest. */
  readonly digestPrefix: string;
  /** Sector size class, used only to filter `.params` files. */
  readonly requiredSize: number;
}

export type Manifest = ReadonlyMap<string, ManifestEntry>;

export function toManifestEntry(name: string, file: ParamFile): ManifestEntry {
  return Object.freeze({
    name,
    contentID: file.cid,
    digestPrefix: file.digest,
    requiredSize: file.sector_size,
  });
}
