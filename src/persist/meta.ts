/**
 * Sidecar metadata written next to memmapped leaves (`meta.json`).
 */

import { z } from "zod";
import { TypeMismatchError } from "../core/errors";
import { type DType, isDType } from "../tensor/dtype";

export const META_FILE = "meta.json";
export const MEMMAP_FORMAT = "tensortree-memmap";
export const MEMMAP_VERSION = 1;

const message = (text: string) => ({ errorMap: () => ({ message: text }) });

const HeaderSchema = z.object({
  format: z.literal(MEMMAP_FORMAT, message("unknown memmap format")),
  version: z.literal(MEMMAP_VERSION, message("unsupported memmap version")),
});

const SizeSchema = z.array(z.number().int().nonnegative());

// a bare file name beside meta.json, never a path
const LeafFileSchema = z
  .string()
  .regex(/^[^/\\]+\.bin$/, "leaf file must be a .bin name in the same directory");

const LeafMetaSchema = z.object({
  shape: SizeSchema,
  dtype: z.string().refine((v): v is DType => isDType(v), "unknown dtype"),
  file: LeafFileSchema,
  device: z.string(),
});

const TreeFields = {
  format: HeaderSchema.shape.format,
  version: HeaderSchema.shape.version,
  batchSize: SizeSchema,
  device: z.string().nullable(),
  names: z.array(z.string().nullable()),
  /** Top-level keys in insertion order, leaves and nested trees together. */
  keys: z.array(z.string()),
  leaves: z.record(z.string(), LeafMetaSchema),
  nested: z.array(z.string()),
};

const TreeMetaSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("plain"), ...TreeFields }),
  z.object({
    kind: z.literal("stacked"),
    ...TreeFields,
    stackDim: z.number().int(),
    count: z.number().int().min(1),
  }),
]);

export type LeafMeta = z.infer<typeof LeafMetaSchema>;
export type TreeMeta = z.infer<typeof TreeMetaSchema>;

function describe(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseMeta(text: string, source: string): TreeMeta {
  const fail = (msg: string): never => {
    throw new TypeMismatchError(`invalid memmap metadata in ${source}: ${msg}`);
  };
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return fail(err instanceof Error ? err.message : String(err));
  }
  // header first, so a foreign file fails on its format
  const header = HeaderSchema.safeParse(raw);
  if (!header.success) return fail(describe(header.error));
  const meta = TreeMetaSchema.safeParse(raw);
  if (!meta.success) return fail(describe(meta.error));
  return meta.data;
}
