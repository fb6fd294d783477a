import { readFileSync } from "node:fs";
import { z } from "zod";

export const blockCategorySchema = z.enum(["cube", "stairs", "slab", "carpet", "decorative", "air"]);
export type BlockCategory = z.infer<typeof blockCategorySchema>;

const colorCodeSchema = z.number().int().nonnegative();

export const namedTableSchema = z.object({
  blocks: z.record(z.string(), colorCodeSchema),
  decorative: z.array(z.string()),
  air: z.array(z.string()),
  categories: z.record(z.string(), blockCategorySchema).default({})
});
export type NamedTableData = z.infer<typeof namedTableSchema>;

export const legacyEntrySchema = z.object({
  name: z.string().min(1),
  color: colorCodeSchema,
  category: blockCategorySchema.optional(),
  /** `true` takes the solid dye list, `"glass"` the translucent one. */
  dyed: z.union([z.boolean(), z.literal("glass")]).optional()
});
export type LegacyEntry = z.infer<typeof legacyEntrySchema>;

export const legacyTableSchema = z.object({
  dyes: z.array(colorCodeSchema).length(16),
  glassDyes: z.array(colorCodeSchema).length(16),
  blocks: z.record(z.string().regex(/^\d+$/), legacyEntrySchema)
});
export type LegacyTableData = z.infer<typeof legacyTableSchema>;

export const paletteSchema = z.object({
  colors: z.array(
    z.object({
      code: colorCodeSchema,
      name: z.string(),
      hex: z.string().regex(/^#[0-9a-fA-F]{6}$/),
      translucent: z.boolean()
    })
  )
});
export type PaletteData = z.infer<typeof paletteSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("\n");
}

export function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, label: string): z.infer<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Invalid ${label}:\n${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function readPackagedJson(file: string): unknown {
  const raw = readFileSync(new URL(`../data/${file}`, import.meta.url), "utf8");
  return JSON.parse(raw);
}

export function readNamedTable(): NamedTableData {
  return parseWith(namedTableSchema, readPackagedJson("blocks.json"), "blocks.json");
}

export function readLegacyTable(): LegacyTableData {
  return parseWith(legacyTableSchema, readPackagedJson("legacy.json"), "legacy.json");
}

export function readPaletteData(): PaletteData {
  return parseWith(paletteSchema, readPackagedJson("colors.json"), "colors.json");
}
