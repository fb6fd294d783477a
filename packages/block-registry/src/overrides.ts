import { readFileSync } from "node:fs";
import YAML from "js-yaml";
import { z } from "zod";
import { blockCategorySchema, legacyEntrySchema, parseWith } from "./data.js";
import type { BlockTableOverrides, NamedOverride } from "./table.js";

const namedOverrideSchema = z.union([
  z.number().int().nonnegative(),
  z.object({
    color: z.number().int().nonnegative().optional(),
    category: blockCategorySchema.optional()
  })
]);

const overridesFileSchema = z
  .object({
    blocks: z.record(z.string(), namedOverrideSchema).default({}),
    legacy: z.record(z.string().regex(/^\d+$/), legacyEntrySchema).default({})
  })
  .strict();

/**
 * Reads a block-table override file:
 *
 * ```yaml
 * blocks:
 *   mymod:marble: 15
 *   oak_planks: { color: 19 }
 *   mymod:marble_stairs: { color: 15, category: stairs }
 * legacy:
 *   "1": { name: stone, color: 72 }
 * ```
 */
export function parseOverrides(raw: unknown, label = "overrides"): BlockTableOverrides {
  if (raw === undefined || raw === null) {
    return {};
  }
  const parsed = parseWith(overridesFileSchema, raw, label);
  const blocks: Record<string, NamedOverride> = {};
  for (const [name, value] of Object.entries(parsed.blocks)) {
    blocks[name] = typeof value === "number" ? { color: value } : value;
  }
  return { blocks, legacy: parsed.legacy };
}

export function readOverridesFromYaml(path: string): BlockTableOverrides {
  const raw = readFileSync(path, "utf8");
  return parseOverrides(YAML.load(raw), path);
}
