import type { BlockSpec, Half } from "@voxbrick/core";
import type { BlockTable } from "@voxbrick/block-registry";
import { resolveGeometry, type GeometryRequest } from "./resolver.js";
import { assertNever } from "./shapes.js";
import type { Descriptor, ScaleMode } from "./transform.js";
import type { WarningCollector } from "./warnings.js";

function slabHalf(spec: BlockSpec): Half | "double" {
  return spec.properties.type ?? spec.properties.half ?? "bottom";
}

/**
 * Maps one block to the pieces that fill its cell. Unknown blocks become a
 * gray cube and missing stair facings default to north; both are recorded
 * on `warnings`. Air yields nothing.
 */
export function classifyVoxel(
  spec: BlockSpec,
  table: BlockTable,
  mode: ScaleMode,
  warnings: WarningCollector
): Descriptor[] {
  const info = table.lookup(spec.id, spec.properties);
  if (!info.known) {
    warnings.add("UNKNOWN_BLOCK", info.name);
  }

  let request: GeometryRequest;
  switch (info.category) {
    case "air":
      return [];
    case "cube":
      request = { category: "cube" };
      break;
    case "stairs": {
      let facing = spec.properties.facing;
      if (facing === undefined) {
        warnings.add("MALFORMED_PROPERTIES", info.name);
        facing = "north";
      }
      request = { category: "stairs", facing, half: spec.properties.half ?? "bottom" };
      break;
    }
    case "slab": {
      const half = slabHalf(spec);
      request = half === "double" ? { category: "cube" } : { category: "slab", half };
      break;
    }
    case "carpet":
    case "decorative":
      request = { category: "floor" };
      break;
    default:
      return assertNever(info.category);
  }

  return resolveGeometry(request, mode, info.color);
}
