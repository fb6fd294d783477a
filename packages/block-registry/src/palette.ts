import { readPaletteData, type PaletteData } from "./data.js";
import { UNKNOWN_COLOR, type ColorId } from "./table.js";

export interface ColorEntry {
  code: ColorId;
  name: string;
  rgb: [number, number, number];
  translucent: boolean;
}

function hexToRgb(hex: string): [number, number, number] {
  const value = Number.parseInt(hex.slice(1), 16);
  return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff];
}

const FALLBACK: ColorEntry = { code: UNKNOWN_COLOR, name: "Light Gray", rgb: [138, 146, 141], translucent: false };

/** LDraw colour codes the tables refer to. Codes missing from the palette read as light gray. */
export class ColorPalette {
  private readonly entries: ReadonlyMap<ColorId, ColorEntry>;

  public constructor(data: PaletteData) {
    const entries = new Map<ColorId, ColorEntry>();
    for (const c of data.colors) {
      entries.set(c.code, { code: c.code, name: c.name, rgb: hexToRgb(c.hex), translucent: c.translucent });
    }
    this.entries = entries;
  }

  public get(code: ColorId): ColorEntry {
    return this.entries.get(code) ?? this.entries.get(UNKNOWN_COLOR) ?? FALLBACK;
  }

  public isTranslucent(code: ColorId): boolean {
    return this.entries.get(code)?.translucent ?? false;
  }

  public colorRgb(code: ColorId): [number, number, number] {
    return this.get(code).rgb;
  }
}

let shared: ColorPalette | undefined;

export function loadPalette(): ColorPalette {
  shared ??= new ColorPalette(readPaletteData());
  return shared;
}
