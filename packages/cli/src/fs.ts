import { mkdirSync, readdirSync, statSync } from "node:fs";
import { extname, resolve } from "node:path";

export const SCHEMATIC_EXTENSIONS: readonly string[] = [".schematic", ".schem"];

export interface ScannedFile {
  path: string;
  size: number;
}

export function ensureDir(path: string): void {
  mkdirSync(path, { recursive: true });
}

export function isSchematicPath(path: string): boolean {
  return SCHEMATIC_EXTENSIONS.includes(extname(path).toLowerCase());
}

/** Schematic files under `root`, sorted by path. */
export function scanSchematics(root: string): ScannedFile[] {
  const out: ScannedFile[] = [];
  const stack = [resolve(root)];
  let current: string | undefined;
  while ((current = stack.pop()) !== undefined) {
    const entries = readdirSync(current, { withFileTypes: true });
    for (const entry of entries) {
      const full = resolve(current, entry.name);
      if (entry.isDirectory()) {
        stack.push(full);
      } else if (entry.isFile() && isSchematicPath(full)) {
        out.push({ path: full, size: statSync(full).size });
      }
    }
  }
  out.sort((a, b) => a.path.localeCompare(b.path));
  return out;
}

/** Swaps the extension, keeping the directory. */
export function withExtension(path: string, ext: string): string {
  const current = extname(path);
  return `${current ? path.slice(0, -current.length) : path}${ext}`;
}
