import { Buffer } from "node:buffer";
import { gunzipSync } from "node:zlib";

export type NbtValue = number | bigint | string | Uint8Array | NbtValue[] | NbtCompound;

export interface NbtCompound {
  [key: string]: NbtValue;
}

const TAG_END = 0;
const TAG_BYTE = 1;
const TAG_SHORT = 2;
const TAG_INT = 3;
const TAG_LONG = 4;
const TAG_FLOAT = 5;
const TAG_DOUBLE = 6;
const TAG_BYTE_ARRAY = 7;
const TAG_STRING = 8;
const TAG_LIST = 9;
export const TAG_COMPOUND = 10;
const TAG_INT_ARRAY = 11;
const TAG_LONG_ARRAY = 12;

// Maximum compound/list nesting.
const MAX_DEPTH = 512;

class Cursor {
  public offset = 0;
  public constructor(public readonly view: DataView) {}

  public ensure(size: number): void {
    if (this.offset + size > this.view.byteLength) {
      throw new Error(`NBT_TRUNCATED at offset=${this.offset}`);
    }
  }

  public i8(): number {
    this.ensure(1);
    const v = this.view.getInt8(this.offset);
    this.offset += 1;
    return v;
  }

  public u8(): number {
    this.ensure(1);
    const v = this.view.getUint8(this.offset);
    this.offset += 1;
    return v;
  }

  public i16(): number {
    this.ensure(2);
    const v = this.view.getInt16(this.offset, false);
    this.offset += 2;
    return v;
  }

  public u16(): number {
    this.ensure(2);
    const v = this.view.getUint16(this.offset, false);
    this.offset += 2;
    return v;
  }

  public i32(): number {
    this.ensure(4);
    const v = this.view.getInt32(this.offset, false);
    this.offset += 4;
    return v;
  }

  public i64(): bigint {
    this.ensure(8);
    const v = this.view.getBigInt64(this.offset, false);
    this.offset += 8;
    return v;
  }

  public f32(): number {
    this.ensure(4);
    const v = this.view.getFloat32(this.offset, false);
    this.offset += 4;
    return v;
  }

  public f64(): number {
    this.ensure(8);
    const v = this.view.getFloat64(this.offset, false);
    this.offset += 8;
    return v;
  }

  public bytes(n: number): Uint8Array {
    this.ensure(n);
    const out = new Uint8Array(this.view.buffer, this.view.byteOffset + this.offset, n);
    this.offset += n;
    return new Uint8Array(out);
  }

  public length(kind: string): number {
    const len = this.i32();
    if (len < 0) throw new Error(`NBT_${kind}_NEGATIVE_LENGTH`);
    return len;
  }
}

function readString(c: Cursor): string {
  return Buffer.from(c.bytes(c.u16())).toString("utf8");
}

function readPayload(c: Cursor, tagType: number, depth: number): NbtValue {
  if (depth > MAX_DEPTH) throw new Error("NBT_NESTING_TOO_DEEP");
  switch (tagType) {
    case TAG_BYTE:
      return c.i8();
    case TAG_SHORT:
      return c.i16();
    case TAG_INT:
      return c.i32();
    case TAG_LONG:
      return c.i64();
    case TAG_FLOAT:
      return c.f32();
    case TAG_DOUBLE:
      return c.f64();
    case TAG_BYTE_ARRAY:
      return c.bytes(c.length("BYTE_ARRAY"));
    case TAG_STRING:
      return readString(c);
    case TAG_LIST: {
      const childType = c.u8();
      const len = c.length("LIST");
      if (childType === TAG_END && len > 0) throw new Error("NBT_LIST_OF_END");
      const out: NbtValue[] = [];
      for (let i = 0; i < len; i++) {
        out.push(readPayload(c, childType, depth + 1));
      }
      return out;
    }
    case TAG_COMPOUND: {
      const out: NbtCompound = {};
      while (true) {
        const nextType = c.u8();
        if (nextType === TAG_END) break;
        const key = readString(c);
        out[key] = readPayload(c, nextType, depth + 1);
      }
      return out;
    }
    case TAG_INT_ARRAY: {
      const len = c.length("INT_ARRAY");
      c.ensure(len * 4);
      const out = new Array<number>(len);
      for (let i = 0; i < len; i++) out[i] = c.i32();
      return out;
    }
    case TAG_LONG_ARRAY: {
      const len = c.length("LONG_ARRAY");
      c.ensure(len * 8);
      const out = new Array<bigint>(len);
      for (let i = 0; i < len; i++) out[i] = c.i64();
      return out;
    }
    default:
      throw new Error(`NBT_UNSUPPORTED_TAG_${tagType}`);
  }
}

export function isCompound(value: NbtValue | undefined): value is NbtCompound {
  return typeof value === "object" && !Array.isArray(value) && !(value instanceof Uint8Array);
}

export function parseNbt(input: Uint8Array): { rootName: string; root: NbtCompound } {
  const c = new Cursor(new DataView(input.buffer, input.byteOffset, input.byteLength));
  const rootType = c.u8();
  if (rootType !== TAG_COMPOUND) {
    throw new Error(`NBT_ROOT_NOT_COMPOUND_${rootType}`);
  }
  const rootName = readString(c);
  const root = readPayload(c, TAG_COMPOUND, 0);
  if (!isCompound(root)) {
    throw new Error("NBT_ROOT_PAYLOAD_INVALID");
  }
  return { rootName, root };
}

export function isGzip(input: Uint8Array): boolean {
  return input.length >= 2 && input[0] === 0x1f && input[1] === 0x8b;
}

export function maybeGunzip(input: Uint8Array): Uint8Array {
  return isGzip(input) ? gunzipSync(input) : input;
}

export function lowerKeys(obj: NbtCompound): NbtCompound {
  const out: NbtCompound = {};
  for (const [k, v] of Object.entries(obj)) {
    out[k.toLowerCase()] = v;
  }
  return out;
}

export function asInt(value: NbtValue | undefined): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return Math.trunc(value);
  if (typeof value === "bigint") return Number(value);
  return undefined;
}

export function asString(value: NbtValue | undefined): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function asByteArray(value: NbtValue | undefined): Uint8Array | undefined {
  return value instanceof Uint8Array ? value : undefined;
}

export function asCompound(value: NbtValue | undefined): NbtCompound | undefined {
  return isCompound(value) ? value : undefined;
}
