import { XMLParser } from "fast-xml-parser";
import { decodeUtf8 } from "../unzip";

export type PlistValue = string | number | boolean | PlistValue[] | { [key: string]: PlistValue };
export type PlistDict = Record<string, PlistValue>;

const BPLIST_MAGIC = "bplist00";
const TRAILER_SIZE = 32;
/** Upper bound on objects decoded from one document, shared references included. */
export const MAX_DECODED_OBJECTS = 10_000;

class BinaryPlistReader {
  private readonly view: DataView;
  private readonly offsets: number[] = [];
  private readonly refSize: number;
  private readonly tableOffset: number;
  private decoded = 0;
  readonly topObject: number;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const trailer = bytes.byteLength - TRAILER_SIZE;
    if (trailer < BPLIST_MAGIC.length) throw new RangeError("binary plist too short");
    const offsetSize = this.view.getUint8(trailer + 6);
    this.refSize = this.view.getUint8(trailer + 7);
    if (!isIntSize(offsetSize) || !isIntSize(this.refSize)) {
      throw new RangeError("binary plist offset or reference size out of range");
    }
    const objectCount = this.readUInt(trailer + 8, 8);
    this.topObject = this.readUInt(trailer + 16, 8);
    this.tableOffset = this.readUInt(trailer + 24, 8);
    if (this.tableOffset < BPLIST_MAGIC.length || this.tableOffset + objectCount * offsetSize > trailer) {
      throw new RangeError("binary plist offset table out of range");
    }
    if (this.topObject >= objectCount) throw new RangeError("binary plist top object out of range");
    for (let i = 0; i < objectCount; i += 1) {
      const offset = this.readUInt(this.tableOffset + i * offsetSize, offsetSize);
      if (offset < BPLIST_MAGIC.length || offset >= this.tableOffset) {
        throw new RangeError(`binary plist object ${i} offset out of range`);
      }
      this.offsets.push(offset);
    }
  }

  private readUInt(at: number, size: number): number {
    let value = 0;
    for (let i = 0; i < size; i += 1) {
      value = value * 256 + this.view.getUint8(at + i);
    }
    return value;
  }

  /** Object length from the marker nibble, with the 0xF escape to a following int object. */
  private readLength(at: number, unitSize: number): { length: number; start: number } {
    const nibble = this.view.getUint8(at) & 0x0f;
    if (nibble !== 0x0f) return this.checkedLength(nibble, at + 1, unitSize);
    const intMarker = this.view.getUint8(at + 1);
    const size = 1 << (intMarker & 0x0f);
    if (!isIntSize(size)) throw new RangeError("binary plist length size out of range");
    return this.checkedLength(this.readUInt(at + 2, size), at + 2 + size, unitSize);
  }

  private checkedLength(length: number, start: number, unitSize: number): { length: number; start: number } {
    if (start + length * unitSize > this.tableOffset) throw new RangeError("binary plist object overruns its data");
    return { length, start };
  }

  readObject(ref: number, depth = 0): PlistValue | undefined {
    if (depth > 32) throw new RangeError("binary plist nesting too deep");
    this.decoded += 1;
    if (this.decoded > MAX_DECODED_OBJECTS) throw new RangeError("binary plist expands to too many objects");
    const at = this.offsets[ref];
    if (at === undefined) throw new RangeError(`binary plist reference ${ref} out of range`);
    const marker = this.view.getUint8(at);
    const kind = marker >> 4;

    switch (kind) {
      case 0x0:
        if (marker === 0x08) return false;
        if (marker === 0x09) return true;
        return undefined;
      case 0x1: {
        const size = 1 << (marker & 0x0f);
        if (!isIntSize(size)) return undefined;
        return this.readUInt(at + 1, size);
      }
      case 0x5: {
        const { length, start } = this.readLength(at, 1);
        return decodeUtf8(this.bytes.subarray(start, start + length));
      }
      case 0x6: {
        const { length, start } = this.readLength(at, 2);
        let text = "";
        for (let i = 0; i < length; i += 1) {
          text += String.fromCharCode(this.view.getUint16(start + i * 2, false));
        }
        return text;
      }
      case 0xa: {
        const { length, start } = this.readLength(at, this.refSize);
        const items: PlistValue[] = [];
        for (let i = 0; i < length; i += 1) {
          const item = this.readObject(this.readUInt(start + i * this.refSize, this.refSize), depth + 1);
          if (item !== undefined) items.push(item);
        }
        return items;
      }
      case 0xd: {
        const { length, start } = this.readLength(at, 2 * this.refSize);
        const dict: PlistDict = {};
        for (let i = 0; i < length; i += 1) {
          const key = this.readObject(this.readUInt(start + i * this.refSize, this.refSize), depth + 1);
          const valueRef = this.readUInt(start + (length + i) * this.refSize, this.refSize);
          const value = this.readObject(valueRef, depth + 1);
          if (typeof key === "string" && value !== undefined) dict[key] = value;
        }
        return dict;
      }
      default:
        // reals, dates, data and uids carry nothing the extractor needs
        return undefined;
    }
  }
}

function isIntSize(size: number): boolean {
  return size >= 1 && size <= 8;
}

function parseBinaryPlist(bytes: Uint8Array): PlistDict | null {
  const reader = new BinaryPlistReader(bytes);
  const top = reader.readObject(reader.topObject);
  return isDict(top) ? top : null;
}

const xmlParser = new XMLParser({ preserveOrder: true, ignoreAttributes: true, parseTagValue: false, trimValues: true });

type OrderedNode = Record<string, unknown>;

function isOrderedNodeList(value: unknown): value is OrderedNode[] {
  return Array.isArray(value) && value.every((node) => typeof node === "object" && node !== null);
}

function tagOf(node: OrderedNode): string | undefined {
  return Object.keys(node).find((key) => key !== ":@");
}

function childrenOf(node: OrderedNode, tag: string): OrderedNode[] {
  const children = node[tag];
  return isOrderedNodeList(children) ? children : [];
}

function textOf(node: OrderedNode, tag: string): string {
  return childrenOf(node, tag)
    .map((child) => child["#text"])
    .filter((text): text is string | number => typeof text === "string" || typeof text === "number")
    .join("");
}

function xmlValue(node: OrderedNode): PlistValue | undefined {
  const tag = tagOf(node);
  switch (tag) {
    case "string":
    case "date":
    case "data":
      return textOf(node, tag);
    case "integer":
    case "real": {
      const value = Number(textOf(node, tag));
      return Number.isFinite(value) ? value : undefined;
    }
    case "true":
      return true;
    case "false":
      return false;
    case "array":
      return childrenOf(node, tag)
        .map(xmlValue)
        .filter((item): item is PlistValue => item !== undefined);
    case "dict":
      return xmlDict(childrenOf(node, tag));
    default:
      return undefined;
  }
}

function xmlDict(children: OrderedNode[]): PlistDict {
  const dict: PlistDict = {};
  for (let i = 0; i < children.length; i += 1) {
    const keyNode = children[i];
    if (!keyNode || tagOf(keyNode) !== "key") continue;
    const valueNode = children[i + 1];
    if (!valueNode) break;
    const value = xmlValue(valueNode);
    if (value !== undefined) dict[textOf(keyNode, "key")] = value;
    i += 1;
  }
  return dict;
}

function parseXmlPlist(text: string): PlistDict | null {
  const parsed: unknown = xmlParser.parse(text);
  if (!isOrderedNodeList(parsed)) return null;
  const plist = parsed.find((node) => tagOf(node) === "plist");
  if (!plist) return null;
  const root = childrenOf(plist, "plist").find((node) => tagOf(node) === "dict");
  return root ? xmlDict(childrenOf(root, "dict")) : null;
}

function isDict(value: PlistValue | undefined): value is PlistDict {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parses an XML or binary property list whose root is a dictionary; null when malformed. */
export function parsePlist(bytes: Uint8Array): PlistDict | null {
  try {
    const head = decodeUtf8(bytes.subarray(0, BPLIST_MAGIC.length));
    return head === BPLIST_MAGIC ? parseBinaryPlist(bytes) : parseXmlPlist(decodeUtf8(bytes));
  } catch {
    return null;
  }
}

export function plistString(dict: PlistDict, key: string): string | null {
  const value = dict[key];
  return typeof value === "string" && value.length > 0 ? value : null;
}
