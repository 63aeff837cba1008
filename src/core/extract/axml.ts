import { XMLParser } from "fast-xml-parser";
import type { PackageMetadata } from "@/types";
import { decodeUtf8 } from "../unzip";

const RES_XML_TYPE = 0x0003;
const RES_STRING_POOL_TYPE = 0x0001;
const RES_XML_START_ELEMENT_TYPE = 0x0102;
const UTF8_FLAG = 1 << 8;
const TYPE_STRING = 0x03;
const NO_INDEX = 0xffffffff;

interface ManifestAttribute {
  name: string;
  value: string | null;
}

interface ManifestElement {
  name: string;
  attributes: ManifestAttribute[];
}

function readStringPool(view: DataView, offset: number): string[] {
  const headerSize = view.getUint16(offset + 2, true);
  const stringCount = view.getUint32(offset + 8, true);
  const flags = view.getUint32(offset + 16, true);
  const stringsStart = view.getUint32(offset + 20, true);
  const utf8 = (flags & UTF8_FLAG) !== 0;
  const offsetsBase = offset + headerSize;
  const dataBase = offset + stringsStart;
  const bytes = new Uint8Array(view.buffer, view.byteOffset, view.byteLength);

  const strings: string[] = [];
  for (let i = 0; i < stringCount; i += 1) {
    let cursor = dataBase + view.getUint32(offsetsBase + i * 4, true);
    if (utf8) {
      // UTF-16 length, then UTF-8 byte length; each one or two bytes.
      cursor += (view.getUint8(cursor) & 0x80) !== 0 ? 2 : 1;
      let byteLength = view.getUint8(cursor);
      if ((byteLength & 0x80) !== 0) {
        byteLength = ((byteLength & 0x7f) << 8) | view.getUint8(cursor + 1);
        cursor += 2;
      } else {
        cursor += 1;
      }
      if (cursor + byteLength > bytes.length) throw new RangeError("string pool entry out of bounds");
      strings.push(decodeUtf8(bytes.subarray(cursor, cursor + byteLength)));
    } else {
      let charLength = view.getUint16(cursor, true);
      if ((charLength & 0x8000) !== 0) {
        charLength = ((charLength & 0x7fff) << 16) | view.getUint16(cursor + 2, true);
        cursor += 4;
      } else {
        cursor += 2;
      }
      const codes: number[] = [];
      for (let c = 0; c < charLength; c += 1) {
        codes.push(view.getUint16(cursor + c * 2, true));
      }
      strings.push(String.fromCharCode(...codes));
    }
  }
  return strings;
}

function readStartElement(view: DataView, offset: number, strings: string[]): ManifestElement {
  const headerSize = view.getUint16(offset + 2, true);
  const body = offset + headerSize;
  const nameIndex = view.getUint32(body + 4, true);
  const attributeStart = view.getUint16(body + 8, true);
  const attributeSize = view.getUint16(body + 10, true);
  const attributeCount = view.getUint16(body + 12, true);

  const attributes: ManifestAttribute[] = [];
  for (let i = 0; i < attributeCount; i += 1) {
    const at = body + attributeStart + i * attributeSize;
    const attrName = strings[view.getUint32(at + 4, true)] ?? "";
    const rawValue = view.getUint32(at + 8, true);
    const dataType = view.getUint8(at + 15);
    const data = view.getUint32(at + 16, true);
    let value: string | null = null;
    if (rawValue !== NO_INDEX) {
      value = strings[rawValue] ?? null;
    } else if (dataType === TYPE_STRING) {
      value = strings[data] ?? null;
    }
    attributes.push({ name: attrName, value });
  }
  return { name: strings[nameIndex] ?? "", attributes };
}

/**
 * Walks the chunks of a compiled (binary) AndroidManifest.xml and returns its
 * start elements in document order. Throws RangeError on truncated input.
 */
export function readBinaryXmlElements(data: Uint8Array): ManifestElement[] {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  if (view.getUint16(0, true) !== RES_XML_TYPE) {
    throw new RangeError("not a binary XML document");
  }

  let strings: string[] = [];
  const elements: ManifestElement[] = [];
  let offset = view.getUint16(2, true);
  while (offset + 8 <= view.byteLength) {
    const type = view.getUint16(offset, true);
    const size = view.getUint32(offset + 4, true);
    if (size < 8) throw new RangeError("malformed chunk size");
    if (type === RES_STRING_POOL_TYPE) {
      strings = readStringPool(view, offset);
    } else if (type === RES_XML_START_ELEMENT_TYPE) {
      elements.push(readStartElement(view, offset, strings));
    }
    offset += size;
  }
  return elements;
}

function literal(value: string | null | undefined): string | null {
  if (!value || value.startsWith("@") || value.startsWith("?")) return null;
  return value;
}

function fromElements(elements: ManifestElement[]): PackageMetadata {
  const manifest = elements.find((el) => el.name === "manifest");
  const application = elements.find((el) => el.name === "application");
  const attr = (el: ManifestElement | undefined, name: string) =>
    el?.attributes.find((a) => a.name === name)?.value ?? null;
  return {
    packageName: literal(attr(manifest, "package")),
    appName: literal(attr(application, "label"))
  };
}

const xmlParser = new XMLParser({ ignoreAttributes: false, attributeNamePrefix: "" });

function readRecord(value: unknown, key: string): unknown {
  return typeof value === "object" && value !== null ? Reflect.get(value, key) : undefined;
}

function readString(value: unknown, key: string): string | null {
  const field = readRecord(value, key);
  return typeof field === "string" ? field : null;
}

function fromPlainXml(text: string): PackageMetadata {
  const doc: unknown = xmlParser.parse(text);
  const manifest = readRecord(doc, "manifest");
  const application = readRecord(manifest, "application");
  return {
    packageName: literal(readString(manifest, "package")),
    appName: literal(readString(application, "android:label"))
  };
}

/**
 * Reads package name and literal app label from an AndroidManifest.xml in
 * either compiled or plain-text form. Unreadable manifests yield nulls.
 */
export function parseAndroidManifest(data: Uint8Array): PackageMetadata {
  try {
    const firstNonSpace = data.findIndex((byte) => byte !== 0x20 && byte !== 0x0a && byte !== 0x0d && byte !== 0x09);
    if (firstNonSpace !== -1 && data[firstNonSpace] === 0x3c) {
      return fromPlainXml(decodeUtf8(data));
    }
    return fromElements(readBinaryXmlElements(data));
  } catch {
    return { packageName: null, appName: null };
  }
}
