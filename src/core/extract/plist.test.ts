import { describe, expect, it } from "vitest";
import { xmlInfoPlist } from "@/testing/fixtures";
import type { PlistValue } from "./plist";
import { parsePlist, plistString } from "./plist";

const encoder = new TextEncoder();

function lengthMarker(kind: number, length: number): number[] {
  if (length < 15) return [(kind << 4) | length];
  return [(kind << 4) | 0x0f, 0x11, (length >> 8) & 0xff, length & 0xff];
}

const beUInt = (value: number, size: number) =>
  Array.from({ length: size }, (_, i) => Math.floor(value / 256 ** (size - 1 - i)) % 256);

/** Writes a bplist00 document with one-byte object references and two-byte offsets. */
function encodeBinaryPlist(root: PlistValue): Uint8Array {
  const objects: number[][] = [];

  const add = (value: PlistValue): number => {
    const ref = objects.length;
    objects.push([]);
    let bytes: number[];
    if (typeof value === "boolean") {
      bytes = [value ? 0x09 : 0x08];
    } else if (typeof value === "number") {
      bytes = [0x11, ...beUInt(value, 2)];
    } else if (typeof value === "string") {
      if (/^[\x00-\x7f]*$/.test(value)) {
        bytes = [...lengthMarker(0x5, value.length), ...encoder.encode(value)];
      } else {
        bytes = lengthMarker(0x6, value.length);
        for (let i = 0; i < value.length; i += 1) bytes.push(...beUInt(value.charCodeAt(i), 2));
      }
    } else if (Array.isArray(value)) {
      const refs = value.map(add);
      bytes = [...lengthMarker(0xa, refs.length), ...refs];
    } else {
      const entries = Object.entries(value);
      const keyRefs = entries.map(([key]) => add(key));
      const valueRefs = entries.map(([, item]) => add(item));
      bytes = [...lengthMarker(0xd, entries.length), ...keyRefs, ...valueRefs];
    }
    objects[ref] = bytes;
    return ref;
  };
  add(root);

  const out = [...encoder.encode("bplist00")];
  const offsets: number[] = [];
  for (const bytes of objects) {
    offsets.push(out.length);
    out.push(...bytes);
  }
  const tableOffset = out.length;
  for (const offset of offsets) out.push(...beUInt(offset, 2));
  out.push(0, 0, 0, 0, 0, 0, 2, 1, ...beUInt(objects.length, 8), ...beUInt(0, 8), ...beUInt(tableOffset, 8));
  return Uint8Array.from(out);
}

interface RawPlistLayout {
  offsetSize?: number;
  objectCount?: number;
  top?: number;
  /** Rewrites each offset-table entry before it is written. */
  offsetFor?: (offset: number, tableOffset: number) => number;
}

/** Lays out pre-encoded objects with a trailer the caller can falsify. */
function rawBinaryPlist(objects: number[][], layout: RawPlistLayout = {}): Uint8Array {
  const { offsetSize = 2, top = 0, offsetFor = (offset: number) => offset } = layout;
  const out = [...encoder.encode("bplist00")];
  const offsets: number[] = [];
  for (const bytes of objects) {
    offsets.push(out.length);
    out.push(...bytes);
  }
  const tableOffset = out.length;
  for (const offset of offsets) out.push(...beUInt(offsetFor(offset, tableOffset), offsetSize));
  const objectCount = layout.objectCount ?? objects.length;
  out.push(0, 0, 0, 0, 0, 0, offsetSize, 1, ...beUInt(objectCount, 8), ...beUInt(top, 8), ...beUInt(tableOffset, 8));
  return Uint8Array.from(out);
}

const nameDict = [
  [0xd1, 1, 2],
  [0x54, ...encoder.encode("Name")],
  [0x54, ...encoder.encode("Demo")]
];

describe("parsePlist", () => {
  it("reads an XML property list", () => {
    const plist = parsePlist(
      encoder.encode(xmlInfoPlist({ CFBundleIdentifier: "com.example.xml", CFBundleName: "XmlApp" }))
    );
    expect(plist).toEqual({ CFBundleIdentifier: "com.example.xml", CFBundleName: "XmlApp" });
  });

  it("reads nested XML values", () => {
    const xml = [
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<plist version="1.0"><dict>',
      "<key>CFBundleVersion</key><integer>42</integer>",
      "<key>ITSAppUsesNonExemptEncryption</key><false/>",
      "<key>UIRequiredDeviceCapabilities</key><array><string>arm64</string><string>metal</string></array>",
      "<key>NSAppTransportSecurity</key><dict><key>NSAllowsArbitraryLoads</key><true/></dict>",
      "<key>CFBundleName</key><string></string>",
      "</dict></plist>"
    ].join("\n");
    const plist = parsePlist(encoder.encode(xml));
    expect(plist).toEqual({
      CFBundleVersion: 42,
      ITSAppUsesNonExemptEncryption: false,
      UIRequiredDeviceCapabilities: ["arm64", "metal"],
      NSAppTransportSecurity: { NSAllowsArbitraryLoads: true },
      CFBundleName: ""
    });
    expect(plist && plistString(plist, "CFBundleName")).toBeNull();
  });

  it("reads a binary property list", () => {
    const plist = parsePlist(
      encodeBinaryPlist({
        CFBundleIdentifier: "com.example.bin",
        CFBundleName: "A Much Longer Bundle Name",
        CFBundleDisplayName: "Café",
        CFBundleVersion: 300,
        Enabled: true,
        Tags: ["a", "b"]
      })
    );
    expect(plist).toEqual({
      CFBundleIdentifier: "com.example.bin",
      CFBundleName: "A Much Longer Bundle Name",
      CFBundleDisplayName: "Café",
      CFBundleVersion: 300,
      Enabled: true,
      Tags: ["a", "b"]
    });
  });

  it("returns null when the root is not a dictionary", () => {
    expect(parsePlist(encodeBinaryPlist(["only", "an", "array"]))).toBeNull();
  });

  it("returns null for malformed input", () => {
    expect(parsePlist(encoder.encode("bplist00short"))).toBeNull();
    expect(parsePlist(encoder.encode("not a property list"))).toBeNull();
  });

  it("reads a hand-laid binary document", () => {
    expect(parsePlist(rawBinaryPlist(nameDict))).toEqual({ Name: "Demo" });
  });

  it("rejects offset and reference sizes outside one to eight bytes", () => {
    expect(parsePlist(rawBinaryPlist([[0x08]], { offsetSize: 0, objectCount: 30_000_000 }))).toBeNull();
    expect(parsePlist(rawBinaryPlist(nameDict, { offsetSize: 9 }))).toBeNull();
  });

  it("rejects an offset table that runs past the trailer", () => {
    expect(parsePlist(rawBinaryPlist(nameDict, { objectCount: 1_000_000 }))).toBeNull();
  });

  it("rejects object offsets outside the object area", () => {
    expect(parsePlist(rawBinaryPlist(nameDict, { offsetFor: (_, tableOffset) => tableOffset }))).toBeNull();
    expect(parsePlist(rawBinaryPlist(nameDict, { offsetFor: () => 2 }))).toBeNull();
  });

  it("rejects a top object outside the table", () => {
    expect(parsePlist(rawBinaryPlist(nameDict, { top: 3 }))).toBeNull();
  });

  it("stops decoding repeated references that multiply", () => {
    // a dict holding a chain of 20 arrays, each listing the next one 14 times
    const chain: number[][] = [[0xd1, 1, 2], [0x51, ...encoder.encode("k")]];
    for (let ref = 2; ref < 22; ref += 1) chain.push([0xae, ...Array<number>(14).fill(ref + 1)]);
    chain.push([0x08]);
    expect(parsePlist(rawBinaryPlist(chain))).toBeNull();
  });

  it("rejects a container whose length runs into the offset table", () => {
    expect(parsePlist(rawBinaryPlist([[0xdf, 0x10, 0x7f, 1, 2], ...nameDict.slice(1)]))).toBeNull();
  });
});

describe("plistString", () => {
  it("returns non-empty strings only", () => {
    const dict = { name: "Demo", empty: "", count: 3 };
    expect(plistString(dict, "name")).toBe("Demo");
    expect(plistString(dict, "empty")).toBeNull();
    expect(plistString(dict, "count")).toBeNull();
    expect(plistString(dict, "missing")).toBeNull();
  });
});
