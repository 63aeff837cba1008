import { unzipSync } from "fflate";
import path from "node:path";

const textDecoder = new TextDecoder("utf-8", { fatal: false });

// Local file header, empty-archive end record, spanned-archive marker.
const ZIP_SIGNATURES = [
  [0x50, 0x4b, 0x03, 0x04],
  [0x50, 0x4b, 0x05, 0x06],
  [0x50, 0x4b, 0x07, 0x08]
];

const END_OF_CENTRAL_DIRECTORY_SIZE = 22;

export interface FileEntry {
  path: string;
  data: Uint8Array;
}

export interface UnzipOptions {
  maxEntries?: number;
  maxEntryBytes?: number;
  maxTotalBytes?: number;
}

export interface UnzipResult {
  files: FileEntry[];
  directories: string[];
  skipped: string[];
}

export function hasZipSignature(buffer: Uint8Array): boolean {
  if (buffer.length < END_OF_CENTRAL_DIRECTORY_SIZE) return false;
  return ZIP_SIGNATURES.some((signature) => signature.every((byte, i) => buffer[i] === byte));
}

/**
 * Decodes a zip container held in memory. Entries beyond the configured
 * limits, and entries whose names would escape the extraction root, are
 * reported in `skipped` instead of being returned. Throws on corrupt data.
 */
export function unzipArchive(buffer: Uint8Array, options: UnzipOptions = {}): UnzipResult {
  const {
    maxEntries = 30000,
    maxEntryBytes = 512 * 1024 * 1024,
    maxTotalBytes = 2048 * 1024 * 1024
  } = options;

  const skipped: string[] = [];
  let accepted = 0;
  let totalSize = 0;

  const files = unzipSync(buffer, {
    filter(file) {
      if (safeEntryPath(file.name) === null) {
        skipped.push(file.name);
        return false;
      }
      if (accepted >= maxEntries || file.originalSize > maxEntryBytes || totalSize + file.originalSize > maxTotalBytes) {
        skipped.push(file.name);
        return false;
      }
      accepted += 1;
      totalSize += file.originalSize;
      return true;
    }
  });

  const result: UnzipResult = { files: [], directories: [], skipped };
  for (const [name, data] of Object.entries(files)) {
    const entryPath = safeEntryPath(name);
    if (entryPath === null) continue;
    if (name.endsWith("/")) {
      result.directories.push(entryPath);
    } else {
      result.files.push({ path: entryPath, data });
    }
  }
  return result;
}

/**
 * Normalizes a zip entry name to a relative POSIX path, or null when the
 * name is absolute or climbs out of the extraction root.
 */
export function safeEntryPath(name: string): string | null {
  const unified = name.replace(/\\/g, "/");
  if (unified.startsWith("/") || /^[a-zA-Z]:/.test(unified)) {
    return null;
  }
  const normalized = path.posix.normalize(unified).replace(/\/+$/, "");
  if (normalized === "" || normalized === "." || normalized === ".." || normalized.startsWith("../")) {
    return null;
  }
  return normalized;
}

export function decodeUtf8(data: Uint8Array): string {
  return textDecoder.decode(data);
}
