import { open } from "node:fs/promises";
import { throwIfCancelled } from "../errors";

export interface StringExtractionOptions {
  minLength: number;
  maxLength: number;
  chunkBytes: number;
  /** Bytes past this offset are not read. */
  maxBytes: number;
  signal?: AbortSignal;
}

function isPrintable(byte: number): boolean {
  return byte >= 0x20 && byte <= 0x7e;
}

/** Bytes of a capped run carried into the next piece, so a match across the cut is still seen whole. */
export const RUN_OVERLAP_BYTES = 256;

/**
 * Lazily yields runs of printable ASCII of at least `minLength` characters,
 * reading the file in fixed-size chunks. A run that reaches `maxLength` is
 * emitted and continued in a new piece that starts with its last
 * `RUN_OVERLAP_BYTES` bytes (at most half of `maxLength`).
 */
export async function* extractPrintableStrings(
  filePath: string,
  { minLength, maxLength, chunkBytes, maxBytes, signal }: StringExtractionOptions
): AsyncGenerator<string> {
  const handle = await open(filePath, "r");
  try {
    const buffer = Buffer.alloc(chunkBytes);
    const run = Buffer.alloc(maxLength);
    const overlap = Math.min(RUN_OVERLAP_BYTES, Math.floor(maxLength / 2));
    let runLength = 0;
    // leading bytes of `run` already emitted with the previous piece
    let carried = 0;
    let position = 0;

    while (position < maxBytes) {
      throwIfCancelled(signal);
      const { bytesRead } = await handle.read(buffer, 0, Math.min(chunkBytes, maxBytes - position), position);
      if (bytesRead === 0) break;
      position += bytesRead;

      for (let i = 0; i < bytesRead; i += 1) {
        const byte = buffer[i] ?? 0;
        if (isPrintable(byte)) {
          run[runLength] = byte;
          runLength += 1;
          if (runLength === maxLength) {
            yield run.toString("latin1", 0, runLength);
            run.copyWithin(0, runLength - overlap, runLength);
            runLength = overlap;
            carried = overlap;
          }
        } else {
          if (runLength > carried && runLength >= minLength) yield run.toString("latin1", 0, runLength);
          runLength = 0;
          carried = 0;
        }
      }
    }

    if (runLength > carried && runLength >= minLength) yield run.toString("latin1", 0, runLength);
  } finally {
    await handle.close();
  }
}
