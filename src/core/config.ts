import { z } from "zod";

export interface ScanConfig {
  /** Packages larger than this are rejected before decoding. */
  maxArchiveBytes: number;
  maxEntries: number;
  /** Entries whose uncompressed size exceeds this are skipped. */
  maxEntryBytes: number;
  maxExtractedBytes: number;
  /** Env/config files larger than this are not parsed. */
  maxTextFileBytes: number;
  /** Read cap for native binary string extraction. */
  maxBinaryBytes: number;
  minStringLength: number;
  maxStringLength: number;
  readChunkBytes: number;
  /** Parent directory for auto-generated working directories; defaults to os.tmpdir(). */
  workRoot?: string;
}

const MiB = 1024 * 1024;

export const DEFAULT_SCAN_CONFIG: Readonly<ScanConfig> = Object.freeze({
  maxArchiveBytes: 1024 * MiB,
  maxEntries: 30000,
  maxEntryBytes: 512 * MiB,
  maxExtractedBytes: 2048 * MiB,
  maxTextFileBytes: 2 * MiB,
  maxBinaryBytes: 512 * MiB,
  minStringLength: 8,
  maxStringLength: 4096,
  readChunkBytes: 64 * 1024
});

const positiveInt = z.number().int().positive();

const scanConfigSchema = z
  .object({
    maxArchiveBytes: positiveInt,
    maxEntries: positiveInt,
    maxEntryBytes: positiveInt,
    maxExtractedBytes: positiveInt,
    maxTextFileBytes: positiveInt,
    maxBinaryBytes: positiveInt,
    minStringLength: positiveInt,
    maxStringLength: positiveInt,
    readChunkBytes: positiveInt,
    workRoot: z.string().min(1).optional()
  })
  .refine((cfg) => cfg.maxStringLength >= cfg.minStringLength, {
    message: "maxStringLength must be at least minStringLength",
    path: ["maxStringLength"]
  });

const ENV_KEYS: Record<Exclude<keyof ScanConfig, "workRoot">, string> = {
  maxArchiveBytes: "BUNDLE_AUDIT_MAX_ARCHIVE_BYTES",
  maxEntries: "BUNDLE_AUDIT_MAX_ENTRIES",
  maxEntryBytes: "BUNDLE_AUDIT_MAX_ENTRY_BYTES",
  maxExtractedBytes: "BUNDLE_AUDIT_MAX_EXTRACTED_BYTES",
  maxTextFileBytes: "BUNDLE_AUDIT_MAX_TEXT_FILE_BYTES",
  maxBinaryBytes: "BUNDLE_AUDIT_MAX_BINARY_BYTES",
  minStringLength: "BUNDLE_AUDIT_MIN_STRING_LENGTH",
  maxStringLength: "BUNDLE_AUDIT_MAX_STRING_LENGTH",
  readChunkBytes: "BUNDLE_AUDIT_READ_CHUNK_BYTES"
};

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

/**
 * Merges a partial override onto the defaults and validates the result.
 * Throws a ZodError when a limit is not a positive integer.
 */
export function resolveScanConfig(overrides: Partial<ScanConfig> = {}): ScanConfig {
  return scanConfigSchema.parse({ ...DEFAULT_SCAN_CONFIG, ...overrides });
}

export function loadScanConfig(env: NodeJS.ProcessEnv = process.env): ScanConfig {
  const overrides: Partial<ScanConfig> = {};
  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    if (isLimitKey(key)) {
      overrides[key] = readInt(env, envName, DEFAULT_SCAN_CONFIG[key]);
    }
  }
  const workRoot = env.BUNDLE_AUDIT_WORK_ROOT?.trim();
  if (workRoot) {
    overrides.workRoot = workRoot;
  }
  return resolveScanConfig(overrides);
}

function isLimitKey(key: string): key is keyof typeof ENV_KEYS {
  return key in ENV_KEYS;
}
