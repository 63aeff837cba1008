import path from "node:path";
import type { Platform } from "@/types";
import { ScanError } from "../errors";
import { ApkExtractor } from "./apk";
import type { BaseExtractor, ExtractorOptions } from "./extractor";
import { IpaExtractor } from "./ipa";

export { ApkExtractor } from "./apk";
export { IpaExtractor } from "./ipa";
export { BaseExtractor, PREFERRED_ARCHITECTURES, sortArchitectures } from "./extractor";
export type { ExtractedPackage, ExtractionStats, ExtractorOptions } from "./extractor";

const PLATFORM_BY_EXTENSION: Record<string, Platform> = {
  ".apk": "android",
  ".ipa": "ios"
};

/** Platform from the package extension. Throws UNSUPPORTED_FORMAT for anything else. */
export function platformForFile(filePath: string): Platform {
  const platform = PLATFORM_BY_EXTENSION[path.extname(filePath).toLowerCase()];
  if (!platform) {
    throw new ScanError(
      "UNSUPPORTED_FORMAT",
      `Unsupported file format: ${path.extname(filePath) || path.basename(filePath)} (expected .apk or .ipa)`
    );
  }
  return platform;
}

export function createExtractor(filePath: string, options: ExtractorOptions = {}): BaseExtractor {
  return platformForFile(filePath) === "android"
    ? new ApkExtractor(filePath, options)
    : new IpaExtractor(filePath, options);
}
