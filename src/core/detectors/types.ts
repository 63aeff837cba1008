import type { Finding, PackageTree, Platform } from "@/types";
import type { ScanConfig } from "../config";
import type { Logger } from "../log";
import type { RulePack } from "../rules";

export interface DetectorContext {
  config: ScanConfig;
  rules: RulePack;
  logger: Logger;
  signal?: AbortSignal;
}

/**
 * A read-only scanning pass over an extracted package. Detectors share no
 * state; per-file failures are recovered inside `scan` and never thrown.
 */
export interface Detector {
  readonly id: string;
  readonly label: string;
  scan(tree: PackageTree, platform: Platform, context: DetectorContext): Promise<Finding[]>;
}
