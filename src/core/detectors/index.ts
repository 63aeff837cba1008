import { assetExposureDetector } from "./assets";
import { binaryStringDetector } from "./binaryStrings";
import { envFileDetector } from "./envFiles";
import type { Detector } from "./types";

export type { Detector, DetectorContext } from "./types";
export { assetExposureDetector } from "./assets";
export { binaryStringDetector } from "./binaryStrings";
export { envFileDetector } from "./envFiles";

/** Registry order is the order findings appear in a result. */
export const DEFAULT_DETECTORS: readonly Detector[] = Object.freeze([
  envFileDetector,
  assetExposureDetector,
  binaryStringDetector
]);
