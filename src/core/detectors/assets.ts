import { stat } from "node:fs/promises";
import path from "node:path";
import type { Finding, Severity } from "@/types";
import type { AssetRules } from "../rules";
import { renderRemediation } from "../rules";
import type { Detector } from "./types";
import { relativeToRoot, walkAssetFiles } from "./walk";

export type SensitivityReason = "extension" | "filename";

const containsAny = (name: string, tokens: readonly string[]) => tokens.some((token) => name.includes(token));

export function isBenignAsset(rules: AssetRules, name: string): boolean {
  return containsAny(name.toLowerCase(), rules.benignPatterns);
}

/** Why a file counts as sensitive, or null. Extension is checked before the exact filename. */
export function classifyAsset(rules: AssetRules, name: string): SensitivityReason | null {
  const lower = name.toLowerCase();
  if (rules.sensitiveExtensions.includes(path.extname(lower))) return "extension";
  if (rules.sensitiveFilenames.some((candidate) => candidate.toLowerCase() === lower)) return "filename";
  return null;
}

export function assetSeverity(rules: AssetRules, name: string): Severity {
  const lower = name.toLowerCase();
  const rule = rules.severityRules.find((candidate) => containsAny(lower, candidate.tokens));
  return rule ? rule.severity : rules.defaultSeverity;
}

export function assetRemediationId(rules: AssetRules, name: string): string {
  const lower = name.toLowerCase();
  const rule = rules.remediationRules.find((candidate) => containsAny(lower, candidate.tokens));
  return rule ? rule.remediation : rules.defaultRemediation;
}

export const assetExposureDetector: Detector = {
  id: "asset-exposure",
  label: "Bundled assets",

  async scan(tree, _platform, { rules, logger, signal }) {
    const findings: Finding[] = [];
    const assetRules = rules.assets;

    for await (const file of walkAssetFiles(tree, signal)) {
      if (isBenignAsset(assetRules, file.name)) continue;
      const reason = classifyAsset(assetRules, file.name);
      if (!reason) continue;

      let size: number;
      try {
        size = (await stat(file.absolutePath)).size;
      } catch (error) {
        logger.debug(`Could not stat ${file.absolutePath}: ${String(error)}`);
        continue;
      }

      const relativePath = relativeToRoot(tree, file.absolutePath);
      findings.push({
        id: `asset-exposure:${relativePath}`,
        detector: "asset-exposure",
        severity: assetSeverity(assetRules, file.name),
        title: `Sensitive File Exposed: ${file.name}`,
        description:
          `File '${file.name}' (${size} bytes) found at '${relativePath}'. ` +
          `Detected as sensitive ${reason}. ` +
          "This file should not be included in production builds.",
        file: relativePath,
        line: null,
        remediation: renderRemediation(rules, assetRemediationId(assetRules, file.name), { name: file.name }),
        owasp: assetRules.owasp,
        cwe: assetRules.cwe,
        cvss: null
      });
    }

    return findings;
  }
};
