import path from "node:path";
import type { Finding } from "@/types";
import { isAbortError } from "../errors";
import type { CompiledStringPattern, StringRules } from "../rules";
import { renderRemediation } from "../rules";
import { extractPrintableStrings } from "./strings";
import type { Detector } from "./types";
import { relativeToRoot } from "./walk";

export function matchesPattern(pattern: CompiledStringPattern, candidate: string): boolean {
  if (!pattern.regex.test(candidate)) return false;
  return !pattern.excludeSubstrings.some((domain) => candidate.includes(domain));
}

export function describeMatches(patternId: string, binaryName: string, matches: string[], sampleLimit: number): string {
  const preview = matches
    .slice(0, sampleLimit)
    .map((match) => `  - ${match}`)
    .join("\n");
  const overflow = matches.length > sampleLimit ? `\n  ... and ${matches.length - sampleLimit} more` : "";
  return `Found ${matches.length} instances of ${patternId} in ${binaryName}:\n\n${preview}${overflow}`;
}

/** One finding per pattern with at least one unique match, in pattern table order. */
export function findingsForMatches(
  rules: Pick<StringRules, "patterns" | "sampleLimit" | "owasp" | "cwe" | "remediation">,
  matches: Map<string, Set<string>>,
  binaryName: string,
  relativePath: string,
  renderFix: (patternId: string) => Finding["remediation"]
): Finding[] {
  const findings: Finding[] = [];
  for (const pattern of rules.patterns) {
    const found = matches.get(pattern.id);
    if (!found || found.size === 0) continue;
    findings.push({
      id: `binary-string:${pattern.id}`,
      detector: "binary-string",
      severity: pattern.severity,
      title: pattern.title,
      description: describeMatches(pattern.id, binaryName, [...found], rules.sampleLimit),
      file: relativePath,
      line: null,
      remediation: renderFix(pattern.id),
      owasp: rules.owasp,
      cwe: rules.cwe,
      cvss: null
    });
  }
  return findings;
}

export const binaryStringDetector: Detector = {
  id: "binary-string",
  label: "Native binary strings",

  async scan(tree, _platform, { config, rules, logger, signal }) {
    // One architecture is enough: every ABI is compiled from the same Dart sources.
    const binary = tree.nativeBinaries[0];
    if (!binary) {
      logger.debug("No native application binary found");
      return [];
    }

    const patterns = rules.strings.patterns;
    const matches = new Map<string, Set<string>>(patterns.map((pattern) => [pattern.id, new Set<string>()]));
    try {
      const candidates = extractPrintableStrings(binary.path, {
        minLength: config.minStringLength,
        maxLength: config.maxStringLength,
        chunkBytes: config.readChunkBytes,
        maxBytes: config.maxBinaryBytes,
        signal
      });
      for await (const candidate of candidates) {
        for (const pattern of patterns) {
          if (matchesPattern(pattern, candidate)) {
            matches.get(pattern.id)?.add(candidate);
          }
        }
      }
    } catch (error) {
      if (isAbortError(error)) throw error;
      logger.debug(`Could not read ${binary.path}: ${String(error)}`);
      return [];
    }

    const binaryName = path.basename(binary.path);
    return findingsForMatches(rules.strings, matches, binaryName, relativeToRoot(tree, binary.path), (patternId) =>
      renderRemediation(rules, rules.strings.remediation, { pattern: patternId, name: binaryName })
    );
  }
};
