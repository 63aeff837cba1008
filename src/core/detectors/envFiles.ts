import { readFile, stat } from "node:fs/promises";
import type { Finding } from "@/types";
import type { EnvFileRules } from "../rules";
import { renderRemediation } from "../rules";
import type { Detector } from "./types";
import { relativeToRoot, walkAssetFiles } from "./walk";

const KEY_PREVIEW_LIMIT = 5;

/** Names of `key=value` lines whose key contains a sensitive token. Comments are ignored. */
export function extractSensitiveKeys(content: string, tokens: readonly string[]): string[] {
  const keys: string[] = [];
  for (const raw of content.split("\n")) {
    const line = raw.trim();
    if (line.startsWith("#") || !line.includes("=")) continue;
    const key = line.slice(0, line.indexOf("=")).trim();
    const lower = key.toLowerCase();
    if (key && tokens.some((token) => lower.includes(token))) {
      keys.push(key);
    }
  }
  return keys;
}

export function describeEnvFile(relativePath: string, keys: string[]): string {
  const preview = keys.slice(0, KEY_PREVIEW_LIMIT).join(", ");
  const overflow = keys.length > KEY_PREVIEW_LIMIT ? "..." : "";
  return (
    `Environment configuration file found at '${relativePath}'. ` +
    "This file is completely unprotected and can be extracted in < 30 seconds. " +
    `Found ${keys.length} sensitive keys: ${preview}${overflow}`
  );
}

function isEnvFileName(rules: EnvFileRules, name: string): boolean {
  return rules.filenames.includes(name);
}

export const envFileDetector: Detector = {
  id: "env-file",
  label: "Environment files",

  async scan(tree, _platform, { config, rules, logger, signal }) {
    const findings: Finding[] = [];
    const envRules = rules.env;

    for await (const file of walkAssetFiles(tree, signal)) {
      if (!isEnvFileName(envRules, file.name)) continue;

      let content: string;
      try {
        const info = await stat(file.absolutePath);
        if (info.size > config.maxTextFileBytes) {
          logger.debug(`Skipping ${file.name}: ${info.size} bytes exceeds text file limit`);
          continue;
        }
        content = await readFile(file.absolutePath, "utf-8");
      } catch (error) {
        logger.debug(`Could not read ${file.absolutePath}: ${String(error)}`);
        continue;
      }

      const relativePath = relativeToRoot(tree, file.absolutePath);
      const keys = extractSensitiveKeys(content, envRules.sensitiveKeyTokens);
      findings.push({
        id: `env-file:${relativePath}`,
        detector: "env-file",
        severity: envRules.severity,
        title: `${file.name} File Exposed`,
        description: describeEnvFile(relativePath, keys),
        file: relativePath,
        line: null,
        remediation: renderRemediation(rules, envRules.remediation, { name: file.name }),
        owasp: envRules.owasp,
        cwe: envRules.cwe,
        cvss: envRules.cvss
      });
    }

    return findings;
  }
};
