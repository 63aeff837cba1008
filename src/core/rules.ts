import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { z } from "zod";
import type { AttackerProfile, Remediation, Severity } from "@/types";
import { ATTACKER_LEVELS } from "@/types";
import { deepFreeze } from "./freeze";
import type { Logger } from "./log";
import { silentLogger } from "./log";

export const DEFAULT_RULES_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../rules");

export class RulePackError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RulePackError";
  }
}

const severitySchema = z.enum(["CRITICAL", "HIGH", "MEDIUM", "LOW", "INFO"]);
const tokenList = z.array(z.string().min(1));

const manifestSchema = z.object({
  env: z.string(),
  assets: z.string(),
  strings: z.string(),
  remediations: z.string(),
  attackers: z.string()
});

const envRulesSchema = z.object({
  filenames: tokenList.min(1),
  sensitiveKeyTokens: tokenList,
  severity: severitySchema,
  owasp: z.string(),
  cwe: z.string(),
  cvss: z.number().min(0).max(10),
  remediation: z.string()
});

const assetRulesSchema = z.object({
  sensitiveExtensions: tokenList,
  sensitiveFilenames: tokenList,
  benignPatterns: tokenList,
  severityRules: z.array(z.object({ severity: severitySchema, tokens: tokenList })),
  defaultSeverity: severitySchema,
  remediationRules: z.array(z.object({ remediation: z.string(), tokens: tokenList })),
  defaultRemediation: z.string(),
  owasp: z.string(),
  cwe: z.string()
});

const stringRulesSchema = z.object({
  patterns: z.array(
    z.object({
      id: z.string().min(1),
      title: z.string().optional(),
      regex: z.string().min(1),
      flags: z.string().regex(/^[imsu]*$/).default(""),
      severity: severitySchema.default("LOW"),
      excludeSubstrings: tokenList.default([])
    })
  ),
  sampleLimit: z.number().int().positive(),
  owasp: z.string(),
  cwe: z.string(),
  remediation: z.string()
});

const remediationSchema = z.object({
  summary: z.string(),
  rootCause: z.string(),
  whyWrong: z.string(),
  fixSteps: z.array(z.string()),
  codeBefore: z.string().optional(),
  codeAfter: z.string().optional(),
  verification: z.string().optional(),
  references: z.array(z.string()).default([])
});

const attackerSchema = z.object({
  level: z.enum(["beginner", "intermediate", "advanced"]),
  label: z.string(),
  baselineMinutes: z.number().nonnegative(),
  successRate: z.number().min(0).max(1),
  tools: z.array(z.string()),
  capabilities: z.array(z.string()),
  scenario: z.array(z.string()),
  defenses: z.array(z.string())
});

export type EnvFileRules = z.infer<typeof envRulesSchema>;
export type AssetRules = z.infer<typeof assetRulesSchema>;

export interface CompiledStringPattern {
  id: string;
  title: string;
  regex: RegExp;
  severity: Severity;
  excludeSubstrings: string[];
}

export interface StringRules {
  patterns: CompiledStringPattern[];
  sampleLimit: number;
  owasp: string;
  cwe: string;
  remediation: string;
}

export interface RulePack {
  env: EnvFileRules;
  assets: AssetRules;
  strings: StringRules;
  remediations: Record<string, Remediation>;
  attackers: AttackerProfile[];
}

function readYaml(dir: string, file: string): unknown {
  const filePath = path.resolve(dir, file);
  try {
    return YAML.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new RulePackError(`Failed to read rule pack ${file}`, { cause: error });
  }
}

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, file: string): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "<root>"}: ${issue.message}` : "invalid content";
    throw new RulePackError(`Invalid rule pack ${file} (${where})`);
  }
  return parsed.data;
}

export function compileStringPatterns(
  defs: z.infer<typeof stringRulesSchema>["patterns"],
  logger: Logger = silentLogger
): CompiledStringPattern[] {
  const compiled: CompiledStringPattern[] = [];
  for (const def of defs) {
    try {
      compiled.push({
        id: def.id,
        title: def.title ?? `${def.id} Found`,
        // no "g": RegExp.test must not carry lastIndex between candidates
        regex: new RegExp(def.regex, def.flags),
        severity: def.severity,
        excludeSubstrings: def.excludeSubstrings
      });
    } catch (error) {
      logger.warn(`Failed to compile string pattern ${def.id}`, error);
    }
  }
  return compiled;
}

export function loadRulePack(dir: string = DEFAULT_RULES_DIR, logger: Logger = silentLogger): RulePack {
  const manifest = parseWith(manifestSchema, JSON.parse(readFileSync(path.resolve(dir, "index.json"), "utf-8")), "index.json");

  const env = parseWith(envRulesSchema, readYaml(dir, manifest.env), manifest.env);
  const assets = parseWith(assetRulesSchema, readYaml(dir, manifest.assets), manifest.assets);
  const stringDefs = parseWith(stringRulesSchema, readYaml(dir, manifest.strings), manifest.strings);
  const remediations = parseWith(z.record(remediationSchema), readYaml(dir, manifest.remediations), manifest.remediations);
  const attackers = parseWith(z.array(attackerSchema), readYaml(dir, manifest.attackers), manifest.attackers);

  const referenced = [
    env.remediation,
    stringDefs.remediation,
    assets.defaultRemediation,
    ...assets.remediationRules.map((rule) => rule.remediation)
  ];
  for (const id of referenced) {
    if (!remediations[id]) {
      throw new RulePackError(`Unknown remediation template "${id}" in ${manifest.remediations}`);
    }
  }

  const levels = attackers.map((profile) => profile.level);
  if (levels.length !== ATTACKER_LEVELS.length || ATTACKER_LEVELS.some((level, i) => levels[i] !== level)) {
    throw new RulePackError(`Attacker profiles must be listed as ${ATTACKER_LEVELS.join(", ")}`);
  }

  return deepFreeze({
    env,
    assets,
    strings: { ...stringDefs, patterns: compileStringPatterns(stringDefs.patterns, logger) },
    remediations,
    attackers
  });
}

let defaultPack: RulePack | undefined;

/** The bundled rule pack, loaded once per process and frozen. */
export function getDefaultRulePack(): RulePack {
  defaultPack ??= loadRulePack();
  return defaultPack;
}

export function fillTemplate(template: string, vars: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (whole, key: string) => {
    const value = vars[key];
    return value === undefined ? whole : String(value);
  });
}

export function renderRemediation(
  pack: RulePack,
  id: string,
  vars: Record<string, string | number>
): Remediation {
  const template = pack.remediations[id];
  if (!template) {
    throw new RulePackError(`Unknown remediation template "${id}"`);
  }
  const fill = (value: string) => fillTemplate(value, vars);
  const remediation: Remediation = {
    summary: fill(template.summary),
    rootCause: fill(template.rootCause),
    whyWrong: fill(template.whyWrong),
    fixSteps: template.fixSteps.map(fill),
    references: [...template.references]
  };
  if (template.codeBefore !== undefined) remediation.codeBefore = fill(template.codeBefore);
  if (template.codeAfter !== undefined) remediation.codeAfter = fill(template.codeAfter);
  if (template.verification !== undefined) remediation.verification = fill(template.verification);
  return remediation;
}
