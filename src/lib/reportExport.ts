import { z } from "zod";
import type { AnalysisResult, Finding, Remediation, ScanOutcome, Severity } from "@/types";
import { PLATFORM_LABELS, SEVERITY_ORDER } from "@/types";
import type { ScoreComparison, ScoreSnapshot } from "@/core/score";
import { analyzeSecurityPosture, countBySeverity, gradeLabel, riskLevelFor } from "@/core/score";

function remediationToJson(remediation: Remediation) {
  return {
    summary: remediation.summary,
    root_cause: remediation.rootCause,
    why_wrong: remediation.whyWrong,
    fix_steps: remediation.fixSteps,
    code_before: remediation.codeBefore ?? null,
    code_after: remediation.codeAfter ?? null,
    verification: remediation.verification ?? null,
    references: remediation.references
  };
}

export function findingToJson(finding: Finding) {
  return {
    severity: finding.severity,
    title: finding.title,
    description: finding.description,
    file_path: finding.file,
    line_number: finding.line,
    owasp: finding.owasp,
    cwe: finding.cwe,
    cvss_score: finding.cvss,
    remediation: finding.remediation ? remediationToJson(finding.remediation) : null
  };
}

export function resultToJson(result: AnalysisResult) {
  return {
    app_name: result.appName,
    package_name: result.packageName,
    platform: result.platform,
    file_path: result.filePath,
    flutter_detected: result.flutterDetected,
    security_score: result.securityScore,
    grade: result.grade,
    grade_label: gradeLabel(result.grade),
    risk_level: riskLevelFor(result.securityScore),
    attack_surface_score: result.attackSurface,
    time_to_compromise_minutes: result.timeToCompromiseMinutes,
    attacker_profile: result.attackerProfile?.level ?? null,
    timestamp: result.createdAt,
    findings_count: countBySeverity(result.findings),
    findings: result.findings.map(findingToJson)
  };
}

export interface JsonReportOptions {
  /** Include the attack simulation block. */
  attackSimulation?: boolean;
}

export function outcomeToJson({ result, simulation }: ScanOutcome, { attackSimulation = true }: JsonReportOptions = {}) {
  const base = resultToJson(result);
  if (!attackSimulation) return base;
  return {
    ...base,
    attack_simulation: {
      most_likely_attacker: simulation.mostLikelyAttacker,
      compromised: simulation.compromised,
      time_to_compromise_minutes: simulation.timeToCompromiseMinutes,
      attack_scenario: simulation.scenario,
      defenses: simulation.defenses,
      profiles: {
        beginner: profileToJson(simulation.profiles.beginner),
        intermediate: profileToJson(simulation.profiles.intermediate),
        advanced: profileToJson(simulation.profiles.advanced)
      }
    }
  };
}

function profileToJson(assessment: ScanOutcome["simulation"]["profiles"]["beginner"]) {
  return {
    can_exploit: assessment.canExploit,
    time_minutes: assessment.timeMinutes,
    exploitable_findings: assessment.exploitableFindings
  };
}

export function reportToJson(outcome: ScanOutcome, options?: JsonReportOptions): string {
  return `${JSON.stringify(outcomeToJson(outcome, options), null, 2)}\n`;
}

const severitySchema = z.enum(["CRITICAL", "HIGH", "MEDIUM", "LOW", "INFO"]);

const jsonReportSchema = z.object({
  security_score: z.number().min(0).max(100),
  grade: z.string(),
  findings_count: z.record(z.number().int().nonnegative()).optional(),
  findings: z.array(z.object({ severity: severitySchema }))
});

/**
 * Reads the comparable parts of a report written by `reportToJson`.
 * Throws a ZodError when the document does not have that shape.
 */
export function readScoreSnapshot(json: unknown): ScoreSnapshot {
  const report = jsonReportSchema.parse(json);
  return {
    securityScore: report.security_score,
    grade: report.grade,
    counts: countBySeverity(report.findings),
    total: report.findings.length
  };
}

function formatMinutes(minutes: number): string {
  if (minutes === 0) return "n/a";
  if (minutes < 60) return `${minutes} minutes`;
  const hours = minutes / 60;
  return `${Number.isInteger(hours) ? hours : hours.toFixed(1)} hours`;
}

export function reportToMarkdown({ result, simulation, warnings }: ScanOutcome): string {
  const counts = countBySeverity(result.findings);
  const lines: string[] = [];
  lines.push(`# Security Report: ${result.appName}`);
  lines.push("");
  lines.push(`- Package: **${result.packageName}**`);
  lines.push(`- Platform: **${PLATFORM_LABELS[result.platform]}**`);
  lines.push(`- File: \`${result.filePath}\``);
  lines.push(`- Scanned At: **${result.createdAt}**`);
  lines.push(`- Security Score: **${result.securityScore}/100 (${gradeLabel(result.grade)})**`);
  lines.push(`- Risk Level: **${riskLevelFor(result.securityScore)}**`);
  lines.push(`- Attack Surface: **${result.attackSurface}/10**`);
  lines.push(`- Time to Compromise: **${formatMinutes(result.timeToCompromiseMinutes)}**`);
  lines.push("");

  if (warnings.length > 0) {
    lines.push("## Warnings");
    for (const warning of warnings) {
      lines.push(`- ${warning}`);
    }
    lines.push("");
  }

  lines.push(`## Findings (${result.findings.length})`);
  lines.push(severityCountsLine(counts));
  lines.push("");
  if (result.findings.length === 0) {
    lines.push("No findings detected.");
    lines.push("");
  }
  for (const finding of result.findings) {
    lines.push(`### [${finding.severity}] ${finding.title}`);
    if (finding.file) lines.push(`- File: \`${finding.file}\``);
    if (finding.owasp) lines.push(`- OWASP: ${finding.owasp}`);
    if (finding.cwe) lines.push(`- CWE: ${finding.cwe}`);
    if (finding.cvss !== null) lines.push(`- CVSS: ${finding.cvss}`);
    lines.push("");
    lines.push(finding.description);
    lines.push("");
    const fix = finding.remediation;
    if (fix) {
      lines.push(`#### Remediation: ${fix.summary}`);
      lines.push(`- Root cause: ${fix.rootCause}`);
      lines.push(`- Why it matters: ${fix.whyWrong}`);
      lines.push("");
      for (const step of fix.fixSteps) {
        lines.push(`- ${step}`);
      }
      lines.push("");
      if (fix.codeBefore) {
        lines.push("Before:", "```", fix.codeBefore, "```", "");
      }
      if (fix.codeAfter) {
        lines.push("After:", "```", fix.codeAfter, "```", "");
      }
      if (fix.verification) {
        lines.push(`Verification: ${fix.verification.replace(/\n/g, "; ")}`, "");
      }
      for (const reference of fix.references) {
        lines.push(`- <${reference}>`);
      }
      if (fix.references.length > 0) lines.push("");
    }
  }

  lines.push("## Attack Simulation");
  lines.push("");
  lines.push(...simulation.scenario);
  lines.push("");
  lines.push("### Defenses");
  for (const defense of simulation.defenses) {
    lines.push(`- ${defense}`);
  }
  lines.push("");

  return lines.join("\n");
}

export interface TextReportOptions {
  attackSimulation?: boolean;
  /** Print each finding's description under its title. */
  details?: boolean;
}

/** Plain-text terminal summary. */
export function reportToText(
  { result, simulation }: ScanOutcome,
  { attackSimulation = false, details = false }: TextReportOptions = {}
): string {
  const posture = analyzeSecurityPosture(result);
  const lines: string[] = [];
  lines.push(`App:          ${result.appName} (${result.packageName})`);
  lines.push(`Platform:     ${PLATFORM_LABELS[result.platform]}`);
  lines.push(`Score:        ${result.securityScore}/100  Grade: ${posture.grade}  (${posture.riskLevel})`);
  lines.push(`Attack surface: ${result.attackSurface}/10`);
  const breakdown = SEVERITY_ORDER.filter((severity) => posture.breakdown[severity] > 0)
    .map((severity) => `${posture.breakdown[severity]} ${severity.toLowerCase()}`)
    .join(", ");
  lines.push(`Findings:     ${posture.totalFindings}${breakdown ? ` (${breakdown})` : ""}`);
  if (result.findings.length > 0) lines.push("");
  for (const finding of result.findings) {
    lines.push(`[${finding.severity}] ${finding.title}${finding.file ? `  (${finding.file})` : ""}`);
    if (details) {
      for (const line of finding.description.split("\n")) {
        lines.push(line ? `    ${line}` : "");
      }
      if (finding.remediation) lines.push(`    Fix: ${finding.remediation.summary}`);
    }
  }
  if (posture.priorityFixes.length > 0) {
    lines.push("");
    lines.push("Fix first:");
    posture.priorityFixes.forEach((title, index) => lines.push(`  ${index + 1}. ${title}`));
  }
  lines.push("");
  lines.push(posture.recommendation);
  if (attackSimulation) {
    lines.push("");
    lines.push(...simulation.scenario);
  }
  return `${lines.join("\n")}\n`;
}

export function comparisonToText(comparison: ScoreComparison): string {
  const sign = comparison.scoreImprovement > 0 ? "+" : "";
  return [
    `Before: ${comparison.beforeScore}/100 (${comparison.beforeGrade})`,
    `After:  ${comparison.afterScore}/100 (${comparison.afterGrade})`,
    `Change: ${sign}${comparison.scoreImprovement} (${comparison.status})`,
    `Fixed:  ${comparison.fixedCritical} critical, ${comparison.fixedHigh} high, ${comparison.fixedTotal} total`,
    ""
  ].join("\n");
}

export function severityCountsLine(counts: Record<Severity, number>): string {
  return SEVERITY_ORDER.map((severity) => `${severity}: ${counts[severity]}`).join(" | ");
}
