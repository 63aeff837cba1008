import type { AnalysisResult, Finding, Grade, SecurityScore, Severity } from "@/types";
import { SEVERITY_ORDER } from "@/types";

export const SEVERITY_WEIGHTS: Readonly<Record<Severity, number>> = Object.freeze({
  CRITICAL: 25,
  HIGH: 15,
  MEDIUM: 8,
  LOW: 3,
  INFO: 0
});

const GRADE_LABELS: Record<Grade, string> = {
  A: "A (Excellent)",
  B: "B (Good)",
  C: "C (Fair)",
  D: "D (Poor)",
  F: "F (Critical)"
};

type SeverityLike = Pick<Finding, "severity">;

export function computeSecurityScore(findings: readonly SeverityLike[]): number {
  const penalty = findings.reduce((acc, finding) => acc + SEVERITY_WEIGHTS[finding.severity], 0);
  return Math.max(0, 100 - penalty);
}

export function gradeFor(score: number): Grade {
  if (score >= 90) return "A";
  if (score >= 75) return "B";
  if (score >= 60) return "C";
  if (score >= 40) return "D";
  return "F";
}

export function gradeLabel(grade: Grade): string {
  return GRADE_LABELS[grade];
}

export function riskLevelFor(score: number): SecurityScore["riskLevel"] {
  if (score >= 80) return "Low Risk";
  if (score >= 60) return "Medium Risk";
  if (score >= 40) return "High Risk";
  return "Critical Risk";
}

export function countBySeverity(findings: readonly SeverityLike[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { CRITICAL: 0, HIGH: 0, MEDIUM: 0, LOW: 0, INFO: 0 };
  for (const finding of findings) {
    counts[finding.severity] += 1;
  }
  return counts;
}

/** Bounded to [0, 10]; critical findings count double. */
export function attackSurfaceIndex(findings: readonly SeverityLike[]): number {
  const counts = countBySeverity(findings);
  return Math.min(10, counts.CRITICAL * 2 + counts.HIGH);
}

export function severityRank(severity: Severity): number {
  return SEVERITY_ORDER.indexOf(severity);
}

/** Most severe first; ties keep their original relative order. */
export function priorityFindings<T extends SeverityLike>(findings: readonly T[], limit = 5): T[] {
  return findings
    .map((finding, index) => ({ finding, index }))
    .sort((a, b) => severityRank(a.finding.severity) - severityRank(b.finding.severity) || a.index - b.index)
    .slice(0, Math.max(0, limit))
    .map(({ finding }) => finding);
}

export function computeScore(findings: readonly SeverityLike[]): SecurityScore {
  const score = computeSecurityScore(findings);
  const grade = gradeFor(score);
  return {
    score,
    grade,
    gradeLabel: gradeLabel(grade),
    riskLevel: riskLevelFor(score),
    attackSurface: attackSurfaceIndex(findings),
    weights: { ...SEVERITY_WEIGHTS }
  };
}

export interface SecurityPosture {
  score: number;
  grade: string;
  riskLevel: SecurityScore["riskLevel"];
  attackSurface: number;
  breakdown: Record<Severity, number>;
  totalFindings: number;
  needsImmediateAttention: boolean;
  priorityFixes: string[];
  recommendation: string;
}

export function recommendationFor(counts: Record<Severity, number>): string {
  if (counts.CRITICAL > 0) return "URGENT: Fix critical issues immediately before production release";
  if (counts.HIGH > 0) return "Fix high severity issues within 1 week";
  if (counts.MEDIUM > 0) return "Address medium issues in next sprint";
  return "Good security posture. Continue monitoring";
}

export function analyzeSecurityPosture(result: AnalysisResult): SecurityPosture {
  const breakdown = countBySeverity(result.findings);
  return {
    score: result.securityScore,
    grade: gradeLabel(result.grade),
    riskLevel: riskLevelFor(result.securityScore),
    attackSurface: result.attackSurface,
    breakdown,
    totalFindings: result.findings.length,
    needsImmediateAttention: breakdown.CRITICAL > 0,
    priorityFixes: priorityFindings(result.findings, 3).map((finding) => finding.title),
    recommendation: recommendationFor(breakdown)
  };
}

/** The parts of a scan two reports are compared on. */
export interface ScoreSnapshot {
  securityScore: number;
  grade: string;
  counts: Record<Severity, number>;
  total: number;
}

export function snapshotOf(result: Pick<AnalysisResult, "securityScore" | "grade" | "findings">): ScoreSnapshot {
  return {
    securityScore: result.securityScore,
    grade: result.grade,
    counts: countBySeverity(result.findings),
    total: result.findings.length
  };
}

export interface ScoreComparison {
  scoreImprovement: number;
  beforeScore: number;
  afterScore: number;
  beforeGrade: string;
  afterGrade: string;
  fixedCritical: number;
  fixedHigh: number;
  fixedTotal: number;
  status: "improved" | "worse" | "unchanged";
}

export function compareScores(before: ScoreSnapshot, after: ScoreSnapshot): ScoreComparison {
  const improvement = after.securityScore - before.securityScore;
  return {
    scoreImprovement: improvement,
    beforeScore: before.securityScore,
    afterScore: after.securityScore,
    beforeGrade: before.grade,
    afterGrade: after.grade,
    fixedCritical: before.counts.CRITICAL - after.counts.CRITICAL,
    fixedHigh: before.counts.HIGH - after.counts.HIGH,
    fixedTotal: before.total - after.total,
    status: improvement > 0 ? "improved" : improvement < 0 ? "worse" : "unchanged"
  };
}
