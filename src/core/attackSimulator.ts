import type {
  AttackSimulationOutcome,
  AttackerLevel,
  AttackerProfile,
  Finding,
  ProfileAssessment
} from "@/types";
import { ATTACKER_LEVELS } from "@/types";
import { fillTemplate } from "./rules";
import { countBySeverity } from "./score";

const EXPLOITABLE_LIST_LIMIT = 10;

type SimulatedFinding = Pick<Finding, "severity" | "title" | "description">;

/**
 * A finding a beginner can act on: a critical environment-file exposure,
 * recognised by its title or by the wording of its description.
 */
export function isEnvFileExposure(finding: SimulatedFinding): boolean {
  return (
    finding.severity === "CRITICAL" &&
    (finding.title.toLowerCase().includes(".env") ||
      finding.description.toLowerCase().includes("environment configuration file"))
  );
}

const EXPLOIT_PREDICATES: Record<AttackerLevel, (finding: SimulatedFinding) => boolean> = {
  beginner: isEnvFileExposure,
  intermediate: (finding) => finding.severity === "CRITICAL" || finding.severity === "HIGH",
  advanced: () => true
};

export function canExploit(level: AttackerLevel, findings: readonly SimulatedFinding[]): boolean {
  return findings.some(EXPLOIT_PREDICATES[level]);
}

/** Minutes for `level` to compromise the app; 0 when it cannot. */
export function timeToCompromise(level: AttackerLevel, findings: readonly SimulatedFinding[]): number {
  if (!canExploit(level, findings)) return 0;
  const counts = countBySeverity(findings);

  switch (level) {
    case "beginner":
      return 2;
    case "intermediate":
      if (counts.CRITICAL > 0) return Math.min(10, 5 + counts.CRITICAL * 2);
      return Math.min(45, 15 + counts.HIGH * 5);
    case "advanced":
      if (counts.CRITICAL > 0) return 30;
      if (counts.HIGH > 0) return 90;
      return 180;
  }
}

export function exploitableFindings(level: AttackerLevel, findings: readonly SimulatedFinding[]): string[] {
  return findings
    .filter(EXPLOIT_PREDICATES[level])
    .slice(0, EXPLOITABLE_LIST_LIMIT)
    .map((finding) => finding.title);
}

/** Weakest profile that can exploit; advanced when none can. */
export function selectAttacker(profiles: Record<AttackerLevel, ProfileAssessment>): AttackerLevel {
  return ATTACKER_LEVELS.find((level) => profiles[level].canExploit) ?? "advanced";
}

export function buildScenario(
  profile: AttackerProfile,
  exploitable: boolean,
  findings: readonly SimulatedFinding[]
): string[] {
  const counts = countBySeverity(findings);
  const lines = [
    `**Attacker Profile**: ${profile.label}`,
    `**Tools Required**: ${profile.tools.slice(0, 3).join(", ")}`,
    `**Success Rate**: ${Math.round(profile.successRate * 100)}%`,
    "",
    "**Attack Timeline**:"
  ];
  if (!exploitable) {
    lines.push("**Result**: No exploitable findings for this profile");
    return lines;
  }
  const vars = { critical: counts.CRITICAL, high: counts.HIGH, total: findings.length };
  return [...lines, ...profile.scenario.map((line) => fillTemplate(line, vars))];
}

/**
 * Evaluates every attacker profile against the findings and picks the most
 * likely one. `profiles` must be listed beginner, intermediate, advanced.
 */
export function simulateAttack(
  findings: readonly SimulatedFinding[],
  profiles: readonly AttackerProfile[]
): AttackSimulationOutcome {
  const assess = (level: AttackerLevel): ProfileAssessment => {
    const profile = profiles.find((candidate) => candidate.level === level);
    if (!profile) {
      throw new Error(`Missing attacker profile: ${level}`);
    }
    return {
      profile,
      canExploit: canExploit(level, findings),
      timeMinutes: timeToCompromise(level, findings),
      exploitableFindings: exploitableFindings(level, findings)
    };
  };
  const assessments: Record<AttackerLevel, ProfileAssessment> = {
    beginner: assess("beginner"),
    intermediate: assess("intermediate"),
    advanced: assess("advanced")
  };

  const mostLikely = selectAttacker(assessments);
  const chosen = assessments[mostLikely];
  return {
    profiles: assessments,
    mostLikelyAttacker: mostLikely,
    compromised: chosen.canExploit,
    timeToCompromiseMinutes: chosen.timeMinutes,
    scenario: buildScenario(chosen.profile, chosen.canExploit, findings),
    defenses: [...chosen.profile.defenses]
  };
}
