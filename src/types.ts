export type Severity = "CRITICAL" | "HIGH" | "MEDIUM" | "LOW" | "INFO";

export const SEVERITY_ORDER: readonly Severity[] = ["CRITICAL", "HIGH", "MEDIUM", "LOW", "INFO"];

export type Platform = "android" | "ios";

export const PLATFORM_LABELS: Record<Platform, string> = {
  android: "Android",
  ios: "iOS"
};

export type Grade = "A" | "B" | "C" | "D" | "F";

export interface Remediation {
  summary: string;
  rootCause: string;
  whyWrong: string;
  fixSteps: string[];
  codeBefore?: string;
  codeAfter?: string;
  verification?: string;
  references: string[];
}

export interface Finding {
  id: string;
  detector: string;
  severity: Severity;
  title: string;
  description: string;
  file: string | null;
  line: number | null;
  remediation: Remediation | null;
  owasp: string | null;
  cwe: string | null;
  cvss: number | null;
}

export type AttackerLevel = "beginner" | "intermediate" | "advanced";

export const ATTACKER_LEVELS: readonly AttackerLevel[] = ["beginner", "intermediate", "advanced"];

export interface AttackerProfile {
  level: AttackerLevel;
  label: string;
  baselineMinutes: number;
  successRate: number;
  tools: string[];
  capabilities: string[];
  scenario: string[];
  defenses: string[];
}

export interface ProfileAssessment {
  profile: AttackerProfile;
  canExploit: boolean;
  timeMinutes: number;
  exploitableFindings: string[];
}

export interface AttackSimulationOutcome {
  profiles: Record<AttackerLevel, ProfileAssessment>;
  mostLikelyAttacker: AttackerLevel;
  compromised: boolean;
  timeToCompromiseMinutes: number;
  scenario: string[];
  defenses: string[];
}

export interface SecurityScore {
  score: number;
  grade: Grade;
  gradeLabel: string;
  riskLevel: "Low Risk" | "Medium Risk" | "High Risk" | "Critical Risk";
  attackSurface: number;
  weights: Record<Severity, number>;
}

export interface AnalysisResult {
  readonly appName: string;
  readonly packageName: string;
  readonly platform: Platform;
  readonly filePath: string;
  readonly flutterDetected: boolean;
  readonly findings: readonly Finding[];
  readonly securityScore: number;
  readonly grade: Grade;
  readonly attackSurface: number;
  readonly timeToCompromiseMinutes: number;
  readonly attackerProfile: AttackerProfile | null;
  readonly createdAt: string;
}

export interface ScanStats {
  entries: number;
  skippedEntries: number;
  durationMs: number;
}

export interface ScanOutcome {
  result: AnalysisResult;
  simulation: AttackSimulationOutcome;
  warnings: string[];
  stats: ScanStats;
}

export interface PackageMetadata {
  appName: string | null;
  packageName: string | null;
}

export interface NativeBinary {
  arch: string;
  path: string;
}

/** Canonical locations inside an extracted package, as seen by detectors. */
export interface PackageTree {
  root: string;
  platform: Platform;
  flutterAssetsDir: string | null;
  assetsDir: string | null;
  nativeBinaries: NativeBinary[];
}

export type ProgressState =
  | { step: "validating"; message: string }
  | { step: "extracting"; message: string }
  | { step: "scanning"; message: string; detector: string; index: number; total: number }
  | { step: "scoring"; message: string }
  | { step: "simulating"; message: string }
  | { step: "cleanup"; message: string }
  | { step: "done"; message: string };
