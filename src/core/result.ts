import type {
  AnalysisResult,
  AttackSimulationOutcome,
  Finding,
  Platform,
  SecurityScore
} from "@/types";
import { deepFreeze } from "./freeze";

export interface ResultIdentity {
  appName: string;
  packageName: string;
  platform: Platform;
  filePath: string;
  flutterDetected: boolean;
}

/**
 * Collects findings while the pipeline runs. `build()` freezes the result;
 * the builder accepts nothing afterwards.
 */
export class ResultBuilder {
  private readonly findings: Finding[] = [];
  private score: SecurityScore | null = null;
  private simulation: AttackSimulationOutcome | null = null;
  private built = false;

  constructor(
    private readonly identity: ResultIdentity,
    private readonly now: () => Date = () => new Date()
  ) {}

  get findingCount(): number {
    return this.findings.length;
  }

  /** Findings appended so far, in insertion order. */
  currentFindings(): readonly Finding[] {
    return this.findings;
  }

  addFindings(findings: readonly Finding[]): this {
    this.assertOpen();
    for (const finding of findings) {
      this.findings.push(deepFreeze(structuredClone(finding)));
    }
    return this;
  }

  withScore(score: SecurityScore): this {
    this.assertOpen();
    this.score = score;
    return this;
  }

  withSimulation(simulation: AttackSimulationOutcome): this {
    this.assertOpen();
    this.simulation = simulation;
    return this;
  }

  build(): AnalysisResult {
    this.assertOpen();
    if (!this.score) {
      throw new Error("Cannot build a result before it has been scored");
    }
    this.built = true;
    const { score, simulation } = this;
    return deepFreeze({
      ...this.identity,
      findings: [...this.findings],
      securityScore: clamp(score.score, 0, 100),
      grade: score.grade,
      attackSurface: clamp(score.attackSurface, 0, 10),
      timeToCompromiseMinutes: Math.max(0, simulation?.timeToCompromiseMinutes ?? 0),
      attackerProfile: simulation ? simulation.profiles[simulation.mostLikelyAttacker].profile : null,
      createdAt: this.now().toISOString()
    });
  }

  private assertOpen(): void {
    if (this.built) {
      throw new Error("Result has already been built");
    }
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}
