import clsx from "clsx";
import type { Grade, SecurityScore } from "@/types";

interface RiskScoreProps {
  score: number;
  grade: Grade;
  gradeLabel: string;
  riskLevel: SecurityScore["riskLevel"];
  attackSurface: number;
}

const GRADE_CLASS: Record<Grade, string> = {
  A: "grade-a",
  B: "grade-b",
  C: "grade-c",
  D: "grade-d",
  F: "grade-f"
};

function RiskScoreBadge({ score, grade, gradeLabel, riskLevel, attackSurface }: RiskScoreProps) {
  return (
    <div className={clsx("score-badge", GRADE_CLASS[grade], { "score-badge--alert": grade === "F" })}>
      <p className="score-badge__label">Security Score</p>
      <p className="score-badge__value">{score}</p>
      <p className="score-badge__grade">{gradeLabel}</p>
      <p className="score-badge__risk">{riskLevel}</p>
      <p className="score-badge__surface">Attack surface {attackSurface}/10</p>
    </div>
  );
}

export default RiskScoreBadge;
