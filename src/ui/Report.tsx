import type { ScanOutcome } from "@/types";
import { PLATFORM_LABELS, SEVERITY_ORDER } from "@/types";
import { countBySeverity, gradeLabel, riskLevelFor } from "@/core/score";
import AttackTimeline from "./AttackTimeline";
import FindingsTable from "./FindingsTable";
import RiskScoreBadge from "./RiskScore";

interface ReportProps {
  outcome: ScanOutcome;
  showAttackSimulation?: boolean;
}

function ReportView({ outcome, showAttackSimulation = true }: ReportProps) {
  const { result, simulation, warnings } = outcome;
  const severityCounts = countBySeverity(result.findings);

  return (
    <section className="report">
      <header className="report__header">
        <div>
          <h2>{result.appName}</h2>
          <p className="muted">
            {result.packageName} | {PLATFORM_LABELS[result.platform]} | {result.createdAt}
          </p>
          <div className="chips">
            <span className="chip">File {result.filePath}</span>
            <span className="chip">Flutter {result.flutterDetected ? "detected" : "not detected"}</span>
            <span className="chip">Findings {result.findings.length}</span>
          </div>
        </div>
        <RiskScoreBadge
          score={result.securityScore}
          grade={result.grade}
          gradeLabel={gradeLabel(result.grade)}
          riskLevel={riskLevelFor(result.securityScore)}
          attackSurface={result.attackSurface}
        />
      </header>

      {warnings.length > 0 && (
        <ul className="warnings">
          {warnings.map((warning) => (
            <li key={warning}>{warning}</li>
          ))}
        </ul>
      )}

      <section className="panel">
        <h3>Findings</h3>
        <div className="chips">
          {SEVERITY_ORDER.map((severity) => (
            <span key={severity} className="chip">
              {severity} ({severityCounts[severity]})
            </span>
          ))}
        </div>
        <FindingsTable findings={result.findings} />
      </section>

      {showAttackSimulation && <AttackTimeline simulation={simulation} />}
    </section>
  );
}

export default ReportView;
