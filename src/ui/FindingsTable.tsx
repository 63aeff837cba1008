import clsx from "clsx";
import type { Finding, Remediation, Severity } from "@/types";

interface FindingsTableProps {
  findings: readonly Finding[];
}

const SEVERITY_CLASS: Record<Severity, string> = {
  CRITICAL: "severity-critical",
  HIGH: "severity-high",
  MEDIUM: "severity-medium",
  LOW: "severity-low",
  INFO: "severity-info"
};

function RemediationDetails({ remediation }: { remediation: Remediation }) {
  return (
    <details className="remediation">
      <summary>{remediation.summary}</summary>
      <p>
        <strong>Root cause:</strong> {remediation.rootCause}
      </p>
      <p>
        <strong>Why it matters:</strong> {remediation.whyWrong}
      </p>
      <ol>
        {remediation.fixSteps.map((step) => (
          <li key={step}>{step.replace(/^\d+\.\s*/, "")}</li>
        ))}
      </ol>
      {remediation.codeBefore && <pre className="code code--before">{remediation.codeBefore}</pre>}
      {remediation.codeAfter && <pre className="code code--after">{remediation.codeAfter}</pre>}
      {remediation.verification && <pre className="code">{remediation.verification}</pre>}
      {remediation.references.length > 0 && (
        <ul className="references">
          {remediation.references.map((reference) => (
            <li key={reference}>
              <a href={reference}>{reference}</a>
            </li>
          ))}
        </ul>
      )}
    </details>
  );
}

function FindingsTable({ findings }: FindingsTableProps) {
  if (findings.length === 0) {
    return <div className="empty">No findings detected.</div>;
  }

  return (
    <table className="findings">
      <thead>
        <tr>
          <th scope="col">Severity</th>
          <th scope="col">Finding</th>
          <th scope="col">File</th>
          <th scope="col">Classification</th>
          <th scope="col">Remediation</th>
        </tr>
      </thead>
      <tbody>
        {findings.map((finding) => (
          <tr key={finding.id} id={`finding-${finding.id}`}>
            <td>
              <span className={clsx("severity", SEVERITY_CLASS[finding.severity])}>{finding.severity}</span>
            </td>
            <td>
              <div className="finding-title">{finding.title}</div>
              <pre className="finding-description">{finding.description}</pre>
            </td>
            <td>{finding.file ? <code>{finding.file}</code> : "-"}</td>
            <td>
              {finding.owasp && <div>{finding.owasp}</div>}
              {finding.cwe && <div>{finding.cwe}</div>}
              {finding.cvss !== null && <div>CVSS {finding.cvss}</div>}
            </td>
            <td>{finding.remediation ? <RemediationDetails remediation={finding.remediation} /> : "-"}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
}

export default FindingsTable;
