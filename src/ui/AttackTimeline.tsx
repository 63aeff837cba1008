import clsx from "clsx";
import type { AttackSimulationOutcome } from "@/types";
import { ATTACKER_LEVELS } from "@/types";

interface AttackTimelineProps {
  simulation: AttackSimulationOutcome;
}

export default function AttackTimeline({ simulation }: AttackTimelineProps) {
  return (
    <section className="panel">
      <h3>Attack Simulation</h3>
      <p className="muted">
        {simulation.compromised
          ? `Most likely attacker: ${simulation.profiles[simulation.mostLikelyAttacker].profile.label}, ` +
            `compromise in about ${simulation.timeToCompromiseMinutes} minutes.`
          : "No attacker profile can exploit the current findings."}
      </p>

      <table className="profiles">
        <thead>
          <tr>
            <th scope="col">Profile</th>
            <th scope="col">Can exploit</th>
            <th scope="col">Time (min)</th>
            <th scope="col">Exploitable findings</th>
          </tr>
        </thead>
        <tbody>
          {ATTACKER_LEVELS.map((level) => {
            const assessment = simulation.profiles[level];
            return (
              <tr key={level} className={clsx({ "profile--chosen": level === simulation.mostLikelyAttacker })}>
                <td>{assessment.profile.label}</td>
                <td>{assessment.canExploit ? "Yes" : "No"}</td>
                <td>{assessment.timeMinutes}</td>
                <td>{assessment.exploitableFindings.length > 0 ? assessment.exploitableFindings.join(", ") : "-"}</td>
              </tr>
            );
          })}
        </tbody>
      </table>

      <pre className="scenario">{simulation.scenario.join("\n")}</pre>

      {simulation.defenses.length > 0 && (
        <div>
          <h4>Defenses</h4>
          <ul>
            {simulation.defenses.map((defense) => (
              <li key={defense}>{defense}</li>
            ))}
          </ul>
        </div>
      )}
    </section>
  );
}
