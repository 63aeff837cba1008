import { renderToStaticMarkup } from "react-dom/server";
import type { ScanOutcome } from "@/types";
import ReportView from "@/ui/Report";

const STYLES = `
body { font-family: ui-monospace, SFMono-Regular, Menlo, monospace; background: #1b1d1f; color: #d7dadc; margin: 0; padding: 2rem; }
h2, h3, h4 { color: #7fd88f; text-transform: uppercase; letter-spacing: 0.05em; }
.muted { color: #9aa0a6; }
.report { display: flex; flex-direction: column; gap: 2rem; }
.report__header { display: flex; justify-content: space-between; gap: 2rem; flex-wrap: wrap; }
.panel { border: 2px solid #b08d57; padding: 1.5rem; background: #232629; }
.chips { display: flex; flex-wrap: wrap; gap: 0.5rem; margin: 1rem 0; }
.chip { border: 2px solid #b08d57; padding: 0.25rem 0.75rem; font-size: 0.75rem; }
.score-badge { border: 2px solid; padding: 1rem 1.5rem; text-align: center; }
.score-badge__value { font-size: 2.5rem; font-weight: bold; margin: 0.25rem 0; }
.score-badge--alert { box-shadow: 0 0 12px #e5484d; }
.grade-a { border-color: #46a758; color: #46a758; }
.grade-b { border-color: #7fd88f; color: #7fd88f; }
.grade-c { border-color: #f5d90a; color: #f5d90a; }
.grade-d { border-color: #f76808; color: #f76808; }
.grade-f { border-color: #e5484d; color: #e5484d; }
table { width: 100%; border-collapse: collapse; font-size: 0.85rem; }
th, td { border: 1px solid #b08d57; padding: 0.5rem; text-align: left; vertical-align: top; }
.severity { display: inline-block; padding: 0.15rem 0.5rem; border: 2px solid; font-weight: bold; }
.severity-critical { color: #e5484d; }
.severity-high { color: #f76808; }
.severity-medium { color: #f5d90a; }
.severity-low { color: #3e63dd; }
.severity-info { color: #9aa0a6; }
.finding-title { font-weight: bold; color: #7fd88f; }
.finding-description, .scenario, .code { white-space: pre-wrap; margin: 0.5rem 0; }
.code { background: #1b1d1f; padding: 0.5rem; }
.profile--chosen { background: #2f3336; }
.warnings { color: #f5d90a; }
a { color: #7fd88f; }
`;

/** Renders a self-contained HTML document for a scan outcome. */
export function reportToHtml(outcome: ScanOutcome, { attackSimulation = true } = {}): string {
  const { result } = outcome;
  const body = renderToStaticMarkup(<ReportView outcome={outcome} showAttackSimulation={attackSimulation} />);
  const title = `Security Report: ${result.appName}`.replace(/[<>&"]/g, (ch) => `&#${ch.charCodeAt(0)};`);
  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8" />',
    '<meta name="viewport" content="width=device-width, initial-scale=1" />',
    `<title>${title}</title>`,
    `<style>${STYLES}</style>`,
    "</head>",
    `<body>${body}</body>`,
    "</html>",
    ""
  ].join("\n");
}
