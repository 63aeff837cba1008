#!/usr/bin/env tsx
/**
 * bundle-audit CLI
 *
 * Scans an Android (.apk) or iOS (.ipa) package for exposed secrets and
 * compares two JSON reports.
 * Usage: npm run scan -- scan <file> [options]
 *        npm run scan -- compare <before.json> <after.json>
 */

import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { Finding, ScanOutcome, Severity } from "../src/types";
import { SEVERITY_ORDER } from "../src/types";
import { loadScanConfig } from "../src/core/config";
import { describeError, isScanError } from "../src/core/errors";
import type { Logger } from "../src/core/log";
import { createConsoleLogger } from "../src/core/log";
import { performScan } from "../src/core/scanService";
import { compareScores } from "../src/core/score";
import { reportToHtml } from "../src/lib/htmlReport";
import {
  comparisonToText,
  readScoreSnapshot,
  reportToJson,
  reportToMarkdown,
  reportToText
} from "../src/lib/reportExport";

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_FAIL_ON = 2;

const FORMATS = ["summary", "text", "json", "markdown", "html"] as const;
export type OutputFormat = (typeof FORMATS)[number];

const FAIL_ON_LEVELS = ["critical", "high", "medium"] as const;
export type FailOnLevel = (typeof FAIL_ON_LEVELS)[number];

const FAIL_ON_SEVERITY: Record<FailOnLevel, Severity> = {
  critical: "CRITICAL",
  high: "HIGH",
  medium: "MEDIUM"
};

export interface ScanArgs {
  command: "scan";
  file: string;
  format: OutputFormat;
  output?: string;
  attackSim: boolean;
  failOn?: FailOnLevel;
  workDir?: string;
  parallel: boolean;
  verbose: boolean;
}

export interface CompareArgs {
  command: "compare";
  before: string;
  after: string;
  verbose: boolean;
}

export type CLIArgs = ScanArgs | CompareArgs | { command: "help" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function isFormat(value: string): value is OutputFormat {
  return FORMATS.some((format) => format === value);
}

function isFailOn(value: string): value is FailOnLevel {
  return FAIL_ON_LEVELS.some((level) => level === value);
}

export function parseArgs(argv: string[]): CLIArgs {
  const [command, ...rest] = argv;
  if (!command || command === "--help" || command === "-h" || command === "help") {
    return { command: "help" };
  }

  const positional: string[] = [];
  const parsed: Omit<ScanArgs, "command" | "file"> = {
    format: "summary",
    attackSim: false,
    parallel: false,
    verbose: false
  };

  const valueFor = (flag: string, value: string | undefined) => {
    if (value === undefined || value.startsWith("-")) {
      throw new UsageError(`${flag} requires a value`);
    }
    return value;
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i] ?? "";
    if (arg === "--format" || arg === "-f") {
      const value = valueFor(arg, rest[++i]);
      if (!isFormat(value)) throw new UsageError(`Unknown format "${value}" (expected ${FORMATS.join(", ")})`);
      parsed.format = value;
    } else if (arg === "--output" || arg === "-o") {
      parsed.output = valueFor(arg, rest[++i]);
    } else if (arg === "--attack-sim") {
      parsed.attackSim = true;
    } else if (arg === "--fail-on") {
      const value = valueFor(arg, rest[++i]).toLowerCase();
      if (!isFailOn(value)) throw new UsageError(`Unknown --fail-on level "${value}"`);
      parsed.failOn = value;
    } else if (arg === "--work-dir") {
      parsed.workDir = valueFor(arg, rest[++i]);
    } else if (arg === "--parallel") {
      parsed.parallel = true;
    } else if (arg === "--verbose" || arg === "-v") {
      parsed.verbose = true;
    } else if (arg === "--help" || arg === "-h") {
      return { command: "help" };
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option ${arg}`);
    } else {
      positional.push(arg);
    }
  }

  if (command === "scan") {
    const [file] = positional;
    if (!file || positional.length > 1) throw new UsageError("scan takes exactly one package file");
    return { command: "scan", file, ...parsed };
  }
  if (command === "compare") {
    const [before, after] = positional;
    if (!before || !after || positional.length > 2) {
      throw new UsageError("compare takes a before and an after JSON report");
    }
    return { command: "compare", before, after, verbose: parsed.verbose };
  }
  throw new UsageError(`Unknown command "${command}"`);
}

export const HELP_TEXT = `
bundle-audit

Usage:
  npm run scan -- scan <file.apk|file.ipa> [options]
  npm run scan -- compare <before.json> <after.json>

Options:
  -f, --format <format>    Output format: summary, text, json, markdown or html (default: summary)
  -o, --output <path>      Write the report to a file instead of stdout
      --attack-sim         Include the attacker simulation in text output
      --fail-on <level>    Exit with code 2 if a finding at or above critical, high or medium exists
      --work-dir <dir>     Extract into this directory instead of a temporary one
      --parallel           Run detectors concurrently
  -v, --verbose            Show detailed progress
  -h, --help               Show this help message

Environment:
  BUNDLE_AUDIT_MAX_ARCHIVE_BYTES, BUNDLE_AUDIT_MAX_ENTRIES, BUNDLE_AUDIT_MAX_BINARY_BYTES,
  BUNDLE_AUDIT_MIN_STRING_LENGTH, BUNDLE_AUDIT_WORK_ROOT and related limits

Examples:
  npm run scan -- scan app-release.apk
  npm run scan -- scan Runner.ipa --format json --output report.json --fail-on high
  npm run scan -- compare before.json after.json
`;

/** True when a finding is at or above the `--fail-on` threshold. */
export function tripsFailOn(findings: readonly Finding[], level: FailOnLevel): boolean {
  const threshold = SEVERITY_ORDER.indexOf(FAIL_ON_SEVERITY[level]);
  return findings.some((finding) => SEVERITY_ORDER.indexOf(finding.severity) <= threshold);
}

export function formatOutcome(outcome: ScanOutcome, format: OutputFormat, attackSim: boolean): string {
  switch (format) {
    case "json":
      return reportToJson(outcome);
    case "markdown":
      return reportToMarkdown(outcome);
    case "html":
      return reportToHtml(outcome);
    case "text":
      return reportToText(outcome, { attackSimulation: true, details: true });
    case "summary":
      return reportToText(outcome, { attackSimulation: attackSim });
  }
}

export interface CLIEnvironment {
  write(text: string): void;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
}

async function runScan(args: ScanArgs, io: CLIEnvironment): Promise<number> {
  const { logger } = io;
  const outcome = await performScan(
    {
      filePath: args.file,
      workDir: args.workDir,
      parallel: args.parallel,
      config: loadScanConfig(io.env ?? process.env),
      logger
    },
    {
      onState(state) {
        logger.debug(state.message);
      }
    }
  );

  const { result, stats } = outcome;
  logger.info(
    `Scanned ${result.appName} (${result.packageName}): ${result.findings.length} findings, ` +
      `score ${result.securityScore}/100 in ${stats.durationMs}ms`
  );

  const rendered = formatOutcome(outcome, args.format, args.attackSim);
  if (args.output) {
    await writeFile(args.output, rendered, "utf-8");
    logger.info(`Report written to ${path.resolve(args.output)}`);
  } else {
    io.write(rendered);
  }

  if (args.failOn && tripsFailOn(result.findings, args.failOn)) {
    logger.error(`Findings at or above ${args.failOn} severity were reported`);
    return EXIT_FAIL_ON;
  }
  return EXIT_OK;
}

async function readReport(file: string): Promise<unknown> {
  return JSON.parse(await readFile(file, "utf-8"));
}

async function runCompare(args: CompareArgs, io: CLIEnvironment): Promise<number> {
  const before = readScoreSnapshot(await readReport(args.before));
  const after = readScoreSnapshot(await readReport(args.after));
  io.write(comparisonToText(compareScores(before, after)));
  return EXIT_OK;
}

export async function run(argv: string[], io?: Partial<CLIEnvironment>): Promise<number> {
  const verbose = argv.includes("--verbose") || argv.includes("-v");
  const env: CLIEnvironment = {
    write: io?.write ?? ((text) => process.stdout.write(text)),
    logger: io?.logger ?? createConsoleLogger({ verbose, stderr: true }),
    env: io?.env
  };

  let args: CLIArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    env.logger.error(describeError(error));
    env.write(HELP_TEXT);
    return EXIT_ERROR;
  }

  try {
    switch (args.command) {
      case "help":
        env.write(HELP_TEXT);
        return EXIT_OK;
      case "scan":
        return await runScan(args, env);
      case "compare":
        return await runCompare(args, env);
    }
  } catch (error) {
    const label = isScanError(error) ? `Scan failed (${error.code})` : "Scan failed";
    env.logger.error(`${label}: ${describeError(error)}`, error);
    return EXIT_ERROR;
  }
}

// Run if executed directly
if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error("[ERROR] Unexpected error:", error);
      process.exitCode = EXIT_ERROR;
    });
}
