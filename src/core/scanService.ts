import type { Finding, PackageTree, Platform, ProgressState, ScanOutcome } from "@/types";
import { PLATFORM_LABELS } from "@/types";
import { simulateAttack } from "./attackSimulator";
import type { ScanConfig } from "./config";
import { resolveScanConfig } from "./config";
import { DEFAULT_DETECTORS } from "./detectors";
import type { Detector, DetectorContext } from "./detectors";
import { describeError, isAbortError, throwIfCancelled } from "./errors";
import { createExtractor, platformForFile } from "./extract";
import type { Logger } from "./log";
import { silentLogger } from "./log";
import { ResultBuilder } from "./result";
import type { RulePack } from "./rules";
import { getDefaultRulePack } from "./rules";
import { computeScore } from "./score";

export interface ScanCallbacks {
  onState?: (state: ProgressState) => void;
}

export interface ScanParams {
  filePath: string;
  /** Extraction directory; a fresh temporary one when omitted. */
  workDir?: string;
  signal?: AbortSignal;
  /** Run detectors concurrently. Findings still follow registry order. */
  parallel?: boolean;
  detectors?: readonly Detector[];
  config?: Partial<ScanConfig>;
  rules?: RulePack;
  logger?: Logger;
  now?: () => Date;
}

interface DetectorRun {
  detector: Detector;
  findings: Finding[];
  failed: boolean;
  error?: unknown;
}

async function runDetector(
  detector: Detector,
  tree: PackageTree,
  platform: Platform,
  context: DetectorContext
): Promise<DetectorRun> {
  try {
    return { detector, findings: await detector.scan(tree, platform, context), failed: false };
  } catch (error) {
    if (isAbortError(error)) throw error;
    return { detector, findings: [], failed: true, error };
  }
}

export async function performScan(params: ScanParams, callbacks: ScanCallbacks = {}): Promise<ScanOutcome> {
  const { filePath, workDir, signal, parallel = false, detectors = DEFAULT_DETECTORS } = params;
  const logger = params.logger ?? silentLogger;
  const emit = callbacks.onState ?? (() => {});
  const jobStart = performance.now();

  emit({ step: "validating", message: `Validating ${filePath}` });
  const platform = platformForFile(filePath);
  const config = resolveScanConfig(params.config);
  const rules = params.rules ?? getDefaultRulePack();
  throwIfCancelled(signal);

  emit({ step: "extracting", message: `Extracting ${PLATFORM_LABELS[platform]} package` });
  const extractor = createExtractor(filePath, { config, logger });
  const extracted = await extractor.extract(workDir, signal);

  let outcome: ScanOutcome;
  try {
    const warnings: string[] = [];
    const flutterDetected = await extractor.detectFlutter();
    if (!flutterDetected) {
      const warning = "This may not be a Flutter app; results may be incomplete";
      logger.warn(warning);
      warnings.push(warning);
    }

    const builder = new ResultBuilder(
      {
        appName: extracted.metadata.appName,
        packageName: extracted.metadata.packageName,
        platform,
        filePath,
        flutterDetected
      },
      params.now
    );

    const context: DetectorContext = { config, rules, logger, signal };
    const total = detectors.length;
    let runs: DetectorRun[];
    if (parallel) {
      emit({ step: "scanning", message: `Running ${total} detectors`, detector: "all", index: 0, total });
      // Every run settles before the workspace can be released; then a cancellation wins.
      const settled = await Promise.allSettled(
        detectors.map((detector) => runDetector(detector, extracted.tree, platform, context))
      );
      runs = [];
      for (const entry of settled) {
        if (entry.status === "rejected") throw entry.reason;
        runs.push(entry.value);
      }
    } else {
      runs = [];
      for (const [index, detector] of detectors.entries()) {
        throwIfCancelled(signal);
        emit({ step: "scanning", message: `Scanning ${detector.label}`, detector: detector.id, index, total });
        runs.push(await runDetector(detector, extracted.tree, platform, context));
      }
    }

    for (const run of runs) {
      if (run.failed) {
        const warning = `Detector ${run.detector.id} failed: ${describeError(run.error)}`;
        logger.warn(warning, run.error);
        warnings.push(warning);
        continue;
      }
      logger.debug(`${run.detector.id}: ${run.findings.length} findings`);
      builder.addFindings(run.findings);
    }
    throwIfCancelled(signal);

    emit({ step: "scoring", message: "Calculating security score" });
    const findings = builder.currentFindings();
    builder.withScore(computeScore(findings));

    emit({ step: "simulating", message: "Simulating attacker profiles" });
    const simulation = simulateAttack(findings, rules.attackers);
    builder.withSimulation(simulation);

    const result = builder.build();
    outcome = {
      result,
      simulation,
      warnings,
      stats: {
        entries: extracted.stats.entries,
        skippedEntries: extracted.stats.skippedEntries,
        durationMs: Math.round(performance.now() - jobStart)
      }
    };
  } finally {
    emit({ step: "cleanup", message: "Removing working directory" });
    await extractor.cleanup();
  }

  emit({ step: "done", message: "Scan complete" });
  return outcome;
}
