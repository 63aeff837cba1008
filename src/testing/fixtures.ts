import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { strToU8, zipSync } from "fflate";
import type { Zippable } from "fflate";
import type { Finding, NativeBinary, PackageTree, ScanOutcome } from "@/types";
import { simulateAttack } from "@/core/attackSimulator";
import type { ScanConfig } from "@/core/config";
import { resolveScanConfig } from "@/core/config";
import type { DetectorContext } from "@/core/detectors/types";
import { silentLogger } from "@/core/log";
import { ResultBuilder } from "@/core/result";
import type { ResultIdentity } from "@/core/result";
import { getDefaultRulePack } from "@/core/rules";
import { computeScore } from "@/core/score";

export type EntryMap = Record<string, string | Uint8Array>;

/** Temporary directories created by a test file, removed in `afterEach`. */
export class TempDirs {
  private readonly dirs: string[] = [];

  async make(prefix = "ba-test-"): Promise<string> {
    const dir = await mkdtemp(path.join(os.tmpdir(), prefix));
    this.dirs.push(dir);
    return dir;
  }

  async cleanup(): Promise<void> {
    await Promise.all(this.dirs.splice(0).map((dir) => rm(dir, { recursive: true, force: true })));
  }
}

export function zipEntries(entries: EntryMap): Uint8Array {
  const zippable: Zippable = {};
  for (const [name, content] of Object.entries(entries)) {
    zippable[name] = typeof content === "string" ? strToU8(content) : content;
  }
  return zipSync(zippable);
}

export async function writePackage(dir: string, fileName: string, entries: EntryMap): Promise<string> {
  const target = path.join(dir, fileName);
  await writeFile(target, zipEntries(entries));
  return target;
}

/** Writes entries as plain files below `root`, as an extraction would. */
export async function writeFiles(root: string, entries: EntryMap): Promise<void> {
  for (const [name, content] of Object.entries(entries)) {
    const target = path.join(root, name);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

/** Printable strings separated by NUL bytes, the way they sit in a compiled binary. */
export function binaryWithStrings(strings: string[]): Uint8Array {
  const parts: number[] = [0x7f, 0x45, 0x4c, 0x46, 0x00];
  for (const text of strings) {
    parts.push(...strToU8(text), 0x00);
  }
  return Uint8Array.from(parts);
}

export function plainManifest(packageName: string, label?: string): string {
  const application = label ? `<application android:label="${label}"/>` : "<application/>";
  return (
    '<?xml version="1.0" encoding="utf-8"?>\n' +
    `<manifest xmlns:android="http://schemas.android.com/apk/res/android" package="${packageName}">` +
    application +
    "</manifest>\n"
  );
}

export function xmlInfoPlist(values: Record<string, string>): string {
  const body = Object.entries(values)
    .map(([key, value]) => `  <key>${key}</key>\n  <string>${value}</string>`)
    .join("\n");
  return (
    '<?xml version="1.0" encoding="UTF-8"?>\n' +
    '<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">\n' +
    `<plist version="1.0">\n<dict>\n${body}\n</dict>\n</plist>\n`
  );
}

export const SAMPLE_ENV = "API_KEY=test-secret\nDEBUG=true\n# SERVER_URL=commented\nAUTH_URL=https://api.example.test\n";

/** A Flutter APK with one exposed .env file and one URL in libapp.so. */
export function flutterApkEntries(extra: EntryMap = {}): EntryMap {
  return {
    "AndroidManifest.xml": plainManifest("com.example.demo", "Demo App"),
    "assets/flutter_assets/.env": SAMPLE_ENV,
    "assets/flutter_assets/AssetManifest.json": "{}",
    "assets/flutter_assets/FontManifest.json": "[]",
    "lib/arm64-v8a/libapp.so": binaryWithStrings(["flutter_engine_main", "https://api.example.test/v1"]),
    "lib/arm64-v8a/libflutter.so": binaryWithStrings(["engine"]),
    "classes.dex": "dex\n035",
    ...extra
  };
}

/** A Flutter IPA whose App.framework carries no sensitive strings. */
export function flutterIpaEntries(extra: EntryMap = {}): EntryMap {
  return {
    "Payload/Runner.app/Info.plist": xmlInfoPlist({
      CFBundleIdentifier: "com.example.runner",
      CFBundleName: "Runner",
      CFBundleDisplayName: "Runner Demo"
    }),
    "Payload/Runner.app/Runner": binaryWithStrings(["main_executable"]),
    "Payload/Runner.app/Frameworks/App.framework/App": binaryWithStrings(["dart_snapshot"]),
    "Payload/Runner.app/Frameworks/App.framework/flutter_assets/AssetManifest.json": "{}",
    "Payload/Runner.app/Frameworks/Flutter.framework/Flutter": binaryWithStrings(["engine"]),
    ...extra
  };
}

export function makeFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    id: "test:finding",
    detector: "test",
    severity: "MEDIUM",
    title: "Test Finding",
    description: "A finding used in tests",
    file: null,
    line: null,
    remediation: null,
    owasp: null,
    cwe: null,
    cvss: null,
    ...overrides
  };
}

/** The layout an APK extraction reports, rooted at `root`. */
export function androidTree(root: string, nativeBinaries: NativeBinary[] = []): PackageTree {
  return {
    root,
    platform: "android",
    flutterAssetsDir: path.join(root, "assets", "flutter_assets"),
    assetsDir: path.join(root, "assets"),
    nativeBinaries
  };
}

export function detectorContext(config: Partial<ScanConfig> = {}, signal?: AbortSignal): DetectorContext {
  return { config: resolveScanConfig(config), rules: getDefaultRulePack(), logger: silentLogger, signal };
}

export const DEMO_IDENTITY: ResultIdentity = {
  appName: "Demo App",
  packageName: "com.example.demo",
  platform: "android",
  filePath: "/builds/demo.apk",
  flutterDetected: true
};

/** Runs scoring and simulation over fixed findings, the way a scan finishes. */
export function makeOutcome(
  findings: Finding[],
  identity: ResultIdentity = DEMO_IDENTITY,
  warnings: string[] = []
): ScanOutcome {
  const builder = new ResultBuilder(identity, () => new Date("2024-05-01T12:00:00.000Z")).addFindings(findings);
  const simulation = simulateAttack(builder.currentFindings(), getDefaultRulePack().attackers);
  const result = builder.withScore(computeScore(builder.currentFindings())).withSimulation(simulation).build();
  return { result, simulation, warnings, stats: { entries: 0, skippedEntries: 0, durationMs: 0 } };
}
