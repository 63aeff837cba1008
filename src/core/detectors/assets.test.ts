import { afterEach, describe, expect, it } from "vitest";
import { TempDirs, androidTree, detectorContext, writeFiles } from "@/testing/fixtures";
import { getDefaultRulePack } from "../rules";
import { assetExposureDetector, assetRemediationId, assetSeverity, classifyAsset, isBenignAsset } from "./assets";

const temp = new TempDirs();
const rules = getDefaultRulePack().assets;

afterEach(async () => {
  await temp.cleanup();
});

describe("asset classification", () => {
  it("treats Flutter build manifests as benign", () => {
    expect(isBenignAsset(rules, "AssetManifest.json")).toBe(true);
    expect(isBenignAsset(rules, "kernel_blob.bin")).toBe(true);
    expect(isBenignAsset(rules, "settings.json")).toBe(false);
  });

  it("checks the extension before the exact filename", () => {
    expect(classifyAsset(rules, "release.KEYSTORE")).toBe("extension");
    expect(classifyAsset(rules, "google-services.json")).toBe("extension");
    expect(classifyAsset(rules, "googleservice-info.PLIST")).toBe("filename");
    expect(classifyAsset(rules, "firebase_options.dart")).toBe("filename");
    expect(classifyAsset(rules, "logo.png")).toBeNull();
  });

  it("applies the first matching severity rule", () => {
    expect(assetSeverity(rules, "server.pem")).toBe("CRITICAL");
    expect(assetSeverity(rules, "cache.sqlite")).toBe("CRITICAL");
    expect(assetSeverity(rules, "secrets.dart")).toBe("HIGH");
    expect(assetSeverity(rules, "firebase_options.dart")).toBe("MEDIUM");
    expect(assetSeverity(rules, "settings.json")).toBe("MEDIUM");
  });

  it("picks the Firebase remediation for Firebase config", () => {
    expect(assetRemediationId(rules, "google-services.json")).toBe("asset-firebase");
    expect(assetRemediationId(rules, "server.pem")).toBe("asset-generic");
  });
});

describe("assetExposureDetector", () => {
  it("reports sensitive bundled files in walk order", async () => {
    const root = await temp.make();
    await writeFiles(root, {
      "assets/flutter_assets/AssetManifest.json": "{}",
      "assets/flutter_assets/FontManifest.json": "[]",
      "assets/flutter_assets/GoogleService-Info.plist": "<plist/>",
      "assets/flutter_assets/assets/certs/server.pem": "-----BEGIN CERTIFICATE-----",
      "assets/flutter_assets/google-services.json": '{"project_info":{}}',
      "assets/flutter_assets/images/logo.png": "png",
      "assets/flutter_assets/secrets.dart": "const key = 'test-secret';"
    });

    const findings = await assetExposureDetector.scan(androidTree(root), "android", detectorContext());

    expect(findings.map((f) => [f.title, f.severity])).toEqual([
      ["Sensitive File Exposed: GoogleService-Info.plist", "MEDIUM"],
      ["Sensitive File Exposed: server.pem", "CRITICAL"],
      ["Sensitive File Exposed: google-services.json", "MEDIUM"],
      ["Sensitive File Exposed: secrets.dart", "HIGH"]
    ]);

    const pem = findings[1];
    expect(pem).toMatchObject({
      id: "asset-exposure:assets/flutter_assets/assets/certs/server.pem",
      detector: "asset-exposure",
      file: "assets/flutter_assets/assets/certs/server.pem",
      description:
        "File 'server.pem' (27 bytes) found at 'assets/flutter_assets/assets/certs/server.pem'. " +
        "Detected as sensitive extension. This file should not be included in production builds.",
      owasp: "M2: Insecure Data Storage",
      cvss: null
    });
    expect(pem?.remediation?.summary).toBe("Remove server.pem from production build");
    expect(findings[2]?.remediation?.summary).toBe("Restrict Firebase API keys in console");
    expect(findings[0]?.description).toContain("Detected as sensitive filename.");
  });
});
