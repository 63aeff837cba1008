import { existsSync } from "node:fs";
import { readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import {
  TempDirs,
  binaryWithStrings,
  flutterApkEntries,
  flutterIpaEntries,
  plainManifest,
  writePackage
} from "@/testing/fixtures";
import { resolveScanConfig } from "../config";
import { ScanError } from "../errors";
import { ApkExtractor, IpaExtractor, createExtractor, platformForFile, sortArchitectures } from "./index";

const temp = new TempDirs();

afterEach(async () => {
  await temp.cleanup();
});

async function setup() {
  const dir = await temp.make();
  const workRoot = path.join(dir, "work");
  return { dir, workRoot, config: resolveScanConfig({ workRoot }) };
}

async function workRootEntries(workRoot: string): Promise<string[]> {
  return existsSync(workRoot) ? readdir(workRoot) : [];
}

describe("platformForFile", () => {
  it("maps package extensions case-insensitively", () => {
    expect(platformForFile("app-release.apk")).toBe("android");
    expect(platformForFile("/builds/Runner.IPA")).toBe("ios");
  });

  it("rejects other extensions", () => {
    expect(() => platformForFile("bundle.aab")).toThrowError(
      "Unsupported file format: .aab (expected .apk or .ipa)"
    );
    expect(() => platformForFile("bundle.aab")).toThrowError(ScanError);
  });

  it("creates the matching extractor", () => {
    expect(createExtractor("a.apk")).toBeInstanceOf(ApkExtractor);
    expect(createExtractor("a.ipa")).toBeInstanceOf(IpaExtractor);
  });
});

describe("sortArchitectures", () => {
  it("puts preferred ABIs first and sorts the rest", () => {
    expect(sortArchitectures(["x86", "mips", "arm64-v8a", "armeabi", "armeabi-v7a"])).toEqual([
      "arm64-v8a",
      "armeabi-v7a",
      "x86",
      "armeabi",
      "mips"
    ]);
  });
});

describe("ApkExtractor", () => {
  it("extracts a Flutter APK and reads its manifest", async () => {
    const { dir, workRoot, config } = await setup();
    const file = await writePackage(
      dir,
      "demo.apk",
      flutterApkEntries({ "lib/x86_64/libapp.so": binaryWithStrings(["x86_64 build"]) })
    );
    const extractor = new ApkExtractor(file, { config });

    const extracted = await extractor.extract();
    expect(extracted.metadata).toEqual({ appName: "Demo App", packageName: "com.example.demo" });
    expect(extracted.tree.platform).toBe("android");
    expect(extracted.tree.flutterAssetsDir).toBe(path.join(extracted.root, "assets", "flutter_assets"));
    expect(extracted.tree.assetsDir).toBe(path.join(extracted.root, "assets"));
    expect(extracted.tree.nativeBinaries.map((b) => b.arch)).toEqual(["arm64-v8a", "x86_64"]);
    expect(extracted.stats).toEqual({ entries: 8, skippedEntries: 0 });
    expect(await readFile(path.join(extracted.root, "assets", "flutter_assets", ".env"), "utf-8")).toContain(
      "API_KEY=test-secret"
    );
    expect(path.dirname(extracted.root)).toBe(workRoot);
    expect(await extractor.detectFlutter()).toBe(true);

    expect(await extractor.cleanup()).toBe(true);
    expect(existsSync(extracted.root)).toBe(false);
    expect(await extractor.detectFlutter()).toBe(false);
  });

  it("falls back to the file stem and unknown package without a manifest", async () => {
    const { dir, config } = await setup();
    const file = await writePackage(dir, "no-manifest.apk", { "classes.dex": "dex" });
    const extractor = new ApkExtractor(file, { config });

    const extracted = await extractor.extract();
    expect(extracted.metadata).toEqual({ appName: "no-manifest", packageName: "unknown" });
    expect(extracted.tree.flutterAssetsDir).toBeNull();
    expect(extracted.tree.assetsDir).toBeNull();
    expect(extracted.tree.nativeBinaries).toEqual([]);
    expect(await extractor.detectFlutter()).toBe(false);
    await extractor.cleanup();
  });

  it("detects Flutter from libflutter.so alone", async () => {
    const { dir, config } = await setup();
    const file = await writePackage(dir, "engine.apk", {
      "AndroidManifest.xml": plainManifest("com.example.engine"),
      "lib/armeabi-v7a/libflutter.so": binaryWithStrings(["engine"])
    });
    const extractor = new ApkExtractor(file, { config });
    const extracted = await extractor.extract();
    expect(extracted.metadata).toEqual({ appName: "engine", packageName: "com.example.engine" });
    expect(await extractor.detectFlutter()).toBe(true);
    await extractor.cleanup();
  });

  it("rejects a file that is not a zip and leaves no working directory", async () => {
    const { dir, workRoot, config } = await setup();
    const file = path.join(dir, "broken.apk");
    await writeFile(file, "this is a text file pretending to be an APK");

    await expect(new ApkExtractor(file, { config }).extract()).rejects.toMatchObject({ code: "INVALID_ARCHIVE" });
    expect(await workRootEntries(workRoot)).toEqual([]);
  });

  it("rejects packages above the size limit", async () => {
    const { dir, config } = await setup();
    const file = await writePackage(dir, "big.apk", flutterApkEntries());
    const extractor = new ApkExtractor(file, { config: { ...config, maxArchiveBytes: 64 } });
    await expect(extractor.extract()).rejects.toMatchObject({ code: "INVALID_ARCHIVE" });
  });

  it("reports a missing file", async () => {
    const { dir, config } = await setup();
    await expect(new ApkExtractor(path.join(dir, "missing.apk"), { config }).extract()).rejects.toMatchObject({
      code: "FILE_NOT_FOUND"
    });
  });

  it("extracts into a caller directory and removes it afterwards", async () => {
    const { dir, config } = await setup();
    const file = await writePackage(dir, "demo.apk", flutterApkEntries());
    const outputDir = path.join(dir, "extracted");
    const extractor = new ApkExtractor(file, { config });

    const extracted = await extractor.extract(outputDir);
    expect(extracted.root).toBe(outputDir);
    expect(extractor.root).toBe(outputDir);
    await extractor.cleanup();
    expect(existsSync(outputDir)).toBe(false);
  });

  it("stops when the signal is already aborted", async () => {
    const { dir, workRoot, config } = await setup();
    const file = await writePackage(dir, "demo.apk", flutterApkEntries());
    const controller = new AbortController();
    controller.abort();

    await expect(new ApkExtractor(file, { config }).extract(undefined, controller.signal)).rejects.toMatchObject({
      code: "CANCELLED"
    });
    expect(await workRootEntries(workRoot)).toEqual([]);
  });
});

describe("IpaExtractor", () => {
  it("extracts a Flutter IPA and reads Info.plist", async () => {
    const { dir, config } = await setup();
    const file = await writePackage(dir, "Runner.ipa", flutterIpaEntries());
    const extractor = new IpaExtractor(file, { config });

    const extracted = await extractor.extract();
    const appDir = path.join(extracted.root, "Payload", "Runner.app");
    expect(extracted.metadata).toEqual({ appName: "Runner Demo", packageName: "com.example.runner" });
    expect(extracted.tree.flutterAssetsDir).toBe(path.join(appDir, "Frameworks", "App.framework", "flutter_assets"));
    expect(extracted.tree.assetsDir).toBeNull();
    expect(extracted.tree.nativeBinaries).toEqual([
      { arch: "arm64", path: path.join(appDir, "Frameworks", "App.framework", "App") }
    ]);
    expect(await extractor.detectFlutter()).toBe(true);
    await extractor.cleanup();
  });

  it("uses the bundle executable when App.framework is absent", async () => {
    const { dir, config } = await setup();
    const file = await writePackage(dir, "Native.ipa", {
      "Payload/Native.app/Native": binaryWithStrings(["native_main"]),
      "Payload/Native.app/Info.plist": "<plist><dict><key>CFBundleName</key><string>NativeApp</string></dict></plist>"
    });
    const extractor = new IpaExtractor(file, { config });

    const extracted = await extractor.extract();
    expect(extracted.metadata).toEqual({ appName: "NativeApp", packageName: "unknown" });
    expect(extracted.tree.nativeBinaries.map((b) => path.basename(b.path))).toEqual(["Native"]);
    expect(await extractor.detectFlutter()).toBe(false);
    await extractor.cleanup();
  });

  it("requires a Payload directory and removes the working directory", async () => {
    const { dir, workRoot, config } = await setup();
    const file = await writePackage(dir, "flat.ipa", { "Runner.app/Info.plist": "<plist/>" });

    const failure = new IpaExtractor(file, { config }).extract();
    await expect(failure).rejects.toMatchObject({ code: "INVALID_STRUCTURE" });
    await expect(failure).rejects.toThrowError("Invalid IPA structure: Payload directory not found");
    expect(await workRootEntries(workRoot)).toEqual([]);
  });

  it("requires an .app bundle inside Payload", async () => {
    const { dir, config } = await setup();
    const file = await writePackage(dir, "empty.ipa", { "Payload/readme.txt": "nothing here" });
    await expect(new IpaExtractor(file, { config }).extract()).rejects.toThrowError("No .app bundle found in Payload");
  });
});
