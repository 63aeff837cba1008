import { readdir } from "node:fs/promises";
import path from "node:path";
import type { NativeBinary, PackageMetadata, PackageTree } from "@/types";
import { ScanError } from "../errors";
import { BaseExtractor, isDirectory, isFile, readOptional } from "./extractor";
import { parsePlist, plistString } from "./plist";

export class IpaExtractor extends BaseExtractor {
  readonly platform = "ios" as const;
  private bundleDir: string | null = null;

  protected async locate(root: string): Promise<PackageTree> {
    const payload = path.join(root, "Payload");
    if (!(await isDirectory(payload))) {
      throw new ScanError("INVALID_STRUCTURE", "Invalid IPA structure: Payload directory not found");
    }

    const bundles = (await readdir(payload, { withFileTypes: true }))
      .filter((entry) => entry.isDirectory() && entry.name.endsWith(".app"))
      .map((entry) => entry.name)
      .sort();
    const bundleName = bundles[0];
    if (!bundleName) {
      throw new ScanError("INVALID_STRUCTURE", "No .app bundle found in Payload");
    }
    const appDir = path.join(payload, bundleName);
    this.bundleDir = appDir;
    const appFramework = path.join(appDir, "Frameworks", "App.framework");
    const flutterAssetsDir = path.join(appFramework, "flutter_assets");

    const nativeBinaries: NativeBinary[] = [];
    const frameworkBinary = path.join(appFramework, "App");
    const mainExecutable = path.join(appDir, path.basename(bundleName, ".app"));
    if (await isFile(frameworkBinary)) {
      nativeBinaries.push({ arch: "arm64", path: frameworkBinary });
    } else if (await isFile(mainExecutable)) {
      nativeBinaries.push({ arch: "arm64", path: mainExecutable });
    }

    return {
      root,
      platform: this.platform,
      flutterAssetsDir: (await isDirectory(flutterAssetsDir)) ? flutterAssetsDir : null,
      assetsDir: null,
      nativeBinaries
    };
  }

  protected async readMetadata(): Promise<PackageMetadata> {
    const data = this.bundleDir ? await readOptional(path.join(this.bundleDir, "Info.plist")) : null;
    if (!data) {
      this.logger.debug("Info.plist not found");
      return { appName: null, packageName: null };
    }
    const plist = parsePlist(data);
    if (!plist) {
      this.logger.debug("Info.plist could not be parsed");
      return { appName: null, packageName: null };
    }
    return {
      packageName: plistString(plist, "CFBundleIdentifier"),
      appName: plistString(plist, "CFBundleDisplayName") ?? plistString(plist, "CFBundleName")
    };
  }

  protected async probeFlutterRuntime(): Promise<boolean> {
    return this.bundleDir !== null && isDirectory(path.join(this.bundleDir, "Frameworks", "Flutter.framework"));
  }
}
