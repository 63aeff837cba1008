import { readdir } from "node:fs/promises";
import path from "node:path";
import type { NativeBinary, PackageMetadata, PackageTree } from "@/types";
import { parseAndroidManifest } from "./axml";
import { BaseExtractor, isDirectory, isFile, readOptional, sortArchitectures } from "./extractor";

const APP_LIBRARY = "libapp.so";
const FLUTTER_LIBRARY = "libflutter.so";

async function listArchitectures(libDir: string): Promise<string[]> {
  try {
    const entries = await readdir(libDir, { withFileTypes: true });
    return sortArchitectures(entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name));
  } catch {
    return [];
  }
}

export class ApkExtractor extends BaseExtractor {
  readonly platform = "android" as const;

  protected async locate(root: string): Promise<PackageTree> {
    const flutterAssetsDir = path.join(root, "assets", "flutter_assets");
    const assetsDir = path.join(root, "assets");
    const libDir = path.join(root, "lib");

    const nativeBinaries: NativeBinary[] = [];
    for (const arch of await listArchitectures(libDir)) {
      const candidate = path.join(libDir, arch, APP_LIBRARY);
      if (await isFile(candidate)) {
        nativeBinaries.push({ arch, path: candidate });
      }
    }

    return {
      root,
      platform: this.platform,
      flutterAssetsDir: (await isDirectory(flutterAssetsDir)) ? flutterAssetsDir : null,
      assetsDir: (await isDirectory(assetsDir)) ? assetsDir : null,
      nativeBinaries
    };
  }

  protected async readMetadata(tree: PackageTree): Promise<PackageMetadata> {
    const manifest = await readOptional(path.join(tree.root, "AndroidManifest.xml"));
    if (!manifest) {
      this.logger.debug("AndroidManifest.xml not found");
      return { appName: null, packageName: null };
    }
    return parseAndroidManifest(manifest);
  }

  protected async probeFlutterRuntime(tree: PackageTree): Promise<boolean> {
    const libDir = path.join(tree.root, "lib");
    for (const arch of await listArchitectures(libDir)) {
      if (await isFile(path.join(libDir, arch, FLUTTER_LIBRARY))) return true;
    }
    return false;
  }
}
