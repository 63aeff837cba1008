import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import type { PackageMetadata, PackageTree, Platform } from "@/types";
import type { ScanConfig } from "../config";
import { DEFAULT_SCAN_CONFIG } from "../config";
import { ScanError, describeError, throwIfCancelled } from "../errors";
import type { Logger } from "../log";
import { silentLogger } from "../log";
import { hasZipSignature, unzipArchive } from "../unzip";
import type { UnzipResult } from "../unzip";
import { Workspace } from "../workspace";

export interface ExtractorOptions {
  config?: ScanConfig;
  logger?: Logger;
}

export interface ExtractionStats {
  entries: number;
  skippedEntries: number;
}

export interface ExtractedPackage {
  root: string;
  tree: PackageTree;
  metadata: { appName: string; packageName: string };
  stats: ExtractionStats;
}

/** Architectures tried first, in this order; any others follow alphabetically. */
export const PREFERRED_ARCHITECTURES = ["arm64-v8a", "armeabi-v7a", "x86_64", "x86"];

export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    return false;
  }
}

export async function isFile(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isFile();
  } catch {
    return false;
  }
}

export async function readOptional(target: string): Promise<Uint8Array | null> {
  try {
    return await readFile(target);
  } catch {
    return null;
  }
}

export function sortArchitectures(archs: string[]): string[] {
  const rank = (arch: string) => {
    const index = PREFERRED_ARCHITECTURES.indexOf(arch);
    return index === -1 ? PREFERRED_ARCHITECTURES.length : index;
  };
  return [...archs].sort((a, b) => rank(a) - rank(b) || a.localeCompare(b));
}

/**
 * Shared extraction flow for zip-based mobile packages. Subclasses describe
 * the platform layout; this class owns validation, decoding and the
 * working-directory lifecycle.
 */
export abstract class BaseExtractor {
  abstract readonly platform: Platform;

  protected readonly config: ScanConfig;
  protected readonly logger: Logger;
  private workspace: Workspace | null = null;
  private extracted: ExtractedPackage | null = null;

  constructor(readonly filePath: string, options: ExtractorOptions = {}) {
    this.config = options.config ?? { ...DEFAULT_SCAN_CONFIG };
    this.logger = options.logger ?? silentLogger;
  }

  /** Locates platform subpaths below the extraction root. Throws INVALID_STRUCTURE when required ones are missing. */
  protected abstract locate(root: string): Promise<PackageTree>;

  protected abstract readMetadata(tree: PackageTree): Promise<PackageMetadata>;

  protected abstract probeFlutterRuntime(tree: PackageTree): Promise<boolean>;

  get root(): string | null {
    return this.workspace?.dir ?? null;
  }

  get result(): ExtractedPackage | null {
    return this.extracted;
  }

  async extract(outputDir?: string, signal?: AbortSignal): Promise<ExtractedPackage> {
    throwIfCancelled(signal);
    const archive = await this.readArchive();
    throwIfCancelled(signal);

    let decoded: UnzipResult;
    try {
      decoded = unzipArchive(archive, {
        maxEntries: this.config.maxEntries,
        maxEntryBytes: this.config.maxEntryBytes,
        maxTotalBytes: this.config.maxExtractedBytes
      });
    } catch (error) {
      throw new ScanError("INVALID_ARCHIVE", `Invalid or corrupted package: ${describeError(error)}`, { cause: error });
    }
    for (const name of decoded.skipped) {
      this.logger.debug(`Skipped archive entry ${name}`);
    }

    if (this.workspace && !this.workspace.isReleased && outputDir === undefined) {
      await this.workspace.release();
    }
    const workspace = await Workspace.create({
      dir: outputDir,
      parent: this.config.workRoot,
      logger: this.logger
    });
    this.workspace = workspace;

    try {
      await this.writeEntries(workspace.dir, decoded, signal);
      const tree = await this.locate(workspace.dir);
      const metadata = await this.readMetadata(tree);
      const stem = path.basename(this.filePath, path.extname(this.filePath));
      this.extracted = {
        root: workspace.dir,
        tree,
        metadata: {
          appName: metadata.appName ?? stem,
          packageName: metadata.packageName ?? "unknown"
        },
        stats: { entries: decoded.files.length, skippedEntries: decoded.skipped.length }
      };
      this.logger.debug(`Extracted ${decoded.files.length} entries into ${workspace.dir}`);
      return this.extracted;
    } catch (error) {
      await this.cleanup();
      throw error;
    }
  }

  async detectFlutter(): Promise<boolean> {
    if (!this.extracted) return false;
    const { tree } = this.extracted;
    if (tree.flutterAssetsDir && (await isDirectory(tree.flutterAssetsDir))) return true;
    return this.probeFlutterRuntime(tree);
  }

  /** Releases the working directory. Never throws. */
  async cleanup(): Promise<boolean> {
    const workspace = this.workspace;
    if (!workspace) return false;
    this.extracted = null;
    return workspace.release();
  }

  private async readArchive(): Promise<Uint8Array> {
    let size: number;
    try {
      const info = await stat(this.filePath);
      if (!info.isFile()) {
        throw new ScanError("FILE_NOT_FOUND", `Not a file: ${this.filePath}`);
      }
      size = info.size;
    } catch (error) {
      if (error instanceof ScanError) throw error;
      throw new ScanError("FILE_NOT_FOUND", `File not found: ${this.filePath}`, { cause: error });
    }

    if (size > this.config.maxArchiveBytes) {
      throw new ScanError(
        "INVALID_ARCHIVE",
        `Package is ${size} bytes, above the ${this.config.maxArchiveBytes} byte limit`
      );
    }

    const buffer = await readFile(this.filePath);
    if (!hasZipSignature(buffer)) {
      throw new ScanError("INVALID_ARCHIVE", `Not a zip container: ${this.filePath}`);
    }
    return buffer;
  }

  private async writeEntries(root: string, decoded: UnzipResult, signal?: AbortSignal): Promise<void> {
    for (const dir of decoded.directories) {
      await mkdir(path.join(root, dir), { recursive: true });
    }
    for (const entry of decoded.files) {
      throwIfCancelled(signal);
      const target = path.join(root, entry.path);
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, entry.data);
    }
  }
}
