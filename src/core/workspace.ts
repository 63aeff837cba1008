import { mkdir, mkdtemp, readdir, rm, stat, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { Logger } from "./log";
import { silentLogger } from "./log";

export const WORKSPACE_PREFIX = "bundle-audit-";
const MARKER_FILE = ".bundle-audit-workspace";

// Directories created by this process; release() only ever removes these.
const ownedDirs = new Set<string>();

export interface WorkspaceOptions {
  /** Caller-supplied directory. When omitted a fresh temporary directory is created. */
  dir?: string;
  /** Parent for generated directories; defaults to os.tmpdir(). */
  parent?: string;
  logger?: Logger;
}

async function pathExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * A pipeline-owned extraction directory. Ownership is tracked in-process and
 * by a marker file, and the directory is removed at most once.
 */
export class Workspace {
  readonly dir: string;
  readonly owned: boolean;
  private readonly logger: Logger;
  private released = false;

  private constructor(dir: string, owned: boolean, logger: Logger) {
    this.dir = dir;
    this.owned = owned;
    this.logger = logger;
  }

  static async create({ dir, parent, logger = silentLogger }: WorkspaceOptions = {}): Promise<Workspace> {
    if (!dir) {
      const base = path.resolve(parent ?? os.tmpdir());
      await mkdir(base, { recursive: true });
      const created = await mkdtemp(path.join(base, WORKSPACE_PREFIX));
      return Workspace.claim(created, logger);
    }

    const resolved = path.resolve(dir);
    if (Workspace.isOwned(resolved)) {
      // Re-extraction into a directory from an earlier run: start clean.
      await Workspace.clear(resolved);
      return Workspace.claim(resolved, logger);
    }

    // mkdir reports the first directory it made; undefined means the path was already there.
    const created = await mkdir(resolved, { recursive: true });
    if (created !== undefined) {
      return Workspace.claim(resolved, logger);
    }

    logger.warn(`Extracting into existing directory ${resolved}; it will not be removed on cleanup`);
    return new Workspace(resolved, false, logger);
  }

  static isOwned(dir: string): boolean {
    return ownedDirs.has(path.resolve(dir));
  }

  private static async claim(dir: string, logger: Logger): Promise<Workspace> {
    await writeFile(path.join(dir, MARKER_FILE), `${process.pid}\n`);
    ownedDirs.add(dir);
    return new Workspace(dir, true, logger);
  }

  private static async clear(dir: string): Promise<void> {
    for (const entry of await readdir(dir)) {
      await rm(path.join(dir, entry), { recursive: true, force: true });
    }
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** Best-effort removal. Returns true when the directory was deleted by this call. */
  async release(): Promise<boolean> {
    if (this.released) return false;
    this.released = true;

    if (!this.owned || !ownedDirs.has(this.dir)) {
      this.logger.warn(`Refusing to remove ${this.dir}: not a directory created by this scan`);
      return false;
    }
    ownedDirs.delete(this.dir);

    if (!(await pathExists(path.join(this.dir, MARKER_FILE)))) {
      this.logger.warn(`Refusing to remove ${this.dir}: workspace marker is missing`);
      return false;
    }

    try {
      await rm(this.dir, { recursive: true, force: true });
      this.logger.debug(`Removed working directory ${this.dir}`);
      return true;
    } catch (error) {
      this.logger.warn(`Failed to remove working directory ${this.dir}`, error);
      return false;
    }
  }
}
