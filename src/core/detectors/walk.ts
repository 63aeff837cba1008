import type { Dirent } from "node:fs";
import { readdir } from "node:fs/promises";
import path from "node:path";
import type { PackageTree } from "@/types";
import { throwIfCancelled } from "../errors";

export interface WalkedFile {
  absolutePath: string;
  name: string;
}

/** Flutter assets first, then the generic assets directory, without repeats. */
export function assetRoots(tree: PackageTree): string[] {
  const roots: string[] = [];
  for (const dir of [tree.flutterAssetsDir, tree.assetsDir]) {
    if (dir && !roots.includes(dir)) roots.push(dir);
  }
  return roots;
}

/**
 * Regular files below `dir`, depth-first in name order. Symlinks are not
 * followed and unreadable directories are skipped.
 */
export async function* walkFiles(dir: string, signal?: AbortSignal): AsyncGenerator<WalkedFile> {
  throwIfCancelled(signal);
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch {
    return;
  }
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const absolutePath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walkFiles(absolutePath, signal);
    } else if (entry.isFile()) {
      yield { absolutePath, name: entry.name };
    }
  }
}

/** Files under every asset root, each absolute path reported once. */
export async function* walkAssetFiles(tree: PackageTree, signal?: AbortSignal): AsyncGenerator<WalkedFile> {
  const seen = new Set<string>();
  for (const root of assetRoots(tree)) {
    for await (const file of walkFiles(root, signal)) {
      if (seen.has(file.absolutePath)) continue;
      seen.add(file.absolutePath);
      yield file;
    }
  }
}

export function relativeToRoot(tree: PackageTree, absolutePath: string): string {
  return path.relative(tree.root, absolutePath).split(path.sep).join("/");
}
