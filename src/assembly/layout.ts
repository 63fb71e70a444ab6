/**
 * DirectoryAssembler: target directory layout and buildpack-owned resources.
 * Purpose: make the build root match the layout the start script expects.
 * Assumptions: directory creation is idempotent; resource copies replace the whole tree.
 * Usage: await ensureLayout(buildDir); await copyStaticResources(buildpackRoot, buildDir).
 */

import path from "node:path";

import fse from "fs-extra";

import { AssemblyFailedError } from "../core/errors.js";
import { NEW_RELIC_DIR, STATIC_RESOURCES, TARGET_LAYOUT_DIRS } from "../core/paths.js";

export const RESOURCES_DIR = "resources";

export async function ensureLayout(root: string): Promise<string[]> {
  const created: string[] = [];
  for (const relative of TARGET_LAYOUT_DIRS) {
    const dir = path.join(root, relative);
    try {
      await fse.ensureDir(dir);
    } catch (err) {
      throw new AssemblyFailedError(`Could not create ${relative} under ${root}`, err);
    }
    created.push(dir);
  }
  return created;
}

export async function copyStaticResources(buildpackRoot: string, root: string): Promise<void> {
  for (const entry of STATIC_RESOURCES) {
    await replaceTree(path.join(buildpackRoot, RESOURCES_DIR, entry), path.join(root, entry));
  }
}

export async function copyMonitoringAgent(buildpackRoot: string, root: string): Promise<void> {
  await replaceTree(
    path.join(buildpackRoot, RESOURCES_DIR, NEW_RELIC_DIR),
    path.join(root, NEW_RELIC_DIR),
  );
}

// Full-tree replace: whatever was at the target before is gone, never merged.
async function replaceTree(source: string, target: string): Promise<void> {
  try {
    await fse.remove(target);
    await fse.copy(source, target, { dereference: true, errorOnExist: true, overwrite: false });
  } catch (err) {
    throw new AssemblyFailedError(`Could not copy ${source} to ${target}`, err);
  }
}
