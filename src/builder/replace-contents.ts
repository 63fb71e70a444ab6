/**
 * Replace a build root's contents with a freshly unpacked package.
 * Purpose: park the package in the root, sweep everything outside the keep list,
 * then rename the package into place.
 * Assumptions: staging and root live on the same volume, or fs-extra falls back to copy+remove.
 * Usage: await replaceDirectoryContents({ root, staging, keep: [".local"] }).
 */

import path from "node:path";

import fse from "fs-extra";

export type ReplaceContentsInput = {
  root: string;
  staging: string;
  keep: readonly string[];
};

export type ReplaceContentsResult = {
  removed: string[];
  kept: string[];
  installed: string[];
};

// Staged entries wait beside the old ones under this prefix until the sweep is done.
export const INCOMING_PREFIX = ".incoming-";

export async function replaceDirectoryContents(
  input: ReplaceContentsInput,
): Promise<ReplaceContentsResult> {
  const keep = new Set(input.keep);

  // The package never overrides a kept subtree.
  const incoming = (await fse.readdir(input.staging)).sort().filter((entry) => !keep.has(entry));
  for (const entry of incoming) {
    await fse.move(
      path.join(input.staging, entry),
      path.join(input.root, `${INCOMING_PREFIX}${entry}`),
      { overwrite: true },
    );
  }
  const parked = new Set(incoming.map((entry) => `${INCOMING_PREFIX}${entry}`));

  const removed: string[] = [];
  const kept: string[] = [];
  for (const entry of (await fse.readdir(input.root)).sort()) {
    if (parked.has(entry)) continue;
    if (keep.has(entry)) {
      kept.push(entry);
      continue;
    }
    await fse.remove(path.join(input.root, entry));
    removed.push(entry);
  }

  for (const entry of incoming) {
    await fse.rename(
      path.join(input.root, `${INCOMING_PREFIX}${entry}`),
      path.join(input.root, entry),
    );
  }

  await fse.remove(input.staging);
  return { removed, kept, installed: incoming };
}
