/**
 * BuildContext: the immutable per-run record every stage reads.
 * Purpose: resolve environment flags, base-image probes and forced URLs once, at pipeline start.
 * Assumptions: the version is resolved before construction; probing only checks for existence.
 * Usage: const context = await createBuildContext({ buildDir, cacheDir, settings, version }).
 */

import os from "node:os";
import path from "node:path";

import fse from "fs-extra";

import {
  artifactSpec,
  cacheKey,
  javaVersionFor,
  type ArtifactComponent,
} from "../artifacts/catalog.js";

import { resolveBuildpackRoot } from "./paths.js";
import type { BuildSettings } from "./settings.js";
import type { ToolchainVersion } from "./version.js";

// =============================================================================
// TYPES
// =============================================================================

export type BuildContext = Readonly<{
  buildDir: string;
  cacheDir: string;
  buildpackRoot: string;
  tempDir: string;
  version: ToolchainVersion;
  settings: Readonly<BuildSettings>;
  // cache key -> artifact location inside the base image
  prebaked: Readonly<Record<string, string>>;
  overrides: Readonly<Partial<Record<ArtifactComponent, string>>>;
}>;

export type BaseImageProbe = (candidate: string) => Promise<boolean>;

export type CreateBuildContextInput = {
  buildDir: string;
  cacheDir: string;
  settings: BuildSettings;
  version: ToolchainVersion;
  buildpackRoot?: string;
  tempDir?: string;
  probe?: BaseImageProbe;
};

// Components the base image may ship pre-installed.
const PREBAKED_CANDIDATES: ReadonlyArray<(version: ToolchainVersion) => [ArtifactComponent, string]> = [
  (version) => ["jdk", javaVersionFor(version)],
  (version) => ["jre", javaVersionFor(version)],
  (version) => ["runtime", version.raw],
];

// =============================================================================
// PUBLIC API
// =============================================================================

export async function createBuildContext(input: CreateBuildContextInput): Promise<BuildContext> {
  const probe = input.probe ?? ((candidate: string) => fse.pathExists(candidate));
  const prebaked: Record<string, string> = {};

  for (const candidate of PREBAKED_CANDIDATES) {
    const [component, version] = candidate(input.version);
    const spec = artifactSpec(component, version);
    if (!spec.baseImagePath) continue;

    const location = path.join(input.settings.baseImageRoot, spec.baseImagePath);
    if (await probe(location)) {
      prebaked[cacheKey(component, version)] = location;
    }
  }

  const overrides: Partial<Record<ArtifactComponent, string>> = {};
  if (input.settings.forcedRuntimeUrl) overrides.runtime = input.settings.forcedRuntimeUrl;
  if (input.settings.forcedCompilerUrl) overrides.mxbuild = input.settings.forcedCompilerUrl;

  return Object.freeze({
    buildDir: path.resolve(input.buildDir),
    cacheDir: path.resolve(input.cacheDir),
    buildpackRoot: input.buildpackRoot ?? resolveBuildpackRoot(),
    tempDir: input.tempDir ?? os.tmpdir(),
    version: input.version,
    settings: Object.freeze({ ...input.settings }),
    prebaked: Object.freeze(prebaked),
    overrides: Object.freeze(overrides),
  });
}
