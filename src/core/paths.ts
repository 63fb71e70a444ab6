import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

// =============================================================================
// TARGET LAYOUT
// =============================================================================

export const LOCAL_DIR = ".local";

// Directories guaranteed to exist under the build root once assembly completes.
export const TARGET_LAYOUT_DIRS = [
  LOCAL_DIR,
  "runtimes",
  "log",
  "database",
  path.join("data", "files"),
  path.join("data", "tmp"),
  path.join("data", "model-upload"),
] as const;

// Buildpack-owned trees copied into every build root.
export const STATIC_RESOURCES = ["etc", "lib", "start.sh"] as const;

export const NEW_RELIC_DIR = "newrelic";

export const BUILD_ERRORS_FILE = "builderrors.json";
export const PACKAGE_FILE = "model.mda";

export function monoHome(buildDir: string): string {
  return path.join(buildDir, LOCAL_DIR, "mono");
}

export function compilerHome(buildDir: string): string {
  return path.join(buildDir, LOCAL_DIR, "mxbuild");
}

export function jdkHome(buildDir: string): string {
  return path.join(buildDir, LOCAL_DIR, "jdk");
}

export function jreHome(buildDir: string): string {
  return path.join(buildDir, LOCAL_DIR, "jre");
}

export function javaLink(buildDir: string): string {
  return path.join(buildDir, LOCAL_DIR, "bin", "java");
}

export function runtimeHome(buildDir: string, version: string): string {
  return path.join(buildDir, "runtimes", version);
}

export function nginxHome(buildDir: string): string {
  return path.join(buildDir, "nginx");
}

export function appDynamicsHome(buildDir: string): string {
  return path.join(buildDir, "appdynamics");
}

// =============================================================================
// BUILDPACK ROOT
// =============================================================================

// Walks up from this module to the directory holding package.json, so the
// lookup works from both src/ and dist/src/.
export function resolveBuildpackRoot(start = path.dirname(fileURLToPath(import.meta.url))): string {
  let current = path.resolve(start);
  while (true) {
    if (fs.existsSync(path.join(current, "package.json"))) {
      return current;
    }

    const parent = path.dirname(current);
    if (parent === current) {
      throw new Error(`No buildpack root found above ${start}`);
    }
    current = parent;
  }
}
