// Artifact catalog.
// Purpose: map (component, runtime version) to archive names, blobstore paths and base-image paths.
// Every version-dependent choice lives in one ordered table so the selection can be audited in isolation.

import path from "node:path";

import { VersionUnavailableError } from "../core/errors.js";
import type { ToolchainVersion } from "../core/version.js";

// =============================================================================
// TYPES
// =============================================================================

export type ArtifactComponent =
  | "mono"
  | "mxbuild"
  | "jdk"
  | "jre"
  | "runtime"
  | "nginx"
  | "appdynamics";

export type ArtifactSpec = {
  component: ArtifactComponent;
  version: string;
  archiveName: string;
  blobstorePath: string;
  // Path inside the base image that would already hold this artifact, if any.
  baseImagePath: string | null;
};

type VersionRule = { minimum: string; value: string };

// =============================================================================
// DECISION TABLES
// =============================================================================

// First matching rule wins; rules are ordered from newest minimum to oldest.
export const JAVA_VERSION_RULES: readonly VersionRule[] = [
  { minimum: "5.18.0", value: "8u202" },
  { minimum: "0.0.0", value: "7u80" },
];

export const MONO_VERSION_RULES: readonly VersionRule[] = [
  { minimum: "7.0.0", value: "4.6.2.16" },
  { minimum: "0.0.0", value: "3.10.0" },
];

export const NGINX_VERSION = "1.15.10";
export const APPDYNAMICS_AGENT_VERSION = "4.3.5.7";

// Compiler releases from this version on accept --write-errors.
export const WRITE_ERRORS_MIN_VERSION = "6.8.0";

export function selectByVersion(rules: readonly VersionRule[], version: ToolchainVersion): string {
  const rule = rules.find((candidate) => version.gte(candidate.minimum));
  if (!rule) {
    throw new VersionUnavailableError(`No toolchain rule matches runtime version ${version.raw}`);
  }
  return rule.value;
}

export function javaVersionFor(version: ToolchainVersion): string {
  return selectByVersion(JAVA_VERSION_RULES, version);
}

export function monoVersionFor(version: ToolchainVersion): string {
  return selectByVersion(MONO_VERSION_RULES, version);
}

// =============================================================================
// ARTIFACT SPECS
// =============================================================================

export function artifactSpec(component: ArtifactComponent, version: string): ArtifactSpec {
  switch (component) {
    case "mono":
      return spec(component, version, `mono-${version}-mx.tar.gz`, "mx-buildpack", null);
    case "mxbuild":
      return spec(component, version, `mxbuild-${version}.tar.gz`, "runtime", null);
    case "jdk":
      return spec(
        component,
        version,
        `oracle-jdk-${version}-linux-x64.tar.gz`,
        "mx-buildpack",
        `/usr/lib/jvm/jdk-${version}-oracle-x64`,
      );
    case "jre":
      return spec(
        component,
        version,
        `oracle-jre-${version}-linux-x64.tar.gz`,
        "mx-buildpack",
        `/usr/lib/jvm/jre-${version}-oracle-x64`,
      );
    case "runtime":
      return spec(
        component,
        version,
        `mendix-${version}.tar.gz`,
        "runtime",
        `/usr/local/share/mendix/${version}`,
      );
    case "nginx":
      return spec(component, version, `nginx-${version}-linux-x64.tar.gz`, "mx-buildpack", null);
    case "appdynamics":
      return spec(
        component,
        version,
        `appdynamics-agent-${version}.tar.gz`,
        "mx-buildpack",
        null,
      );
  }
}

export function cacheKey(component: ArtifactComponent, version: string): string {
  return `${component}/${version}`;
}

export function blobstoreUrl(blobstore: string, artifact: ArtifactSpec): string {
  return `${blobstore}/${artifact.blobstorePath}`;
}

function spec(
  component: ArtifactComponent,
  version: string,
  archiveName: string,
  folder: string,
  baseImagePath: string | null,
): ArtifactSpec {
  return {
    component,
    version,
    archiveName,
    blobstorePath: path.posix.join(folder, archiveName),
    baseImagePath,
  };
}
