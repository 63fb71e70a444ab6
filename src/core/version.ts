import * as semver from "semver";

import { VersionUnavailableError } from "./errors.js";

// Runtime versions are semver-shaped with an optional fourth build number
// (e.g. 7.23.1.55882). Ordering uses semver on the first three parts, then the build.

const VERSION_PATTERN = /^(\d+)\.(\d+)(?:\.(\d+))?(?:\.(\d+))?$/;

export class ToolchainVersion {
  private constructor(
    readonly raw: string,
    private readonly core: semver.SemVer,
    readonly build: number | null,
  ) {}

  static parse(input: string): ToolchainVersion {
    const raw = input.trim();
    const match = VERSION_PATTERN.exec(raw);
    if (!match) {
      throw new VersionUnavailableError(`Invalid runtime version: "${input}"`);
    }

    const [, major, minor, patch, build] = match;
    const core = semver.parse(`${Number(major)}.${Number(minor)}.${Number(patch ?? "0")}`);
    if (!core) {
      throw new VersionUnavailableError(`Invalid runtime version: "${input}"`);
    }

    return new ToolchainVersion(raw, core, build === undefined ? null : Number(build));
  }

  get major(): number {
    return this.core.major;
  }

  get minor(): number {
    return this.core.minor;
  }

  get patch(): number {
    return this.core.patch;
  }

  compare(other: ToolchainVersion | string): number {
    const rhs = typeof other === "string" ? ToolchainVersion.parse(other) : other;
    const byCore = semver.compare(this.core, rhs.core);
    if (byCore !== 0) return byCore;
    return Math.sign((this.build ?? 0) - (rhs.build ?? 0));
  }

  gte(other: ToolchainVersion | string): boolean {
    return this.compare(other) >= 0;
  }

  toString(): string {
    return this.raw;
  }
}
