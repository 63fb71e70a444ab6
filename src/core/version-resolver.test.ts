import path from "node:path";

import fse from "fs-extra";
import { afterEach, describe, expect, it } from "vitest";

import {
  cleanupTempDirs,
  makeTempDir,
  writeMetadataProject,
  writeProjectDatabase,
} from "../app/pipeline/__tests__/fakes.js";

import { VersionUnavailableError } from "./errors.js";
import { findProjectFile, resolveToolchainVersion, type VersionTier } from "./version-resolver.js";

afterEach(() => {
  cleanupTempDirs();
});

describe("resolveToolchainVersion", () => {
  it("returns the version declared in model/metadata.json", async () => {
    const dir = makeTempDir("resolver-meta-");
    await writeMetadataProject(dir, "7.23.1");

    const resolved = await resolveToolchainVersion(dir);

    expect(resolved.version.raw).toBe("7.23.1");
    expect(resolved.source).toBe("metadata");
  });

  it("prefers metadata over the project database", async () => {
    const dir = makeTempDir("resolver-both-");
    await fse.outputJson(path.join(dir, "model-metadata.json"), { RuntimeVersion: "8.1.0" });
    writeProjectDatabase(dir, "7.0.2");

    const resolved = await resolveToolchainVersion(dir);

    expect(resolved.version.raw).toBe("8.1.0");
    expect(resolved.source).toBe("metadata");
  });

  it("falls back to the project database record", async () => {
    const dir = makeTempDir("resolver-mpr-");
    writeProjectDatabase(dir, "6.10.4.3210");

    const resolved = await resolveToolchainVersion(dir);

    expect(resolved.version.raw).toBe("6.10.4.3210");
    expect(resolved.source).toBe("project-database");
  });

  it("fails when neither source exists", async () => {
    const dir = makeTempDir("resolver-empty-");
    await fse.outputFile(path.join(dir, "README.md"), "nothing here");

    await expect(resolveToolchainVersion(dir)).rejects.toBeInstanceOf(VersionUnavailableError);
  });

  it("fails on metadata without RuntimeVersion instead of falling through", async () => {
    const dir = makeTempDir("resolver-bad-meta-");
    await fse.outputJson(path.join(dir, "model", "metadata.json"), { ModelVersion: "1.0" });
    writeProjectDatabase(dir, "7.0.2");

    await expect(resolveToolchainVersion(dir)).rejects.toThrow(
      "model/metadata.json has no RuntimeVersion",
    );
  });

  it("fails on a project file that is not a database", async () => {
    const dir = makeTempDir("resolver-bad-mpr-");
    await fse.outputFile(path.join(dir, "App.mpr"), "not sqlite");

    await expect(resolveToolchainVersion(dir)).rejects.toThrow(
      "Could not read project database App.mpr",
    );
  });

  it("consults tiers strictly in order", async () => {
    const seen: string[] = [];
    const tiers: VersionTier[] = [
      {
        source: "metadata",
        read: async () => {
          seen.push("metadata");
          return null;
        },
      },
      {
        source: "project-database",
        read: async () => {
          seen.push("database");
          return "9.0.0";
        },
      },
    ];

    const resolved = await resolveToolchainVersion("/unused", tiers);

    expect(seen).toEqual(["metadata", "database"]);
    expect(resolved.version.raw).toBe("9.0.0");
  });
});

describe("findProjectFile", () => {
  it("returns null when the directory does not exist", async () => {
    const dir = makeTempDir("resolver-missing-");
    expect(await findProjectFile(path.join(dir, "nope"))).toBeNull();
  });
});
