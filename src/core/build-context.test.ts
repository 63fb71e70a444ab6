import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { baseSettings, cleanupTempDirs, makeTempDir } from "../app/pipeline/__tests__/fakes.js";

import { createBuildContext } from "./build-context.js";
import { ToolchainVersion } from "./version.js";

afterEach(() => {
  cleanupTempDirs();
});

describe("createBuildContext", () => {
  it("records base-image artifacts the probe finds", async () => {
    const root = makeTempDir("context-");
    const probed: string[] = [];

    const context = await createBuildContext({
      buildDir: path.join(root, "build"),
      cacheDir: path.join(root, "cache"),
      settings: baseSettings({ baseImageRoot: "/base" }),
      version: ToolchainVersion.parse("7.23.1"),
      buildpackRoot: root,
      tempDir: root,
      probe: async (candidate) => {
        probed.push(candidate);
        return candidate === "/base/usr/lib/jvm/jre-8u202-oracle-x64";
      },
    });

    expect(probed).toEqual([
      "/base/usr/lib/jvm/jdk-8u202-oracle-x64",
      "/base/usr/lib/jvm/jre-8u202-oracle-x64",
      "/base/usr/local/share/mendix/7.23.1",
    ]);
    expect(context.prebaked).toEqual({ "jre/8u202": "/base/usr/lib/jvm/jre-8u202-oracle-x64" });
  });

  it("maps forced URLs onto the components they replace", async () => {
    const root = makeTempDir("context-");

    const context = await createBuildContext({
      buildDir: path.join(root, "build"),
      cacheDir: path.join(root, "cache"),
      settings: baseSettings({
        forcedRuntimeUrl: "https://builds.test/mendix-custom.tar.gz",
        forcedCompilerUrl: "https://builds.test/mxbuild-custom.tar.gz",
      }),
      version: ToolchainVersion.parse("7.23.1"),
      buildpackRoot: root,
      tempDir: root,
      probe: async () => false,
    });

    expect(context.overrides).toEqual({
      runtime: "https://builds.test/mendix-custom.tar.gz",
      mxbuild: "https://builds.test/mxbuild-custom.tar.gz",
    });
    expect(context.prebaked).toEqual({});
  });

  it("is frozen once built", async () => {
    const root = makeTempDir("context-");

    const context = await createBuildContext({
      buildDir: path.join(root, "build"),
      cacheDir: path.join(root, "cache"),
      settings: baseSettings(),
      version: ToolchainVersion.parse("7.23.1"),
      buildpackRoot: root,
      tempDir: root,
      probe: async () => false,
    });

    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.settings)).toBe(true);
    expect(context.buildDir).toBe(path.join(root, "build"));
  });
});
