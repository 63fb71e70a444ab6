import { describe, expect, it } from "vitest";

import { VersionUnavailableError } from "../core/errors.js";
import { ToolchainVersion } from "../core/version.js";

import {
  artifactSpec,
  blobstoreUrl,
  cacheKey,
  javaVersionFor,
  monoVersionFor,
  selectByVersion,
} from "./catalog.js";

const v = (raw: string) => ToolchainVersion.parse(raw);

describe("version decision tables", () => {
  it("selects the Java release by runtime version", () => {
    expect(javaVersionFor(v("5.17.9"))).toBe("7u80");
    expect(javaVersionFor(v("5.18.0"))).toBe("8u202");
    expect(javaVersionFor(v("7.23.1"))).toBe("8u202");
  });

  it("selects the Mono release by runtime version", () => {
    expect(monoVersionFor(v("6.10.4"))).toBe("3.10.0");
    expect(monoVersionFor(v("7.0.0"))).toBe("4.6.2.16");
  });

  it("rejects a version no rule covers", () => {
    expect(() => selectByVersion([{ minimum: "8.0.0", value: "x" }], v("7.23.1"))).toThrow(
      VersionUnavailableError,
    );
  });
});

describe("artifactSpec", () => {
  it("describes the runtime archive and its base-image location", () => {
    expect(artifactSpec("runtime", "7.23.1")).toEqual({
      component: "runtime",
      version: "7.23.1",
      archiveName: "mendix-7.23.1.tar.gz",
      blobstorePath: "runtime/mendix-7.23.1.tar.gz",
      baseImagePath: "/usr/local/share/mendix/7.23.1",
    });
  });

  it("has no base-image location for buildpack-only components", () => {
    expect(artifactSpec("nginx", "1.15.10").baseImagePath).toBeNull();
    expect(artifactSpec("mono", "4.6.2.16").baseImagePath).toBeNull();
  });

  it("builds blobstore URLs and cache keys", () => {
    const jre = artifactSpec("jre", "8u202");

    expect(blobstoreUrl("https://blobs.test", jre)).toBe(
      "https://blobs.test/mx-buildpack/oracle-jre-8u202-linux-x64.tar.gz",
    );
    expect(cacheKey("jre", "8u202")).toBe("jre/8u202");
  });
});
