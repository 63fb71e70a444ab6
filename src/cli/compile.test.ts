import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import {
  FULL_ENV,
  FakeArchiveFetcher,
  FakeProcessExecutor,
  RecordingStatusHttp,
  cleanupTempDirs,
  createTestLogger,
  makeTempDir,
  writeMetadataProject,
} from "../app/pipeline/__tests__/fakes.js";
import { buildProgram } from "../index.js";

import { compileCommand } from "./compile.js";

class CapturedStream {
  readonly chunks: string[] = [];
  readonly isTTY = false;

  write(text: string): boolean {
    this.chunks.push(text);
    return true;
  }

  text(): string {
    return this.chunks.join("");
  }
}

afterEach(() => {
  cleanupTempDirs();
  process.exitCode = undefined;
});

function fakePorts() {
  return {
    fetcher: new FakeArchiveFetcher(),
    executor: new FakeProcessExecutor(),
    statusHttp: new RecordingStatusHttp(),
    probe: async () => false,
  };
}

describe("compileCommand", () => {
  it("prints the mapped error and sets a failing exit code", async () => {
    const root = makeTempDir("cli-");
    const stderr = new CapturedStream();

    const result = await compileCommand(path.join(root, "build"), path.join(root, "cache"), {
      env: { ADMIN_PASSWORD: "test-admin-password" },
      ports: fakePorts(),
      logger: createTestLogger().logger,
      stderr,
    });

    expect(result).toBeNull();
    expect(process.exitCode).toBe(1);
    expect(stderr.text()).toBe(
      [
        "Required configuration missing.",
        "Missing required configuration: DATABASE_URL",
        "Hint: Bind a database service or set DATABASE_URL, and set ADMIN_PASSWORD.",
      ].join("\n") + "\n",
    );
  });

  it("returns the pipeline result on success", async () => {
    const root = makeTempDir("cli-");
    const buildDir = path.join(root, "build");
    await writeMetadataProject(buildDir, "7.23.1");
    const stderr = new CapturedStream();

    const result = await compileCommand(buildDir, path.join(root, "cache"), {
      env: FULL_ENV,
      ports: fakePorts(),
      logger: createTestLogger().logger,
      stderr,
    });

    expect(result?.state).toBe("Succeeded");
    expect(result?.version).toBe("7.23.1");
    expect(stderr.chunks).toEqual([]);
    expect(process.exitCode).toBeUndefined();
  });
});

describe("buildProgram", () => {
  it("takes the build and cache directories as arguments", () => {
    const program = buildProgram();

    expect(program.name()).toBe("buildpack-compile");
    expect(program.registeredArguments.map((arg) => arg.name())).toEqual(["build-dir", "cache-dir"]);
  });
});
