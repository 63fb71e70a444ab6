import { execa } from "execa";
import { afterEach, describe, expect, it, vi } from "vitest";

import { ExecaProcessExecutor, truncateText } from "./executor.js";

vi.mock("execa", () => ({
  execa: vi.fn(),
}));

const execaMock = vi.mocked(execa);

afterEach(() => {
  execaMock.mockReset();
});

describe("ExecaProcessExecutor", () => {
  it("runs with exactly the given environment and never rejects on exit codes", async () => {
    execaMock.mockResolvedValueOnce({
      stdout: "out",
      stderr: "err",
      exitCode: 3,
    } as Awaited<ReturnType<typeof execa>>);

    const result = await new ExecaProcessExecutor().run({
      program: "/build/.local/mono/bin/mono",
      args: ["mxbuild.exe", "--target=package"],
      env: { LD_LIBRARY_PATH: "/build/.local/mono/lib" },
      cwd: "/build",
    });

    expect(result).toEqual({ exitCode: 3, stdout: "out", stderr: "err" });
    expect(execaMock).toHaveBeenCalledWith(
      "/build/.local/mono/bin/mono",
      ["mxbuild.exe", "--target=package"],
      {
        cwd: "/build",
        env: { LD_LIBRARY_PATH: "/build/.local/mono/lib" },
        extendEnv: false,
        reject: false,
        stdio: "pipe",
      },
    );
  });
});

describe("truncateText", () => {
  it("keeps short text intact", () => {
    expect(truncateText("abc", 5)).toEqual({ text: "abc", truncated: false });
  });

  it("cuts long text at the limit", () => {
    expect(truncateText("abcdef", 4)).toEqual({ text: "abcd", truncated: true });
  });
});
