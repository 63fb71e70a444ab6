/**
 * Process execution port.
 * Purpose: keep argument vectors and environments testable by running every subprocess through one interface.
 * Assumptions: callers wait for completion; output is captured, not streamed.
 * Usage: await executor.run({ program, args, env, cwd }) -> { exitCode, stdout, stderr }.
 */

import { execa } from "execa";

// =============================================================================
// TYPES
// =============================================================================

export type ProcessSpec = {
  program: string;
  args: string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
};

export type ProcessResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export interface ProcessExecutor {
  run(spec: ProcessSpec): Promise<ProcessResult>;
}

// =============================================================================
// EXECA ADAPTER
// =============================================================================

export class ExecaProcessExecutor implements ProcessExecutor {
  async run(spec: ProcessSpec): Promise<ProcessResult> {
    const res = await execa(spec.program, spec.args, {
      cwd: spec.cwd,
      env: spec.env ?? process.env,
      extendEnv: false,
      reject: false,
      stdio: "pipe",
    });

    return {
      exitCode: res.exitCode ?? -1,
      stdout: res.stdout,
      stderr: res.stderr,
    };
  }
}

export function truncateText(text: string, limit: number): { text: string; truncated: boolean } {
  if (text.length <= limit) {
    return { text, truncated: false };
  }
  return { text: text.slice(0, limit), truncated: true };
}
