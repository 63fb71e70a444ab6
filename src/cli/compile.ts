import path from "node:path";

import { buildPipelinePorts } from "../app/pipeline/pipeline-context.js";
import { runPipeline, type PipelineResult } from "../app/pipeline/pipeline.js";
import type { PipelinePorts } from "../app/pipeline/ports.js";
import {
  createAnsiFormatter,
  formatErrorLines,
  renderErrorLines,
  resolveColorEnabled,
} from "../core/error-format.js";
import type { BuildLogger } from "../core/logger.js";

export type CompileCommandOptions = {
  env?: NodeJS.ProcessEnv;
  ports?: Partial<PipelinePorts>;
  logger?: BuildLogger;
  stderr?: { write(text: string): unknown; isTTY?: boolean };
};

export async function compileCommand(
  buildDir: string,
  cacheDir: string,
  opts: CompileCommandOptions = {},
): Promise<PipelineResult | null> {
  const env = opts.env ?? process.env;
  const stderr = opts.stderr ?? process.stderr;

  try {
    return await runPipeline(
      {
        buildDir: path.resolve(buildDir),
        cacheDir: path.resolve(cacheDir),
        env,
        logger: opts.logger,
      },
      buildPipelinePorts(opts.ports),
    );
  } catch (err) {
    const debug = env.BUILDPACK_LOG_LEVEL?.trim().toLowerCase() === "debug";
    const lines = formatErrorLines(err, { mode: debug ? "debug" : "short" });
    const format = createAnsiFormatter(resolveColorEnabled({ stream: stderr }));
    stderr.write(`${renderErrorLines(lines, format)}\n`);
    process.exitCode = 1;
    return null;
  }
}
