/**
 * Composition root for compile runs.
 * Purpose: wire the default adapters (axios, execa, fs-extra, better-sqlite3) behind the pipeline ports.
 * Assumptions: overrides replace whole ports, never parts of one.
 * Usage: buildPipelinePorts() in the CLI; buildPipelinePorts({ executor }) in tests.
 */

import fse from "fs-extra";

import { HttpArchiveFetcher } from "../../artifacts/fetcher.js";
import { resolveToolchainVersion } from "../../core/version-resolver.js";
import { ExecaProcessExecutor } from "../../process/executor.js";
import { AxiosStatusHttpClient } from "../../reporting/build-status.js";

import type { PipelinePorts } from "./ports.js";

// =============================================================================
// DEFAULT ADAPTERS
// =============================================================================

export function createDefaultPorts(): PipelinePorts {
  const executor = new ExecaProcessExecutor();
  return {
    executor,
    fetcher: new HttpArchiveFetcher({ executor }),
    statusHttp: new AxiosStatusHttpClient(),
    probe: (candidate) => fse.pathExists(candidate),
    resolveVersion: (sourceRoot) => resolveToolchainVersion(sourceRoot),
  };
}

// =============================================================================
// COMPOSITION ROOT
// =============================================================================

export function buildPipelinePorts(overrides: Partial<PipelinePorts> = {}): PipelinePorts {
  return {
    ...createDefaultPorts(),
    ...overrides,
  };
}
