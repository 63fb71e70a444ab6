/**
 * Pipeline ports.
 * Purpose: name every outside-world dependency of a compile run so tests can swap it.
 * Assumptions: adapters are thin; none of them hold run state.
 * Usage: buildPipelinePorts({ fetcher: fakeFetcher }) and pass to runPipeline.
 */

import type { ArtifactFetcher } from "../../artifacts/fetcher.js";
import type { BaseImageProbe } from "../../core/build-context.js";
import type { ResolvedVersion } from "../../core/version-resolver.js";
import type { ProcessExecutor } from "../../process/executor.js";
import type { StatusHttpClient } from "../../reporting/build-status.js";

export type VersionLookup = (sourceRoot: string) => Promise<ResolvedVersion>;

export type PipelinePorts = {
  fetcher: ArtifactFetcher;
  executor: ProcessExecutor;
  statusHttp: StatusHttpClient;
  probe: BaseImageProbe;
  resolveVersion: VersionLookup;
};
