/**
 * PipelineCoordinator: the compile run's state machine.
 * Purpose: Preflight -> {SourceBuild | SkipBuild} -> Assemble -> Acquire -> Finalize, each stage awaited in turn.
 * Assumptions: no stage retries; any error is terminal and propagates after the run is marked Failed.
 * Usage: const result = await runPipeline({ buildDir, cacheDir, env }, buildPipelinePorts()).
 */

import path from "node:path";

import fse from "fs-extra";

import { copyMonitoringAgent, copyStaticResources, ensureLayout } from "../../assembly/layout.js";
import { ArtifactCache } from "../../artifacts/cache.js";
import {
  APPDYNAMICS_AGENT_VERSION,
  NGINX_VERSION,
  javaVersionFor,
} from "../../artifacts/catalog.js";
import { runModelCompiler } from "../../builder/mxbuild.js";
import { createBuildContext, type BuildContext } from "../../core/build-context.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { CompileFailedError, ConfigurationMissingError } from "../../core/errors.js";
import { BuildLogger, logBuildEvent } from "../../core/logger.js";
import {
  appDynamicsHome,
  compilerHome,
  javaLink,
  jdkHome,
  jreHome,
  nginxHome,
  runtimeHome,
} from "../../core/paths.js";
import { loadBuildSettings, parseLogLevel } from "../../core/settings.js";
import { findProjectFile, type VersionSource } from "../../core/version-resolver.js";
import { checkPreflight, missingSettings } from "../../preflight/preflight.js";
import { reportBuildStatus } from "../../reporting/build-status.js";

import type { PipelinePorts } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipelineState =
  | "Preflight"
  | "SourceBuild"
  | "SkipBuild"
  | "Assemble"
  | "Acquire"
  | "Finalize"
  | "Succeeded"
  | "Failed";

export type PipelineInput = {
  buildDir: string;
  cacheDir: string;
  env: NodeJS.ProcessEnv;
  buildpackRoot?: string;
  tempDir?: string;
  logger?: BuildLogger;
  onStateChange?: (state: PipelineState) => void;
};

export type PipelineResult = {
  state: "Succeeded";
  version: string;
  versionSource: VersionSource;
  sourceBuild: boolean;
  history: PipelineState[];
};

// =============================================================================
// STATE TRACKING
// =============================================================================

class PipelineRun {
  readonly history: PipelineState[] = [];

  constructor(
    private readonly logger: BuildLogger,
    private readonly onStateChange?: (state: PipelineState) => void,
  ) {}

  enter(state: PipelineState): void {
    this.history.push(state);
    logBuildEvent(this.logger, state === "Failed" ? "error" : "info", "pipeline.state", { state });
    this.onStateChange?.(state);
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

export async function runPipeline(
  input: PipelineInput,
  ports: PipelinePorts,
): Promise<PipelineResult> {
  const logger =
    input.logger ?? new BuildLogger({ level: parseLogLevel(input.env.BUILDPACK_LOG_LEVEL ?? null) });
  const run = new PipelineRun(logger, input.onStateChange);

  try {
    run.enter("Preflight");
    const settings = loadBuildSettings(input.env);
    if (!checkPreflight(settings, logger)) {
      throw new ConfigurationMissingError(missingSettings(settings));
    }

    const resolved = await ports.resolveVersion(input.buildDir);
    logger.info("version.resolved", { version: resolved.version.raw, source: resolved.source });

    const context = await createBuildContext({
      buildDir: input.buildDir,
      cacheDir: input.cacheDir,
      settings,
      version: resolved.version,
      buildpackRoot: input.buildpackRoot,
      tempDir: input.tempDir,
      probe: ports.probe,
    });
    const cache = new ArtifactCache({ context, fetcher: ports.fetcher, logger });

    const sourceBuild = (await findProjectFile(context.buildDir)) !== null;
    if (sourceBuild) {
      run.enter("SourceBuild");
      await sourceBuildStage(context, cache, ports, logger);
    } else {
      run.enter("SkipBuild");
    }

    run.enter("Assemble");
    await assembleStage(context, logger);

    run.enter("Acquire");
    await acquireStage(context, cache, logger);

    run.enter("Finalize");
    logger.info("pipeline.complete", {
      build_dir: context.buildDir,
      version: context.version.raw,
      source_build: sourceBuild,
    });
    run.enter("Succeeded");

    return {
      state: "Succeeded",
      version: context.version.raw,
      versionSource: resolved.source,
      sourceBuild,
      history: run.history,
    };
  } catch (err) {
    logger.error("pipeline.fail", { message: formatErrorMessage(err) });
    run.enter("Failed");
    throw err;
  }
}

// =============================================================================
// STAGES
// =============================================================================

async function sourceBuildStage(
  context: BuildContext,
  cache: ArtifactCache,
  ports: PipelinePorts,
  logger: BuildLogger,
): Promise<void> {
  try {
    await runModelCompiler(context, {
      cache,
      executor: ports.executor,
      fetcher: ports.fetcher,
      logger,
    });
  } catch (err) {
    if (err instanceof CompileFailedError) {
      await reportBuildStatus(err.errorFile, {
        callbackUrl: context.settings.buildStatusCallbackUrl,
        http: ports.statusHttp,
        logger,
      });
    }
    throw err;
  }

  // Compile-only toolchains are not needed at run time.
  await fse.remove(compilerHome(context.buildDir));
  await fse.remove(jdkHome(context.buildDir));
  logger.debug("compile.toolchain_released", { removed: ["mxbuild", "jdk"] });
}

async function assembleStage(context: BuildContext, logger: BuildLogger): Promise<void> {
  await ensureLayout(context.buildDir);
  await copyStaticResources(context.buildpackRoot, context.buildDir);

  if (context.settings.newRelicLicenseKey) {
    await copyMonitoringAgent(context.buildpackRoot, context.buildDir);
    logger.info("assemble.newrelic", { enabled: true });
  }
  logger.info("assemble.complete", { build_dir: context.buildDir });
}

async function acquireStage(
  context: BuildContext,
  cache: ArtifactCache,
  logger: BuildLogger,
): Promise<void> {
  const { buildDir, version } = context;

  const jre = await cache.ensure("jre", javaVersionFor(version), jreHome(buildDir));
  await linkArtifact(buildDir, javaLink(buildDir), path.join(jre, "bin", "java"));

  if (context.settings.appDynamicsEnabled) {
    await cache.ensure("appdynamics", APPDYNAMICS_AGENT_VERSION, appDynamicsHome(buildDir));
  }

  const runtimeDir = runtimeHome(buildDir, version.raw);
  const runtime = await cache.ensure("runtime", version.raw, runtimeDir);
  if (runtime !== runtimeDir) {
    await linkArtifact(buildDir, runtimeDir, runtime);
  }

  await cache.ensure("nginx", NGINX_VERSION, nginxHome(buildDir));
  logger.info("acquire.complete", { runtime, jre });
}

// Links inside the build root are relative so the tree survives being moved
// by the platform; links into the base image stay absolute.
export async function linkArtifact(buildDir: string, linkPath: string, target: string): Promise<string> {
  const insideBuild = !path.relative(buildDir, target).startsWith("..");
  const linkTarget = insideBuild ? path.relative(path.dirname(linkPath), target) : target;

  await fse.remove(linkPath);
  await fse.ensureDir(path.dirname(linkPath));
  await fse.symlink(linkTarget, linkPath);
  return linkTarget;
}
