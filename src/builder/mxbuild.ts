/**
 * ExternalBuilder: compile a source project with the model compiler.
 * Purpose: acquire the compile toolchain, run the compiler, and install the package it produces.
 * Assumptions: the compiler runs under Mono; its error file is read only after a non-zero exit.
 * Usage: const artifact = await runModelCompiler(context, { cache, executor, fetcher, logger }).
 */

import path from "node:path";

import fse from "fs-extra";

import type { ArtifactCache } from "../artifacts/cache.js";
import { WRITE_ERRORS_MIN_VERSION, javaVersionFor, monoVersionFor } from "../artifacts/catalog.js";
import type { ArtifactFetcher } from "../artifacts/fetcher.js";
import type { BuildContext } from "../core/build-context.js";
import { AssemblyFailedError, CompileFailedError } from "../core/errors.js";
import type { BuildLogger } from "../core/logger.js";
import {
  BUILD_ERRORS_FILE,
  LOCAL_DIR,
  PACKAGE_FILE,
  compilerHome,
  jdkHome,
  monoHome,
} from "../core/paths.js";
import { findProjectFile } from "../core/version-resolver.js";
import { truncateText, type ProcessExecutor, type ProcessSpec } from "../process/executor.js";

import { readBuildErrors } from "./build-errors.js";
import { replaceDirectoryContents } from "./replace-contents.js";

// =============================================================================
// TYPES
// =============================================================================

export type BuilderDeps = {
  cache: ArtifactCache;
  executor: ProcessExecutor;
  fetcher: ArtifactFetcher;
  logger: BuildLogger;
};

export type CompileToolchain = {
  mono: string;
  compiler: string;
  jdk: string;
};

export type BuildArtifact = {
  archivePath: string;
  errorFile: string;
  installed: string[];
};

// =============================================================================
// CONSTANTS
// =============================================================================

const OUTPUT_PREVIEW_LIMIT = 4000;

export function buildErrorsPath(context: BuildContext): string {
  return path.join(context.tempDir, BUILD_ERRORS_FILE);
}

export function packagePath(context: BuildContext): string {
  return path.join(context.tempDir, PACKAGE_FILE);
}

// =============================================================================
// ARGUMENTS + ENVIRONMENT
// =============================================================================

export function shouldWriteBuildErrors(context: BuildContext): boolean {
  return context.settings.forceWriteBuildErrors || context.version.gte(WRITE_ERRORS_MIN_VERSION);
}

export function buildCompilerArgs(
  context: BuildContext,
  toolchain: CompileToolchain,
  projectFile: string,
): string[] {
  const args = [
    path.join(toolchain.compiler, "modeler", "mxbuild.exe"),
    "--target=package",
    `--output=${packagePath(context)}`,
    `--java-home=${toolchain.jdk}`,
    `--java-exe-path=${path.join(toolchain.jdk, "bin", "java")}`,
  ];

  if (shouldWriteBuildErrors(context)) {
    args.push(`--write-errors=${buildErrorsPath(context)}`);
  }

  // A forced compiler build may not match the project's version exactly.
  if (context.overrides.mxbuild) {
    args.push("--loose-version-check");
  }

  args.push(projectFile);
  return args;
}

export function buildCompilerEnv(
  toolchain: CompileToolchain,
  base: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv {
  const monoLib = path.join(toolchain.mono, "lib");
  const previous = base.LD_LIBRARY_PATH?.trim();
  return {
    ...base,
    LD_LIBRARY_PATH: previous ? `${monoLib}:${previous}` : monoLib,
  };
}

export function buildCompilerProcess(
  context: BuildContext,
  toolchain: CompileToolchain,
  projectFile: string,
  baseEnv?: NodeJS.ProcessEnv,
): ProcessSpec {
  return {
    program: path.join(toolchain.mono, "bin", "mono"),
    args: buildCompilerArgs(context, toolchain, projectFile),
    env: buildCompilerEnv(toolchain, baseEnv),
    cwd: context.buildDir,
  };
}

// =============================================================================
// PUBLIC API
// =============================================================================

export async function acquireCompileToolchain(
  context: BuildContext,
  cache: ArtifactCache,
): Promise<CompileToolchain> {
  const mono = await cache.ensure("mono", monoVersionFor(context.version), monoHome(context.buildDir));
  const compiler = await cache.ensure("mxbuild", context.version.raw, compilerHome(context.buildDir));
  const jdk = await cache.ensure("jdk", javaVersionFor(context.version), jdkHome(context.buildDir));
  return { mono, compiler, jdk };
}

export async function runModelCompiler(
  context: BuildContext,
  deps: BuilderDeps,
): Promise<BuildArtifact> {
  const { executor, fetcher, logger } = deps;

  const projectFile = await findProjectFile(context.buildDir);
  if (!projectFile) {
    throw new CompileFailedError(
      [{ severity: "Error", message: "No .mpr project file found", locations: [] }],
      buildErrorsPath(context),
    );
  }

  const toolchain = await acquireCompileToolchain(context, deps.cache);

  const errorFile = buildErrorsPath(context);
  const archivePath = packagePath(context);
  await fse.remove(errorFile);
  await fse.remove(archivePath);

  const spec = buildCompilerProcess(context, toolchain, projectFile);
  logger.info("compile.start", { project: path.basename(projectFile), version: context.version.raw });
  logger.debug("compile.command", { program: spec.program, args: spec.args });

  const result = await executor.run(spec);
  const stdout = truncateText(result.stdout, OUTPUT_PREVIEW_LIMIT);
  const stderr = truncateText(result.stderr, OUTPUT_PREVIEW_LIMIT);
  logger.log({
    type: result.exitCode === 0 ? "compile.complete" : "compile.fail",
    level: result.exitCode === 0 ? "info" : "error",
    payload: {
      exit_code: result.exitCode,
      stdout: stdout.text,
      stdout_truncated: stdout.truncated,
      stderr: stderr.text,
      stderr_truncated: stderr.truncated,
    },
  });

  if (result.exitCode !== 0) {
    const errors = await readBuildErrors(errorFile);
    throw new CompileFailedError(errors, errorFile);
  }

  const staging = path.join(context.tempDir, "package-staging");
  try {
    await fse.emptyDir(staging);
    await fetcher.unpack(archivePath, staging);
  } catch (err) {
    throw new AssemblyFailedError(`Could not unpack compiler output ${archivePath}`, err);
  }

  const replaced = await replaceDirectoryContents({
    root: context.buildDir,
    staging,
    keep: [LOCAL_DIR],
  });
  logger.info("compile.package_installed", {
    removed: replaced.removed.length,
    installed: replaced.installed.length,
  });

  return { archivePath, errorFile, installed: replaced.installed };
}
