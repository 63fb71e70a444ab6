/**
 * ArtifactCache: acquire a toolchain artifact at most once per cache volume.
 * Purpose: choose where an artifact comes from (base image, forced URL, shared cache, blobstore) and unpack it.
 * Assumptions: a present, non-empty archive is trusted; one writer per cache key at a time.
 * Usage: const home = await cache.ensure("jdk", "8u202", jdkHome(buildDir)).
 */

import path from "node:path";

import fse from "fs-extra";

import type { BuildContext } from "../core/build-context.js";
import { ArtifactUnavailableError } from "../core/errors.js";
import type { BuildLogger } from "../core/logger.js";

import {
  artifactSpec,
  blobstoreUrl,
  cacheKey,
  type ArtifactComponent,
  type ArtifactSpec,
} from "./catalog.js";
import type { ArtifactFetcher } from "./fetcher.js";

// =============================================================================
// TYPES
// =============================================================================

export type CacheEntry = {
  component: ArtifactComponent;
  version: string;
  key: string;
  archivePath: string;
};

export type AcquisitionPlan =
  | { kind: "prebaked"; location: string }
  | { kind: "forced-url"; url: string; archivePath: string; scratchDir: string }
  | { kind: "cached"; entry: CacheEntry }
  | { kind: "blobstore"; url: string; entry: CacheEntry };

export type ArtifactCacheDeps = {
  context: BuildContext;
  fetcher: ArtifactFetcher;
  logger: BuildLogger;
};

// =============================================================================
// CACHE
// =============================================================================

export class ArtifactCache {
  constructor(private readonly deps: ArtifactCacheDeps) {}

  entryFor(component: ArtifactComponent, version: string): CacheEntry {
    const spec = artifactSpec(component, version);
    return {
      component,
      version,
      key: cacheKey(component, version),
      archivePath: path.join(this.deps.context.cacheDir, component, version, spec.archiveName),
    };
  }

  // Ordered decision table: the first row that applies decides the source.
  async plan(component: ArtifactComponent, version: string): Promise<AcquisitionPlan> {
    const { context } = this.deps;
    const spec = artifactSpec(component, version);
    const entry = this.entryFor(component, version);

    const prebaked = context.prebaked[entry.key];
    if (prebaked) {
      return { kind: "prebaked", location: prebaked };
    }

    const forced = context.overrides[component];
    if (forced) {
      const scratchDir = path.join(context.tempDir, "forced-artifacts", component);
      return {
        kind: "forced-url",
        url: forced,
        archivePath: path.join(scratchDir, archiveNameFromUrl(forced, spec)),
        scratchDir,
      };
    }

    if (await isPopulated(entry.archivePath)) {
      return { kind: "cached", entry };
    }

    return { kind: "blobstore", url: blobstoreUrl(context.settings.blobstore, spec), entry };
  }

  async ensure(component: ArtifactComponent, version: string, destination: string): Promise<string> {
    const { fetcher, logger } = this.deps;
    const plan = await this.plan(component, version);
    logger.debug("artifact.plan", { component, version, source: plan.kind });

    if (plan.kind === "prebaked") {
      logger.info("artifact.prebaked", { component, version, location: plan.location });
      return plan.location;
    }

    try {
      const archivePath = await this.fetchArchive(component, version, plan);
      try {
        await fse.emptyDir(destination);
        await fetcher.unpack(archivePath, destination);
      } catch (err) {
        throw new ArtifactUnavailableError(
          `Failed to unpack ${component} ${version} into ${destination}`,
          err,
        );
      }
    } finally {
      // Forced archives never outlive the run, whether or not they arrived.
      if (plan.kind === "forced-url") {
        await fse.remove(plan.scratchDir);
      }
    }

    logger.info("artifact.ready", { component, version, destination });
    return destination;
  }

  private async fetchArchive(
    component: ArtifactComponent,
    version: string,
    plan: Exclude<AcquisitionPlan, { kind: "prebaked" }>,
  ): Promise<string> {
    const { fetcher, logger } = this.deps;
    try {
      switch (plan.kind) {
        case "forced-url":
          logger.info("artifact.download", { component, version, url: plan.url, persistent: false });
          await fse.emptyDir(plan.scratchDir);
          await fetcher.download(plan.url, plan.archivePath);
          return plan.archivePath;
        case "blobstore":
          logger.info("artifact.download", { component, version, url: plan.url, persistent: true });
          await fetcher.download(plan.url, plan.entry.archivePath);
          return plan.entry.archivePath;
        case "cached":
          logger.debug("artifact.cache_hit", { component, version, archive: plan.entry.archivePath });
          return plan.entry.archivePath;
      }
    } catch (err) {
      throw new ArtifactUnavailableError(`Failed to download ${component} ${version}`, err);
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

async function isPopulated(file: string): Promise<boolean> {
  try {
    const stat = await fse.stat(file);
    return stat.isFile() && stat.size > 0;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw err;
  }
}

function archiveNameFromUrl(url: string, spec: ArtifactSpec): string {
  try {
    const name = path.posix.basename(new URL(url).pathname);
    return name.length > 0 ? name : spec.archiveName;
  } catch {
    return spec.archiveName;
  }
}
