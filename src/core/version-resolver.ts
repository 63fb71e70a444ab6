/**
 * Runtime version lookup for a pushed project.
 * Purpose: find the toolchain version from declarative metadata, falling back to the project database.
 * Assumptions: at most one .mpr sits at the project root; the database is only read.
 * Usage: await resolveToolchainVersion(buildDir) or pass a custom tier list in tests.
 */

import path from "node:path";

import Database from "better-sqlite3";
import fse from "fs-extra";
import { z } from "zod";

import { VersionUnavailableError } from "./errors.js";
import { ToolchainVersion } from "./version.js";

// =============================================================================
// TYPES
// =============================================================================

export type VersionSource = "metadata" | "project-database";

export type VersionTier = {
  source: VersionSource;
  // Returns null when this tier has nothing to offer; throws when it has
  // something but it is unusable.
  read: (sourceRoot: string) => Promise<string | null>;
};

export type ResolvedVersion = {
  version: ToolchainVersion;
  source: VersionSource;
};

// =============================================================================
// TIERS
// =============================================================================

export const METADATA_FILES = [path.join("model", "metadata.json"), "model-metadata.json"];

const MetadataSchema = z.object({ RuntimeVersion: z.string().min(1) }).passthrough();

export const metadataTier: VersionTier = {
  source: "metadata",
  read: async (sourceRoot) => {
    for (const relative of METADATA_FILES) {
      const file = path.join(sourceRoot, relative);
      if (!(await fse.pathExists(file))) continue;

      let json: unknown;
      try {
        json = await fse.readJson(file);
      } catch (err) {
        throw new VersionUnavailableError(`Could not read ${relative}`, err);
      }

      const parsed = MetadataSchema.safeParse(json);
      if (!parsed.success) {
        throw new VersionUnavailableError(`${relative} has no RuntimeVersion`, parsed.error);
      }
      return parsed.data.RuntimeVersion;
    }
    return null;
  },
};

export const projectDatabaseTier: VersionTier = {
  source: "project-database",
  read: async (sourceRoot) => {
    const projectFile = await findProjectFile(sourceRoot);
    if (!projectFile) return null;

    let db: Database.Database | null = null;
    try {
      db = new Database(projectFile, { readonly: true, fileMustExist: true });
      const row: unknown = db.prepare("SELECT _ProductVersion FROM _MetaData LIMIT 1").get();
      const parsed = z.object({ _ProductVersion: z.string().min(1) }).safeParse(row);
      if (!parsed.success) {
        throw new VersionUnavailableError(
          `${path.basename(projectFile)} has no product version record`,
        );
      }
      return parsed.data._ProductVersion;
    } catch (err) {
      if (err instanceof VersionUnavailableError) throw err;
      throw new VersionUnavailableError(
        `Could not read project database ${path.basename(projectFile)}`,
        err,
      );
    } finally {
      db?.close();
    }
  },
};

export const DEFAULT_VERSION_TIERS: readonly VersionTier[] = [metadataTier, projectDatabaseTier];

// =============================================================================
// PUBLIC API
// =============================================================================

export async function resolveToolchainVersion(
  sourceRoot: string,
  tiers: readonly VersionTier[] = DEFAULT_VERSION_TIERS,
): Promise<ResolvedVersion> {
  for (const tier of tiers) {
    const raw = await tier.read(sourceRoot);
    if (raw === null) continue;
    return { version: ToolchainVersion.parse(raw), source: tier.source };
  }

  throw new VersionUnavailableError(
    `No runtime version found in ${sourceRoot}: expected ${METADATA_FILES.join(" or ")} or a .mpr project file`,
  );
}

export async function findProjectFile(sourceRoot: string): Promise<string | null> {
  if (!(await fse.pathExists(sourceRoot))) return null;

  const entries = await fse.readdir(sourceRoot);
  const match = entries.filter((entry) => entry.endsWith(".mpr")).sort()[0];
  return match ? path.join(sourceRoot, match) : null;
}
