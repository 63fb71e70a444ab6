// Environment settings for a compile run.
// Purpose: parse the recognised environment options once, so nothing else reads process.env.
// Assumes values arrive as strings; blank strings count as unset.

import { z } from "zod";

import { ConfigurationMissingError } from "./errors.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

// =============================================================================
// SCHEMA
// =============================================================================

export const DEFAULT_BLOBSTORE = "https://cdn.mendix.com";

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

const flag = z
  .string()
  .optional()
  .transform((value) => ["true", "1", "yes"].includes(value?.trim().toLowerCase() ?? ""));

const EnvSchema = z.object({
  DATABASE_URL: optionalText,
  VCAP_SERVICES: optionalText,
  ADMIN_PASSWORD: optionalText,
  FORCED_MXRUNTIME_URL: optionalText,
  FORCED_MXBUILD_URL: optionalText,
  FORCE_WRITE_BUILD_ERRORS: flag,
  NEW_RELIC_LICENSE_KEY: optionalText,
  APPDYNAMICS: flag,
  BUILD_STATUS_CALLBACK_URL: optionalText,
  BLOBSTORE: optionalText,
  BUILDPACK_BASE_IMAGE_ROOT: optionalText,
  BUILDPACK_LOG_LEVEL: optionalText,
});

const VcapServicesSchema = z.record(
  z.array(
    z.object({
      credentials: z.object({ uri: z.string().optional() }).passthrough().optional(),
    }).passthrough(),
  ),
);

// =============================================================================
// TYPES
// =============================================================================

export type BuildSettings = {
  databaseUrl: string | null;
  adminPassword: string | null;
  forcedRuntimeUrl: string | null;
  forcedCompilerUrl: string | null;
  forceWriteBuildErrors: boolean;
  newRelicLicenseKey: string | null;
  appDynamicsEnabled: boolean;
  buildStatusCallbackUrl: string | null;
  blobstore: string;
  baseImageRoot: string;
  logLevel: LogLevel;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadBuildSettings(env: NodeJS.ProcessEnv): BuildSettings {
  const parsed = EnvSchema.parse(env);

  return {
    databaseUrl: parsed.DATABASE_URL ?? databaseUrlFromServices(parsed.VCAP_SERVICES),
    adminPassword: parsed.ADMIN_PASSWORD,
    forcedRuntimeUrl: parsed.FORCED_MXRUNTIME_URL,
    forcedCompilerUrl: parsed.FORCED_MXBUILD_URL,
    forceWriteBuildErrors: parsed.FORCE_WRITE_BUILD_ERRORS,
    newRelicLicenseKey: parsed.NEW_RELIC_LICENSE_KEY,
    appDynamicsEnabled: parsed.APPDYNAMICS,
    buildStatusCallbackUrl: parsed.BUILD_STATUS_CALLBACK_URL,
    blobstore: (parsed.BLOBSTORE ?? DEFAULT_BLOBSTORE).replace(/\/+$/, ""),
    baseImageRoot: parsed.BUILDPACK_BASE_IMAGE_ROOT ?? "/",
    logLevel: parseLogLevel(parsed.BUILDPACK_LOG_LEVEL),
  };
}

// A bound database service counts as a database descriptor; the first uri that
// looks like a database URL wins.
export function databaseUrlFromServices(raw: string | null): string | null {
  if (!raw) return null;

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationMissingError(["VCAP_SERVICES (invalid JSON)"], err);
  }

  const parsed = VcapServicesSchema.safeParse(json);
  if (!parsed.success) return null;

  for (const instances of Object.values(parsed.data)) {
    for (const instance of instances) {
      const uri = instance.credentials?.uri;
      if (uri && /^(postgres|postgresql|mysql|sqlserver|jdbc:)/.test(uri)) {
        return uri;
      }
    }
  }
  return null;
}

export function parseLogLevel(raw: string | null): LogLevel {
  const value = raw?.toLowerCase();
  const match = LOG_LEVELS.find((level) => level === value);
  return match ?? "info";
}
