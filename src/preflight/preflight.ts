import type { BuildLogger } from "../core/logger.js";
import type { BuildSettings } from "../core/settings.js";

// Mandatory settings, checked before anything touches the build root.
export const MANDATORY_SETTINGS: ReadonlyArray<{
  name: string;
  present: (settings: BuildSettings) => boolean;
}> = [
  { name: "DATABASE_URL", present: (settings) => settings.databaseUrl !== null },
  { name: "ADMIN_PASSWORD", present: (settings) => settings.adminPassword !== null },
];

export function missingSettings(settings: BuildSettings): string[] {
  return MANDATORY_SETTINGS.filter((check) => !check.present(settings)).map((check) => check.name);
}

// Warns once per missing value; the caller decides whether a false result is fatal.
export function checkPreflight(settings: BuildSettings, logger: BuildLogger): boolean {
  const missing = missingSettings(settings);
  for (const name of missing) {
    logger.warn("preflight.missing", { setting: name });
  }

  logger.debug("preflight.complete", { ok: missing.length === 0, missing });
  return missing.length === 0;
}
