/**
 * BuildStatusReporter: tell the deployment platform why a compile failed.
 * Purpose: PUT the compiler's structured problems to the configured callback URL.
 * Assumptions: called only while a compile failure propagates; never fatal on its own.
 * Usage: await reportBuildStatus(errorFile, { callbackUrl, http, logger }).
 */

import axios from "axios";
import fse from "fs-extra";

import { formatErrorMessage } from "../core/error-format.js";
import type { BuildLogger } from "../core/logger.js";
import { genericErrorPayload } from "../builder/build-errors.js";

// =============================================================================
// TYPES
// =============================================================================

export interface StatusHttpClient {
  put(url: string, body: string, headers: Record<string, string>): Promise<{ status: number }>;
}

export type BuildStatusReporterDeps = {
  callbackUrl: string | null;
  http: StatusHttpClient;
  logger: BuildLogger;
};

export type BuildStatusReport =
  | { status: "skipped" }
  | { status: "submitted"; httpStatus: number; payloadSource: "error-file" | "generic" }
  | { status: "failed"; message: string };

// =============================================================================
// AXIOS ADAPTER
// =============================================================================

const CALLBACK_TIMEOUT_MS = 30_000;

export class AxiosStatusHttpClient implements StatusHttpClient {
  async put(url: string, body: string, headers: Record<string, string>): Promise<{ status: number }> {
    const res = await axios.put(url, body, { headers, timeout: CALLBACK_TIMEOUT_MS });
    return { status: res.status };
  }
}

// =============================================================================
// PUBLIC API
// =============================================================================

export async function reportBuildStatus(
  errorFile: string,
  deps: BuildStatusReporterDeps,
): Promise<BuildStatusReport> {
  const { callbackUrl, http, logger } = deps;

  if (!callbackUrl) {
    logger.warn("build_status.skip", { reason: "BUILD_STATUS_CALLBACK_URL is not set" });
    return { status: "skipped" };
  }

  const fromFile = await fse.pathExists(errorFile);
  const body = fromFile ? await fse.readFile(errorFile, "utf8") : genericErrorPayload();
  const payloadSource = fromFile ? "error-file" : "generic";

  logger.info("build_status.submit.start", { payload_source: payloadSource });
  try {
    const res = await http.put(callbackUrl, body, { "Content-Type": "application/json" });
    logger.info("build_status.submit.complete", { http_status: res.status });
    return { status: "submitted", httpStatus: res.status, payloadSource };
  } catch (err) {
    const message = formatErrorMessage(err);
    logger.warn("build_status.submit.fail", { message });
    return { status: "failed", message };
  }
}
