// Structured compiler problems.
// Purpose: validate the compiler's error file and provide the generic fallback.
// Assumes the file is JSON shaped { problems: [...] }; unknown fields are kept for the status callback.

import fse from "fs-extra";
import { z } from "zod";

export const BuildErrorSchema = z
  .object({
    severity: z.string(),
    message: z.string(),
    locations: z.array(z.record(z.unknown())).optional(),
  })
  .passthrough();

export const BuildErrorFileSchema = z
  .object({
    problems: z.array(BuildErrorSchema),
  })
  .passthrough();

export type BuildError = z.infer<typeof BuildErrorSchema>;

export const GENERIC_BUILD_ERROR: BuildError = {
  severity: "Error",
  message: "Failed to run the model compiler",
  locations: [],
};

export function genericErrorPayload(): string {
  return JSON.stringify({ problems: [GENERIC_BUILD_ERROR] });
}

export function parseBuildErrors(raw: string): BuildError[] | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const parsed = BuildErrorFileSchema.safeParse(json);
  return parsed.success ? parsed.data.problems : null;
}

// Problems in compiler order; a missing, unreadable or empty file yields the generic error.
export async function readBuildErrors(errorFile: string): Promise<BuildError[]> {
  if (!(await fse.pathExists(errorFile))) {
    return [GENERIC_BUILD_ERROR];
  }

  const problems = parseBuildErrors(await fse.readFile(errorFile, "utf8"));
  return problems && problems.length > 0 ? problems : [GENERIC_BUILD_ERROR];
}
