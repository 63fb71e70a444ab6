/**
 * ArtifactFetcher: download and unpack remote archives.
 * Purpose: the only place that knows how bytes travel from a URL to disk.
 * Assumptions: archives are .tar.gz/.tgz or zip-format (.zip, .mda); tar and unzip exist on the stager.
 * Usage: await fetcher.download(url, file); await fetcher.unpack(file, destination).
 */

import path from "node:path";
import { pipeline } from "node:stream/promises";
import type { Readable } from "node:stream";

import axios from "axios";
import fse from "fs-extra";

import { ExecaProcessExecutor, truncateText, type ProcessExecutor } from "../process/executor.js";

// =============================================================================
// TYPES
// =============================================================================

export interface ArtifactFetcher {
  download(url: string, targetFile: string): Promise<void>;
  unpack(archiveFile: string, destination: string): Promise<void>;
}

export type HttpArchiveFetcherOptions = {
  executor?: ProcessExecutor;
  timeoutMs?: number;
};

// =============================================================================
// HTTP + TAR/UNZIP ADAPTER
// =============================================================================

const DEFAULT_DOWNLOAD_TIMEOUT_MS = 10 * 60 * 1000;
const STDERR_PREVIEW_LIMIT = 2000;

export class HttpArchiveFetcher implements ArtifactFetcher {
  private readonly executor: ProcessExecutor;
  private readonly timeoutMs: number;

  constructor(opts: HttpArchiveFetcherOptions = {}) {
    this.executor = opts.executor ?? new ExecaProcessExecutor();
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
  }

  async download(url: string, targetFile: string): Promise<void> {
    await fse.ensureDir(path.dirname(targetFile));
    // Written under a temporary name so an interrupted download never looks cached.
    const partial = `${targetFile}.partial`;

    const response = await axios.get<Readable>(url, {
      responseType: "stream",
      timeout: this.timeoutMs,
    });

    try {
      await pipeline(response.data, fse.createWriteStream(partial));
      await fse.move(partial, targetFile, { overwrite: true });
    } finally {
      await fse.remove(partial);
    }
  }

  async unpack(archiveFile: string, destination: string): Promise<void> {
    await fse.ensureDir(destination);

    const spec = isZipArchive(archiveFile)
      ? { program: "unzip", args: ["-oqq", archiveFile, "-d", destination] }
      : { program: "tar", args: ["xzf", archiveFile, "-C", destination] };

    const result = await this.executor.run(spec);
    if (result.exitCode !== 0) {
      const stderr = truncateText(result.stderr.trim(), STDERR_PREVIEW_LIMIT).text;
      throw new Error(
        `${spec.program} exited with ${result.exitCode} for ${path.basename(archiveFile)}: ${stderr}`,
      );
    }
  }
}

export function isZipArchive(file: string): boolean {
  return /\.(zip|mda|mpk)$/i.test(file);
}
