import { chmodSync, copyFileSync, existsSync, mkdirSync, mkdtempSync, readdirSync, renameSync, rmSync, statSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import type { ArchiveReader } from "./archive.js";
import { firstSuccess, skip, success } from "./chain.js";
import type { Downloader } from "./download.js";
import { errorMessage, InstallerError, InstallerErrorCode } from "./errors.js";
import type { Logger } from "./log.js";
import type { FetchResult, ReleaseCandidate } from "./types.js";
import { BINARY_NAME } from "./types.js";

const ARCHIVE_NAME = `${BINARY_NAME}.tar.gz`;

export interface FetchDeps {
  downloader: Downloader | null;
  archive: ArchiveReader;
  /** Install targets in preference order */
  binaryTargets: readonly string[];
  timeoutMs: number;
  /** Parent of the per-run work directory (default: os.tmpdir()) */
  tmpRoot?: string;
  log: Logger;
}

/** First regular file called `name` with an execute bit, searched depth-first in name order. */
export function findExecutable(root: string, name: string): string | null {
  const walk = (dir: string): string | null => {
    const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
      a.name.localeCompare(b.name)
    );
    for (const entry of entries) {
      const path = join(dir, entry.name);
      if (entry.isFile() && entry.name === name && (statSync(path).mode & 0o111) !== 0) {
        return path;
      }
    }
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const found = walk(join(dir, entry.name));
      if (found) return found;
    }
    return null;
  };

  const found = walk(root);
  if (found) return found;
  const atRoot = join(root, name);
  return existsSync(atRoot) && statSync(atRoot).isFile() ? atRoot : null;
}

export function installBinary(source: string, targets: readonly string[], log: Logger): string {
  const failures: string[] = [];
  for (const target of targets) {
    // rename, not truncate: the target may be a running executable
    const staged = `${target}.tmp`;
    try {
      mkdirSync(dirname(target), { recursive: true });
      copyFileSync(source, staged);
      chmodSync(staged, 0o755);
      renameSync(staged, target);
      return target;
    } catch (err) {
      if (existsSync(staged)) rmSync(staged, { force: true });
      failures.push(`${target}: ${errorMessage(err)}`);
      log.info(`Could not install to ${target}; trying the next location`);
    }
  }
  throw new InstallerError(
    InstallerErrorCode.INSTALL_FAILED,
    `Could not install ${BINARY_NAME} to ${targets.join(" or ")}`,
    { failures }
  );
}

/**
 * Downloads the first candidate that validates as a tarball, extracts it and
 * installs the executable. The work directory is removed on every path.
 */
export async function fetchArtifact(candidate: ReleaseCandidate, deps: FetchDeps): Promise<FetchResult> {
  const { downloader, archive, log } = deps;
  if (!downloader) {
    throw new InstallerError(
      InstallerErrorCode.NO_DOWNLOADER,
      `No transfer tool available to download ${BINARY_NAME}`
    );
  }

  let workDir: string;
  try {
    workDir = mkdtempSync(join(deps.tmpRoot ?? tmpdir(), "sbx-"));
  } catch (err) {
    throw new InstallerError(
      InstallerErrorCode.TEMP_DIR_FAILED,
      `Could not create a download directory: ${errorMessage(err)}`
    );
  }
  try {
    const archivePath = join(workDir, ARCHIVE_NAME);

    const winner = await firstSuccess<string>(
      candidate.candidateUrls.map((url) => ({
        name: url,
        attempt: async () => {
          log.info(`Downloading ${url}`);
          try {
            await downloader.download(url, archivePath, deps.timeoutMs);
          } catch (err) {
            rmSync(archivePath, { force: true });
            log.info(`Download failed (${errorMessage(err)}); trying the next URL`);
            return skip(errorMessage(err));
          }
          if (!archive.list(archivePath)) {
            rmSync(archivePath, { force: true });
            log.info("Downloaded file is not a valid tar.gz; trying the next URL");
            return skip("archive listing failed");
          }
          return success(url);
        },
      })),
      log
    );

    if (!winner) {
      throw new InstallerError(
        InstallerErrorCode.DOWNLOAD_EXHAUSTED,
        `Could not download ${BINARY_NAME}; check the network or install it manually`,
        { tried: candidate.candidateUrls }
      );
    }

    const extractDir = join(workDir, "extract");
    mkdirSync(extractDir);
    try {
      archive.extract(archivePath, extractDir);
    } catch (err) {
      throw new InstallerError(
        InstallerErrorCode.EXTRACT_FAILED,
        `Could not extract ${ARCHIVE_NAME}: ${errorMessage(err)}`
      );
    }

    const extractedBinaryPath = findExecutable(extractDir, BINARY_NAME);
    if (!extractedBinaryPath) {
      throw new InstallerError(
        InstallerErrorCode.BINARY_NOT_FOUND,
        `No ${BINARY_NAME} executable inside the archive from ${winner.value}`
      );
    }

    const installedPath = installBinary(extractedBinaryPath, deps.binaryTargets, log);
    log.info(`Installed ${BINARY_NAME} to ${installedPath}`);
    return { archivePath, extractedBinaryPath, installedPath, sourceUrl: winner.value };
  } finally {
    rmSync(workDir, { recursive: true, force: true });
  }
}
