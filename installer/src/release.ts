import type { Downloader } from "./download.js";
import { errorMessage } from "./errors.js";
import type { Logger } from "./log.js";
import type { ArchToken, ReleaseCandidate } from "./types.js";
import { BINARY_NAME } from "./types.js";

export const DEFAULT_REPO = "SagerNet/sing-box";

const TAG_PATTERN = /"tag_name"\s*:\s*"v?([^"]+)"/;

export function parseTagName(body: string): string {
  return body.match(TAG_PATTERN)?.[1] ?? "";
}

/** Never throws: any failure yields an empty tag and the "latest" URLs take over. */
export async function resolveLatestRelease(
  downloader: Downloader | null,
  repo: string,
  timeoutMs: number,
  log: Logger
): Promise<string> {
  if (!downloader) {
    log.warn("No transfer tool available for the release lookup; using latest");
    return "";
  }
  const url = `https://api.github.com/repos/${repo}/releases/latest`;
  let body: string;
  try {
    body = await downloader.fetchText(url, timeoutMs);
  } catch (err) {
    log.warn(`Release lookup failed (${errorMessage(err)}); using latest`);
    return "";
  }
  if (!body.trim()) {
    log.warn("Release lookup returned an empty body; using latest");
    return "";
  }
  const tag = parseTagName(body);
  if (tag) {
    log.info(`Latest release: ${tag}`);
  } else {
    log.warn("No tag_name in release metadata; using latest");
  }
  return tag;
}

/** Most specific first; the two "latest" redirects are always present. */
export function buildCandidateUrls(repo: string, arch: ArchToken, versionTag: string): string[] {
  const base = `https://github.com/${repo}/releases`;
  const urls: string[] = [];
  if (versionTag) {
    urls.push(`${base}/download/v${versionTag}/${BINARY_NAME}-${versionTag}-linux-${arch}.tar.gz`);
    urls.push(`${base}/download/v${versionTag}/${BINARY_NAME}-linux-${arch}.tar.gz`);
  }
  urls.push(`${base}/latest/download/${BINARY_NAME}-linux-${arch}.tar.gz`);
  urls.push(`${base}/latest/download/${BINARY_NAME}-${versionTag || "latest"}-linux-${arch}.tar.gz`);
  return urls;
}

export function releaseCandidate(repo: string, arch: ArchToken, versionTag: string): ReleaseCandidate {
  return { versionTag, candidateUrls: buildCandidateUrls(repo, arch, versionTag) };
}
