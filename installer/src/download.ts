import { writeFile } from "fs/promises";
import { fetch } from "undici";
import type { CommandRunner } from "./host.js";

const USER_AGENT = "sbx-installer";

/** Transfer capability shared by release lookup, artifact fetch and address discovery. */
export interface Downloader {
  readonly name: string;
  /** Response body as text; throws on transport failure or non-2xx status */
  fetchText(url: string, timeoutMs: number): Promise<string>;
  /** Writes the response body to `dest`; throws on failure */
  download(url: string, dest: string, timeoutMs: number): Promise<void>;
}

export type DownloaderPreference = "auto" | "http" | "curl" | "wget";

export class HttpDownloader implements Downloader {
  readonly name = "http";

  async fetchText(url: string, timeoutMs: number): Promise<string> {
    const resp = await fetch(url, {
      headers: { "User-Agent": USER_AGENT },
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!resp.ok) {
      throw new Error(`GET ${url} returned ${resp.status}`);
    }
    return resp.text();
  }

  async download(url: string, dest: string, timeoutMs: number): Promise<void> {
    const resp = await fetch(url, {
      headers: { "User-Agent": USER_AGENT },
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!resp.ok) {
      throw new Error(`GET ${url} returned ${resp.status}`);
    }
    await writeFile(dest, Buffer.from(await resp.arrayBuffer()));
  }
}

abstract class ToolDownloader implements Downloader {
  abstract readonly name: string;
  constructor(protected readonly runner: CommandRunner) {}

  protected abstract textArgs(url: string, seconds: number): string[];
  protected abstract fileArgs(url: string, dest: string, seconds: number): string[];

  async fetchText(url: string, timeoutMs: number): Promise<string> {
    const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
    const result = this.runner.run(this.name, this.textArgs(url, seconds));
    if (result.exitCode !== 0) {
      throw new Error(`${this.name} exited with ${result.exitCode} for ${url}`);
    }
    return result.stdout;
  }

  async download(url: string, dest: string, timeoutMs: number): Promise<void> {
    const seconds = Math.max(1, Math.ceil(timeoutMs / 1000));
    const result = this.runner.run(this.name, this.fileArgs(url, dest, seconds));
    if (result.exitCode !== 0) {
      throw new Error(`${this.name} exited with ${result.exitCode} for ${url}`);
    }
  }
}

export class CurlDownloader extends ToolDownloader {
  readonly name = "curl";

  protected textArgs(url: string, seconds: number): string[] {
    return ["-fsSL", "--max-time", String(seconds), url];
  }

  protected fileArgs(url: string, dest: string, seconds: number): string[] {
    return ["-fsSL", "--max-time", String(seconds), "-o", dest, url];
  }
}

export class WgetDownloader extends ToolDownloader {
  readonly name = "wget";

  protected textArgs(url: string, seconds: number): string[] {
    return ["-qO-", `--timeout=${seconds}`, url];
  }

  protected fileArgs(url: string, dest: string, seconds: number): string[] {
    return ["-qO", dest, `--timeout=${seconds}`, url];
  }
}

/** `auto` uses the in-process client. An explicit tool that is not installed yields null. */
export function selectDownloader(
  preference: DownloaderPreference,
  runner: CommandRunner
): Downloader | null {
  switch (preference) {
    case "auto":
    case "http":
      return new HttpDownloader();
    case "curl":
      return runner.which("curl") ? new CurlDownloader(runner) : null;
    case "wget":
      return runner.which("wget") ? new WgetDownloader(runner) : null;
  }
}
