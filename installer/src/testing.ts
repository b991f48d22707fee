import { chmodSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import type { ArchiveReader } from "./archive.js";
import type { Downloader } from "./download.js";
import type { CommandResult, CommandRunner } from "./host.js";

export type FakeTool = string | ((args: string[]) => Partial<CommandResult>);

/** Command runner over a fixed table of tools; anything else is "not installed". */
export class FakeRunner implements CommandRunner {
  readonly calls: Array<{ command: string; args: string[] }> = [];

  constructor(private readonly tools: Record<string, FakeTool> = {}) {}

  which(command: string): string | null {
    if (!(command in this.tools)) return null;
    return command.includes("/") ? command : `/usr/bin/${command}`;
  }

  run(command: string, args: string[]): CommandResult {
    this.calls.push({ command, args });
    const tool = this.tools[command];
    if (tool === undefined) {
      return { stdout: "", stderr: `${command}: not found`, exitCode: 127 };
    }
    const result = typeof tool === "string" ? { stdout: tool } : tool(args);
    return { stdout: result.stdout ?? "", stderr: result.stderr ?? "", exitCode: result.exitCode ?? 0 };
  }

  argsFor(command: string): string[][] {
    return this.calls.filter((c) => c.command === command).map((c) => c.args);
  }
}

/** Serves canned bodies by URL; any other URL fails like a network error. */
export class FakeDownloader implements Downloader {
  readonly name = "fake";
  readonly requested: string[] = [];

  constructor(private readonly responses: Record<string, string>) {}

  private body(url: string): string {
    this.requested.push(url);
    const body = this.responses[url];
    if (body === undefined) {
      throw new Error(`connect ECONNREFUSED ${url}`);
    }
    return body;
  }

  async fetchText(url: string): Promise<string> {
    return this.body(url);
  }

  async download(url: string, dest: string): Promise<void> {
    writeFileSync(dest, this.body(url));
  }
}

const FAKE_ARCHIVE_MAGIC = "FAKE-TGZ\n";

export interface FakeArchiveEntry {
  path: string;
  mode: number;
}

export function fakeArchive(entries: FakeArchiveEntry[]): string {
  return FAKE_ARCHIVE_MAGIC + JSON.stringify(entries);
}

export const SING_BOX_ARCHIVE = fakeArchive([
  { path: "sing-box-1.11.4-linux-amd64/LICENSE", mode: 0o644 },
  { path: "sing-box-1.11.4-linux-amd64/sing-box", mode: 0o755 },
]);

/** Archive reader for bodies built with fakeArchive(). */
export class FakeArchiveReader implements ArchiveReader {
  list(archivePath: string): boolean {
    return readFileSync(archivePath, "utf8").startsWith(FAKE_ARCHIVE_MAGIC);
  }

  extract(archivePath: string, destDir: string): void {
    const content = readFileSync(archivePath, "utf8");
    if (!content.startsWith(FAKE_ARCHIVE_MAGIC)) {
      throw new Error("not an archive");
    }
    const entries: FakeArchiveEntry[] = JSON.parse(content.slice(FAKE_ARCHIVE_MAGIC.length));
    for (const entry of entries) {
      const target = join(destDir, entry.path);
      mkdirSync(dirname(target), { recursive: true });
      writeFileSync(target, "#!/bin/sh\necho sing-box\n");
      chmodSync(target, entry.mode);
    }
  }
}
