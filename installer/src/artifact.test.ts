import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { spawn } from "child_process";
import { once } from "events";
import { copyFileSync, existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, statSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import { fetchArtifact, findExecutable, installBinary } from "./artifact.js";
import type { FetchDeps } from "./artifact.js";
import { InstallerErrorCode } from "./errors.js";
import { createMemoryLogger } from "./log.js";
import { releaseCandidate } from "./release.js";
import { FakeArchiveReader, FakeDownloader, SING_BOX_ARCHIVE, fakeArchive } from "./testing.js";

const BASE = "https://github.com/SagerNet/sing-box/releases";
const VERSIONED = `${BASE}/download/v1.11.4/sing-box-1.11.4-linux-amd64.tar.gz`;
const VERSIONED_PLAIN = `${BASE}/download/v1.11.4/sing-box-linux-amd64.tar.gz`;
const LATEST = `${BASE}/latest/download/sing-box-linux-amd64.tar.gz`;
const LATEST_LABELED = `${BASE}/latest/download/sing-box-latest-linux-amd64.tar.gz`;

let root: string;
let tmpRoot: string;
let targets: [string, string];

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), "sbx-artifact-"));
  tmpRoot = join(root, "tmp");
  mkdirSync(tmpRoot);
  targets = [join(root, "usr", "bin", "sing-box"), join(root, "usr", "local", "bin", "sing-box")];
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

function deps(downloader: FakeDownloader | null): FetchDeps {
  return {
    downloader,
    archive: new FakeArchiveReader(),
    binaryTargets: targets,
    timeoutMs: 1000,
    tmpRoot,
    log: createMemoryLogger(),
  };
}

// ── fetchArtifact ────────────────────────────────────────────────────

describe("fetchArtifact", () => {
  it("installs from the first candidate that validates", async () => {
    const downloader = new FakeDownloader({
      [VERSIONED_PLAIN]: "<html>Not Found</html>",
      [LATEST]: SING_BOX_ARCHIVE,
    });

    const result = await fetchArtifact(releaseCandidate("SagerNet/sing-box", "amd64", "1.11.4"), deps(downloader));

    expect(downloader.requested).toEqual([VERSIONED, VERSIONED_PLAIN, LATEST]);
    expect(result.sourceUrl).toBe(LATEST);
    expect(result.installedPath).toBe(targets[0]);
    expect(statSync(targets[0]).mode & 0o777).toBe(0o755);
    expect(readdirSync(tmpRoot)).toEqual([]);
  });

  it("succeeds through a latest URL when the version is unknown", async () => {
    const downloader = new FakeDownloader({ [LATEST_LABELED]: SING_BOX_ARCHIVE });

    const result = await fetchArtifact(releaseCandidate("SagerNet/sing-box", "amd64", ""), deps(downloader));

    expect(downloader.requested).toEqual([LATEST, LATEST_LABELED]);
    expect(result.sourceUrl).toBe(LATEST_LABELED);
  });

  it("fails when every candidate is exhausted and cleans up", async () => {
    const downloader = new FakeDownloader({ [LATEST]: "truncated" });

    await expect(
      fetchArtifact(releaseCandidate("SagerNet/sing-box", "amd64", "1.11.4"), deps(downloader))
    ).rejects.toMatchObject({ code: InstallerErrorCode.DOWNLOAD_EXHAUSTED });
    expect(downloader.requested).toHaveLength(4);
    expect(readdirSync(tmpRoot)).toEqual([]);
    expect(targets.some((t) => existsSync(t))).toBe(false);
  });

  it("reports a missing temp root as an installer error", async () => {
    const downloader = new FakeDownloader({ [LATEST]: SING_BOX_ARCHIVE });
    const missing = { ...deps(downloader), tmpRoot: join(root, "no-such-dir") };

    await expect(
      fetchArtifact(releaseCandidate("SagerNet/sing-box", "amd64", ""), missing)
    ).rejects.toMatchObject({ code: InstallerErrorCode.TEMP_DIR_FAILED });
    expect(downloader.requested).toEqual([]);
  });

  it("fails before touching the file system without a downloader", async () => {
    await expect(
      fetchArtifact(releaseCandidate("SagerNet/sing-box", "amd64", ""), deps(null))
    ).rejects.toMatchObject({ code: InstallerErrorCode.NO_DOWNLOADER });
    expect(readdirSync(tmpRoot)).toEqual([]);
    expect(targets.some((t) => existsSync(t))).toBe(false);
  });

  it("fails when the archive has no sing-box executable", async () => {
    const downloader = new FakeDownloader({ [LATEST]: fakeArchive([{ path: "docs/README.md", mode: 0o644 }]) });

    await expect(
      fetchArtifact(releaseCandidate("SagerNet/sing-box", "amd64", ""), deps(downloader))
    ).rejects.toMatchObject({ code: InstallerErrorCode.BINARY_NOT_FOUND });
    expect(readdirSync(tmpRoot)).toEqual([]);
  });
});

// ── findExecutable ───────────────────────────────────────────────────

describe("findExecutable", () => {
  it("finds a nested executable", () => {
    const dir = join(root, "x");
    mkdirSync(join(dir, "pkg", "bin"), { recursive: true });
    writeFileSync(join(dir, "pkg", "bin", "sing-box"), "bin", { mode: 0o755 });
    expect(findExecutable(dir, "sing-box")).toBe(join(dir, "pkg", "bin", "sing-box"));
  });

  it("falls back to a root-level file without an execute bit", () => {
    const dir = join(root, "x");
    mkdirSync(dir);
    writeFileSync(join(dir, "sing-box"), "bin", { mode: 0o644 });
    expect(findExecutable(dir, "sing-box")).toBe(join(dir, "sing-box"));
  });

  it("ignores nested files without an execute bit", () => {
    const dir = join(root, "x");
    mkdirSync(join(dir, "pkg"), { recursive: true });
    writeFileSync(join(dir, "pkg", "sing-box"), "bin", { mode: 0o644 });
    expect(findExecutable(dir, "sing-box")).toBeNull();
  });
});

// ── installBinary ────────────────────────────────────────────────────

describe("installBinary", () => {
  it("falls back to the secondary target when the primary is not writable", () => {
    const source = join(root, "sing-box");
    writeFileSync(source, "bin");
    writeFileSync(join(root, "blocked"), "");
    const primary = join(root, "blocked", "sing-box");

    const installed = installBinary(source, [primary, targets[1]], createMemoryLogger());

    expect(installed).toBe(targets[1]);
    expect(statSync(targets[1]).mode & 0o777).toBe(0o755);
  });

  it("fails when no target is writable", () => {
    const source = join(root, "sing-box");
    writeFileSync(source, "bin");
    writeFileSync(join(root, "blocked"), "");

    let caught: unknown;
    try {
      installBinary(source, [join(root, "blocked", "a"), join(root, "blocked", "b")], createMemoryLogger());
    } catch (err) {
      caught = err;
    }

    expect(caught).toMatchObject({ code: InstallerErrorCode.INSTALL_FAILED });
  });

  it("overwrites the primary target in place", () => {
    const source = join(root, "sing-box");
    writeFileSync(source, "new build");
    mkdirSync(dirname(targets[0]), { recursive: true });
    writeFileSync(targets[0], "old build", { mode: 0o755 });

    expect(installBinary(source, targets, createMemoryLogger())).toBe(targets[0]);
    expect(readFileSync(targets[0], "utf8")).toBe("new build");
    expect(readdirSync(dirname(targets[0]))).toEqual(["sing-box"]);
  });

  it.skipIf(!existsSync("/bin/sleep"))("replaces a running executable", async () => {
    mkdirSync(dirname(targets[0]), { recursive: true });
    copyFileSync("/bin/sleep", targets[0]);
    const child = spawn(targets[0], ["30"], { stdio: "ignore" });
    try {
      await once(child, "spawn");
      const source = join(root, "sing-box");
      writeFileSync(source, "new build");
      const log = createMemoryLogger();

      expect(installBinary(source, targets, log)).toBe(targets[0]);
      expect(readFileSync(targets[0], "utf8")).toBe("new build");
      expect(existsSync(targets[1])).toBe(false);
      expect(log.messages("info")).toEqual([]);
    } finally {
      child.kill();
    }
  });
});
