import type { CommandRunner } from "./host.js";

export interface ArchiveReader {
  /** True when the file lists cleanly as an archive of the expected format */
  list(archivePath: string): boolean;
  /** Throws when the archive cannot be unpacked into `destDir` */
  extract(archivePath: string, destDir: string): void;
}

export class TarArchiveReader implements ArchiveReader {
  constructor(private readonly runner: CommandRunner) {}

  list(archivePath: string): boolean {
    if (!this.runner.which("tar")) return false;
    return this.runner.run("tar", ["-tzf", archivePath]).exitCode === 0;
  }

  extract(archivePath: string, destDir: string): void {
    if (!this.runner.which("tar")) {
      throw new Error("tar is not installed");
    }
    const result = this.runner.run("tar", ["-xzf", archivePath, "-C", destDir]);
    if (result.exitCode !== 0) {
      throw new Error(`tar exited with ${result.exitCode}: ${result.stderr.trim()}`);
    }
  }
}
