import { describe, it, expect } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { createMemoryLogger } from "./log.js";
import { detectOsFamily, mapArch, profileSystem } from "./profile.js";

// ── detectOsFamily ───────────────────────────────────────────────────

describe("detectOsFamily", () => {
  it.each([
    ["alpine", "", "alpine", "apk"],
    ["debian", "", "debian", "apt"],
    ["ubuntu", "debian", "debian", "apt"],
    ["linuxmint", "ubuntu debian", "debian", "apt"],
    ["centos", "rhel fedora", "rhel", "dnf"],
    ["rocky", "rhel centos fedora", "rhel", "dnf"],
    ["fedora", "", "rhel", "dnf"],
    ["ALPINE", "", "alpine", "apk"],
  ])("maps ID=%s ID_LIKE=%s to %s/%s", (id, idLike, family, pm) => {
    expect(detectOsFamily(id, idLike)).toEqual({ osFamily: family, packageManager: pm });
  });

  it("falls back to unknown without a package manager", () => {
    expect(detectOsFamily("arch", "")).toEqual({ osFamily: "unknown", packageManager: "none" });
    expect(detectOsFamily("", "")).toEqual({ osFamily: "unknown", packageManager: "none" });
  });
});

// ── mapArch ──────────────────────────────────────────────────────────

describe("mapArch", () => {
  it.each([
    ["x86_64", "amd64"],
    ["amd64", "amd64"],
    ["aarch64", "arm64"],
    ["arm64", "arm64"],
    ["armv7l", "armv7"],
    ["armv7", "armv7"],
    ["i686", "386"],
    ["i386", "386"],
  ])("maps %s to %s", (machine, token) => {
    expect(mapArch(machine)).toEqual({ archToken: token, recognized: true });
  });

  it("defaults unknown machine types to amd64 and flags them", () => {
    expect(mapArch("riscv64")).toEqual({ archToken: "amd64", recognized: false });
    expect(mapArch("s390x")).toEqual({ archToken: "amd64", recognized: false });
  });
});

// ── profileSystem ────────────────────────────────────────────────────

describe("profileSystem", () => {
  it("reads ID and ID_LIKE from os-release", () => {
    const dir = mkdtempSync(join(tmpdir(), "sbx-profile-"));
    const osRelease = join(dir, "os-release");
    writeFileSync(
      osRelease,
      ['NAME="Ubuntu"', 'VERSION_ID="24.04"', "ID=ubuntu", "ID_LIKE=debian", ""].join("\n")
    );
    const log = createMemoryLogger();

    const profile = profileSystem({ osReleasePath: osRelease, machine: "aarch64" }, log);

    expect(profile).toEqual({
      osFamily: "debian",
      packageManager: "apt",
      archToken: "arm64",
      machine: "aarch64",
      archRecognized: true,
    });
    expect(Object.isFrozen(profile)).toBe(true);
    expect(log.messages("warn")).toEqual([]);

    rmSync(dir, { recursive: true, force: true });
  });

  it("tolerates a missing os-release file and an unknown arch", () => {
    const log = createMemoryLogger();
    const profile = profileSystem({ osReleasePath: "/nonexistent/os-release", machine: "mips" }, log);

    expect(profile.osFamily).toBe("unknown");
    expect(profile.packageManager).toBe("none");
    expect(profile.archToken).toBe("amd64");
    expect(profile.archRecognized).toBe(false);
    expect(log.messages("warn")).toEqual([
      "Unrecognized OS (ID=?); continuing without a package manager",
      "Unrecognized architecture mips; trying amd64",
    ]);
  });
});
