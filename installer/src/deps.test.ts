import { describe, it, expect } from "vitest";
import { installDependencies, packageInstallerFor, requiredPackages } from "./deps.js";
import { createMemoryLogger } from "./log.js";
import { FakeRunner } from "./testing.js";
import type { SystemProfile } from "./types.js";

const profile = (overrides: Partial<SystemProfile>): SystemProfile => ({
  osFamily: "debian",
  packageManager: "apt",
  archToken: "amd64",
  machine: "x86_64",
  archRecognized: true,
  ...overrides,
});

describe("installDependencies", () => {
  it("installs the Alpine set with apk in one call", () => {
    const runner = new FakeRunner({ apk: "" });
    const result = installDependencies(
      profile({ osFamily: "alpine", packageManager: "apk" }),
      runner,
      createMemoryLogger()
    );

    expect(result).toEqual({ ok: true });
    expect(runner.argsFor("apk")).toEqual([
      ["add", "--no-cache", "ca-certificates", "curl", "tar", "gzip", "openssl", "bash", "coreutils"],
    ]);
  });

  it("refreshes the apt index before installing", () => {
    const runner = new FakeRunner({ "apt-get": "" });
    installDependencies(profile({}), runner, createMemoryLogger());

    expect(runner.argsFor("apt-get")).toEqual([
      ["update", "-y"],
      ["install", "-y", "ca-certificates", "curl", "tar", "gzip", "openssl"],
    ]);
  });

  it("uses yum when dnf is not installed", () => {
    const runner = new FakeRunner({ yum: "" });
    const installer = packageInstallerFor(profile({ osFamily: "rhel", packageManager: "dnf" }), runner);
    expect(installer?.name).toBe("yum");
  });

  it("prefers dnf when present", () => {
    const runner = new FakeRunner({ dnf: "", yum: "" });
    installDependencies(profile({ osFamily: "rhel", packageManager: "dnf" }), runner, createMemoryLogger());
    expect(runner.argsFor("dnf")).toHaveLength(1);
    expect(runner.argsFor("yum")).toHaveLength(0);
  });

  it("warns but does not throw when the install fails", () => {
    const runner = new FakeRunner({ "apt-get": () => ({ exitCode: 100 }) });
    const log = createMemoryLogger();

    const result = installDependencies(profile({}), runner, log);

    expect(result).toEqual({ ok: false, reason: "apt-get exited with 100" });
    expect(log.messages("warn")).toHaveLength(1);
  });

  it("only warns when there is no package manager", () => {
    const runner = new FakeRunner();
    const log = createMemoryLogger();

    const result = installDependencies(profile({ osFamily: "unknown", packageManager: "none" }), runner, log);

    expect(result.ok).toBe(false);
    expect(runner.calls).toEqual([]);
    expect(log.messages("warn")).toEqual([
      "No package manager recognized; make sure curl, tar and openssl are available",
    ]);
  });

  it("does not add Alpine extras elsewhere", () => {
    expect(requiredPackages(profile({}))).toEqual(["ca-certificates", "curl", "tar", "gzip", "openssl"]);
  });
});
