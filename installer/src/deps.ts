import type { StepResult } from "./chain.js";
import type { CommandRunner } from "./host.js";
import type { Logger } from "./log.js";
import type { SystemProfile } from "./types.js";

export const BASE_PACKAGES = ["ca-certificates", "curl", "tar", "gzip", "openssl"];
const ALPINE_EXTRA = ["bash", "coreutils"];

export interface PackageInstaller {
  readonly name: string;
  install(packages: string[]): StepResult;
}

function runInstall(runner: CommandRunner, command: string, args: string[]): StepResult {
  const result = runner.run(command, args, { inherit: true });
  return result.exitCode === 0
    ? { ok: true }
    : { ok: false, reason: `${command} exited with ${result.exitCode}` };
}

export class ApkInstaller implements PackageInstaller {
  readonly name = "apk";
  constructor(private readonly runner: CommandRunner) {}

  install(packages: string[]): StepResult {
    return runInstall(this.runner, "apk", ["add", "--no-cache", ...packages]);
  }
}

export class AptInstaller implements PackageInstaller {
  readonly name = "apt-get";
  constructor(private readonly runner: CommandRunner) {}

  install(packages: string[]): StepResult {
    // A stale index still lets most installs succeed
    this.runner.run("apt-get", ["update", "-y"], { inherit: true });
    return runInstall(this.runner, "apt-get", ["install", "-y", ...packages]);
  }
}

export class DnfInstaller implements PackageInstaller {
  readonly name: "dnf" | "yum";
  constructor(private readonly runner: CommandRunner) {
    this.name = runner.which("dnf") ? "dnf" : "yum";
  }

  install(packages: string[]): StepResult {
    return runInstall(this.runner, this.name, ["install", "-y", ...packages]);
  }
}

export function packageInstallerFor(
  profile: SystemProfile,
  runner: CommandRunner
): PackageInstaller | null {
  switch (profile.packageManager) {
    case "apk":
      return new ApkInstaller(runner);
    case "apt":
      return new AptInstaller(runner);
    case "dnf":
      return new DnfInstaller(runner);
    case "none":
      return null;
  }
}

export function requiredPackages(profile: SystemProfile): string[] {
  return profile.osFamily === "alpine" ? [...BASE_PACKAGES, ...ALPINE_EXTRA] : [...BASE_PACKAGES];
}

/** Non-fatal: later stages re-check each tool before using it. */
export function installDependencies(
  profile: SystemProfile,
  runner: CommandRunner,
  log: Logger
): StepResult {
  const installer = packageInstallerFor(profile, runner);
  if (!installer) {
    log.warn("No package manager recognized; make sure curl, tar and openssl are available");
    return { ok: false, reason: "no package manager" };
  }

  const packages = requiredPackages(profile);
  log.info(`Installing ${packages.join(", ")} with ${installer.name}`);
  const result = installer.install(packages);
  if (!result.ok) {
    log.warn(`${installer.name} could not install some packages (${result.reason}); install them manually if later steps fail`);
  }
  return result;
}
