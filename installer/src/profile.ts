import { existsSync } from "fs";
import { machine as osMachine } from "os";
import { parseEnvFile } from "./lib.js";
import type { Logger } from "./log.js";
import type { ArchToken, OsFamily, PackageManagerKind, SystemProfile } from "./types.js";

const FAMILY_KEYWORDS: Array<[string[], OsFamily, PackageManagerKind]> = [
  [["alpine"], "alpine", "apk"],
  [["debian", "ubuntu"], "debian", "apt"],
  [["centos", "rhel", "fedora"], "rhel", "dnf"],
];

const ARCH_SYNONYMS: Record<string, ArchToken> = {
  x86_64: "amd64",
  amd64: "amd64",
  aarch64: "arm64",
  arm64: "arm64",
  armv7l: "armv7",
  armv7: "armv7",
  i686: "386",
  i386: "386",
};

export function detectOsFamily(
  id: string,
  idLike: string
): { osFamily: OsFamily; packageManager: PackageManagerKind } {
  const haystack = `${id} ${idLike}`.toLowerCase();
  for (const [keywords, osFamily, packageManager] of FAMILY_KEYWORDS) {
    if (keywords.some((k) => haystack.includes(k))) {
      return { osFamily, packageManager };
    }
  }
  return { osFamily: "unknown", packageManager: "none" };
}

export function mapArch(machine: string): { archToken: ArchToken; recognized: boolean } {
  const token = ARCH_SYNONYMS[machine.trim().toLowerCase()];
  return token ? { archToken: token, recognized: true } : { archToken: "amd64", recognized: false };
}

export interface ProfileInputs {
  osReleasePath: string;
  /** Kernel machine type; defaults to os.machine() */
  machine?: string;
}

export function profileSystem(inputs: ProfileInputs, log: Logger): SystemProfile {
  const vars = existsSync(inputs.osReleasePath) ? parseEnvFile(inputs.osReleasePath) : {};
  const { osFamily, packageManager } = detectOsFamily(vars.ID ?? "", vars.ID_LIKE ?? "");
  if (osFamily === "unknown") {
    log.warn(`Unrecognized OS (ID=${vars.ID ?? "?"}); continuing without a package manager`);
  }

  const machine = inputs.machine ?? osMachine();
  const { archToken, recognized } = mapArch(machine);
  if (!recognized) {
    log.warn(`Unrecognized architecture ${machine}; trying amd64`);
  }

  log.info(`Detected system: ${osFamily}, arch ${archToken} (${machine})`);
  return Object.freeze({ osFamily, packageManager, archToken, machine, archRecognized: recognized });
}
