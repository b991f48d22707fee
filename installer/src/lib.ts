import { readFileSync } from "fs";
import { ADDRESS_ENDPOINTS, ADDRESS_TIMEOUT_MS } from "./address.js";
import type { DownloaderPreference } from "./download.js";
import { DEFAULT_REPO } from "./release.js";

export interface CliArgs {
  port?: string;
  password?: string;
  repo?: string;
  downloader: DownloaderPreference;
  reinstall: boolean;
  strictSecret: boolean;
  nonInteractive: boolean;
  help: boolean;
}

export interface InstallPaths {
  /** Binary install targets, primary first */
  binaryTargets: string[];
  configPath: string;
  openrcScriptPath: string;
  systemdUnitPath: string;
  pidFile: string;
  osReleasePath: string;
}

export interface InstallerOptions {
  paths: InstallPaths;
  /** GitHub owner/repo serving sing-box releases */
  repo: string;
  downloader: DownloaderPreference;
  /** Explicit port input, validated as digits */
  port?: string;
  /** Explicit key, used verbatim */
  password?: string;
  /** Download even when sing-box is already on PATH */
  reinstall: boolean;
  /** Fail instead of falling back to a timestamp key */
  strictSecret: boolean;
  metadataTimeoutMs: number;
  downloadTimeoutMs: number;
  addressTimeoutMs: number;
  addressEndpoints: string[];
  /** Kernel machine type override (default: os.machine()) */
  machine?: string;
  /** Parent directory for the download work directory */
  tmpRoot?: string;
}

const DOWNLOADERS: DownloaderPreference[] = ["auto", "http", "curl", "wget"];

export function defaultInstallPaths(): InstallPaths {
  return {
    binaryTargets: ["/usr/bin/sing-box", "/usr/local/bin/sing-box"],
    configPath: "/etc/sing-box/config.json",
    openrcScriptPath: "/etc/init.d/sing-box",
    systemdUnitPath: "/etc/systemd/system/sing-box.service",
    pidFile: "/run/sing-box.pid",
    osReleasePath: "/etc/os-release",
  };
}

export function defaultInstallerOptions(overrides: Partial<InstallerOptions> = {}): InstallerOptions {
  return {
    paths: defaultInstallPaths(),
    repo: DEFAULT_REPO,
    downloader: "auto",
    reinstall: false,
    strictSecret: false,
    metadataTimeoutMs: 15_000,
    downloadTimeoutMs: 120_000,
    addressTimeoutMs: ADDRESS_TIMEOUT_MS,
    addressEndpoints: [...ADDRESS_ENDPOINTS],
    ...overrides,
  };
}

function isDownloaderPreference(value: string): value is DownloaderPreference {
  return DOWNLOADERS.some((d) => d === value);
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    downloader: "auto",
    reinstall: false,
    strictSecret: false,
    nonInteractive: false,
    help: false,
  };

  const valueOf = (i: number): string => {
    const value = argv[i + 1];
    if (value === undefined) {
      throw new Error(`Missing value for ${argv[i]}`);
    }
    return value;
  };

  for (let i = 2; i < argv.length; i++) {
    switch (argv[i]) {
      case "--port":
        args.port = valueOf(i++);
        break;
      case "--password":
        args.password = valueOf(i++);
        break;
      case "--repo":
        args.repo = valueOf(i++);
        break;
      case "--downloader": {
        const value = valueOf(i++);
        if (!isDownloaderPreference(value)) {
          throw new Error(`Unknown downloader: ${value} (expected ${DOWNLOADERS.join(", ")})`);
        }
        args.downloader = value;
        break;
      }
      case "--reinstall":
        args.reinstall = true;
        break;
      case "--strict-secret":
        args.strictSecret = true;
        break;
      case "--non-interactive":
        args.nonInteractive = true;
        break;
      case "--help":
      case "-h":
        args.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${argv[i]} (try --help)`);
    }
  }

  return args;
}

export function parseEnvText(content: string): Record<string, string> {
  const vars: Record<string, string> = {};
  for (const rawLine of content.split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    const key = line.slice(0, eq).trim();
    let value = line.slice(eq + 1).trim();
    if (
      (value.startsWith('"') && value.endsWith('"')) ||
      (value.startsWith("'") && value.endsWith("'"))
    ) {
      value = value.slice(1, -1);
    }
    vars[key] = value;
  }
  return vars;
}

/** KEY=VALUE files such as /etc/os-release. */
export function parseEnvFile(path: string): Record<string, string> {
  return parseEnvText(readFileSync(path, "utf8"));
}
