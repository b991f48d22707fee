import { chmodSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import type { StepResult } from "./chain.js";
import { errorMessage, InstallerError, InstallerErrorCode } from "./errors.js";
import type { CommandRunner } from "./host.js";
import { isExecutableFile } from "./host.js";
import type { Logger } from "./log.js";
import type { ServiceKind, ServiceUnit, SystemProfile } from "./types.js";
import { SERVICE_NAME } from "./types.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const PKG_ROOT = join(__dirname, "..");

export interface UnitSpec {
  binaryPath: string;
  configPath: string;
}

export interface ServicePaths {
  openrcScriptPath: string;
  systemdUnitPath: string;
  pidFile: string;
}

export function renderTemplate(name: string, values: Record<string, string>): string {
  const template = readFileSync(join(PKG_ROOT, "templates", name), "utf8");
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => values[key] ?? match);
}

function writeUnitFile(path: string, content: string, mode?: number): void {
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, content);
    if (mode !== undefined) chmodSync(path, mode);
  } catch (err) {
    throw new InstallerError(
      InstallerErrorCode.SERVICE_WRITE_FAILED,
      `Could not write ${path}: ${errorMessage(err)}`
    );
  }
}

function runStep(runner: CommandRunner, command: string, args: string[]): StepResult {
  const result = runner.run(command, args, { inherit: true });
  return result.exitCode === 0
    ? { ok: true }
    : { ok: false, reason: `${command} ${args.join(" ")} exited with ${result.exitCode}` };
}

export interface ServiceSupervisor {
  readonly kind: ServiceKind;
  register(spec: UnitSpec): ServiceUnit;
}

export class OpenRcSupervisor implements ServiceSupervisor {
  readonly kind = "openrc";

  constructor(
    private readonly runner: CommandRunner,
    private readonly paths: ServicePaths,
    private readonly log: Logger
  ) {}

  register(spec: UnitSpec): ServiceUnit {
    const path = this.paths.openrcScriptPath;
    this.log.info(`Writing OpenRC service ${path}`);
    writeUnitFile(path, renderTemplate("openrc-init.sh", { ...spec, pidFile: this.paths.pidFile }), 0o755);

    // a missing rc-update only skips the runlevel step
    let enabled: StepResult = { ok: true };
    if (this.runner.which("rc-update")) {
      enabled = runStep(this.runner, "rc-update", ["add", SERVICE_NAME, "default"]);
      if (!enabled.ok) this.log.warn(`Could not add ${SERVICE_NAME} to the default runlevel (${enabled.reason})`);
    } else {
      this.log.warn(`rc-update not found; add it to a runlevel manually: rc-update add ${SERVICE_NAME} default`);
    }

    if (!this.runner.which("rc-service")) {
      this.log.warn(`rc-service not found; start it manually: rc-service ${SERVICE_NAME} start`);
      return { kind: this.kind, path, outcome: "skipped-no-supervisor" };
    }
    const started = runStep(this.runner, "rc-service", [SERVICE_NAME, "start"]);
    if (!started.ok) {
      this.log.warn(`Could not start ${SERVICE_NAME}; run rc-service ${SERVICE_NAME} start manually`);
    }
    return { kind: this.kind, path, outcome: started.ok && enabled.ok ? "started" : "enable-failed" };
  }
}

export class SystemdSupervisor implements ServiceSupervisor {
  readonly kind = "systemd";

  constructor(
    private readonly runner: CommandRunner,
    private readonly paths: ServicePaths,
    private readonly log: Logger
  ) {}

  register(spec: UnitSpec): ServiceUnit {
    const path = this.paths.systemdUnitPath;
    this.log.info(`Writing systemd unit ${path}`);
    writeUnitFile(path, renderTemplate("systemd.service", { ...spec }));

    const reloaded = runStep(this.runner, "systemctl", ["daemon-reload"]);
    if (!reloaded.ok) this.log.debug(reloaded.reason);

    const enabled = runStep(this.runner, "systemctl", ["enable", "--now", SERVICE_NAME]);
    if (!enabled.ok) {
      this.log.warn(`systemd could not enable/start ${SERVICE_NAME}; run systemctl start ${SERVICE_NAME} manually`);
      return { kind: this.kind, path, outcome: "enable-failed" };
    }
    return { kind: this.kind, path, outcome: "started" };
  }
}

/** Used when the host has no service manager to talk to. */
export class NoSupervisor implements ServiceSupervisor {
  readonly kind = "none";

  constructor(private readonly log: Logger) {}

  register(spec: UnitSpec): ServiceUnit {
    this.log.warn(
      `systemctl not found; skipping service registration. Start it manually: ${spec.binaryPath} run -c ${spec.configPath}`
    );
    return { kind: this.kind, path: null, outcome: "skipped-no-supervisor" };
  }
}

/** Alpine gets OpenRC; every other family, unknown included, gets systemd. */
export function selectSupervisor(
  profile: SystemProfile,
  runner: CommandRunner,
  paths: ServicePaths,
  log: Logger
): ServiceSupervisor {
  if (profile.osFamily === "alpine") {
    return new OpenRcSupervisor(runner, paths, log);
  }
  return runner.which("systemctl") ? new SystemdSupervisor(runner, paths, log) : new NoSupervisor(log);
}

export function registerService(supervisor: ServiceSupervisor, spec: UnitSpec): ServiceUnit {
  if (!isExecutableFile(spec.binaryPath)) {
    throw new InstallerError(
      InstallerErrorCode.BINARY_MISSING,
      `${spec.binaryPath} is missing or not executable`
    );
  }
  return supervisor.register(spec);
}
