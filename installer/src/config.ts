import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import { isPortInRange } from "./credentials.js";
import { errorMessage, InstallerError, InstallerErrorCode } from "./errors.js";
import type { Logger } from "./log.js";
import type { ServiceDescriptor } from "./types.js";
import { OUTBOUND_TAG } from "./types.js";

export interface ServiceConfigDocument {
  log: { level: string };
  inbounds: Array<{
    type: "shadowsocks";
    listen: string;
    listen_port: number;
    method: string;
    password: string;
    tag: string;
  }>;
  outbounds: Array<{ type: "direct"; tag: string }>;
}

export function assertDescriptor(descriptor: ServiceDescriptor): void {
  if (!isPortInRange(descriptor.port)) {
    throw new InstallerError(InstallerErrorCode.INVALID_CREDENTIAL, `Port ${descriptor.port} is out of range`);
  }
  if (descriptor.secret.length === 0) {
    throw new InstallerError(InstallerErrorCode.INVALID_CREDENTIAL, "Refusing to write an empty key");
  }
}

export function buildServiceConfig(descriptor: ServiceDescriptor): ServiceConfigDocument {
  return {
    log: { level: "info" },
    inbounds: [
      {
        type: "shadowsocks",
        listen: descriptor.listenAddress,
        listen_port: descriptor.port,
        method: descriptor.method,
        password: descriptor.secret,
        tag: descriptor.tag,
      },
    ],
    outbounds: [{ type: "direct", tag: OUTBOUND_TAG }],
  };
}

/** Overwrites any previous file; there is no merge. */
export function writeServiceConfig(configPath: string, descriptor: ServiceDescriptor, log: Logger): void {
  assertDescriptor(descriptor);
  try {
    mkdirSync(dirname(configPath), { recursive: true });
    writeFileSync(configPath, `${JSON.stringify(buildServiceConfig(descriptor), null, 2)}\n`, { mode: 0o600 });
  } catch (err) {
    throw new InstallerError(
      InstallerErrorCode.CONFIG_WRITE_FAILED,
      `Could not write ${configPath}: ${errorMessage(err)}`
    );
  }
  log.info(`Wrote ${configPath}`);
}
