import { randomBytes, randomInt } from "crypto";
import type { Provider } from "./chain.js";
import { firstSuccess, skip, success } from "./chain.js";
import { InstallerError, InstallerErrorCode } from "./errors.js";
import type { CommandRunner } from "./host.js";
import { captureOutput } from "./host.js";
import type { Logger } from "./log.js";
import type { CredentialOrigin } from "./types.js";
import { PORT_MAX, PORT_MIN, PSK_BYTES } from "./types.js";

const PORT_SPAN = PORT_MAX - PORT_MIN + 1;

export interface Sourced<T> {
  value: T;
  origin: CredentialOrigin;
  source: string;
}

type Clock = () => Date;

export function reducePort(n: number): number {
  return PORT_MIN + (Math.abs(Math.trunc(n)) % PORT_SPAN);
}

export function isPortInRange(port: number): boolean {
  return Number.isInteger(port) && port >= PORT_MIN && port <= PORT_MAX;
}

/** Explicit port input: digits only and within range, anything else is fatal. */
export function parsePortInput(raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InstallerError(InstallerErrorCode.INVALID_PORT, `Port must be numeric, got "${raw}"`);
  }
  const port = Number(trimmed);
  if (!isPortInRange(port)) {
    throw new InstallerError(
      InstallerErrorCode.INVALID_PORT,
      `Port must be between ${PORT_MIN} and ${PORT_MAX}, got ${port}`
    );
  }
  return port;
}

const unixSeconds = (now: Clock) => Math.floor(now().getTime() / 1000);

export function portProviders(runner: CommandRunner, now: Clock = () => new Date()): Provider<Sourced<number>>[] {
  return [
    {
      name: "shuf",
      attempt: () => {
        const out = captureOutput(runner, "shuf", ["-i", `${PORT_MIN}-${PORT_MAX}`, "-n", "1"]);
        if (!out || !/^\d+$/.test(out)) return skip("shuf unavailable");
        const port = Number(out);
        return isPortInRange(port)
          ? success({ value: port, origin: "toolGenerated", source: "shuf" })
          : skip(`shuf returned ${out}`);
      },
    },
    {
      name: "openssl",
      attempt: () => {
        const out = captureOutput(runner, "openssl", ["rand", "-hex", "2"]);
        if (!out || !/^[0-9a-f]{4}$/i.test(out)) return skip("openssl unavailable");
        return success({ value: reducePort(parseInt(out, 16)), origin: "toolGenerated", source: "openssl" });
      },
    },
    {
      name: "node-crypto",
      attempt: () =>
        success({ value: randomInt(PORT_MIN, PORT_MAX + 1), origin: "randomGenerated", source: "node-crypto" }),
    },
    {
      name: "shell-random",
      attempt: () => {
        const out = captureOutput(runner, "bash", ["-c", "echo $RANDOM"]);
        if (!out || !/^\d+$/.test(out)) return skip("$RANDOM unavailable");
        return success({ value: reducePort(Number(out)), origin: "randomGenerated", source: "shell-random" });
      },
    },
    {
      name: "clock",
      attempt: () =>
        success({ value: reducePort(unixSeconds(now)), origin: "weakFallback", source: "clock" }),
    },
  ];
}

export async function resolvePort(
  explicit: string | undefined,
  providers: ReadonlyArray<Provider<Sourced<number>>>,
  log: Logger
): Promise<Sourced<number>> {
  if (explicit !== undefined && explicit.trim() !== "") {
    return { value: parsePortInput(explicit), origin: "userSupplied", source: "user" };
  }
  const winner = await firstSuccess(providers, log);
  // the clock strategy cannot fail, so only a custom provider list gets here
  if (!winner) {
    throw new InstallerError(InstallerErrorCode.INVALID_CREDENTIAL, "No port generator produced a value");
  }
  log.info(`Using random port ${winner.value.value} (${winner.value.source})`);
  return winner.value;
}

/** Base64 text that decodes to exactly PSK_BYTES bytes. */
export function isValidPsk(value: string): boolean {
  return /^[A-Za-z0-9+/]+={0,2}$/.test(value) && Buffer.from(value, "base64").length === PSK_BYTES;
}

function toolPsk(runner: CommandRunner, command: string, args: string[]): string | null {
  const out = captureOutput(runner, command, args)?.replace(/\s+/g, "") ?? null;
  return out && isValidPsk(out) ? out : null;
}

export interface SecretProviderOptions {
  /** Installed sing-box, if any; used for its own key generator */
  binaryPath: string | null;
  now?: Clock;
  /** Leave out the timestamp fallback */
  strict?: boolean;
}

export function secretProviders(runner: CommandRunner, opts: SecretProviderOptions): Provider<Sourced<string>>[] {
  const now = opts.now ?? (() => new Date());
  const providers: Provider<Sourced<string>>[] = [
    {
      name: "sing-box",
      attempt: () => {
        if (!opts.binaryPath) return skip("sing-box not installed");
        const psk = toolPsk(runner, opts.binaryPath, ["generate", "rand", "--base64", String(PSK_BYTES)]);
        return psk ? success({ value: psk, origin: "toolGenerated", source: "sing-box" }) : skip("sing-box generate failed");
      },
    },
    {
      name: "openssl",
      attempt: () => {
        const psk = toolPsk(runner, "openssl", ["rand", "-base64", String(PSK_BYTES)]);
        return psk ? success({ value: psk, origin: "toolGenerated", source: "openssl" }) : skip("openssl unavailable");
      },
    },
    {
      name: "node-crypto",
      attempt: () =>
        success({
          value: randomBytes(PSK_BYTES).toString("base64"),
          origin: "randomGenerated",
          source: "node-crypto",
        }),
    },
  ];
  if (!opts.strict) {
    providers.push({
      name: "timestamp",
      attempt: () => success({ value: `psk-${unixSeconds(now)}`, origin: "weakFallback", source: "timestamp" }),
    });
  }
  return providers;
}

export async function resolveSecret(
  explicit: string | undefined,
  providers: ReadonlyArray<Provider<Sourced<string>>>,
  log: Logger
): Promise<Sourced<string>> {
  if (explicit !== undefined && explicit !== "") {
    return { value: explicit, origin: "userSupplied", source: "user" };
  }
  const winner = await firstSuccess(providers, log);
  if (!winner) {
    throw new InstallerError(
      InstallerErrorCode.WEAK_SECRET_REFUSED,
      "No strong key generator is available (sing-box, openssl, node crypto) and weak keys are refused"
    );
  }
  if (winner.value.origin === "weakFallback") {
    log.warn(`No random source available; using WEAK key ${winner.value.value}. Replace it in the config as soon as possible`);
  } else {
    log.info(`Generated ${PSK_BYTES}-byte key with ${winner.value.source}`);
  }
  return winner.value;
}
