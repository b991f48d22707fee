export type OsFamily = "alpine" | "debian" | "rhel" | "unknown";
export type PackageManagerKind = "apk" | "apt" | "dnf" | "none";
export type ArchToken = "amd64" | "arm64" | "armv7" | "386";

export interface SystemProfile {
  readonly osFamily: OsFamily;
  readonly packageManager: PackageManagerKind;
  readonly archToken: ArchToken;
  /** Raw kernel machine type the arch token was mapped from */
  readonly machine: string;
  readonly archRecognized: boolean;
}

export interface ReleaseCandidate {
  /** Empty when the release metadata could not be read */
  versionTag: string;
  candidateUrls: string[];
}

export interface FetchResult {
  /** Used during the fetch; the work directory holding it is gone on return */
  archivePath: string;
  /** Also inside the removed work directory */
  extractedBinaryPath: string;
  installedPath: string;
  sourceUrl: string;
}

export type CredentialOrigin = "userSupplied" | "toolGenerated" | "randomGenerated" | "weakFallback";

export interface Credential {
  port: number;
  portOrigin: CredentialOrigin;
  portSource: string;
  secret: string;
  secretOrigin: CredentialOrigin;
  secretSource: string;
}

export const SS_METHOD = "2022-blake3-aes-128-gcm";
export const INBOUND_TAG = "ss2022-in";
export const OUTBOUND_TAG = "direct-out";
export const LINK_TAG = "singbox-ss2022";
export const BINARY_NAME = "sing-box";
export const SERVICE_NAME = "sing-box";

export interface ServiceDescriptor {
  binaryPath: string;
  listenAddress: "::";
  port: number;
  method: typeof SS_METHOD;
  secret: string;
  tag: string;
}

export type ServiceKind = "openrc" | "systemd" | "none";
export type ServiceOutcome = "started" | "enable-failed" | "skipped-no-supervisor";

export interface ServiceUnit {
  kind: ServiceKind;
  /** Unit or init script written, null when registration was skipped */
  path: string | null;
  outcome: ServiceOutcome;
}

export interface ConnectionLinks {
  sip002: string;
  legacy: string;
}

export const PORT_MIN = 10000;
export const PORT_MAX = 60000;
export const PSK_BYTES = 16;
export const ADDRESS_PLACEHOLDER = "YOUR_SERVER_IP";
