import { resolvePublicAddress } from "./address.js";
import type { ArchiveReader } from "./archive.js";
import { TarArchiveReader } from "./archive.js";
import { fetchArtifact } from "./artifact.js";
import type { StepResult } from "./chain.js";
import { writeServiceConfig } from "./config.js";
import { portProviders, resolvePort, resolveSecret, secretProviders } from "./credentials.js";
import { installDependencies } from "./deps.js";
import type { Downloader, DownloaderPreference } from "./download.js";
import { selectDownloader } from "./download.js";
import type { CommandRunner } from "./host.js";
import { NodeCommandRunner } from "./host.js";
import type { InstallerOptions } from "./lib.js";
import { buildLinks } from "./links.js";
import type { Logger } from "./log.js";
import { profileSystem } from "./profile.js";
import { releaseCandidate, resolveLatestRelease } from "./release.js";
import { registerService, selectSupervisor } from "./service.js";
import { withSpan } from "./tracing.js";
import type {
  ConnectionLinks,
  Credential,
  FetchResult,
  ReleaseCandidate,
  ServiceDescriptor,
  ServiceUnit,
  SystemProfile,
} from "./types.js";
import { ADDRESS_PLACEHOLDER, BINARY_NAME, INBOUND_TAG, LINK_TAG, SS_METHOD } from "./types.js";

/** Everything the pipeline touches outside the file system. */
export interface HostCapabilities {
  runner: CommandRunner;
  downloader: Downloader | null;
  archive: ArchiveReader;
  now: () => Date;
}

export function nodeHost(preference: DownloaderPreference): HostCapabilities {
  const runner = new NodeCommandRunner();
  return {
    runner,
    downloader: selectDownloader(preference, runner),
    archive: new TarArchiveReader(runner),
    now: () => new Date(),
  };
}

export interface InstallReport {
  profile: SystemProfile;
  dependencies: StepResult;
  /** Null when an existing binary was reused */
  release: ReleaseCandidate | null;
  fetch: FetchResult | null;
  binaryPath: string;
  credential: Credential;
  descriptor: ServiceDescriptor;
  configPath: string;
  service: ServiceUnit;
  address: string;
  addressResolved: boolean;
  links: ConnectionLinks;
}

/**
 * Runs every stage once, in order. Fatal conditions surface as InstallerError
 * and leave earlier side effects in place.
 */
export async function runInstaller(
  options: InstallerOptions,
  host: HostCapabilities,
  log: Logger
): Promise<InstallReport> {
  const { paths } = options;

  const profile = await withSpan("installer.profile", () =>
    profileSystem({ osReleasePath: paths.osReleasePath, machine: options.machine }, log.scope("profile"))
  );

  const port = await withSpan("installer.port", () =>
    resolvePort(options.port, portProviders(host.runner, host.now), log.scope("credentials"))
  );

  const dependencies = await withSpan("installer.dependencies", () =>
    installDependencies(profile, host.runner, log.scope("deps"))
  );

  const existing = host.runner.which(BINARY_NAME);
  let release: ReleaseCandidate | null = null;
  let fetch: FetchResult | null = null;
  let binaryPath: string;
  if (existing && !options.reinstall) {
    log.info(`Found existing ${BINARY_NAME} at ${existing}`);
    binaryPath = existing;
  } else {
    const fetchLog = log.scope("fetch");
    const versionTag = await withSpan("installer.release", () =>
      resolveLatestRelease(host.downloader, options.repo, options.metadataTimeoutMs, log.scope("release"))
    );
    release = releaseCandidate(options.repo, profile.archToken, versionTag);
    const candidate = release;
    fetch = await withSpan("installer.fetch", (span) => {
      span.setAttribute("installer.candidates", candidate.candidateUrls.length);
      return fetchArtifact(candidate, {
        downloader: host.downloader,
        archive: host.archive,
        binaryTargets: paths.binaryTargets,
        timeoutMs: options.downloadTimeoutMs,
        tmpRoot: options.tmpRoot,
        log: fetchLog,
      });
    });
    binaryPath = fetch.installedPath;
  }

  const secret = await withSpan("installer.secret", () =>
    resolveSecret(
      options.password,
      secretProviders(host.runner, { binaryPath, now: host.now, strict: options.strictSecret }),
      log.scope("credentials")
    )
  );
  const credential: Credential = {
    port: port.value,
    portOrigin: port.origin,
    portSource: port.source,
    secret: secret.value,
    secretOrigin: secret.origin,
    secretSource: secret.source,
  };

  const descriptor: ServiceDescriptor = {
    binaryPath,
    listenAddress: "::",
    port: credential.port,
    method: SS_METHOD,
    secret: credential.secret,
    tag: INBOUND_TAG,
  };

  await withSpan("installer.config", () =>
    writeServiceConfig(paths.configPath, descriptor, log.scope("config"))
  );

  const service = await withSpan("installer.service", (span) => {
    const serviceLog = log.scope("service");
    const supervisor = selectSupervisor(profile, host.runner, paths, serviceLog);
    span.setAttribute("installer.supervisor", supervisor.kind);
    return registerService(supervisor, { binaryPath, configPath: paths.configPath });
  });

  const addressLog = log.scope("address");
  const resolved = await withSpan("installer.address", () =>
    resolvePublicAddress(host.downloader, options.addressEndpoints, options.addressTimeoutMs, addressLog)
  );
  if (resolved) {
    addressLog.info(`Public address: ${resolved}`);
  } else {
    addressLog.warn(`Could not detect the public address; replace ${ADDRESS_PLACEHOLDER} in the links below with it`);
  }
  const address = resolved ?? ADDRESS_PLACEHOLDER;

  const links = buildLinks({
    method: descriptor.method,
    secret: descriptor.secret,
    host: address,
    port: descriptor.port,
    tag: LINK_TAG,
  });

  return {
    profile,
    dependencies,
    release,
    fetch,
    binaryPath,
    credential,
    descriptor,
    configPath: paths.configPath,
    service,
    address,
    addressResolved: resolved !== null,
    links,
  };
}
