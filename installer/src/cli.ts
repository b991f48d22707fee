#!/usr/bin/env node

import { createInterface } from "readline/promises";
import { InstallerError, errorMessage } from "./errors.js";
import { defaultInstallerOptions, parseArgs } from "./lib.js";
import type { CliArgs } from "./lib.js";
import { createConsoleLogger } from "./log.js";
import { nodeHost, runInstaller } from "./pipeline.js";
import { DEFAULT_REPO } from "./release.js";
import { formatSummary } from "./summary.js";
import { shutdownTracing, startTracing } from "./tracing.js";

function printHelp(): void {
  console.log(`sbx-install: unattended sing-box Shadowsocks-2022 installer

Usage: sbx-install [options]

Options:
  --port <n>             Listen port (default: random 10000-60000)
  --password <psk>       Pre-shared key (default: SBX_PASSWORD or a random 16-byte key)
  --repo <owner/repo>    Release repository (default: SagerNet/sing-box)
  --downloader <name>    auto, http, curl or wget (default: auto)
  --reinstall            Download sing-box even if it is already installed
  --strict-secret        Fail instead of falling back to a weak key
  --non-interactive      Never prompt, even on a terminal
  --help                 Show this help

Environment:
  SBX_PASSWORD                  Pre-shared key override
  SBX_DEBUG                     Print debug lines
  OTEL_EXPORTER_OTLP_ENDPOINT   Export installer traces over OTLP/gRPC`);
}

async function promptMissing(args: CliArgs): Promise<{ port?: string; password?: string }> {
  const password = args.password ?? process.env.SBX_PASSWORD;
  if (args.nonInteractive || !process.stdin.isTTY) {
    return { port: args.port, password };
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const port = args.port ?? (await rl.question("Port (empty for random 10000-60000): "));
    const pwd = password ?? (await rl.question("Password (empty to generate a base64 PSK): "));
    return { port, password: pwd };
  } finally {
    rl.close();
  }
}

async function main(): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv);
  } catch (err) {
    console.error(errorMessage(err));
    return 2;
  }

  if (args.help) {
    printHelp();
    return 0;
  }

  const log = createConsoleLogger();
  startTracing();
  try {
    const inputs = await promptMissing(args);
    const options = defaultInstallerOptions({
      repo: args.repo ?? DEFAULT_REPO,
      downloader: args.downloader,
      reinstall: args.reinstall,
      strictSecret: args.strictSecret,
      port: inputs.port,
      password: inputs.password,
    });
    const report = await runInstaller(options, nodeHost(options.downloader), log);
    console.log(formatSummary(report));
    log.info("Done");
    return 0;
  } catch (err) {
    if (err instanceof InstallerError) {
      log.error(`${err.message} [${err.code}]`);
      return err.exitCode;
    }
    throw err;
  } finally {
    await shutdownTracing();
  }
}

main().then(
  (code) => process.exit(code),
  (err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  }
);
