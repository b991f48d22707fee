import { spawnSync } from "child_process";
import { accessSync, constants, statSync } from "fs";
import { delimiter, join } from "path";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
  /** Stream output to the terminal instead of capturing it */
  inherit?: boolean;
}

/** Host process capability: locating and running external tools. */
export interface CommandRunner {
  /** Absolute path of `command` on PATH, or null when absent */
  which(command: string): string | null;
  run(command: string, args: string[], options?: RunOptions): CommandResult;
}

export function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) return false;
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export class NodeCommandRunner implements CommandRunner {
  constructor(private readonly pathEnv: string = process.env.PATH ?? "") {}

  which(command: string): string | null {
    if (command.includes("/")) {
      return isExecutableFile(command) ? command : null;
    }
    for (const dir of this.pathEnv.split(delimiter)) {
      if (!dir) continue;
      const candidate = join(dir, command);
      if (isExecutableFile(candidate)) return candidate;
    }
    return null;
  }

  run(command: string, args: string[], options: RunOptions = {}): CommandResult {
    const result = spawnSync(command, args, {
      cwd: options.cwd,
      timeout: options.timeoutMs,
      encoding: "utf8",
      stdio: options.inherit ? "inherit" : "pipe",
      env: process.env,
    });
    if (result.error) {
      return { stdout: "", stderr: result.error.message, exitCode: 127 };
    }
    return {
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
      exitCode: result.status ?? (result.signal ? 128 : 1),
    };
  }
}

/** Runs `command` and returns its trimmed stdout, or null when it is absent or fails. */
export function captureOutput(
  runner: CommandRunner,
  command: string,
  args: string[],
  options?: RunOptions
): string | null {
  if (!runner.which(command)) return null;
  const result = runner.run(command, args, options);
  if (result.exitCode !== 0) return null;
  const out = result.stdout.trim();
  return out.length > 0 ? out : null;
}
