export enum InstallerErrorCode {
  INVALID_PORT = "INVALID_PORT",
  INVALID_CREDENTIAL = "INVALID_CREDENTIAL",
  WEAK_SECRET_REFUSED = "WEAK_SECRET_REFUSED",
  NO_DOWNLOADER = "NO_DOWNLOADER",
  DOWNLOAD_EXHAUSTED = "DOWNLOAD_EXHAUSTED",
  EXTRACT_FAILED = "EXTRACT_FAILED",
  BINARY_NOT_FOUND = "BINARY_NOT_FOUND",
  INSTALL_FAILED = "INSTALL_FAILED",
  BINARY_MISSING = "BINARY_MISSING",
  TEMP_DIR_FAILED = "TEMP_DIR_FAILED",
  CONFIG_WRITE_FAILED = "CONFIG_WRITE_FAILED",
  SERVICE_WRITE_FAILED = "SERVICE_WRITE_FAILED",
}

/** Fatal installer condition; aborts the run with a non-zero exit. */
export class InstallerError extends Error {
  readonly code: InstallerErrorCode;
  readonly context?: Record<string, unknown>;
  readonly exitCode: number;

  constructor(code: InstallerErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "InstallerError";
    this.code = code;
    this.context = context;
    this.exitCode = 1;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
