import { dirname } from "path";
import type { InstallReport } from "./pipeline.js";

export function formatSummary(report: InstallReport): string {
  const lines = [
    "",
    "==================== ss links ====================",
    `    ${report.links.sip002}`,
    `    ${report.links.legacy}`,
    "==================================================",
    `  Port:         ${report.credential.port}`,
    `  PSK:          ${report.credential.secret}${report.credential.secretOrigin === "weakFallback" ? "  (WEAK)" : ""}`,
    `  Config:       ${report.configPath}`,
    `  Service:      ${report.service.path ?? "manual start"} (${report.service.outcome})`,
  ];
  if (!report.addressResolved) {
    lines.push(`  Address:      not detected, replace ${report.address} with the server's public IP`);
  }
  const uninstall = [report.binaryPath, dirname(report.configPath), report.service.path]
    .filter((p): p is string => p !== null)
    .join(", ");
  lines.push("", `To uninstall, remove: ${uninstall}`, "");
  return lines.join("\n");
}
