import { isIP } from "net";
import { firstSuccess, skip, success } from "./chain.js";
import type { Downloader } from "./download.js";
import type { Logger } from "./log.js";

export const ADDRESS_ENDPOINTS = [
  "https://ipinfo.io/ip",
  "https://ipv4.icanhazip.com",
  "https://ifconfig.co/ip",
  "https://api.ipify.org",
];

export const ADDRESS_TIMEOUT_MS = 5000;

/** First endpoint answering with an IP address wins; null when none does. */
export async function resolvePublicAddress(
  downloader: Downloader | null,
  endpoints: readonly string[],
  timeoutMs: number,
  log: Logger
): Promise<string | null> {
  if (!downloader) return null;
  const winner = await firstSuccess<string>(
    endpoints.map((url) => ({
      name: url,
      attempt: async () => {
        const body = (await downloader.fetchText(url, timeoutMs)).replace(/\s+/g, "");
        if (!body) return skip("empty response");
        return isIP(body) ? success(body) : skip(`not an address: ${body.slice(0, 40)}`);
      },
    })),
    log
  );
  return winner?.value ?? null;
}
