import { isIPv6 } from "net";
import type { ConnectionLinks } from "./types.js";

export interface LinkParams {
  method: string;
  secret: string;
  host: string;
  port: number;
  tag: string;
}

/** RFC 3986 unreserved characters stay as they are; everything else is escaped. */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

function formatHost(host: string): string {
  return isIPv6(host) ? `[${host}]` : host;
}

export function buildLinks(params: LinkParams): ConnectionLinks {
  const userInfo = `${params.method}:${params.secret}`;
  const suffix = `@${formatHost(params.host)}:${params.port}#${params.tag}`;
  return {
    sip002: `ss://${percentEncode(userInfo)}${suffix}`,
    legacy: `ss://${Buffer.from(userInfo, "utf8").toString("base64")}${suffix}`,
  };
}

/** Recovers "method:secret" from either link form. */
export function decodeUserInfo(link: string): string {
  const rest = link.replace(/^ss:\/\//, "");
  const at = rest.lastIndexOf("@");
  const encoded = at >= 0 ? rest.slice(0, at) : rest;
  const decoded = decodeURIComponent(encoded);
  if (decoded.includes(":")) return decoded;
  return Buffer.from(encoded, "base64").toString("utf8");
}
