import { lookup as dnsLookup } from "node:dns/promises";
import { isIPv4, isIPv6 } from "node:net";
import { createTaggedError, isTaggedError } from "../core/Retry.js";

/**
 * IPv4 ranges that must never be dereferenced: this-network, private,
 * carrier-grade NAT, loopback, link-local, IETF protocol assignments,
 * documentation, benchmarking, multicast, reserved and broadcast.
 */
export const BLOCKED_IPV4_CIDRS: readonly string[] = [
  "0.0.0.0/8",
  "10.0.0.0/8",
  "100.64.0.0/10",
  "127.0.0.0/8",
  "169.254.0.0/16",
  "172.16.0.0/12",
  "192.0.0.0/24",
  "192.0.2.0/24",
  "192.168.0.0/16",
  "198.18.0.0/15",
  "198.51.100.0/24",
  "203.0.113.0/24",
  "224.0.0.0/4",
  "240.0.0.0/4",
  "255.255.255.255/32",
];

export const BLOCKED_IPV6_CIDRS: readonly string[] = [
  "::/128",
  "::1/128",
  "100::/64",
  "2001::/23",
  "2001:db8::/32",
  "fc00::/7",
  "fe80::/10",
  "ff00::/8",
];

// Prefixes whose low 32 bits carry an IPv4 address. "::/96" is the deprecated
// IPv4-compatible form, which also covers "::" and "::1".
const EMBEDDED_IPV4_CIDRS: readonly string[] = ["::ffff:0:0/96", "64:ff9b::/96", "::/96"];

const TLD = /^(?:[a-z]{2,63}|xn--[a-z0-9-]{1,59})$/;
const LABEL = /^[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?$/;
const DOTTED_IPV4 = /^\d{1,3}(?:\.\d{1,3}){3}$/;

/**
 * True when `url` is an absolute http(s) URL whose host is a public address or
 * a syntactically valid public hostname. Never throws.
 *
 * Only the URL text is inspected; a hostname may still resolve to a private
 * address (see {@link assertResolvesPublic}).
 */
export function isSafeUrl(url: string): boolean {
  try {
    return explainUnsafeUrl(url) === undefined;
  } catch {
    return false;
  }
}

/**
 * Reason `url` is rejected, or `undefined` if it passes.
 */
export function explainUnsafeUrl(url: string): string | undefined {
  if (typeof url !== "string" || !/^https?:\/\//i.test(url)) {
    return "scheme must be http or https";
  }
  if (/[\u0000- \u007f]/.test(url)) {
    return "whitespace or control character in URL";
  }

  const afterScheme = url.slice(url.indexOf("//") + 2);
  const authority = afterScheme.split(/[/?#]/, 1)[0] ?? "";
  if (authority.includes("@")) {
    return "userinfo is not allowed";
  }

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return "malformed URL";
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return "scheme must be http or https";
  }
  if (parsed.username || parsed.password) {
    return "userinfo is not allowed";
  }

  const queryReason = checkQuery(url);
  if (queryReason) return queryReason;

  return checkHost(parsed.hostname);
}

/**
 * Resolve the URL's host and reject it if any address it maps to is non-public.
 *
 * @throws TaggedError `HTTP_DISALLOWED_HOST`
 */
export async function assertResolvesPublic(
  url: string,
  lookup: LookupFn = dnsLookup,
): Promise<void> {
  let hostname: string;
  try {
    hostname = new URL(url).hostname;
  } catch {
    throw createTaggedError("HTTP_DISALLOWED_HOST", `Invalid or Disallowed URL: ${url}`, { url });
  }

  const bare = hostname.startsWith("[") ? hostname.slice(1, -1) : hostname;
  if (isIPv4(bare) || isIPv6(bare)) {
    if (isBlockedAddress(bare)) {
      throw createTaggedError("HTTP_DISALLOWED_HOST", `Invalid or Disallowed URL: ${url}`, {
        url,
        address: bare,
      });
    }
    return;
  }

  try {
    const addresses = await lookup(bare, { all: true });
    const blocked = addresses.find((entry) => isBlockedAddress(entry.address));
    if (blocked) {
      throw createTaggedError(
        "HTTP_DISALLOWED_HOST",
        `Host "${bare}" resolves to blocked address: ${blocked.address}`,
        { url, hostname: bare, resolvedIp: blocked.address },
      );
    }
    if (addresses.length === 0) {
      throw createTaggedError("HTTP_DISALLOWED_HOST", `Host "${bare}" has no addresses`, {
        url,
        hostname: bare,
      });
    }
  } catch (err) {
    if (isTaggedError(err) && err.kind === "HTTP_DISALLOWED_HOST") {
      throw err;
    }
    throw createTaggedError(
      "HTTP_DISALLOWED_HOST",
      `DNS resolution failed for host "${bare}": ${err instanceof Error ? err.message : String(err)}`,
      { url, hostname: bare },
    );
  }
}

export type LookupFn = (
  hostname: string,
  options: { all: true },
) => Promise<Array<{ address: string; family: number }>>;

/**
 * Check an IP address (v4 or v6, without brackets) against the blocked ranges.
 */
export function isBlockedAddress(ip: string): boolean {
  if (DOTTED_IPV4.test(ip)) {
    return BLOCKED_IPV4_CIDRS.some((cidr) => isIpv4InCidr(ip, cidr));
  }

  const bytes = expandIpv6(ip);
  // Unparseable addresses are never treated as public.
  if (!bytes) return true;

  for (const cidr of EMBEDDED_IPV4_CIDRS) {
    if (isIpv6InCidr(bytes, cidr)) {
      const embedded = bytes.slice(12).join(".");
      return isBlockedAddress(embedded);
    }
  }
  return BLOCKED_IPV6_CIDRS.some((cidr) => isIpv6InCidr(bytes, cidr));
}

function checkHost(hostname: string): string | undefined {
  if (!hostname) return "missing host";

  if (hostname.startsWith("[")) {
    return isBlockedAddress(hostname.slice(1, -1)) ? "non-public IPv6 address" : undefined;
  }
  if (DOTTED_IPV4.test(hostname)) {
    return isBlockedAddress(hostname) ? "non-public IPv4 address" : undefined;
  }

  if (hostname === "localhost" || hostname.endsWith(".localhost")) {
    return "localhost is not allowed";
  }
  if (hostname.length > 253) return "hostname too long";
  if (hostname.endsWith(".")) return "trailing dot in hostname";

  const labels = hostname.split(".");
  if (labels.length < 2) return "hostname has no top-level domain";
  if (!labels.every((label) => LABEL.test(label))) return "invalid hostname label";

  const tld = labels[labels.length - 1] ?? "";
  if (!TLD.test(tld)) return "invalid top-level domain";
  return undefined;
}

function checkQuery(url: string): string | undefined {
  const queryStart = url.indexOf("?");
  if (queryStart === -1) return undefined;
  const hashStart = url.indexOf("#", queryStart);
  const query = url.slice(queryStart + 1, hashStart === -1 ? undefined : hashStart);
  if (!query) return undefined;

  if (/%(?![0-9a-fA-F]{2})/.test(query)) {
    return "invalid percent-escape in query";
  }
  for (const field of query.split("&")) {
    if (!field.includes("=")) return `bad query field: ${field}`;
  }
  return undefined;
}

function isIpv4InCidr(ip: string, cidr: string): boolean {
  const [cidrIp, prefixStr] = cidr.split("/");
  if (!cidrIp || !prefixStr) return false;

  const prefix = parseInt(prefixStr, 10);
  if (isNaN(prefix) || prefix < 0 || prefix > 32) return false;

  const ipNum = ipv4ToNum(ip);
  const cidrNum = ipv4ToNum(cidrIp);
  if (ipNum === null || cidrNum === null) return false;

  const mask = prefix === 0 ? 0 : (~0 << (32 - prefix)) >>> 0;
  return ((ipNum & mask) >>> 0) === ((cidrNum & mask) >>> 0);
}

function ipv4ToNum(ip: string): number | null {
  const parts = ip.split(".");
  if (parts.length !== 4) return null;
  let num = 0;
  for (const part of parts) {
    const n = parseInt(part, 10);
    if (isNaN(n) || n < 0 || n > 255) return null;
    num = ((num << 8) | n) >>> 0;
  }
  return num;
}

function isIpv6InCidr(ipBytes: number[], cidr: string): boolean {
  const [cidrIp, prefixStr] = cidr.split("/");
  if (!cidrIp || !prefixStr) return false;

  const prefix = parseInt(prefixStr, 10);
  if (isNaN(prefix)) return false;

  const cidrBytes = expandIpv6(cidrIp);
  if (!cidrBytes) return false;

  const fullBytes = Math.floor(prefix / 8);
  for (let i = 0; i < fullBytes && i < 16; i++) {
    if (ipBytes[i] !== cidrBytes[i]) return false;
  }

  const remainingBits = prefix % 8;
  if (remainingBits > 0 && fullBytes < 16) {
    const mask = (~0 << (8 - remainingBits)) & 0xff;
    if (((ipBytes[fullBytes] ?? 0) & mask) !== ((cidrBytes[fullBytes] ?? 0) & mask)) return false;
  }

  return true;
}

/**
 * Expand an IPv6 address to 16 bytes. Accepts a trailing dotted IPv4 part.
 */
export function expandIpv6(address: string): number[] | null {
  let ip = address;
  const zoneIdx = ip.indexOf("%");
  if (zoneIdx !== -1) ip = ip.slice(0, zoneIdx);

  const parts = ip.split("::");
  if (parts.length > 2) return null;

  const expandGroup = (group: string): number[] | null => {
    if (!group) return [];
    const out: number[] = [];
    for (const hex of group.split(":")) {
      if (DOTTED_IPV4.test(hex)) {
        const num = ipv4ToNum(hex);
        if (num === null) return null;
        out.push((num >>> 24) & 0xff, (num >>> 16) & 0xff, (num >>> 8) & 0xff, num & 0xff);
        continue;
      }
      if (!/^[0-9a-fA-F]{1,4}$/.test(hex)) return null;
      const val = parseInt(hex, 16);
      out.push((val >> 8) & 0xff, val & 0xff);
    }
    return out;
  };

  const left = expandGroup(parts[0] ?? "");
  if (!left) return null;

  if (parts.length === 1) {
    return left.length === 16 ? left : null;
  }

  const right = expandGroup(parts[1] ?? "");
  if (!right || left.length + right.length > 14) return null;

  const bytes: number[] = new Array<number>(16).fill(0);
  left.forEach((value, i) => {
    bytes[i] = value;
  });
  right.forEach((value, i) => {
    bytes[16 - right.length + i] = value;
  });
  return bytes;
}
