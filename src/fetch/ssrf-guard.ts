/**
 * SSRF protection for outbound PDF downloads.
 *
 * A URL is only fetched when every address its hostname resolves to is
 * public. "Cannot determine" counts as unsafe: resolution failures and DNS
 * timeouts block the URL instead of letting the request fail later.
 */
import { promises as dns } from 'dns';
import { BlockList, isIP } from 'net';
import { BlockedUrlError } from '../errors.js';
import { logger } from '../logger.js';

const DNS_TIMEOUT_MS = 5000;

const ALLOWED_PROTOCOLS = new Set(['http:', 'https:']);

/** Rejected by name, before any DNS lookup. */
const LOCALHOST_NAMES = new Set(['localhost', '127.0.0.1', '::1', '0.0.0.0']);

const BLOCKED_IPV4_SUBNETS: ReadonlyArray<[string, number]> = [
  ['0.0.0.0', 8], // "this network"
  ['10.0.0.0', 8], // private
  ['100.64.0.0', 10], // carrier-grade NAT
  ['127.0.0.0', 8], // loopback
  ['169.254.0.0', 16], // link-local, includes cloud metadata 169.254.169.254
  ['172.16.0.0', 12], // private
  ['192.0.0.0', 24], // IETF protocol assignments
  ['192.0.2.0', 24], // TEST-NET-1
  ['192.168.0.0', 16], // private
  ['198.18.0.0', 15], // benchmarking
  ['198.51.100.0', 24], // TEST-NET-2
  ['203.0.113.0', 24], // TEST-NET-3
  ['224.0.0.0', 4], // multicast
  ['240.0.0.0', 4], // reserved, includes broadcast
];

/**
 * Non-public blocks inside global unicast. Everything outside 2000::/3
 * (unspecified, loopback, IPv4-compatible, NAT64, unique local, link-local,
 * multicast) is rejected before these are consulted.
 */
const BLOCKED_IPV6_SUBNETS: ReadonlyArray<[string, number]> = [
  ['2001::', 23], // IETF protocol assignments, includes Teredo
  ['2001:db8::', 32], // documentation
  ['2002::', 16], // 6to4, embeds an arbitrary IPv4 address
  ['3fff::', 20], // documentation
];

function createBlockList(): BlockList {
  const blockList = new BlockList();
  for (const [network, prefix] of BLOCKED_IPV4_SUBNETS) {
    blockList.addSubnet(network, prefix, 'ipv4');
  }
  for (const [network, prefix] of BLOCKED_IPV6_SUBNETS) {
    blockList.addSubnet(network, prefix, 'ipv6');
  }
  return blockList;
}

/** IPv6 global unicast, 2000::/3. Addresses outside it are never public. */
function createGlobalUnicastList(): BlockList {
  const list = new BlockList();
  list.addSubnet('2000::', 3, 'ipv6');
  return list;
}

const blockList = createBlockList();
const globalUnicast = createGlobalUnicastList();

/**
 * Unwrap IPv4-mapped IPv6 (::ffff:a.b.c.d or ::ffff:7f00:1) to plain IPv4,
 * so mapped loopback/private addresses hit the IPv4 rules.
 */
function unwrapMappedIPv4(ip: string): string {
  const lowered = ip.toLowerCase();
  if (!lowered.startsWith('::ffff:')) return ip;

  const tail = lowered.slice('::ffff:'.length);
  if (isIP(tail) === 4) return tail;

  const hex = /^([0-9a-f]{1,4}):([0-9a-f]{1,4})$/.exec(tail);
  if (!hex) return ip;
  const high = parseInt(hex[1], 16);
  const low = parseInt(hex[2], 16);
  return [high >> 8, high & 0xff, low >> 8, low & 0xff].join('.');
}

/**
 * Whether an IP literal is private, loopback, link-local, reserved or
 * multicast. Strings that are not IP addresses are treated as blocked.
 */
export function isBlockedAddress(ip: string): boolean {
  const candidate = unwrapMappedIPv4(ip.trim());
  const family = isIP(candidate);
  if (family === 4) return blockList.check(candidate, 'ipv4');
  if (family === 6) {
    return !globalUnicast.check(candidate, 'ipv6') || blockList.check(candidate, 'ipv6');
  }
  return true;
}

/** Resolve with the system resolver, bounded by DNS_TIMEOUT_MS. */
async function resolveAll(hostname: string): Promise<string[]> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('DNS resolution timed out')), DNS_TIMEOUT_MS);
  });
  try {
    const results = await Promise.race([dns.lookup(hostname, { all: true }), timeout]);
    return results.map((entry) => entry.address);
  } finally {
    clearTimeout(timer);
  }
}

type HostCheck = 'public' | 'private-address' | 'unresolvable';

async function classifyHost(hostname: string): Promise<HostCheck> {
  let addresses: string[];
  try {
    addresses = await resolveAll(hostname);
  } catch (error) {
    logger.debug({ hostname, error: String(error) }, 'DNS resolution failed, blocking host');
    return 'unresolvable';
  }

  if (addresses.length === 0) return 'unresolvable';

  const blocked = addresses.find(isBlockedAddress);
  if (blocked !== undefined) {
    logger.debug({ hostname, address: blocked }, 'Host resolves to a blocked address');
    return 'private-address';
  }
  return 'public';
}

/**
 * Fail-closed predicate: true when the hostname resolves to any non-public
 * address, or when it cannot be resolved at all.
 */
export async function isPrivateHost(hostname: string): Promise<boolean> {
  return (await classifyHost(hostname)) !== 'public';
}

/** Hostname as DNS sees it: lowercase, IPv6 brackets removed. */
function bareHostname(url: URL): string {
  const host = url.hostname.toLowerCase();
  return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;
}

/**
 * Validate a URL before connecting to it.
 * Must be called for the original URL and again for every redirect target.
 */
export async function validateUrl(url: string): Promise<void> {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new BlockedUrlError(url, 'no-host', `Could not extract hostname from URL: ${url}`);
  }

  if (!ALLOWED_PROTOCOLS.has(parsed.protocol)) {
    const scheme = parsed.protocol.replace(/:$/, '');
    throw new BlockedUrlError(url, 'scheme', `Only HTTP and HTTPS URLs are allowed, got: ${scheme}`);
  }

  const hostname = bareHostname(parsed);
  if (!hostname) {
    throw new BlockedUrlError(url, 'no-host', `Could not extract hostname from URL: ${url}`);
  }

  if (LOCALHOST_NAMES.has(hostname)) {
    throw new BlockedUrlError(url, 'localhost', `URLs targeting localhost are not allowed: ${url}`);
  }

  const check = await classifyHost(hostname);
  if (check === 'unresolvable') {
    throw new BlockedUrlError(
      url,
      'unresolvable',
      `URL hostname could not be resolved and is blocked: ${url}`
    );
  }
  if (check === 'private-address') {
    throw new BlockedUrlError(
      url,
      'private-address',
      `URL resolves to a private/reserved IP address and is blocked: ${url}`
    );
  }
}
