import { lookup } from "node:dns/promises"
import { isIP } from "node:net"

export interface ResolvedAddress {
  address: string
  family: number
}

export type HostResolver = (host: string) => Promise<ResolvedAddress[]>

export class UnsafeUrlError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "UnsafeUrlError"
  }
}

export class HostResolutionError extends Error {
  constructor(readonly host: string, readonly reason: unknown) {
    super(`Could not resolve host ${host}`)
    this.name = "HostResolutionError"
  }
}

interface CidrRange {
  prefix: number
  network: bigint
  mask: bigint
}

interface ParsedIp {
  family: 4 | 6
  value: bigint
  ipv4Mapped: bigint | null
}

const BLOCKED_HOSTNAMES = new Set(["localhost", "127.0.0.1", "::1", "0.0.0.0"])
const BLOCKED_HOST_SUFFIXES = [".local", ".internal", ".localhost", ".localdomain"]

const BLOCKED_IPV4_CIDRS = [
  "0.0.0.0/8",
  "10.0.0.0/8",
  "100.64.0.0/10",
  "127.0.0.0/8",
  "169.254.0.0/16",
  "172.16.0.0/12",
  "192.0.0.0/24",
  "192.0.2.0/24",
  "192.88.99.0/24",
  "192.168.0.0/16",
  "198.18.0.0/15",
  "198.51.100.0/24",
  "203.0.113.0/24",
  "224.0.0.0/4",
  "240.0.0.0/4",
]

const BLOCKED_IPV6_CIDRS = [
  "::/128",
  "::1/128",
  "64:ff9b::/96",
  "100::/64",
  "2001:db8::/32",
  "fc00::/7",
  "fe80::/10",
  "fec0::/10",
  "ff00::/8",
]

const IPV4_RANGES = BLOCKED_IPV4_CIDRS.map((cidr) => parseCidr(cidr, 4))
const IPV6_RANGES = BLOCKED_IPV6_CIDRS.map((cidr) => parseCidr(cidr, 6))

export const resolveAllAddresses: HostResolver = async (host) =>
  lookup(host, { all: true, verbatim: true })

/**
 * True for loopback, private, link-local, shared, documentation, multicast
 * and reserved addresses. Unparseable input counts as non-public.
 */
export function isPrivateIp(ip: string): boolean {
  const parsed = parseIp(ip)
  if (!parsed) {
    return true
  }

  const ipv4 = parsed.family === 4 ? parsed.value : parsed.ipv4Mapped
  if (ipv4 !== null) {
    return IPV4_RANGES.some((range) => cidrContains(range, ipv4))
  }

  return IPV6_RANGES.some((range) => cidrContains(range, parsed.value))
}

export async function assertPublicHost(
  host: string,
  resolver: HostResolver = resolveAllAddresses,
): Promise<void> {
  const bare = stripBrackets(host)
  if (isIP(bare) !== 0) {
    if (isPrivateIp(bare)) {
      throw new UnsafeUrlError(`Host ${bare} is not a public IP address`)
    }
    return
  }

  let addresses: ResolvedAddress[]
  try {
    addresses = await resolver(bare)
  } catch (error) {
    throw new HostResolutionError(bare, error)
  }

  if (addresses.length === 0) {
    throw new HostResolutionError(bare, null)
  }

  for (const resolved of addresses) {
    if (isPrivateIp(resolved.address)) {
      throw new UnsafeUrlError(`Resolved non-public address ${resolved.address} for host ${bare}`)
    }
  }
}

/**
 * Request-forgery guard run before any outbound fetch of a user-supplied URL.
 * Returns the parsed URL when it may be fetched.
 */
export async function assertSafeUrl(
  input: string | URL,
  resolver: HostResolver = resolveAllAddresses,
): Promise<URL> {
  let url: URL
  try {
    url = typeof input === "string" ? new URL(input) : input
  } catch {
    throw new UnsafeUrlError("Malformed URL")
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new UnsafeUrlError("Only http and https URLs are allowed")
  }

  const hostname = stripBrackets(url.hostname).toLowerCase().replace(/\.+$/, "")
  if (!hostname) {
    throw new UnsafeUrlError("URL has no hostname")
  }

  if (BLOCKED_HOSTNAMES.has(hostname)) {
    throw new UnsafeUrlError(`Local host ${hostname} is not allowed`)
  }

  if (BLOCKED_HOST_SUFFIXES.some((suffix) => hostname.endsWith(suffix))) {
    throw new UnsafeUrlError(`Internal domain ${hostname} is not allowed`)
  }

  await assertPublicHost(hostname, resolver)
  return url
}

function stripBrackets(host: string): string {
  return host.startsWith("[") && host.endsWith("]") ? host.slice(1, -1) : host
}

function parseIp(input: string): ParsedIp | null {
  const family = isIP(input)
  if (family === 4) {
    const value = parseIpv4(input)
    return value === null ? null : { family: 4, value, ipv4Mapped: null }
  }

  if (family === 6) {
    const value = parseIpv6(input)
    if (value === null) {
      return null
    }
    const ipv4Mapped = value >> 32n === 0xffffn ? value & 0xffff_ffffn : null
    return { family: 6, value, ipv4Mapped }
  }

  return null
}

function parseCidr(value: string, expectedFamily: 4 | 6): CidrRange {
  const [ip, prefixRaw] = value.split("/")
  if (!ip || !prefixRaw) {
    throw new Error(`Invalid CIDR range: ${value}`)
  }

  const prefix = Number.parseInt(prefixRaw, 10)
  const parsed = parseIp(ip)
  if (!parsed || parsed.family !== expectedFamily) {
    throw new Error(`Invalid CIDR base address: ${value}`)
  }

  const width = expectedFamily === 4 ? 32 : 128
  if (!Number.isInteger(prefix) || prefix < 0 || prefix > width) {
    throw new Error(`CIDR prefix out of range: ${value}`)
  }

  const mask = prefix === 0 ? 0n : ((1n << BigInt(prefix)) - 1n) << BigInt(width - prefix)
  return { prefix, network: parsed.value & mask, mask }
}

function cidrContains(range: CidrRange, value: bigint): boolean {
  return range.prefix === 0 || (value & range.mask) === range.network
}

function parseIpv4(ip: string): bigint | null {
  const parts = ip.split(".")
  if (parts.length !== 4) {
    return null
  }

  let value = 0n
  for (const part of parts) {
    if (!/^\d{1,3}$/.test(part)) {
      return null
    }
    const octet = Number.parseInt(part, 10)
    if (octet > 255) {
      return null
    }
    value = (value << 8n) | BigInt(octet)
  }

  return value
}

function parseIpv6(ip: string): bigint | null {
  const normalized = ip.split("%")[0]?.toLowerCase() ?? ""
  if (!normalized) {
    return null
  }

  const halves = normalized.split("::")
  if (halves.length > 2) {
    return null
  }

  const left = expandGroups(halves[0] ? halves[0].split(":") : [])
  const right = expandGroups(halves[1] ? halves[1].split(":") : [])
  if (!left || !right) {
    return null
  }

  const groups =
    halves.length === 2
      ? [...left, ...new Array<number>(8 - left.length - right.length).fill(0), ...right]
      : left

  if (groups.length !== 8) {
    return null
  }

  return groups.reduce((acc, group) => (acc << 16n) | BigInt(group), 0n)
}

function expandGroups(parts: string[]): number[] | null {
  const groups: number[] = []
  for (const [index, part] of parts.entries()) {
    if (!part) {
      return null
    }

    if (part.includes(".")) {
      const ipv4 = index === parts.length - 1 ? parseIpv4(part) : null
      if (ipv4 === null) {
        return null
      }
      groups.push(Number((ipv4 >> 16n) & 0xffffn), Number(ipv4 & 0xffffn))
      continue
    }

    if (!/^[0-9a-f]{1,4}$/i.test(part)) {
      return null
    }
    groups.push(Number.parseInt(part, 16))
  }

  return groups
}
