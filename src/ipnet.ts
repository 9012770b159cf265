import { isIP } from "node:net";
import { format } from "node:util";
import { WgError } from "./errors.js";

function expandIPv6(addr: string): number[] {
  let head = addr, tail: number[] = [];
  const lastColon = addr.lastIndexOf(":"), last = addr.slice(lastColon + 1);
  if (last.includes(".")) {
    const octets = last.split(".").map(Number);
    tail = [(octets[0] << 8) | octets[1], (octets[2] << 8) | octets[3]];
    head = addr.slice(0, lastColon + 1);
    if (!head.endsWith("::")) head = head.slice(0, -1);
  }
  const [left = "", right] = head.split("::");
  const leftGroups = left.length > 0 ? left.split(":") : [], rightGroups = right ? right.split(":") : [];
  const missing = 8 - tail.length - leftGroups.length - rightGroups.length;
  return ([...leftGroups, ...Array<string>(right === undefined ? 0 : missing).fill("0"), ...rightGroups]).map(group => parseInt(group, 16)).concat(tail);
}

function compressIPv6(groups: number[]): string {
  if (groups.slice(0, 5).every(group => group === 0) && groups[5] === 0xffff) return format("::ffff:%d.%d.%d.%d", groups[6] >> 8, groups[6] & 0xff, groups[7] >> 8, groups[7] & 0xff);
  let bestStart = -1, bestLength = 0;
  for (let i = 0; i < groups.length;) {
    if (groups[i] !== 0) { i++; continue; }
    let end = i;
    while (end < groups.length && groups[end] === 0) end++;
    if (end - i > bestLength) {
      bestStart = i;
      bestLength = end - i;
    }
    i = end;
  }
  const hex = groups.map(group => group.toString(16));
  if (bestLength < 2) return hex.join(":");
  return hex.slice(0, bestStart).join(":").concat("::", hex.slice(bestStart + bestLength).join(":"));
}

/**
 * IP address with its network prefix, in CIDR notation (`10.0.0.1/24`, `fd00::1/64`).
 *
 * Host bits are kept as given, `10.0.0.1/24` is not truncated to `10.0.0.0/24`.
 */
export class IpNet {
  /** `0.0.0.0/0`, every IPv4 address */
  static readonly ANY_V4 = IpNet.parse("0.0.0.0/0");
  /** `::/0`, every IPv6 address */
  static readonly ANY_V6 = IpNet.parse("::/0");

  private constructor(readonly addr: string, readonly prefix: number, readonly family: 4 | 6) {}

  /**
   * Parse `address/prefix` or a bare address, bare addresses get `/32` (IPv4) or `/128` (IPv6).
   *
   * @throws WgError on malformed input
   */
  static parse(input: string): IpNet {
    if (typeof input !== "string") throw new WgError(format("invalid ip network: %O", input));
    const value = input.trim(), slash = value.indexOf("/");
    const addr = slash === -1 ? value : value.slice(0, slash), prefixStr = slash === -1 ? null : value.slice(slash + 1);
    const family = addr.includes("%") ? 0 : isIP(addr);
    if (family !== 4 && family !== 6) throw new WgError(format("invalid ip network: %O", input));
    const maxPrefix = family === 4 ? 32 : 128;
    if (prefixStr !== null && !(/^[0-9]{1,3}$/).test(prefixStr)) throw new WgError(format("invalid ip network: %O", input));
    const prefix = prefixStr === null ? maxPrefix : parseInt(prefixStr, 10);
    if (prefix > maxPrefix) throw new WgError(format("invalid ip network prefix: %O", input));
    return new IpNet(family === 4 ? addr.split(".").map(Number).join(".") : compressIPv6(expandIPv6(addr.toLowerCase())), prefix, family);
  }

  static from(input: IpNet | string): IpNet {
    return input instanceof IpNet ? input : IpNet.parse(input);
  }

  isIPv4() {
    return this.family === 4;
  }

  isIPv6() {
    return this.family === 6;
  }

  /** Single address network, `/32` or `/128` */
  isHost() {
    return this.prefix === (this.family === 4 ? 32 : 128);
  }

  /** Like `toString`, without the prefix for single address networks */
  hostString(): string {
    return this.isHost() ? this.addr : this.toString();
  }

  equals(other: IpNet): boolean {
    return this.family === other.family && this.prefix === other.prefix && this.addr === other.addr;
  }

  toString(): string {
    return this.addr.concat("/", String(this.prefix));
  }

  toJSON(): string {
    return this.toString();
  }
}
