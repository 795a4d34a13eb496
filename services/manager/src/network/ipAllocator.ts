import { IpExhaustedError } from "../errors/vmmErrors.js";

const IPV4 = /^(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)(\.(25[0-5]|2[0-4]\d|1\d\d|[1-9]?\d)){3}$/;

export function isValidIpv4(ip: string): boolean {
  return IPV4.test(ip);
}

function octets(ip: string): [number, number, number, number] {
  const [a, b, c, d] = ip.split(".").map((part) => Number.parseInt(part, 10));
  return [a, b, c, d];
}

/** `a.b.c.0/24` for the network `ip` sits in. */
export function subnetOf(ip: string): string {
  const [a, b, c] = octets(ip);
  return `${a}.${b}.${c}.0/24`;
}

/** The gateway convention is the first host address of the /24. */
export function gatewayFor(ip: string): string {
  const [a, b, c] = octets(ip);
  return `${a}.${b}.${c}.1`;
}

/** Host addresses of the /24 in ascending order (.1 through .254). */
export function hostsOf(ip: string): string[] {
  const [a, b, c] = octets(ip);
  const hosts: string[] = [];
  for (let d = 1; d <= 254; d++) {
    hosts.push(`${a}.${b}.${c}.${d}`);
  }
  return hosts;
}

export interface IpAllocation {
  ipAddress: string;
  gateway: string;
  remapped: boolean;
}

/**
 * Keeps `requested` unless another active instance holds it or it is the gateway.
 * Otherwise takes the first host address of the /24 that is not the gateway, not the
 * requested address, and not in `inUse`.
 */
export function allocateIp(requested: string, inUse: ReadonlySet<string>): IpAllocation {
  const gateway = gatewayFor(requested);
  if (!inUse.has(requested) && requested !== gateway) {
    return { ipAddress: requested, gateway, remapped: false };
  }

  for (const candidate of hostsOf(requested)) {
    if (candidate === gateway) continue;
    if (candidate === requested) continue;
    if (inUse.has(candidate)) continue;
    return { ipAddress: candidate, gateway: gatewayFor(candidate), remapped: true };
  }

  throw new IpExhaustedError(subnetOf(requested));
}
