import { isIP } from "net";
import { InvalidAddressError } from "../errors";

export interface SocketAddress {
  host: string;
  port: number;
}

/**
 * Parses `ip:port` or `[ipv6]:port`. Host names are not resolved.
 */
export function parseSocketAddress(input: string): SocketAddress {
  const text = input.trim();
  const match = /^(?:\[([^\]]+)\]|([^:]+)):(\d{1,5})$/.exec(text);
  if (!match) {
    throw new InvalidAddressError(input);
  }

  const host = match[1] ?? match[2];
  const port = Number(match[3]);
  const family = isIP(host);
  // Bracketed hosts must be IPv6, bare hosts must be IPv4.
  if (family === 0 || (match[1] !== undefined) !== (family === 6)) {
    throw new InvalidAddressError(input);
  }
  if (port > 65535) {
    throw new InvalidAddressError(input);
  }

  return { host, port };
}

export function formatSocketAddress(host: string, port: number): string {
  return isIP(host) === 6 ? `[${host}]:${port}` : `${host}:${port}`;
}
