import { DEFAULT_PORT } from "./constants.js";
import { AddressError } from "./errors.js";

export interface ServerAddress {
  host: string;
  port: number;
}

function parsePort(address: string, raw: string): number {
  if (!/^\d+$/.test(raw)) throw new AddressError(address, `port "${raw}" is not a number`);
  const port = parseInt(raw, 10);
  if (port <= 0 || port > 65535) throw new AddressError(address, `port ${port} is out of range`);
  return port;
}

/**
 * Parse a server address of the form `host[:port]` (IPv6 as `[addr][:port]`).
 * The port defaults to 27017. Throws AddressError for anything malformed.
 */
export function parseAddress(address: string): ServerAddress {
  const input = address.trim();
  if (!input) throw new AddressError(address, "host is empty");

  if (input.startsWith("[")) {
    const close = input.indexOf("]");
    if (close === -1) throw new AddressError(address, "missing closing bracket");
    const host = input.slice(1, close);
    if (!host) throw new AddressError(address, "host is empty");
    const rest = input.slice(close + 1);
    if (!rest) return { host, port: DEFAULT_PORT };
    if (!rest.startsWith(":")) throw new AddressError(address, "unexpected characters after host");
    return { host, port: parsePort(address, rest.slice(1)) };
  }

  const colon = input.indexOf(":");
  if (colon === -1) return { host: input, port: DEFAULT_PORT };
  if (input.indexOf(":", colon + 1) !== -1) {
    throw new AddressError(address, "IPv6 hosts must be written in brackets");
  }
  const host = input.slice(0, colon);
  if (!host) throw new AddressError(address, "host is empty");
  return { host, port: parsePort(address, input.slice(colon + 1)) };
}

export function formatAddress(address: ServerAddress): string {
  const host = address.host.includes(":") ? `[${address.host}]` : address.host;
  return `${host}:${address.port}`;
}
