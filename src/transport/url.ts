/**
 * OSC transport URLs
 *
 *   osc.udp://host:port/
 *   osc.tcp://host:port/
 *   osc.unix:///path/to/socket/
 *
 * IPv6 hosts are written in brackets: osc.udp://[::1]:9000/
 */

import * as net from 'net';
import { OscError } from '../errors';

export type Protocol = 'udp' | 'tcp' | 'unix';

export const PROTOCOLS: readonly Protocol[] = ['udp', 'tcp', 'unix'];

export type Endpoint =
  | { protocol: 'udp' | 'tcp'; host: string; port: number }
  | { protocol: 'unix'; path: string };

const URL_PATTERN = /^osc\.([a-z]+):\/\/(.*)$/;
const HOST_PORT_PATTERN = /^(\[[^\]]+\]|[^:/[\]]+):(\d+)\/?$/;

export function isProtocol(value: string): value is Protocol {
  return PROTOCOLS.some((p) => p === value);
}

export function isStreamProtocol(protocol: Protocol): boolean {
  return protocol !== 'udp';
}

/** IPv4 224.0.0.0/4 or IPv6 ff00::/8 */
export function isMulticastAddress(host: string): boolean {
  if (net.isIPv4(host)) {
    const first = Number(host.split('.')[0]);
    return first >= 224 && first <= 239;
  }
  return net.isIPv6(host) && host.toLowerCase().startsWith('ff');
}

/** Loopback address to reach a server bound to a wildcard host */
export function reachableHost(host: string): string {
  if (host === '0.0.0.0') return '127.0.0.1';
  if (host === '::') return '::1';
  return host;
}

export function formatUrl(endpoint: Endpoint): string {
  if (endpoint.protocol === 'unix') {
    const path = endpoint.path.endsWith('/') ? endpoint.path : `${endpoint.path}/`;
    return `osc.unix://${path}`;
  }
  const host = endpoint.host.includes(':') ? `[${endpoint.host}]` : endpoint.host;
  return `osc.${endpoint.protocol}://${host}:${endpoint.port}/`;
}

export function parseUrl(url: string): Endpoint {
  const match = URL_PATTERN.exec(url.trim());
  if (!match) {
    throw new OscError('AddressError', `Not an OSC URL: ${JSON.stringify(url)}`, { url });
  }
  const [, protocol, rest] = match;
  if (!isProtocol(protocol)) {
    throw new OscError('AddressError', `Unsupported OSC protocol '${protocol}' in ${url}`, { url, protocol });
  }

  if (protocol === 'unix') {
    // osc.unix:///tmp/sock/ -> /tmp/sock
    const path = rest.length > 1 && rest.endsWith('/') ? rest.slice(0, -1) : rest;
    if (!path.startsWith('/') && !path.startsWith('.')) {
      throw new OscError('AddressError', `Unix socket URL needs a path: ${url}`, { url });
    }
    return { protocol, path };
  }

  const hostPort = HOST_PORT_PATTERN.exec(rest);
  if (!hostPort) {
    throw new OscError('AddressError', `Expected host:port in ${url}`, { url });
  }
  const host = hostPort[1].startsWith('[') ? hostPort[1].slice(1, -1) : hostPort[1];
  const port = Number(hostPort[2]);
  if (port > 65535) {
    throw new OscError('AddressError', `Port out of range in ${url}`, { url, port });
  }
  return { protocol, host, port };
}
