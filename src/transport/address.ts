/**
 * Address: the sending side of an OSC connection.
 *
 *   udp   one unconnected datagram socket bound to an ephemeral port;
 *         every send carries the destination
 *   tcp   connects on the first send and keeps the connection; packets
 *         are length-prefix framed
 *   unix  same as tcp over a Unix domain socket path
 *
 * Usage:
 *   const target = Address.fromUrl('osc.udp://127.0.0.1:9000/');
 *   await target.send(new Message('/ping'));
 *   await target.close();
 */

import * as dgram from 'dgram';
import * as dns from 'dns';
import * as net from 'net';
import { Bundle } from '../bundle';
import { OscError, errorMessage } from '../errors';
import { getLogger } from '../logger';
import type { Packet } from '../packet';
import { toBuffer } from '../wire';
import { DEFAULT_MAX_FRAME_LENGTH, sendFramed } from './frame-codec';
import { type TransportStats, createTransportStats, recordError, recordSent } from './transport-stats';
import { type Endpoint, type Protocol, formatUrl, parseUrl } from './url';

const log = getLogger('Address');

/** Largest payload a single IPv4 UDP datagram can carry */
export const MAX_UDP_PAYLOAD = 65507;

export interface AddressOptions {
  /** Defaults to MAX_UDP_PAYLOAD for UDP and 64 KiB for streams */
  maxMessageSize?: number;
  /** Multicast TTL for UDP */
  ttl?: number;
  noDelay?: boolean;
  /** Idle timeout for stream connections; 0 disables */
  timeoutMs?: number;
}

export class Address {
  readonly endpoint: Endpoint;

  private maxMessageSize: number;
  private ttl: number | undefined;
  private noDelay: boolean;
  private timeoutMs: number;

  private resolvedHost: string | null = null;
  private udpSocket: dgram.Socket | null = null;
  private stream: net.Socket | null = null;
  private connecting: Promise<net.Socket> | null = null;
  private opening: Promise<void> | null = null;
  private stats: TransportStats;

  /** For 'unix', `host` is the socket path and `port` is ignored */
  constructor(host: string, port: number, protocol: Protocol = 'udp', options: AddressOptions = {}) {
    if (protocol === 'unix') {
      this.endpoint = { protocol, path: host };
    } else {
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new OscError('AddressError', `Invalid port ${port} for ${host}`, { host, port });
      }
      if (host.length === 0) {
        throw new OscError('AddressError', 'Host must not be empty', { port });
      }
      this.endpoint = { protocol, host, port };
    }

    if (protocol === 'unix' && process.platform === 'win32') {
      throw new OscError('NotImplemented', 'Unix domain sockets are not supported on Windows', { path: host });
    }

    this.maxMessageSize = options.maxMessageSize ?? (protocol === 'udp' ? MAX_UDP_PAYLOAD : DEFAULT_MAX_FRAME_LENGTH);
    this.ttl = options.ttl === undefined ? undefined : clampTTL(options.ttl);
    this.noDelay = options.noDelay ?? true;
    this.timeoutMs = options.timeoutMs ?? 0;
    this.stats = createTransportStats(protocol, this.url());
  }

  static unix(path: string, options: AddressOptions = {}): Address {
    return new Address(path, 0, 'unix', options);
  }

  static fromUrl(url: string, options: AddressOptions = {}): Address {
    const endpoint = parseUrl(url);
    if (endpoint.protocol === 'unix') return Address.unix(endpoint.path, options);
    return new Address(endpoint.host, endpoint.port, endpoint.protocol, options);
  }

  get protocol(): Protocol {
    return this.endpoint.protocol;
  }

  url(): string {
    return formatUrl(this.endpoint);
  }

  /**
   * Resolve the host and, for UDP, bind the sending socket.
   * Stream protocols connect lazily on the first send. Safe to call twice.
   */
  open(): Promise<void> {
    if (!this.opening) {
      this.opening = this.doOpen().catch((err: unknown) => {
        this.opening = null;
        throw err;
      });
    }
    return this.opening;
  }

  /** Serialize (unless already bytes), check the size limit and send */
  async send(packet: Packet | Uint8Array): Promise<void> {
    const payload = packet instanceof Uint8Array ? toBuffer(packet) : packet.serialize();
    if (payload.length > this.maxMessageSize) {
      throw this.tooLarge(packet, payload.length);
    }

    await this.open();

    try {
      if (this.endpoint.protocol === 'udp') {
        await this.sendDatagram(payload, this.endpoint.port);
      } else {
        const socket = await this.connect();
        await sendFramed(socket, payload);
      }
    } catch (err) {
      recordError(this.stats, errorMessage(err));
      throw err;
    }
    recordSent(this.stats, payload.length);
  }

  /**
   * UDP only. Hop limit for multicast datagrams (IP_MULTICAST_TTL), clamped
   * to 1..255. Returns false for stream protocols.
   */
  setTTL(ttl: number): boolean {
    if (this.endpoint.protocol !== 'udp') return false;
    this.ttl = clampTTL(ttl);
    if (this.udpSocket) this.udpSocket.setMulticastTTL(this.ttl);
    return true;
  }

  /** TCP only. Returns false for other protocols. */
  setNoDelay(noDelay: boolean): boolean {
    if (this.endpoint.protocol !== 'tcp') return false;
    this.noDelay = noDelay;
    if (this.stream) this.stream.setNoDelay(noDelay);
    return true;
  }

  /** Idle timeout for stream connections; recorded but unused for UDP */
  setTimeout(timeoutMs: number): void {
    if (!Number.isFinite(timeoutMs) || timeoutMs < 0) {
      throw new OscError('InvalidArgument', `Timeout must be a non-negative number, got ${timeoutMs}`);
    }
    this.timeoutMs = timeoutMs;
    if (this.stream) this.stream.setTimeout(timeoutMs);
  }

  getTimeout(): number {
    return this.timeoutMs;
  }

  getTTL(): number | undefined {
    return this.ttl;
  }

  getMaxMessageSize(): number {
    return this.maxMessageSize;
  }

  setMaxMessageSize(size: number): void {
    if (!Number.isInteger(size) || size < 1) {
      throw new OscError('InvalidArgument', `Max message size must be a positive integer, got ${size}`);
    }
    this.maxMessageSize = size;
  }

  isConnected(): boolean {
    return this.stats.connected;
  }

  getStats(): TransportStats {
    return { ...this.stats };
  }

  /** A fresh Address to the same endpoint with the same settings */
  clone(): Address {
    const options: AddressOptions = {
      maxMessageSize: this.maxMessageSize,
      ttl: this.ttl,
      noDelay: this.noDelay,
      timeoutMs: this.timeoutMs,
    };
    if (this.endpoint.protocol === 'unix') return Address.unix(this.endpoint.path, options);
    return new Address(this.endpoint.host, this.endpoint.port, this.endpoint.protocol, options);
  }

  async close(): Promise<void> {
    const udp = this.udpSocket;
    const stream = this.stream;
    this.udpSocket = null;
    this.stream = null;
    this.opening = null;
    this.stats.connected = false;

    if (udp) {
      await new Promise<void>((resolve) => udp.close(() => resolve()));
    }
    if (stream && !stream.destroyed) {
      await new Promise<void>((resolve) => {
        stream.once('close', () => resolve());
        stream.end(() => stream.destroy());
      });
    }
  }

  // --- Internals ---

  private async doOpen(): Promise<void> {
    const endpoint = this.endpoint;
    if (endpoint.protocol === 'unix') return;

    let family: number;
    try {
      const result = await dns.promises.lookup(endpoint.host);
      this.resolvedHost = result.address;
      family = result.family;
    } catch (err) {
      throw new OscError('AddressError', `Cannot resolve host ${endpoint.host}: ${errorMessage(err)}`, {
        host: endpoint.host,
        port: endpoint.port,
      }, { cause: err });
    }

    if (endpoint.protocol === 'udp') {
      this.udpSocket = await this.bindUdp(family === 6 ? 'udp6' : 'udp4');
    }
  }

  private bindUdp(type: dgram.SocketType): Promise<dgram.Socket> {
    const socket = dgram.createSocket(type);
    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        socket.close();
        reject(new OscError('SocketError', `Cannot bind UDP socket: ${err.message}`, { url: this.url() }, { cause: err }));
      };
      socket.once('error', onError);
      socket.bind(0, () => {
        socket.off('error', onError);
        socket.on('error', (err: Error) => {
          recordError(this.stats, err.message);
          log.warn({ url: this.url(), error: err.message }, 'UDP socket error');
        });
        if (this.ttl !== undefined) socket.setMulticastTTL(this.ttl);
        this.stats.connected = true;
        resolve(socket);
      });
    });
  }

  private sendDatagram(payload: Buffer, port: number): Promise<void> {
    const socket = this.udpSocket;
    const host = this.resolvedHost;
    if (!socket || host === null) {
      return Promise.reject(new OscError('SocketError', 'UDP socket is not open', { url: this.url() }));
    }
    return new Promise((resolve, reject) => {
      socket.send(payload, port, host, (err) => {
        if (err) {
          reject(new OscError('NetworkError', `UDP send to ${this.url()} failed: ${err.message}`, {
            url: this.url(),
            size: payload.length,
          }, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  /** Reuse the live connection, or join the connect already in flight */
  private connect(): Promise<net.Socket> {
    if (this.stream && !this.stream.destroyed) return Promise.resolve(this.stream);
    if (!this.connecting) {
      this.connecting = this.openStream().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private openStream(): Promise<net.Socket> {
    const endpoint = this.endpoint;
    const socket = endpoint.protocol === 'unix'
      ? net.createConnection({ path: endpoint.path })
      : net.createConnection({ host: this.resolvedHost ?? endpoint.host, port: endpoint.port });

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        socket.destroy();
        recordError(this.stats, err.message);
        reject(new OscError('NetworkError', `Cannot connect to ${this.url()}: ${err.message}`, {
          url: this.url(),
        }, { cause: err }));
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        this.adoptStream(socket);
        resolve(socket);
      });
    });
  }

  private adoptStream(socket: net.Socket): void {
    this.stream = socket;
    this.stats.connected = true;
    if (this.endpoint.protocol === 'tcp') socket.setNoDelay(this.noDelay);
    if (this.timeoutMs > 0) socket.setTimeout(this.timeoutMs);

    socket.on('timeout', () => {
      log.debug({ url: this.url(), timeoutMs: this.timeoutMs }, 'Idle timeout, closing connection');
      socket.end();
    });
    socket.on('error', (err: Error) => {
      recordError(this.stats, err.message);
      log.warn({ url: this.url(), error: err.message }, 'Stream socket error');
    });
    socket.on('close', () => {
      if (this.stream === socket) {
        this.stream = null;
        this.stats.connected = false;
      }
    });
    // Replies are not read on the sending side
    socket.resume();
    log.debug({ url: this.url() }, 'Connected');
  }

  private tooLarge(packet: Packet | Uint8Array, size: number): OscError {
    const context = { url: this.url(), size, maxMessageSize: this.maxMessageSize };
    if (packet instanceof Bundle) {
      const index = packet.elements.findIndex((e) => e.serialize().length > this.maxMessageSize);
      if (index !== -1) {
        const element = packet.elements[index];
        const name = element instanceof Bundle ? 'nested bundle' : element.getPath();
        return new OscError(
          'MessageTooLarge',
          `Bundle element ${index} (${name}) exceeds max message size ${this.maxMessageSize}`,
          { ...context, element: index },
        );
      }
      return new OscError('MessageTooLarge', `Bundle of ${size} bytes exceeds max message size ${this.maxMessageSize}`, context);
    }
    const name = packet instanceof Uint8Array ? 'Packet' : `Message ${packet.getPath()}`;
    return new OscError('MessageTooLarge', `${name} of ${size} bytes exceeds max message size ${this.maxMessageSize}`, context);
  }
}

function clampTTL(ttl: number): number {
  return Math.min(255, Math.max(1, Math.round(ttl)));
}
