/**
 * Server: the receiving side of OSC.
 *
 * Binds a UDP socket, or listens for TCP / Unix stream connections, and
 * collects incoming packets in one bounded queue. receive() takes the next
 * packet off the queue, decodes it and hands it to the Dispatcher.
 *
 * Every accepted stream connection gets its own FrameReader; frames from
 * all connections feed the same queue in arrival order.
 *
 * Failures that concern a single packet or connection (bad bytes, a peer
 * hanging up mid-frame, an oversized datagram) go to the error handler and
 * the server keeps running.
 *
 * Events:
 *   'listening'  the socket is bound
 *   'close'      the server has shut down
 */

import * as dgram from 'dgram';
import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as net from 'net';
import { type BundleHook, Dispatcher, type ErrorHandler, type MethodHandler } from '../dispatcher';
import { OscError, type OscErrorCode, errorMessage } from '../errors';
import { getLogger } from '../logger';
import { decodePacket } from '../packet';
import { DEFAULT_MAX_FRAME_LENGTH, FrameReader } from './frame-codec';
import { PacketQueue } from './packet-queue';
import { type TransportStats, createTransportStats, recordError, recordReceived } from './transport-stats';
import { type Endpoint, type Protocol, formatUrl, isMulticastAddress, parseUrl, reachableHost } from './url';

const log = getLogger('Server');

export const DEFAULT_QUEUE_CAPACITY = 1024;

export interface ServerOptions {
  /** Bind address for UDP/TCP; ignored for Unix sockets */
  host?: string;
  maxMessageSize?: number;
  /** Packets held before the oldest is dropped */
  queueCapacity?: number;
  /** UDP only: multicast group joined once bound */
  multicastGroup?: string;
  /** Local interface address used for the group membership */
  multicastInterface?: string;
}

type Waiter = (ready: boolean) => void;

export class Server extends EventEmitter {
  readonly protocol: Protocol;

  private readonly requestedPort: number;
  private readonly socketPath: string;
  private readonly host: string;
  private readonly maxMessageSize: number;
  private readonly multicastGroup: string | undefined;
  private readonly multicastInterface: string | undefined;
  private readonly dispatcher = new Dispatcher();
  private readonly queue: PacketQueue;
  private readonly connections = new Set<net.Socket>();
  private waiters: Waiter[] = [];

  private udpSocket: dgram.Socket | null = null;
  private netServer: net.Server | null = null;
  private boundPort = 0;
  private listening = false;
  private stats: TransportStats;

  /** `portOrPath` is a port for UDP/TCP (0 picks one) and a path for Unix */
  constructor(portOrPath: number | string, protocol: Protocol = 'udp', options: ServerOptions = {}) {
    super();
    this.protocol = protocol;
    this.host = options.host ?? '0.0.0.0';
    this.maxMessageSize = options.maxMessageSize ?? DEFAULT_MAX_FRAME_LENGTH;
    this.queue = new PacketQueue(options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);
    this.multicastGroup = options.multicastGroup;
    this.multicastInterface = options.multicastInterface;

    if (this.multicastGroup !== undefined) {
      if (protocol !== 'udp') {
        throw new OscError('AddressError', `Multicast needs UDP, not ${protocol}`, { group: this.multicastGroup });
      }
      if (!isMulticastAddress(this.multicastGroup)) {
        throw new OscError('AddressError', `${this.multicastGroup} is not a multicast address`, {
          group: this.multicastGroup,
        });
      }
    }

    if (protocol === 'unix') {
      if (process.platform === 'win32') {
        throw new OscError('NotImplemented', 'Unix domain sockets are not supported on Windows');
      }
      if (typeof portOrPath !== 'string' || portOrPath.length === 0) {
        throw new OscError('AddressError', 'Unix server needs a socket path');
      }
      this.socketPath = portOrPath;
      this.requestedPort = 0;
    } else {
      const port = typeof portOrPath === 'number' ? portOrPath : Number(portOrPath);
      if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new OscError('AddressError', `Invalid port ${String(portOrPath)}`, { port: String(portOrPath) });
      }
      this.socketPath = '';
      this.requestedPort = port;
    }

    this.stats = createTransportStats(protocol, this.url());
  }

  /** UDP server on every interface that joins `group` once started */
  static multicast(group: string, port: number, options: Omit<ServerOptions, 'host' | 'multicastGroup'> = {}): Server {
    return new Server(port, 'udp', { ...options, host: group.includes(':') ? '::' : '0.0.0.0', multicastGroup: group });
  }

  /** Server for an osc.udp / osc.tcp / osc.unix URL; the URL's host is the bind address */
  static fromUrl(url: string, options: Omit<ServerOptions, 'host'> = {}): Server {
    const endpoint = parseUrl(url);
    if (endpoint.protocol === 'unix') return new Server(endpoint.path, 'unix', options);
    return new Server(endpoint.port, endpoint.protocol, { ...options, host: endpoint.host });
  }

  // --- Lifecycle ---

  async start(): Promise<void> {
    if (this.listening) return;
    try {
      if (this.protocol === 'udp') {
        await this.bindUdp();
      } else {
        await this.listenStream();
      }
    } catch (err) {
      if (err instanceof OscError) throw err;
      throw new OscError('SocketError', `Cannot start ${this.protocol} server: ${errorMessage(err)}`, {
        url: this.url(),
      }, { cause: err });
    }
    this.listening = true;
    this.stats.endpoint = this.url();
    this.stats.connected = true;
    log.info({ url: this.url() }, 'OSC server listening');
    this.emit('listening');
  }

  isListening(): boolean {
    return this.listening;
  }

  async close(): Promise<void> {
    if (!this.listening) return;
    this.listening = false;
    this.stats.connected = false;
    this.interrupt();

    const udp = this.udpSocket;
    const server = this.netServer;
    this.udpSocket = null;
    this.netServer = null;

    if (udp) {
      await new Promise<void>((resolve) => udp.close(() => resolve()));
    }
    if (server) {
      for (const conn of this.connections) conn.destroy();
      this.connections.clear();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    }
    if (this.protocol === 'unix') {
      removeSocketFile(this.socketPath);
    }

    this.queue.clear();
    log.info({ url: this.url() }, 'OSC server closed');
    this.emit('close');
  }

  // --- Method registry (delegates to the Dispatcher) ---

  addMethod(pathPattern: string, typeSignature: string | null, handler: MethodHandler): number {
    return this.dispatcher.addMethod(pathPattern, typeSignature, handler);
  }

  addDefaultMethod(handler: MethodHandler): number {
    return this.dispatcher.addDefaultMethod(handler);
  }

  removeMethod(id: number): boolean {
    return this.dispatcher.removeMethod(id);
  }

  setBundleHandlers(onStart?: BundleHook, onEnd?: BundleHook): void {
    this.dispatcher.setBundleHandlers(onStart, onEnd);
  }

  setErrorHandler(handler: ErrorHandler): void {
    this.dispatcher.setErrorHandler(handler);
  }

  getDispatcher(): Dispatcher {
    return this.dispatcher;
  }

  // --- Receiving ---

  /**
   * Resolve true as soon as a packet is queued, false on timeout or
   * interrupt(). A missing or negative timeout waits indefinitely.
   */
  wait(timeoutMs?: number): Promise<boolean> {
    if (!this.queue.empty) return Promise.resolve(true);
    if (!this.listening) return Promise.resolve(false);

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const waiter: Waiter = (ready) => {
        if (timer) clearTimeout(timer);
        resolve(ready);
      };
      if (timeoutMs !== undefined && timeoutMs >= 0) {
        timer = setTimeout(() => {
          this.waiters = this.waiters.filter((w) => w !== waiter);
          resolve(false);
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Wait for one packet, decode and dispatch it.
   * Resolves true once it has been dispatched; false on timeout, interrupt,
   * or when the packet could not be decoded (reported to the error handler).
   */
  async receive(timeoutMs?: number): Promise<boolean> {
    const ready = await this.wait(timeoutMs);
    if (!ready) return false;

    const item = this.queue.shift();
    if (!item) return false;

    const result = decodePacket(item.data);
    if (!result.ok) {
      this.fail(result.error.code, result.error.message, item.source);
      return false;
    }

    this.dispatcher.dispatch(result.packet, item.source);
    return true;
  }

  hasPendingMessages(): boolean {
    return !this.queue.empty;
  }

  /** Wake every pending wait()/receive() with false */
  interrupt(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake(false);
  }

  // --- Introspection ---

  /** Bound port once started (the requested one before); 0 for Unix */
  port(): number {
    return this.listening ? this.boundPort : this.requestedPort;
  }

  url(): string {
    return formatUrl(this.endpoint());
  }

  getStats(): TransportStats {
    return { ...this.stats };
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  // --- Internals ---

  private endpoint(): Endpoint {
    if (this.protocol === 'unix') return { protocol: 'unix', path: this.socketPath };
    const host = this.multicastGroup ?? reachableHost(this.host);
    return { protocol: this.protocol, host, port: this.port() };
  }

  private bindUdp(): Promise<void> {
    const group = this.multicastGroup;
    // Several receivers on one host may join the same group and port
    const socket = dgram.createSocket({ type: this.host.includes(':') ? 'udp6' : 'udp4', reuseAddr: group !== undefined });

    socket.on('message', (data: Buffer, rinfo: dgram.RemoteInfo) => {
      const source = `${rinfo.address}:${rinfo.port}`;
      if (data.length > this.maxMessageSize) {
        this.fail('MessageTooLarge', `Dropped ${data.length}-byte datagram, max ${this.maxMessageSize}`, source);
        return;
      }
      this.enqueue(data, source);
    });

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        socket.close();
        reject(new OscError('SocketError', `Cannot bind UDP ${this.host}:${this.requestedPort}: ${err.message}`, {
          host: this.host,
          port: this.requestedPort,
        }, { cause: err }));
      };
      socket.once('error', onError);
      socket.bind(this.requestedPort, this.host, () => {
        socket.off('error', onError);
        if (group !== undefined) {
          try {
            socket.addMembership(group, this.multicastInterface);
          } catch (err) {
            socket.close();
            reject(new OscError('SocketError', `Cannot join multicast group ${group}: ${errorMessage(err)}`, {
              group,
              port: this.requestedPort,
            }, { cause: err }));
            return;
          }
          log.debug({ group, iface: this.multicastInterface }, 'Joined multicast group');
        }
        socket.on('error', (err: Error) => this.fail('SocketError', err.message, this.url()));
        this.udpSocket = socket;
        this.boundPort = socket.address().port;
        resolve();
      });
    });
  }

  private listenStream(): Promise<void> {
    if (this.protocol === 'unix') {
      removeSocketFile(this.socketPath);
    }

    const server = net.createServer((conn) => this.accept(conn));

    return new Promise((resolve, reject) => {
      const onError = (err: Error) => {
        reject(new OscError('SocketError', `Cannot listen on ${this.url()}: ${err.message}`, {
          url: this.url(),
        }, { cause: err }));
      };
      server.once('error', onError);
      const onListening = () => {
        server.off('error', onError);
        server.on('error', (err: Error) => this.fail('SocketError', err.message, this.url()));
        this.netServer = server;
        const address = server.address();
        this.boundPort = address !== null && typeof address === 'object' ? address.port : 0;
        resolve();
      };
      if (this.protocol === 'unix') {
        server.listen(this.socketPath, onListening);
      } else {
        server.listen(this.requestedPort, this.host, onListening);
      }
    });
  }

  private accept(conn: net.Socket): void {
    const source = this.protocol === 'unix'
      ? `unix:${this.socketPath}`
      : `${conn.remoteAddress ?? '?'}:${conn.remotePort ?? 0}`;
    const reader = new FrameReader({ maxLength: this.maxMessageSize });

    this.connections.add(conn);
    log.debug({ source }, 'Connection accepted');

    conn.on('data', (chunk: Buffer) => {
      let frames: Buffer[];
      try {
        frames = reader.feed(chunk);
      } catch (err) {
        const code: OscErrorCode = err instanceof OscError ? err.code : 'MalformedPacket';
        this.fail(code, `${errorMessage(err)}; closing connection`, source);
        conn.destroy();
        return;
      }
      for (const frame of frames) this.enqueue(frame, source);
    });

    conn.on('error', (err: Error) => {
      this.fail('NetworkError', `Connection error: ${err.message}`, source);
    });

    conn.on('close', () => {
      this.connections.delete(conn);
      if (reader.buffered > 0) {
        this.fail('NetworkError', `Connection closed mid-frame with ${reader.buffered} bytes pending`, source);
        reader.reset();
      } else {
        log.debug({ source }, 'Connection closed');
      }
    });
  }

  private enqueue(data: Buffer, source: string): void {
    recordReceived(this.stats, data.length);
    const evicted = this.queue.push(data, source);
    if (evicted) {
      this.fail('ServerError', `Receive queue full, dropped oldest packet from ${evicted.source}`, source);
    }
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake(true);
  }

  private fail(code: OscErrorCode, message: string, source: string): void {
    recordError(this.stats, message);
    this.dispatcher.reportError(code, message, source);
  }
}

/** Remove a leftover Unix socket file; refuse to touch anything else */
function removeSocketFile(path: string): void {
  if (!fs.existsSync(path)) return;
  if (!fs.statSync(path).isSocket()) {
    throw new OscError('SocketError', `Refusing to remove ${path}: not a socket`, { path });
  }
  fs.unlinkSync(path);
}
