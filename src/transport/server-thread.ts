/**
 * ServerThread: keeps a Server receiving in the background.
 *
 * Node runs handlers on one event loop, so this is an async loop rather
 * than an OS thread: it awaits server.receive(pollMs) until stopped.
 * Handlers are not awaited by the loop, so a handler may call stop() on
 * the thread that is running it; the loop ends after the current packet.
 */

import { errorMessage } from '../errors';
import { getLogger } from '../logger';
import { Server, type ServerOptions } from './server';

const log = getLogger('ServerThread');

export const DEFAULT_POLL_MS = 100;

export interface ServerThreadOptions {
  /** How long each receive() waits before re-checking the running flag */
  pollMs?: number;
}

export class ServerThread {
  private running = false;
  private loop: Promise<void> | null = null;
  private starting: Promise<void> | null = null;
  private readonly pollMs: number;

  constructor(readonly server: Server, options: ServerThreadOptions = {}) {
    this.pollMs = options.pollMs ?? DEFAULT_POLL_MS;
  }

  static fromUrl(url: string, options: ServerThreadOptions = {}, serverOptions: Omit<ServerOptions, 'host'> = {}): ServerThread {
    return new ServerThread(Server.fromUrl(url, serverOptions), options);
  }

  static multicast(
    group: string,
    port: number,
    options: ServerThreadOptions = {},
    serverOptions: Omit<ServerOptions, 'host' | 'multicastGroup'> = {},
  ): ServerThread {
    return new ServerThread(Server.multicast(group, port, serverOptions), options);
  }

  /** Start the server if needed, then begin receiving. Overlapping calls share one start. */
  start(): Promise<void> {
    if (this.running) return Promise.resolve();
    if (!this.starting) {
      this.starting = this.begin().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  /** Resolves once the loop has exited; the server stays open */
  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.running = false;
    this.loop = null;
    this.server.interrupt();
    await loop;
    log.debug({ url: this.server.url() }, 'Receive loop stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  private async begin(): Promise<void> {
    if (!this.server.isListening()) {
      await this.server.start();
    }
    this.running = true;
    this.loop = this.run();
    log.debug({ url: this.server.url() }, 'Receive loop started');
  }

  private async run(): Promise<void> {
    while (this.running && this.server.isListening()) {
      try {
        await this.server.receive(this.pollMs);
      } catch (err) {
        log.error({ error: errorMessage(err) }, 'Receive failed');
      }
    }
    this.running = false;
  }
}
