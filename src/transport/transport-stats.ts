/**
 * TransportStats: lightweight per-socket telemetry
 *
 * Updated by Address and Server as packets move; read with getStats().
 */

import type { Protocol } from './url';

export interface TransportStats {
  protocol: Protocol;
  endpoint: string;
  connected: boolean;
  packetsSent: number;
  bytesSent: number;
  packetsReceived: number;
  bytesReceived: number;
  errors: number;
  lastError: string | null;
  lastErrorAt: number | null;
  lastPacketAt: number | null;
}

export function createTransportStats(protocol: Protocol, endpoint: string): TransportStats {
  return {
    protocol,
    endpoint,
    connected: false,
    packetsSent: 0,
    bytesSent: 0,
    packetsReceived: 0,
    bytesReceived: 0,
    errors: 0,
    lastError: null,
    lastErrorAt: null,
    lastPacketAt: null,
  };
}

export function recordSent(stats: TransportStats, bytes: number, now = Date.now()): void {
  stats.packetsSent++;
  stats.bytesSent += bytes;
  stats.lastPacketAt = now;
}

export function recordReceived(stats: TransportStats, bytes: number, now = Date.now()): void {
  stats.packetsReceived++;
  stats.bytesReceived += bytes;
  stats.lastPacketAt = now;
}

export function recordError(stats: TransportStats, message: string, now = Date.now()): void {
  stats.errors++;
  stats.lastError = message;
  stats.lastErrorAt = now;
}
