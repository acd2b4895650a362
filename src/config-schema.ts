/**
 * Config Schema Validation
 *
 * Zod schemas for the YAML file that declares OSC servers to listen on,
 * targets to send to, and logging.
 */

import { z } from 'zod';
import { MIN_PACKET_SIZE } from './packet';
import { isMulticastAddress, parseUrl } from './transport/url';

// --- Reusable Validators ---

const portSchema = z.number().int().min(0).max(65535);

const hostSchema = z.string().min(1).refine(
  (val) => {
    // Accept IP addresses, hostnames, and special values
    const ipv4 = /^(\d{1,3}\.){3}\d{1,3}$/;
    const ipv6 = /^[0-9a-fA-F:.]+$/;
    const hostname = /^[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?)*$/;
    return val === 'localhost' || val === '0.0.0.0' || ipv4.test(val)
      || (val.includes(':') && ipv6.test(val)) || hostname.test(val);
  },
  { message: 'Invalid host: must be IP address or hostname' }
);

const maxMessageSizeSchema = z.number().int().min(MIN_PACKET_SIZE);

function isOscUrl(val: string): boolean {
  try {
    parseUrl(val);
    return true;
  } catch {
    return false;
  }
}

const oscUrlSchema = z.string().refine(isOscUrl, {
  message: 'Invalid OSC URL: expected osc.udp://host:port/, osc.tcp://host:port/ or osc.unix:///path/',
});

// --- Servers ---

const baseServerSchema = z.object({
  maxMessageSize: maxMessageSizeSchema.optional(),
  queueCapacity: z.number().int().min(1).optional(),
});

const udpServerSchema = baseServerSchema.extend({
  protocol: z.literal('udp'),
  host: hostSchema.default('0.0.0.0'),
  port: portSchema,
  multicastGroup: z.string().refine(isMulticastAddress, { message: 'Invalid multicast group' }).optional(),
  multicastInterface: z.string().min(1).optional(),
});

const tcpServerSchema = baseServerSchema.extend({
  protocol: z.literal('tcp'),
  host: hostSchema.default('0.0.0.0'),
  port: portSchema,
});

const unixServerSchema = baseServerSchema.extend({
  protocol: z.literal('unix'),
  path: z.string().min(1),
});

const serverSchema = z.discriminatedUnion('protocol', [
  udpServerSchema,
  tcpServerSchema,
  unixServerSchema,
]);

// --- Targets ---

const targetSchema = z.object({
  url: oscUrlSchema,
  ttl: z.number().int().min(1).max(255).optional(),
  noDelay: z.boolean().optional(),
  timeoutMs: z.number().int().min(0).optional(),
  maxMessageSize: maxMessageSizeSchema.optional(),
});

// --- Logging Config ---

const loggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  pretty: z.boolean().optional(),
});

// --- Full Config Schema ---

export const oscConfigSchema = z.object({
  logging: loggingConfigSchema.default({}),
  servers: z.array(serverSchema).default([]),
  targets: z.array(targetSchema).default([]),
}).refine(
  (config) => {
    // Two servers cannot own the same socket (port 0 is always fresh)
    const keys = config.servers
      .filter((s) => s.protocol === 'unix' || s.port !== 0)
      .map((s) => (s.protocol === 'unix' ? `unix:${s.path}` : `${s.protocol}:${s.port}`));
    return new Set(keys).size === keys.length;
  },
  { message: 'Duplicate server endpoint detected', path: ['servers'] }
);

// --- Type Exports ---

export type OscConfigInput = z.input<typeof oscConfigSchema>;
export type OscConfigOutput = z.output<typeof oscConfigSchema>;
export type ServerConfig = z.output<typeof serverSchema>;
export type TargetConfig = z.output<typeof targetSchema>;
export type LoggingConfig = z.output<typeof loggingConfigSchema>;

/**
 * Validate a parsed config document
 */
export function validateConfig(data: unknown): OscConfigOutput {
  return oscConfigSchema.parse(data);
}

/**
 * Format Zod errors into readable messages
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'config';
    return `  - ${path}: ${issue.message}`;
  }).join('\n');
}
