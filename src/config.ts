/**
 * Configuration loader
 *
 * Reads a YAML file declaring OSC servers, send targets and logging:
 *
 *   logging:
 *     level: debug
 *   servers:
 *     - protocol: udp
 *       port: 9000
 *     - protocol: udp
 *       port: 9002
 *       multicastGroup: 239.255.0.1
 *     - protocol: unix
 *       path: /tmp/osc.sock
 *   targets:
 *     - url: osc.tcp://127.0.0.1:9001/
 *       noDelay: true
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse } from 'yaml';
import { ZodError } from 'zod';
import { type OscConfigOutput, formatZodError, validateConfig } from './config-schema';
import { errorMessage } from './errors';
import { getLogger, initLogger } from './logger';
import { Address } from './transport/address';
import { Server } from './transport/server';

const log = getLogger('Config');

export type Config = OscConfigOutput;

export const DEFAULT_CONFIG_FILE = 'osc.yml';

export function defaultConfig(): Config {
  return {
    logging: { level: 'info' },
    servers: [],
    targets: [],
  };
}

/**
 * Load and validate config from YAML, then apply its logging section.
 * A missing file yields the defaults; a present but invalid one throws.
 */
export function loadConfig(configPath?: string): Config {
  const resolvedPath = configPath ?? path.join(process.cwd(), DEFAULT_CONFIG_FILE);

  if (!fs.existsSync(resolvedPath)) {
    log.info({ path: resolvedPath }, 'No config file found, using defaults');
    return defaultConfig();
  }

  const config = parseConfig(fs.readFileSync(resolvedPath, 'utf-8'), resolvedPath);
  initLogger(config.logging);
  log.info(
    { path: resolvedPath, servers: config.servers.length, targets: config.targets.length },
    'Config loaded',
  );
  return config;
}

/** Parse and validate YAML text; `source` names it in error messages */
export function parseConfig(text: string, source = 'config'): Config {
  let data: unknown;
  try {
    data = parse(text);
  } catch (error) {
    throw new Error(`[Config] Invalid YAML in ${source}: ${errorMessage(error)}`);
  }

  // An empty document means "all defaults"
  if (data === null || data === undefined) {
    data = {};
  }

  try {
    return validateConfig(data);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new Error(`[Config] Validation failed:\n${formatZodError(error)}`);
    }
    throw error;
  }
}

/** Build (unstarted) servers for every configured endpoint */
export function createServers(config: Config): Server[] {
  return config.servers.map((s) => {
    const options = { maxMessageSize: s.maxMessageSize, queueCapacity: s.queueCapacity };
    if (s.protocol === 'unix') {
      return new Server(s.path, 'unix', options);
    }
    if (s.protocol === 'udp' && s.multicastGroup !== undefined) {
      return Server.multicast(s.multicastGroup, s.port, { ...options, multicastInterface: s.multicastInterface });
    }
    return new Server(s.port, s.protocol, { ...options, host: s.host });
  });
}

/** Build (unopened) addresses for every configured target */
export function createAddresses(config: Config): Address[] {
  return config.targets.map((t) =>
    Address.fromUrl(t.url, {
      ttl: t.ttl,
      noDelay: t.noDelay,
      timeoutMs: t.timeoutMs,
      maxMessageSize: t.maxMessageSize,
    }),
  );
}
