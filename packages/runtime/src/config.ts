/**
 * Client configuration
 *
 * Explicit options win over a configuration file, which wins over the
 * environment.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import type { Severity } from '@carp/trace';

export interface ClientConfig {
  /** Module descriptor directories, root scope first */
  scope_paths?: string[];
  /** Trace output directory */
  trace_dir?: string;
  /** Enable file-based trace output */
  trace_to_file?: boolean;
  /** Events below this severity are not recorded */
  trace_min_severity?: Severity;
  /** Abort calls after this many milliseconds; 0 disables */
  request_timeout_ms?: number;
  /** Peers remembered by the fingerprint repository */
  fingerprint_capacity?: number;
  /** User-Agent header of outgoing requests */
  user_agent?: string;
}

export const DEFAULT_CLIENT_CONFIG: Required<ClientConfig> = {
  scope_paths: ['./schemas'],
  trace_dir: './traces',
  trace_to_file: false,
  trace_min_severity: 'info',
  request_timeout_ms: 30000,
  fingerprint_capacity: 1024,
  user_agent: 'carp-client/0.1.0',
};

const SEVERITIES: readonly Severity[] = ['debug', 'info', 'warn', 'error', 'critical'];

function isSeverity(value: unknown): value is Severity {
  return typeof value === 'string' && (SEVERITIES as readonly string[]).includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check a raw configuration object, returning the recognized settings.
 *
 * @throws Error listing every invalid setting
 */
export function validateClientConfig(raw: unknown, source = 'config'): ClientConfig {
  if (!isRecord(raw)) {
    throw new Error(`${source}: configuration must be an object`);
  }

  const errors: string[] = [];
  const config: ClientConfig = {};

  const { scope_paths, trace_dir, trace_to_file, trace_min_severity } = raw;
  const { request_timeout_ms, fingerprint_capacity, user_agent } = raw;

  if (scope_paths !== undefined) {
    if (Array.isArray(scope_paths) && scope_paths.every((p): p is string => typeof p === 'string')) {
      config.scope_paths = scope_paths;
    } else {
      errors.push('scope_paths must be a list of strings');
    }
  }
  if (trace_dir !== undefined) {
    if (typeof trace_dir === 'string') config.trace_dir = trace_dir;
    else errors.push('trace_dir must be a string');
  }
  if (trace_to_file !== undefined) {
    if (typeof trace_to_file === 'boolean') config.trace_to_file = trace_to_file;
    else errors.push('trace_to_file must be a boolean');
  }
  if (trace_min_severity !== undefined) {
    if (isSeverity(trace_min_severity)) config.trace_min_severity = trace_min_severity;
    else errors.push(`trace_min_severity must be one of ${SEVERITIES.join(', ')}`);
  }
  if (request_timeout_ms !== undefined) {
    if (typeof request_timeout_ms === 'number' && request_timeout_ms >= 0) {
      config.request_timeout_ms = request_timeout_ms;
    } else {
      errors.push('request_timeout_ms must be a non-negative number');
    }
  }
  if (fingerprint_capacity !== undefined) {
    if (typeof fingerprint_capacity === 'number' && Number.isInteger(fingerprint_capacity) &&
        fingerprint_capacity > 0) {
      config.fingerprint_capacity = fingerprint_capacity;
    } else {
      errors.push('fingerprint_capacity must be a positive integer');
    }
  }
  if (user_agent !== undefined) {
    if (typeof user_agent === 'string') config.user_agent = user_agent;
    else errors.push('user_agent must be a string');
  }

  if (errors.length > 0) {
    throw new Error(`${source}: ${errors.join('; ')}`);
  }
  return config;
}

/**
 * Load a JSON or YAML configuration file. Relative scope paths are taken
 * relative to the file.
 */
export async function loadClientConfig(file: string): Promise<ClientConfig> {
  const content = await fs.promises.readFile(file, 'utf-8');
  const raw: unknown = file.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  const config = validateClientConfig(raw, file);

  if (config.scope_paths) {
    const base = path.dirname(path.resolve(file));
    config.scope_paths = config.scope_paths.map(p => path.resolve(base, p));
  }
  return config;
}

/**
 * Read settings from `CARP_*` environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const config: ClientConfig = {};

  if (env.CARP_SCOPE_PATHS) {
    config.scope_paths = env.CARP_SCOPE_PATHS.split(',').map(p => p.trim()).filter(Boolean);
  }
  if (env.CARP_TRACE_DIR) {
    config.trace_dir = env.CARP_TRACE_DIR;
  }
  if (env.CARP_TRACE_TO_FILE) {
    config.trace_to_file = env.CARP_TRACE_TO_FILE === 'true' || env.CARP_TRACE_TO_FILE === '1';
  }
  if (env.CARP_REQUEST_TIMEOUT_MS) {
    const timeout = Number(env.CARP_REQUEST_TIMEOUT_MS);
    if (Number.isFinite(timeout) && timeout >= 0) {
      config.request_timeout_ms = timeout;
    }
  }

  return config;
}

/**
 * Merge configuration layers, later layers winning, over the defaults.
 */
export function resolveClientConfig(...layers: ClientConfig[]): Required<ClientConfig> {
  const merged: Required<ClientConfig> = { ...DEFAULT_CLIENT_CONFIG };
  for (const layer of layers) {
    merged.scope_paths = layer.scope_paths ?? merged.scope_paths;
    merged.trace_dir = layer.trace_dir ?? merged.trace_dir;
    merged.trace_to_file = layer.trace_to_file ?? merged.trace_to_file;
    merged.trace_min_severity = layer.trace_min_severity ?? merged.trace_min_severity;
    merged.request_timeout_ms = layer.request_timeout_ms ?? merged.request_timeout_ms;
    merged.fingerprint_capacity = layer.fingerprint_capacity ?? merged.fingerprint_capacity;
    merged.user_agent = layer.user_agent ?? merged.user_agent;
  }
  return merged;
}
