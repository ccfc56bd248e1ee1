import * as fs from 'fs';
import { Server, ServerGroup } from '../classes/server';
import { DEFAULT_READY_TIMEOUT_MS } from '../classes/connection-manager';
import { ServerGroupOptions, ServerOptions } from '../interfaces';
import { HostKeyPolicy } from './host-key';
import {
  ValidationError,
  sanitizeFingerprint,
  sanitizeNumber,
  sanitizeSSHHost,
  sanitizeSSHKeyPath,
  sanitizeSSHUsername,
  sanitizeServerName,
} from './sanitization';

/**
 * Connection flags shared by every command. Each one falls back to an
 * environment variable (see .env.example).
 */
export interface ConnectionCliOptions {
  name?: string;
  host?: string;
  port?: string;
  username?: string;
  password?: string;
  privateKey?: string;
  passphrase?: string;
  sudoPassword?: string;
  timeout?: string;
  hostFingerprint?: string;
}

type Env = Record<string, string | undefined>;

/**
 * @description Builds a validated server from flags, falling back to SSH_* environment variables.
 */
export function resolveServer(
  options: ConnectionCliOptions,
  env: Env = process.env
): Server {
  const host = options.host || env.SSH_HOST;
  const username = options.username || env.SSH_USERNAME;

  if (!host || !username) {
    throw new ValidationError(
      'Host and username are required. Provide them via options or environment variables (SSH_HOST, SSH_USERNAME)'
    );
  }

  const name = options.name || env.SSH_NAME;
  const password = options.password || env.SSH_PASSWORD;
  const privateKeyPath = options.privateKey || env.SSH_PRIVATE_KEY;

  if (!password && !privateKeyPath) {
    throw new ValidationError(
      'Either --password or --private-key must be provided (or SSH_PASSWORD/SSH_PRIVATE_KEY environment variables)'
    );
  }

  return new Server({
    name: name ? sanitizeServerName(name) : undefined,
    address: sanitizeSSHHost(host),
    port: sanitizeNumber(options.port || env.SSH_PORT || '22', 'port', 1, 65535),
    user: sanitizeSSHUsername(username),
    password,
    privateKeyPath: privateKeyPath ? sanitizeSSHKeyPath(privateKeyPath) : undefined,
    passphrase: options.passphrase || env.SSH_PASSPHRASE,
    sudoPassword: options.sudoPassword || env.SSH_SUDO_PASSWORD,
  });
}

/**
 * @description Pins the host key when a fingerprint is configured, accepts any host otherwise.
 */
export function resolveHostKeyPolicy(
  options: ConnectionCliOptions,
  env: Env = process.env
): HostKeyPolicy {
  const fingerprint = options.hostFingerprint || env.SSH_HOST_FINGERPRINT;
  if (!fingerprint) {
    return { kind: 'accept-any' };
  }
  return { kind: 'fingerprint', fingerprint: sanitizeFingerprint(fingerprint) };
}

export function resolveReadyTimeout(
  options: ConnectionCliOptions,
  env: Env = process.env
): number {
  return sanitizeNumber(
    options.timeout || env.SSH_TIMEOUT || String(DEFAULT_READY_TIMEOUT_MS),
    'timeout',
    1000,
    120000
  );
}

/**
 * @description Reads a server group from a JSON file.
 */
export function loadServerGroup(filePath: string): ServerGroup {
  if (!fs.existsSync(filePath)) {
    throw new ValidationError(`Server group file not found: ${filePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ValidationError(`Server group file is not valid JSON: ${error}`);
  }

  return new ServerGroup(parseServerGroup(raw));
}

export function parseServerGroup(raw: unknown): ServerGroupOptions {
  if (!isRecord(raw)) {
    throw new ValidationError('Server group must be an object');
  }
  if (typeof raw.name !== 'string') {
    throw new ValidationError('Server group name is required');
  }
  if (!Array.isArray(raw.servers)) {
    throw new ValidationError('Server group must list its servers');
  }

  return {
    name: sanitizeServerName(raw.name),
    args: isRecord(raw.args) ? raw.args : undefined,
    servers: raw.servers.map((entry: unknown, index) =>
      parseServerEntry(entry, index)
    ),
  };
}

function parseServerEntry(entry: unknown, index: number): ServerOptions {
  if (!isRecord(entry)) {
    throw new ValidationError(`Server ${index} must be an object`);
  }
  const fields: Record<string, unknown> = entry;

  const text = (key: string): string | undefined => {
    const value = fields[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
      throw new ValidationError(`Server ${index}: ${key} must be a string`);
    }
    return value;
  };

  const host = text('host');
  const username = text('username');
  if (!host || !username) {
    throw new ValidationError(`Server ${index}: host and username are required`);
  }

  const name = text('name');
  const port = typeof fields.port === 'number' ? fields.port : undefined;
  if (fields.port !== undefined && port === undefined) {
    throw new ValidationError(`Server ${index}: port must be a number`);
  }

  return {
    name: name ? sanitizeServerName(name) : undefined,
    address: sanitizeSSHHost(host),
    port,
    user: sanitizeSSHUsername(username),
    password: text('password'),
    privateKeyPath: text('privateKeyPath'),
    passphrase: text('passphrase'),
    sudoPassword: text('sudoPassword'),
    args: isRecord(fields.args) ? fields.args : undefined,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
