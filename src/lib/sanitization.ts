import * as path from 'path';
import * as fs from 'fs';
import { isIP } from 'net';
import { describeCause } from './errors';
import { expandHomePath } from './filesystem';
import { parseFingerprint } from './host-key';

/**
 * Sanitization utilities for CLI input validation
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Validates and sanitizes server names
 */
export function sanitizeServerName(name: string): string {
  if (!name || typeof name !== 'string') {
    throw new ValidationError('Server name is required and must be a string');
  }

  const trimmed = name.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Server name cannot be empty');
  }

  if (trimmed.length > 100) {
    throw new ValidationError('Server name cannot exceed 100 characters');
  }

  // Allow alphanumeric, hyphens, underscores, and dots
  if (!/^[a-zA-Z0-9._-]+$/.test(trimmed)) {
    throw new ValidationError(
      'Server name can only contain letters, numbers, dots, hyphens, and underscores'
    );
  }

  return trimmed;
}

/**
 * Validates and sanitizes commands
 */
export function sanitizeCommand(command: string): string {
  if (!command || typeof command !== 'string') {
    throw new ValidationError('Command is required and must be a string');
  }

  const trimmed = command.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Command cannot be empty');
  }

  if (trimmed.length > 1000) {
    throw new ValidationError('Command cannot exceed 1000 characters');
  }

  // Check for dangerous patterns
  const dangerousPatterns = [
    /rm\s+-rf\s+\/(?!tmp|var\/tmp)/i, // Dangerous rm commands (except /tmp)
    /chmod\s+777/i, // Overly permissive chmod
    />\s*\/dev\/sd[a-z]/i, // Writing to disk devices
    /mkfs\./i, // Format filesystem
    /dd\s+.*of=/i, // Dangerous dd commands
    /:\(\)\{.*;\}/i, // Fork bomb pattern
  ];

  for (const pattern of dangerousPatterns) {
    if (pattern.test(trimmed)) {
      throw new ValidationError(
        'Command contains potentially dangerous operations'
      );
    }
  }

  return trimmed;
}

/**
 * Validates numeric inputs
 */
export function sanitizeNumber(
  value: string,
  fieldName: string,
  min?: number,
  max?: number
): number {
  if (!value || typeof value !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const num = parseInt(value, 10);

  if (isNaN(num)) {
    throw new ValidationError(`${fieldName} must be a valid number`);
  }

  if (min !== undefined && num < min) {
    throw new ValidationError(`${fieldName} must be at least ${min}`);
  }

  if (max !== undefined && num > max) {
    throw new ValidationError(`${fieldName} cannot exceed ${max}`);
  }

  return num;
}

/**
 * Validates and sanitizes local file paths
 */
export function sanitizeFilePath(filePath: string, fieldName: string): string {
  if (!filePath || typeof filePath !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = filePath.trim();

  if (trimmed.length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty`);
  }

  const resolved = path.resolve(expandHomePath(trimmed));

  if (resolved.length > 500) {
    throw new ValidationError(`${fieldName} path is too long`);
  }

  return resolved;
}

/**
 * Validates SSH key file path and permissions
 */
export function sanitizeSSHKeyPath(keyPath: string): string {
  const sanitized = sanitizeFilePath(keyPath, 'SSH key path');

  let stats: fs.Stats;
  try {
    stats = fs.statSync(sanitized);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ValidationError('SSH key file does not exist');
    }
    throw new ValidationError(`Cannot access SSH key file: ${error}`);
  }

  if (!stats.isFile()) {
    throw new ValidationError('SSH key path must point to a file');
  }

  // Check file permissions (should not be world-readable)
  const mode = stats.mode & parseInt('777', 8);
  if (mode & parseInt('044', 8)) {
    console.warn(
      'Warning: SSH key file is readable by others, consider changing permissions'
    );
  }

  return sanitized;
}

/**
 * Validates paths of files on the remote host
 */
export function sanitizeRemotePath(remotePath: string): string {
  if (!remotePath || typeof remotePath !== 'string') {
    throw new ValidationError('Remote path is required');
  }

  const trimmed = remotePath.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Remote path cannot be empty');
  }

  if (trimmed.length > 4096) {
    throw new ValidationError('Remote path is too long');
  }

  if (!path.posix.isAbsolute(trimmed)) {
    throw new ValidationError('Remote path must be an absolute path');
  }

  if (/[\x00-\x1F\x7F]/.test(trimmed)) {
    throw new ValidationError('Remote path contains invalid control characters');
  }

  return trimmed;
}

/**
 * Validates SSH hostnames/IPs
 */
export function sanitizeSSHHost(host: string): string {
  if (!host || typeof host !== 'string') {
    throw new ValidationError('SSH host is required');
  }

  const trimmed = host.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH host cannot be empty');
  }

  if (trimmed.length > 253) {
    throw new ValidationError('SSH host name is too long');
  }

  // Basic hostname/IP validation
  const hostnameRegex = /^[a-zA-Z0-9.-]+$/;
  const ipRegex =
    /^(?:(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\.){3}(?:25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)$/;

  // bracketless IPv6 literals such as ::1 or fe80::1
  if (
    !hostnameRegex.test(trimmed) &&
    !ipRegex.test(trimmed) &&
    isIP(trimmed) !== 6
  ) {
    throw new ValidationError(
      'SSH host must be a valid hostname or IP address'
    );
  }

  return trimmed;
}

/**
 * Validates SSH usernames
 */
export function sanitizeSSHUsername(username: string): string {
  if (!username || typeof username !== 'string') {
    throw new ValidationError('SSH username is required');
  }

  const trimmed = username.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH username cannot be empty');
  }

  if (trimmed.length > 32) {
    throw new ValidationError('SSH username cannot exceed 32 characters');
  }

  // Unix username validation
  if (!/^[a-z_][a-z0-9_-]*$/.test(trimmed)) {
    throw new ValidationError('SSH username must be a valid Unix username');
  }

  return trimmed;
}

/**
 * Validates SHA256 host key fingerprints
 */
export function sanitizeFingerprint(fingerprint: string): string {
  try {
    return parseFingerprint(fingerprint).display;
  } catch (error) {
    throw new ValidationError(describeCause(error));
  }
}
