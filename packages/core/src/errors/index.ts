/**
 * Custom Error Classes
 */

import { hasErrorCode } from '@transcode-mirror/utils';

/**
 * Base error class for all transcode-mirror errors
 */
export class TranscodeMirrorError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TranscodeMirrorError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Unreadable or corrupt media; the item is reported, never acted upon
 */
export class ProbeError extends TranscodeMirrorError {
  constructor(path: string, reason: string, cause?: unknown) {
    super(
      `Probe failed for ${path}: ${reason}`,
      'PROBE_ERROR',
      { path, reason },
      { cause }
    );
    this.name = 'ProbeError';
  }
}

/**
 * Encoder failure. Transient failures are retried by the executor.
 */
export class EncodeError extends TranscodeMirrorError {
  public readonly transient: boolean;

  constructor(path: string, reason: string, transient: boolean = false, cause?: unknown) {
    super(
      `Encode failed for ${path}: ${reason}`,
      'ENCODE_ERROR',
      { path, reason, transient },
      { cause }
    );
    this.name = 'EncodeError';
    this.transient = transient;
  }
}

export type FilesystemOperation = 'scan' | 'stat' | 'delete' | 'rename' | 'symlink' | 'mkdir';

/**
 * Permission or IO failure on a filesystem side effect
 */
export class FilesystemError extends TranscodeMirrorError {
  public readonly path: string;
  public readonly operation: FilesystemOperation;

  constructor(operation: FilesystemOperation, path: string, cause: unknown) {
    const errno = cause instanceof Error && 'code' in cause ? String(cause.code) : undefined;
    super(
      `Filesystem ${operation} failed for ${path}${errno ? ` (${errno})` : ''}`,
      'FILESYSTEM_ERROR',
      { path, operation, errno },
      { cause }
    );
    this.name = 'FilesystemError';
    this.path = path;
    this.operation = operation;
  }
}

/**
 * Invalid configuration; fatal at startup
 */
export class ConfigurationError extends TranscodeMirrorError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(
      `Invalid configuration: ${issues.join('; ')}`,
      'CONFIGURATION_ERROR',
      { issues }
    );
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * External command error
 */
export class CommandExecutionError extends TranscodeMirrorError {
  public readonly exitCode: number;

  constructor(
    command: string,
    exitCode: number,
    stderr: string
  ) {
    super(
      `Command failed with exit code ${exitCode}`,
      'COMMAND_EXECUTION_ERROR',
      { command, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'CommandExecutionError';
    this.exitCode = exitCode;
  }
}

const TRANSIENT_ERRNO_CODES = ['EBUSY', 'EAGAIN', 'ENODEV', 'ETIMEDOUT', 'EMFILE', 'ENFILE', 'ETXTBSY'];

/**
 * Whether an error is worth retrying with backoff
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof EncodeError) {
    return error.transient;
  }
  if (error instanceof FilesystemError) {
    return hasErrorCode(error.cause, ...TRANSIENT_ERRNO_CODES);
  }
  return hasErrorCode(error, ...TRANSIENT_ERRNO_CODES);
}
