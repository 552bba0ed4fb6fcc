/**
 * Provisioning Errors
 *
 * Typed failures raised while provisioning the rulekit binary, plus the
 * user-facing diagnostic renderer used by the launcher entry points.
 */

import { errorBox } from './utils/ui';

/** Exit code used when the binary could not be provisioned */
export const EXIT_PROVISIONING_FAILED = 69;

export type ProvisioningPhase = 'platform' | 'download' | 'verify' | 'extract' | 'cache';

/**
 * Base class for every provisioning failure.
 * `remediationUrl` is attached by the provisioner once the release is known.
 */
export class ProvisioningError extends Error {
  remediationUrl: string | null = null;

  constructor(
    message: string,
    public readonly phase: ProvisioningPhase,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProvisioningError';
  }

  withRemediationUrl(url: string): this {
    if (!this.remediationUrl) this.remediationUrl = url;
    return this;
  }
}

export class UnsupportedPlatformError extends ProvisioningError {
  constructor(
    message: string,
    public readonly hostOs: string,
    public readonly hostArch: string
  ) {
    super(message, 'platform');
    this.name = 'UnsupportedPlatformError';
  }
}

export class DownloadError extends ProvisioningError {
  readonly statusCode?: number;

  constructor(
    message: string,
    public readonly url: string,
    public readonly attempts: number,
    options?: { cause?: unknown; statusCode?: number }
  ) {
    super(message, 'download', { cause: options?.cause });
    this.name = 'DownloadError';
    this.statusCode = options?.statusCode;
  }
}

export class ChecksumMismatchError extends ProvisioningError {
  constructor(
    public readonly fileName: string,
    public readonly expected: string | null,
    public readonly actual: string | null
  ) {
    super(
      expected
        ? `Checksum mismatch for ${fileName}\nExpected: ${expected}\nActual:   ${actual ?? '(not computed)'}`
        : `No checksum entry for ${fileName} in the release manifest`,
      'verify'
    );
    this.name = 'ChecksumMismatchError';
  }
}

export class ExtractionError extends ProvisioningError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'extract', options);
    this.name = 'ExtractionError';
  }
}

export class CacheIOError extends ProvisioningError {
  constructor(
    message: string,
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'cache', options);
    this.name = 'CacheIOError';
  }
}

/**
 * Error check that also holds for errors raised by Node internals,
 * which are not `instanceof Error` under a separate vm context (Jest)
 */
export function isErrorLike(value: unknown): value is Error {
  return (
    typeof value === 'object' &&
    value !== null &&
    'message' in value &&
    typeof value.message === 'string' &&
    'name' in value &&
    typeof value.name === 'string'
  );
}

/** Human readable cause of an unknown thrown value */
export function describeError(error: unknown): string {
  return isErrorLike(error) ? error.message : String(error);
}

/** errno-style code of a thrown value (ENOENT, EXDEV, ...) */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

function headline(error: ProvisioningError): string {
  if (error instanceof UnsupportedPlatformError) return 'Unsupported platform';
  if (error instanceof DownloadError) return 'Download failed';
  if (error instanceof ChecksumMismatchError) return 'Integrity check failed';
  if (error instanceof ExtractionError) return 'Archive does not contain the expected binary';
  if (error instanceof CacheIOError) return 'Cannot write to the binary cache';
  return 'Provisioning failed';
}

/**
 * Render a single diagnostic for a failure (no stack trace).
 */
export function formatDiagnostic(error: unknown): string {
  if (!(error instanceof ProvisioningError)) {
    return `Unexpected error: ${describeError(error)}`;
  }

  const lines = [`${headline(error)}: ${error.message}`];
  if (error instanceof CacheIOError) {
    lines.push(`Path: ${error.path}`);
  }
  if (error.remediationUrl) {
    lines.push('', 'You can download the binary manually from:', error.remediationUrl);
  }
  return lines.join('\n');
}

/**
 * Print the diagnostic for a failure to stderr.
 * @returns exit code the caller should terminate with
 */
export function handleError(error: unknown): number {
  console.error(errorBox(formatDiagnostic(error)));
  return EXIT_PROVISIONING_FAILED;
}
