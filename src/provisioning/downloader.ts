/**
 * Binary Downloader
 * Fetches release files with bounded retries, exponential backoff and redirect following.
 * Every attempt writes into a private temp directory; only a non-empty payload reaches the destination.
 */

import * as fs from 'fs';
import * as http from 'http';
import * as https from 'https';
import * as os from 'os';
import * as path from 'path';
import { CacheIOError, DownloadError, describeError, errorCode, isErrorLike } from '../errors';
import { debugLog } from '../utils/logger';
import type { DownloadResult, RetryCallback, SleepFn } from './types';

const USER_AGENT = 'rulekit-launcher';
const MAX_REDIRECTS = 5;
const REDIRECT_CODES = new Set([301, 302, 303, 307, 308]);

/** Moves bytes from a URL into a local file (single attempt) */
export interface Transport {
  download(url: string, destPath: string, options: { timeoutMs: number }): Promise<void>;
}

export interface RetryOptions {
  /** Total attempts, including the first one */
  maxAttempts: number;
  /** Delay before the first retry (ms) */
  initialDelayMs: number;
  /** Upper bound for the retry delay (ms) */
  delayCapMs: number;
  /** Per-request timeout (ms) */
  timeoutMs: number;
  verbose: boolean;
  /** Suppress the per-attempt failure line */
  quiet: boolean;
  transport: Transport;
  sleep: SleepFn;
  onRetry?: RetryCallback;
}

export const DEFAULT_RETRY_OPTIONS: Omit<RetryOptions, 'transport' | 'sleep'> = {
  maxAttempts: 3,
  initialDelayMs: 5000,
  delayCapMs: 30000,
  timeoutMs: 30000,
  verbose: false,
  quiet: false,
};

/** Thrown for non-200 responses so the status survives to the final DownloadError */
export class HttpStatusError extends Error {
  constructor(
    public readonly statusCode: number,
    statusMessage: string | undefined
  ) {
    super(`HTTP ${statusCode}: ${statusMessage ?? 'Unknown status'}`);
    this.name = 'HttpStatusError';
  }
}

/** Error types for categorized reporting */
export type NetworkErrorType = 'socket' | 'timeout' | 'http' | 'redirect' | 'unknown';

/** Categorize error for reporting */
export function categorizeError(error: Error): NetworkErrorType {
  const msg = error.message.toLowerCase();
  if (msg.includes('socket hang up') || msg.includes('econnreset') || msg.includes('epipe')) {
    return 'socket';
  }
  if (msg.includes('timeout') || msg.includes('etimedout')) {
    return 'timeout';
  }
  if (error instanceof HttpStatusError || msg.startsWith('http ')) {
    return 'http';
  }
  if (msg.includes('redirect')) {
    return 'redirect';
  }
  return 'unknown';
}

/** Get user-friendly error message */
export function getErrorMessage(error: Error, attempt: number, maxAttempts: number): string {
  const prefix = `[Attempt ${attempt}/${maxAttempts}]`;

  switch (categorizeError(error)) {
    case 'socket':
      return `${prefix} Connection dropped: ${error.message}`;
    case 'timeout':
      return `${prefix} Download timed out: ${error.message}`;
    case 'http':
      return `${prefix} Server error: ${error.message}`;
    case 'redirect':
      return `${prefix} Redirect failed: ${error.message}`;
    default:
      return `${prefix} Network error: ${error.message}`;
  }
}

/**
 * Download a URL into destPath, following redirects.
 * The partial file is removed on failure.
 */
export function downloadFile(
  url: string,
  destPath: string,
  timeoutMs = DEFAULT_RETRY_OPTIONS.timeoutMs,
  redirectsLeft = MAX_REDIRECTS
): Promise<void> {
  return new Promise((resolve, reject) => {
    let settled = false;
    let fileStream: fs.WriteStream | null = null;

    // The partial file is closed before it is removed
    const fail = (err: Error) => {
      if (settled) return;
      settled = true;
      req.destroy();
      const removePartial = () => fs.rm(destPath, { force: true }, () => reject(err));
      const out = fileStream;
      if (!out || out.closed) {
        removePartial();
        return;
      }
      out.once('close', removePartial);
      out.destroy();
    };

    const handleResponse = (res: http.IncomingMessage) => {
      const status = res.statusCode ?? 0;

      if (REDIRECT_CODES.has(status)) {
        res.resume();
        const location = res.headers.location;
        if (!location) {
          fail(new Error('Redirect without location header'));
          return;
        }
        if (redirectsLeft <= 0) {
          fail(new Error(`Too many redirects while fetching ${url}`));
          return;
        }
        settled = true;
        const next = new URL(location, url).toString();
        downloadFile(next, destPath, timeoutMs, redirectsLeft - 1).then(resolve, reject);
        return;
      }

      if (status !== 200) {
        res.resume();
        fail(new HttpStatusError(status, res.statusMessage));
        return;
      }

      const out = fs.createWriteStream(destPath);
      fileStream = out;
      res.pipe(out);

      let finished = false;
      out.on('finish', () => {
        finished = true;
      });
      out.on('close', () => {
        if (settled || !finished) return;
        settled = true;
        resolve();
      });
      out.on('error', fail);
      res.on('error', fail);
      res.on('close', () => {
        if (!res.complete) fail(new Error('socket hang up'));
      });
    };

    const protocol = url.startsWith('https:') ? https : http;
    const req = protocol.get(
      url,
      {
        headers: { 'User-Agent': USER_AGENT },
        agent: false, // no pooling, so the process can exit
      },
      handleResponse
    );

    req.on('error', fail);
    req.setTimeout(timeoutMs, () => {
      req.destroy();
      fail(new Error(`Download timeout (${timeoutMs / 1000}s)`));
    });
  });
}

/**
 * Create a scratch directory under the OS temp dir
 * @throws CacheIOError when the temp dir is not writable
 */
export async function createTempDir(prefix: string): Promise<string> {
  try {
    return await fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
  } catch (error) {
    throw new CacheIOError(
      `Failed to create temporary directory: ${describeError(error)}`,
      os.tmpdir(),
      { cause: error }
    );
  }
}

/** Transport backed by Node's http/https */
export const httpTransport: Transport = {
  download: (url, destPath, { timeoutMs }) => downloadFile(url, destPath, timeoutMs),
};

/**
 * Sleep helper
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Next backoff delay: double, capped */
export function nextDelay(currentMs: number, capMs: number): number {
  return Math.min(currentMs * 2, capMs);
}

async function moveFile(from: string, to: string): Promise<void> {
  try {
    await fs.promises.rename(from, to);
  } catch (error) {
    if (errorCode(error) !== 'EXDEV') throw error;
    await fs.promises.copyFile(from, to);
    await fs.promises.rm(from, { force: true });
  }
}

/**
 * Download a file with retry logic and exponential backoff.
 * Any failure (network, non-200, timeout, empty payload) is retried until maxAttempts.
 * @throws DownloadError naming the last cause once every attempt failed
 */
export async function fetchWithRetry(
  url: string,
  destPath: string,
  label: string,
  options: Partial<RetryOptions> = {}
): Promise<DownloadResult> {
  const {
    maxAttempts,
    initialDelayMs,
    delayCapMs,
    timeoutMs,
    verbose,
    quiet,
    transport = httpTransport,
    sleep: wait = sleep,
    onRetry,
  } = { ...DEFAULT_RETRY_OPTIONS, ...options };

  const attempts = Math.max(1, Math.floor(maxAttempts));
  const tempDir = await createTempDir('rulekit-download-');
  const tempPath = path.join(tempDir, 'payload');
  let delay = initialDelayMs;
  let lastError: Error | null = null;

  try {
    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        debugLog(`Fetching ${label} (attempt ${attempt}/${attempts}): ${url}`, verbose);
        await transport.download(url, tempPath, { timeoutMs });

        const { size } = await fs.promises.stat(tempPath);
        if (size === 0) {
          throw new Error('Downloaded file is empty');
        }

        await fs.promises.mkdir(path.dirname(destPath), { recursive: true });
        await moveFile(tempPath, destPath);
        debugLog(`Fetched ${label}: ${size} bytes`, verbose);
        return { filePath: destPath, bytes: size, attempts: attempt };
      } catch (error) {
        lastError = isErrorLike(error) ? error : new Error(describeError(error));
        await fs.promises.rm(tempPath, { force: true });

        if (attempt === attempts) break;

        if (!quiet) console.error(`[rulekit] ${getErrorMessage(lastError, attempt, attempts)}`);
        onRetry?.({ attempt, delayMs: delay, error: lastError });
        debugLog(`Waiting ${delay}ms before retrying ${label}`, verbose);
        await wait(delay);
        delay = nextDelay(delay, delayCapMs);
      }
    }
  } finally {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  }

  const cause = lastError ?? new Error('Unknown error');
  throw new DownloadError(
    `Failed to download ${label} after ${attempts} attempts: ${cause.message}`,
    url,
    attempts,
    {
      cause,
      statusCode: cause instanceof HttpStatusError ? cause.statusCode : undefined,
    }
  );
}

/**
 * Fetch a small text payload (e.g. the checksum manifest) through fetchWithRetry
 */
export async function fetchText(
  url: string,
  label: string,
  options: Partial<RetryOptions> = {}
): Promise<string> {
  const dir = await createTempDir('rulekit-text-');
  try {
    const { filePath } = await fetchWithRetry(url, path.join(dir, 'content'), label, options);
    return await fs.promises.readFile(filePath, 'utf8');
  } finally {
    await fs.promises.rm(dir, { recursive: true, force: true });
  }
}
