/**
 * Launcher Configuration
 * Resolves environment overrides into an immutable provisioner config, once at startup.
 */

import * as path from 'path';
import { DEFAULT_RELEASE_BASE_URL, normalizeVersion } from '../provisioning/artifact-locator';
import { getExecutableName } from '../provisioning/platform-detector';
import type { ProvisionerConfig } from '../provisioning/types';
import { getDefaultCacheDir } from '../provisioning/version-cache';
import { PACKAGE_ROOT, getVersion } from '../utils/version';

export const BINARY_NAME = 'rulekit';

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;
export const INITIAL_RETRY_DELAY_MS = 5000;
export const RETRY_DELAY_CAP_MS = 30000;

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Directory holding the launcher's package.json */
  packageRoot?: string;
  /** Overrides package.json */
  version?: string;
  hostOs?: string;
}

/** "1" / "true" / "yes" (any case) */
export function parseFlag(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

/** Positive integer, or the fallback for anything else */
export function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return fallback;
  const parsed = Number.parseInt(trimmed, 10);
  return parsed >= 1 ? parsed : fallback;
}

/**
 * Build the launcher configuration from the environment
 */
export function loadLauncherConfig(options: LoadConfigOptions = {}): Readonly<ProvisionerConfig> {
  const env = options.env ?? process.env;
  const packageRoot = options.packageRoot ?? PACKAGE_ROOT;
  const hostOs = options.hostOs ?? process.platform;
  const version = normalizeVersion(options.version ?? getVersion(packageRoot));

  const releaseBaseUrl = env.RULEKIT_RELEASES_URL?.trim() || DEFAULT_RELEASE_BASE_URL;
  const devBinaryPath = env.RULEKIT_DEV
    ? path.join(packageRoot, getExecutableName(BINARY_NAME, hostOs))
    : null;

  return Object.freeze({
    version,
    binaryName: BINARY_NAME,
    releaseBaseUrl,
    cacheDir: getDefaultCacheDir(env, hostOs),
    devBinaryPath,
    maxAttempts: parsePositiveInt(env.RULEKIT_DOWNLOAD_ATTEMPTS, DEFAULT_MAX_ATTEMPTS),
    initialDelayMs: INITIAL_RETRY_DELAY_MS,
    delayCapMs: RETRY_DELAY_CAP_MS,
    requestTimeoutMs: parsePositiveInt(env.RULEKIT_DOWNLOAD_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS),
    verbose: parseFlag(env.RULEKIT_VERBOSE),
    quiet: parseFlag(env.RULEKIT_QUIET),
  });
}
