/**
 * Binary Lifecycle Manager
 * Decides between the development binary, a current cache entry and a fresh install.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ProvisioningError, describeError } from '../errors';
import { debugLog } from '../utils/logger';
import { warn } from '../utils/ui';
import { getReleasePageUrl } from './artifact-locator';
import type { Transport } from './downloader';
import { downloadAndInstall } from './installer';
import { getExecutableName, isWindowsHost } from './platform-detector';
import type {
  HostInfo,
  ProvisionState,
  ProvisionerConfig,
  RetryCallback,
  SleepFn,
} from './types';
import { VersionCache, type VersionStore } from './version-cache';

/** Collaborators replaced in tests */
export interface ProvisionerDeps {
  transport?: Transport;
  sleep?: SleepFn;
  store?: VersionStore;
  host?: HostInfo;
  onRetry?: RetryCallback;
}

/**
 * Regular, non-empty file the current user may execute
 */
export function isUsableBinary(filePath: string, hostOs: string = process.platform): boolean {
  try {
    const stat = fs.statSync(filePath);
    if (!stat.isFile() || stat.size === 0) return false;
    if (!isWindowsHost(hostOs)) fs.accessSync(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export class BinaryProvisioner {
  private state: ProvisionState = 'needs-verification';
  private readonly cache: VersionCache;
  private readonly host: HostInfo;

  constructor(
    private readonly config: ProvisionerConfig,
    private readonly deps: ProvisionerDeps = {}
  ) {
    this.cache = new VersionCache(config.cacheDir, deps.store);
    this.host = deps.host ?? { platform: process.platform, arch: process.arch };
  }

  getState(): ProvisionState {
    return this.state;
  }

  /** Where the cached executable lives for this host */
  getBinaryPath(): string {
    return path.join(
      this.config.cacheDir,
      getExecutableName(this.config.binaryName, this.host.platform)
    );
  }

  /**
   * Ensure a usable binary for the configured version.
   * A current cache entry returns without any network access.
   * @returns path to the executable
   * @throws ProvisioningError carrying the release page URL
   */
  async ensureBinary(): Promise<string> {
    const { config } = this;
    const verbose = config.verbose;
    this.state = 'needs-verification';

    if (config.devBinaryPath) {
      if (isUsableBinary(config.devBinaryPath, this.host.platform)) {
        debugLog(`Using development binary: ${config.devBinaryPath}`, verbose);
        this.state = 'valid-cache-hit';
        return config.devBinaryPath;
      }
      if (!config.quiet) {
        console.error(
          warn(`Development binary not found at ${config.devBinaryPath}, using the cache`)
        );
      }
    }

    const binaryPath = this.getBinaryPath();

    try {
      if (isUsableBinary(binaryPath, this.host.platform) && this.cache.isCurrent(config.version)) {
        debugLog(`Binary is current (v${config.version}): ${binaryPath}`, verbose);
        this.state = 'valid-cache-hit';
        return binaryPath;
      }

      this.state = 'needs-download';
      debugLog(
        `Binary missing or stale (recorded: ${this.cache.readRecordedVersion() ?? 'none'}), downloading...`,
        verbose
      );

      const installed = await downloadAndInstall({
        config,
        cache: this.cache,
        host: this.host,
        transport: this.deps.transport,
        sleep: this.deps.sleep,
        onRetry: this.deps.onRetry,
      });
      this.state = 'provisioned';
      return installed;
    } catch (error) {
      this.state = 'failed';
      const failure =
        error instanceof ProvisioningError
          ? error
          : new ProvisioningError(describeError(error), 'cache', { cause: error });
      throw failure.withRemediationUrl(
        getReleasePageUrl(config.version, { releaseBaseUrl: config.releaseBaseUrl })
      );
    }
  }
}

/**
 * Ensure binary is available (download if missing or stale)
 * @returns Path to executable binary
 */
export function ensureBinary(config: ProvisionerConfig, deps: ProvisionerDeps = {}): Promise<string> {
  return new BinaryProvisioner(config, deps).ensureBinary();
}
