/**
 * Binary Installer
 * Handles downloading, verifying, and extracting the binary into the cache.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import {
  CacheIOError,
  ChecksumMismatchError,
  ExtractionError,
  ProvisioningError,
  describeError,
  type ProvisioningPhase,
} from '../errors';
import { debugLog } from '../utils/logger';
import { ProgressIndicator } from '../utils/progress-indicator';
import { CHECKSUMS_FILE, locateArtifact } from './artifact-locator';
import {
  createTempDir,
  fetchText,
  fetchWithRetry, type RetryOptions, type Transport } from './downloader';
import { extractExecutable } from './extractor';
import { getExecutableName, resolvePlatform } from './platform-detector';
import type { HostInfo, ProvisionerConfig, RetryCallback, SleepFn } from './types';
import { verifyChecksum } from './verifier';
import type { VersionCache } from './version-cache';

export interface InstallContext {
  config: ProvisionerConfig;
  cache: VersionCache;
  host: HostInfo;
  transport?: Transport;
  sleep?: SleepFn;
  onRetry?: RetryCallback;
}

function retryOptions(ctx: InstallContext): Partial<RetryOptions> {
  const { config } = ctx;
  return {
    maxAttempts: config.maxAttempts,
    initialDelayMs: config.initialDelayMs,
    delayCapMs: config.delayCapMs,
    timeoutMs: config.requestTimeoutMs,
    verbose: config.verbose,
    quiet: config.quiet,
    transport: ctx.transport,
    sleep: ctx.sleep,
    onRetry: ctx.onRetry,
  };
}

/** Give untyped failures the type of the phase they happened in */
function toProvisioningError(
  error: unknown,
  phase: ProvisioningPhase,
  binaryPath: string
): ProvisioningError {
  if (error instanceof ProvisioningError) return error;
  const message = describeError(error);
  switch (phase) {
    case 'extract':
      return new ExtractionError(message, { cause: error });
    case 'cache':
      return new CacheIOError(`Failed to install binary: ${message}`, binaryPath, { cause: error });
    default:
      return new ProvisioningError(message, phase, { cause: error });
  }
}

/**
 * Move the staged executable over the cache path.
 * Permissions are set before the rename so the final path is never non-executable.
 */
async function installStaged(stagingPath: string, binaryPath: string, setMode: boolean): Promise<void> {
  if (setMode) {
    await fs.promises.chmod(stagingPath, 0o755);
  }
  await fs.promises.rename(stagingPath, binaryPath);
}

/**
 * Download, verify and install the binary for the configured version.
 * @returns path of the installed executable
 */
export async function downloadAndInstall(ctx: InstallContext): Promise<string> {
  const { config, cache, host } = ctx;
  const verbose = config.verbose;

  const platform = resolvePlatform(host.platform, host.arch);
  const artifact = locateArtifact(config.version, platform, {
    binaryName: config.binaryName,
    releaseBaseUrl: config.releaseBaseUrl,
  });
  const executableName = getExecutableName(config.binaryName, host.platform);
  const cacheDir = cache.cacheDir();
  const binaryPath = path.join(cacheDir, executableName);
  const retry = retryOptions(ctx);

  debugLog(`Platform: ${platform.os}/${platform.arch}`, verbose);
  debugLog(`Archive: ${artifact.binaryUrl}`, verbose);

  const workDir = await createTempDir('rulekit-install-');
  const archivePath = path.join(workDir, artifact.archiveName);
  const suffix = crypto.randomBytes(4).toString('hex');
  const stagingPath = path.join(cacheDir, `.${executableName}.${process.pid}.${suffix}.partial`);

  const spinner = new ProgressIndicator(`Downloading ${config.binaryName} v${artifact.version}`, {
    quiet: config.quiet,
  });
  spinner.start();
  let phase: ProvisioningPhase = 'download';

  try {
    const manifest = await fetchText(artifact.checksumsUrl, CHECKSUMS_FILE, retry);
    await fetchWithRetry(artifact.binaryUrl, archivePath, artifact.archiveName, retry);

    phase = 'verify';
    spinner.update('Verifying checksum');
    const checksum = await verifyChecksum(archivePath, artifact.archiveName, manifest);
    if (!checksum.valid) {
      await fs.promises.rm(archivePath, { force: true });
      throw new ChecksumMismatchError(artifact.archiveName, checksum.expected, checksum.actual);
    }
    debugLog(`Checksum OK: ${checksum.actual}`, verbose);

    phase = 'extract';
    spinner.update('Extracting binary');
    const bytes = await extractExecutable(
      archivePath,
      artifact.archiveKind,
      executableName,
      stagingPath
    );
    if (bytes === 0) {
      throw new ExtractionError(`Extracted ${executableName} is empty`);
    }

    phase = 'cache';
    await installStaged(stagingPath, binaryPath, platform.os !== 'windows');
    debugLog(`Installed ${binaryPath} (${bytes} bytes)`, verbose);

    // Marker only after the binary is in place
    cache.recordCurrent(config.version);
    spinner.succeed(`${config.binaryName} v${artifact.version} ready`);
    return binaryPath;
  } catch (error) {
    spinner.fail('Installation failed');
    throw toProvisioningError(error, phase, binaryPath);
  } finally {
    await fs.promises.rm(stagingPath, { force: true });
    await fs.promises.rm(workDir, { recursive: true, force: true });
  }
}
