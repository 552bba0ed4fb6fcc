/**
 * Binary provisioning: resolve, download, verify, extract and cache the rulekit executable.
 */

export * from './types';
export {
  resolvePlatform,
  getExecutableName,
  getArchiveKind,
  isWindowsHost,
} from './platform-detector';
export {
  DEFAULT_RELEASE_BASE_URL,
  CHECKSUMS_FILE,
  normalizeVersion,
  getArchiveName,
  getDownloadUrl,
  getChecksumsUrl,
  getReleasePageUrl,
  locateArtifact,
} from './artifact-locator';
export { computeChecksum, parseChecksum, parseChecksumManifest, verifyChecksum } from './verifier';
export type { ChecksumResult } from './verifier';
export { fetchWithRetry, fetchText, httpTransport, DEFAULT_RETRY_OPTIONS } from './downloader';
export type { Transport, RetryOptions } from './downloader';
export { EXTRACTORS, getExtractor, extractExecutable } from './extractor';
export type { ArchiveExtractor } from './extractor';
export {
  VersionCache,
  FileVersionStore,
  MemoryVersionStore,
  VERSION_MARKER_FILE,
  getDefaultCacheDir,
} from './version-cache';
export type { VersionStore } from './version-cache';
export { downloadAndInstall } from './installer';
export { BinaryProvisioner, ensureBinary, isUsableBinary } from './lifecycle';
export type { ProvisionerDeps } from './lifecycle';
